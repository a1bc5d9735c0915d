/**
 * OAuth client configuration
 * Immutable once built at process start
 */

export const DEFAULT_OAUTH_SCOPES: readonly string[] = ['all-apis', 'offline_access'];

export interface OAuthClientConfig {
  readonly host: string;
  readonly clientId: string;
  readonly clientSecret?: string;
  readonly redirectUrl: string;
  readonly scopes: readonly string[];
}

export interface OAuthClientConfigInput {
  host: string;
  clientId: string;
  clientSecret?: string;
  port: number;
  scopes?: readonly string[];
}

/**
 * Local redirect URL registered with the OAuth application
 */
export function callbackUrlForPort(port: number): string {
  return `http://localhost:${port}/callback`;
}

export function buildOAuthClientConfig(input: OAuthClientConfigInput): OAuthClientConfig {
  const requested = input.scopes && input.scopes.length > 0 ? input.scopes : DEFAULT_OAUTH_SCOPES;
  // Refresh tokens are only issued for offline_access
  const scopes = requested.includes('offline_access') ? [...requested] : [...requested, 'offline_access'];

  return Object.freeze({
    host: input.host,
    clientId: input.clientId,
    clientSecret: input.clientSecret,
    redirectUrl: callbackUrlForPort(input.port),
    scopes: Object.freeze(scopes),
  });
}
