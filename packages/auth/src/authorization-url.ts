import type { OAuthClientConfig } from '@warehouse-oauth-demo/config';

/**
 * Build authorization URL with PKCE
 */
export function buildAuthorizationUrl(
  authorizationEndpoint: string,
  config: Pick<OAuthClientConfig, 'clientId' | 'redirectUrl' | 'scopes'>,
  challenge: string,
  state: string
): string {
  const url = new URL(authorizationEndpoint);
  url.searchParams.set('client_id', config.clientId);
  url.searchParams.set('redirect_uri', config.redirectUrl);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('scope', config.scopes.join(' '));
  url.searchParams.set('state', state);
  url.searchParams.set('code_challenge', challenge);
  url.searchParams.set('code_challenge_method', 'S256');

  return url.toString();
}
