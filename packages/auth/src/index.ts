/**
 * @warehouse-oauth-demo/auth
 *
 * OAuth 2.0 Authorization Code flow with PKCE against a workspace host,
 * with credentials kept in the browser session
 */

export * from './errors.js';
export * from './pkce.js';
export * from './authorization-url.js';
export * from './types.js';
export { OAuthClient } from './oauth-client.js';
export type { OAuthClientOptions } from './oauth-client.js';
export { SessionCredentialStore } from './session-credential-store.js';
export type { SessionCredentialStoreOptions } from './session-credential-store.js';
