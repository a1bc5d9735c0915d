/**
 * @warehouse-oauth-demo/config
 * Server settings and OAuth client configuration
 */

export * from './server-config.js';
export * from './oauth-client-config.js';
