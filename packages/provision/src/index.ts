/**
 * @warehouse-oauth-demo/provision
 *
 * Registers the demo as a confidential OAuth application on an account;
 * `main.ts` is the executable.
 */

export * from './errors.js';
export * from './profile.js';
export * from './account-client.js';
export * from './provision.js';
export * from './cli.js';
