/**
 * @warehouse-oauth-demo/http-server
 *
 * Express app for the warehouse query demo: login redirect, OAuth callback,
 * query form and result table, logout and health routes.
 */

export { WarehouseDemoServer } from './server/web-server.js';
export type { WarehouseDemoServerOptions } from './server/web-server.js';
export type { RouteDependencies } from './server/routes/types.js';
export * from './server/responses/error-response.js';
export * from './server/responses/health-response.js';
export * from './session/index.js';
export * from './views/html.js';
export * from './views/result-table.js';
export * from './views/index-page.js';
export * from './views/error-page.js';
