/**
 * @warehouse-oauth-demo/sql
 *
 * SQL Statement Execution API client
 */

export * from './types.js';
export * from './errors.js';
export { StatementExecutionClient } from './statement-client.js';
export type { StatementExecutionClientOptions } from './statement-client.js';
