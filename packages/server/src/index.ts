/**
 * @warehouse-oauth-demo/server
 *
 * Command line and wiring for the demo server; `main.ts` is the executable.
 */

export { createServerProgram, parseServerArgs } from './cli.js';
export {
  connectPersistenceLogger,
  createWarehouseDemoServer,
  generateSessionSecret,
  provisionHint,
  type BootstrapOptions
} from './bootstrap.js';
