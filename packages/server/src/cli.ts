/**
 * Command-line options for the demo server. Every flag falls back to an
 * environment variable, so nothing gets a commander default here.
 */

import { Command } from 'commander';
import type { ServerCliOptions } from '@warehouse-oauth-demo/config';

export function createServerProgram(): Command {
  return new Command()
    .name('warehouse-oauth-demo')
    .description('Sign in to a workspace with OAuth (PKCE) and run SQL on a warehouse with your own credentials')
    .option('--host <url>', 'Workspace host (env: DATABRICKS_HOST)')
    .option('--client-id <id>', 'OAuth application client id (env: DATABRICKS_CLIENT_ID)')
    .option('--client-secret <secret>', 'OAuth application client secret (env: DATABRICKS_CLIENT_SECRET)')
    .option('--warehouse-id <id>', 'SQL warehouse to run statements on (env: DATABRICKS_WAREHOUSE_ID)')
    .option('--port <port>', 'Local port, also used in the OAuth redirect URL (env: PORT, default: 5001)')
    .option('--profile <name>', 'Account profile named in the provisioning hint (env: DATABRICKS_CONFIG_PROFILE, default: DEFAULT)');
}

/**
 * Parse user arguments (without the node and script entries).
 * Throws CommanderError for --help and unknown options instead of exiting.
 */
export function parseServerArgs(argv: readonly string[]): ServerCliOptions {
  const program = createServerProgram().exitOverride();
  program.parse([...argv], { from: 'user' });
  return program.opts<ServerCliOptions>();
}
