/**
 * Builds the demo server from validated configuration
 */

import { randomBytes } from 'node:crypto';
import { OAuthClient, SessionCredentialStore } from '@warehouse-oauth-demo/auth';
import { ConfigurationError, buildOAuthClientConfig, type ServerConfig } from '@warehouse-oauth-demo/config';
import { WarehouseDemoServer } from '@warehouse-oauth-demo/http-server';
import { logger } from '@warehouse-oauth-demo/observability';
import { BrowserSessionManager, MemorySessionStore, setLogger } from '@warehouse-oauth-demo/persistence';
import { StatementExecutionClient } from '@warehouse-oauth-demo/sql';

export function provisionHint(profile: string): string {
  return `Register an OAuth application first with \`npm run provision -- --profile ${profile}\`, ` +
    'then pass --client-id and --client-secret (or DATABRICKS_CLIENT_ID and DATABRICKS_CLIENT_SECRET).';
}

export interface BootstrapOptions {
  /** Cookie signing secret (default: 32 random bytes per process) */
  sessionSecret?: string;
  /** Interface to listen on; the redirect URL always names localhost */
  listenHost?: string;
  fetch?: typeof fetch;
}

export function generateSessionSecret(): string {
  return randomBytes(32).toString('hex');
}

/**
 * Route persistence-layer logs into the application logger
 */
export function connectPersistenceLogger(): void {
  setLogger({
    debug: (message, meta) => logger.debug(message, meta),
    info: (message, meta) => logger.info(message, meta),
    warn: (message, meta) => logger.warn(message, meta),
    error: (message, meta) => logger.error(message, meta),
  });
}

export function createWarehouseDemoServer(config: ServerConfig, options: BootstrapOptions = {}): WarehouseDemoServer {
  if (!config.clientId) {
    throw new ConfigurationError(`No OAuth client id configured. ${provisionHint(config.profile)}`, [
      'clientId: OAuth client id is required (--client-id or DATABRICKS_CLIENT_ID)'
    ]);
  }

  connectPersistenceLogger();

  const oauthClient = new OAuthClient(
    buildOAuthClientConfig({
      host: config.host,
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      port: config.port,
    }),
    { fetch: options.fetch }
  );
  const sessions = new BrowserSessionManager(new MemorySessionStore());

  return new WarehouseDemoServer({
    port: config.port,
    host: options.listenHost ?? 'localhost',
    sessionSecret: options.sessionSecret ?? generateSessionSecret(),
    sessions,
    oauthClient,
    credentialStore: new SessionCredentialStore(oauthClient, sessions),
    statementClient: new StatementExecutionClient({
      host: config.host,
      warehouseId: config.warehouseId,
      fetch: options.fetch,
    }),
  });
}
