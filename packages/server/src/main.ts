#!/usr/bin/env node

import { CommanderError } from 'commander';
import { ConfigurationError, loadServerConfig } from '@warehouse-oauth-demo/config';
import { logger } from '@warehouse-oauth-demo/observability';
import { createWarehouseDemoServer } from './bootstrap.js';
import { parseServerArgs } from './cli.js';

async function main(): Promise<void> {
  const config = loadServerConfig(parseServerArgs(process.argv.slice(2)));
  const server = createWarehouseDemoServer(config);

  await server.start();
  logger.info('Open the demo in a browser', {
    url: `http://localhost:${config.port}`,
    host: config.host,
    warehouseId: config.warehouseId
  });

  // Handle graceful shutdown
  const handleShutdown = async (signal: string) => {
    logger.info('Received shutdown signal, shutting down gracefully', { signal });
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void handleShutdown('SIGINT'));
  process.on('SIGTERM', () => void handleShutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  if (error instanceof ConfigurationError) {
    logger.error(error.message, { issues: error.issues });
    process.exit(1);
  }
  logger.error('Server startup failed', error);
  process.exit(1);
});
