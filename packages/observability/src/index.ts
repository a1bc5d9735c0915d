/**
 * @warehouse-oauth-demo/observability
 * Pino-backed logging shared by every package
 */

export * from './config.js';
export * from './logger.js';
