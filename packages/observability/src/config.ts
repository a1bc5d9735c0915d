/**
 * Observability configuration with environment detection
 */

import type { LogLevel } from './logger.js';

export interface ObservabilityConfig {
  environment: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  exporters: {
    console: boolean;
  };
  service: {
    name: string;
  };
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Detect deployment environment
 */
export function detectEnvironment(env: NodeJS.ProcessEnv = process.env): 'development' | 'production' | 'test' {
  if (env.NODE_ENV === 'test') {
    return 'test';
  }
  if (env.NODE_ENV === 'production') {
    return 'production';
  }
  return 'development';
}

/**
 * Get observability configuration based on environment
 */
export function getObservabilityConfig(env: NodeJS.ProcessEnv = process.env): ObservabilityConfig {
  const environment = detectEnvironment(env);
  const requestedLevel = env.LOG_LEVEL?.toLowerCase();

  return {
    environment,
    logLevel: isLogLevel(requestedLevel) ? requestedLevel : environment === 'development' ? 'debug' : 'info',
    exporters: {
      // Pretty console output in development only; production emits JSON lines
      console: environment === 'development',
    },
    service: {
      name: env.SERVICE_NAME ?? 'warehouse-oauth-demo',
    },
  };
}
