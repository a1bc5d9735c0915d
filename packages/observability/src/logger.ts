/**
 * Structured logging with Pino
 *
 * Sensitive keys are redacted in every environment: access tokens, refresh
 * tokens, PKCE verifiers and client secrets never reach a log line.
 */

import pino from 'pino';
import { getObservabilityConfig, type ObservabilityConfig } from './config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'verifier', 'credential', 'authorization', 'cookie', 'apikey'];

export function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some(sensitiveKey => lowerKey.includes(sensitiveKey));
}

/**
 * Replace values under sensitive keys with [REDACTED], recursively
 */
export function redactSensitive(obj: unknown, visited: WeakSet<object> = new WeakSet()): unknown {
  if (typeof obj !== 'object' || obj === null) {
    return obj;
  }

  if (visited.has(obj)) {
    return '[Circular Reference]';
  }
  visited.add(obj);

  if (Array.isArray(obj)) {
    return obj.map(item => redactSensitive(item, visited));
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key)) {
      sanitized[key] = '[REDACTED]';
    } else if (typeof value === 'object' && value !== null) {
      sanitized[key] = redactSensitive(value, visited);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

/**
 * Application logger backed by Pino
 */
export class ObservabilityLogger {
  private pino: pino.Logger;
  private config: ObservabilityConfig;
  private isProduction: boolean;

  /**
   * @param destination - Explicit output stream; bypasses transports and test silencing
   */
  constructor(config?: ObservabilityConfig, destination?: pino.DestinationStream) {
    this.config = config ?? getObservabilityConfig();
    this.isProduction = this.config.environment === 'production';
    this.pino = this.createPinoLogger(destination);
  }

  private createPinoLogger(destination?: pino.DestinationStream): pino.Logger {
    const baseOptions: pino.LoggerOptions = {
      level: this.config.logLevel,
      base: { service: this.config.service.name },
      formatters: {
        level: (label) => ({ level: label }),
      },
    };

    if (destination) {
      return pino(baseOptions, destination);
    }

    // Keep test output concise
    if (this.config.environment === 'test') {
      return pino({ level: 'silent' });
    }

    if (this.config.exporters.console) {
      // Transports run in a worker thread and cannot take custom formatters
      return pino({
        level: this.config.logLevel,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2
          }
        }
      });
    }

    return pino(baseOptions);
  }

  /**
   * Scrub free-text messages in production, redact structured data everywhere
   */
  private sanitize(message: string, data?: unknown): { message: string; data?: unknown } {
    const sanitizedData = data === undefined ? undefined : redactSensitive(data);

    if (!this.isProduction) {
      return { message, data: sanitizedData };
    }

    const sanitizedMessage = message
      .replace(/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}\b/g, '[EMAIL]')
      .replace(/Bearer\s+[A-Za-z0-9\-._~+/]+=*/g, 'Bearer [TOKEN]')
      .replace(/[A-Za-z0-9\-._~+/]{32,}/g, '[TOKEN]');

    return { message: sanitizedMessage, data: sanitizedData };
  }

  private toBindings(data: unknown): Record<string, unknown> {
    if (data === undefined) {
      return {};
    }
    if (typeof data === 'object' && data !== null && !Array.isArray(data)) {
      return { ...data };
    }
    return { data };
  }

  debug(message: string, data?: unknown): void {
    const sanitized = this.sanitize(message, data);
    this.pino.debug(this.toBindings(sanitized.data), sanitized.message);
  }

  info(message: string, data?: unknown): void {
    const sanitized = this.sanitize(message, data);
    this.pino.info(this.toBindings(sanitized.data), sanitized.message);
  }

  warn(message: string, data?: unknown): void {
    const sanitized = this.sanitize(message, data);
    this.pino.warn(this.toBindings(sanitized.data), sanitized.message);
  }

  error(message: string, error?: Error | unknown): void {
    const { message: sanitizedMessage } = this.sanitize(message);

    if (error instanceof Error) {
      const errorInfo = this.isProduction
        ? { name: error.name, message: error.message }
        : { name: error.name, message: error.message, stack: error.stack };
      this.pino.error({ err: errorInfo }, sanitizedMessage);
    } else if (error !== undefined) {
      this.pino.error(this.toBindings(redactSensitive(error)), sanitizedMessage);
    } else {
      this.pino.error(sanitizedMessage);
    }
  }

  // OAuth flow logging
  oauthDebug(message: string, data?: unknown): void {
    this.debug(`[OAuth] ${message}`, data);
  }

  oauthInfo(message: string, data?: unknown): void {
    this.info(`[OAuth] ${message}`, data);
  }

  oauthWarn(message: string, data?: unknown): void {
    this.warn(`[OAuth] ${message}`, data);
  }

  oauthError(message: string, error?: Error | unknown): void {
    this.error(`[OAuth] ${message}`, error);
  }

  // Statement execution logging
  sqlInfo(message: string, data?: unknown): void {
    this.info(`[SQL] ${message}`, data);
  }

  sqlError(message: string, error?: Error | unknown): void {
    this.error(`[SQL] ${message}`, error);
  }
}

let loggerInstance: ObservabilityLogger | null = null;

export function getLogger(): ObservabilityLogger {
  if (!loggerInstance) {
    loggerInstance = new ObservabilityLogger();
  }
  return loggerInstance;
}

export const logger = getLogger();
