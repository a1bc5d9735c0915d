/**
 * Logger hook for the persistence package
 *
 * Silent until the application injects its logger with setLogger().
 */

export interface PersistenceLogger {
  info(_message: string, _meta?: Record<string, unknown>): void;
  warn(_message: string, _meta?: Record<string, unknown>): void;
  error(_message: string, _meta?: Record<string, unknown>): void;
  debug(_message: string, _meta?: Record<string, unknown>): void;
}

const silentLogger: PersistenceLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

let loggerInstance: PersistenceLogger = silentLogger;

export function setLogger(logger: PersistenceLogger): void {
  loggerInstance = logger;
}

/**
 * Delegates to whichever logger is current at call time
 */
export const logger: PersistenceLogger = {
  info: (message, meta) => loggerInstance.info(message, meta),
  warn: (message, meta) => loggerInstance.warn(message, meta),
  error: (message, meta) => loggerInstance.error(message, meta),
  debug: (message, meta) => loggerInstance.debug(message, meta),
};
