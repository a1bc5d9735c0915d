/**
 * @warehouse-oauth-demo/persistence
 *
 * Typed browser sessions (consent, credentials, flash messages) over a
 * pluggable string-record store.
 *
 * ```typescript
 * import { BrowserSessionManager, MemorySessionStore, setLogger } from '@warehouse-oauth-demo/persistence';
 *
 * setLogger(myLogger);
 * const sessions = new BrowserSessionManager(new MemorySessionStore());
 * const session = await sessions.createSession();
 * ```
 */

export * from './types.js';
export * from './session-serialization.js';
export * from './interfaces/session-store.js';
export * from './stores/memory/memory-session-store.js';
export * from './keyed-lock.js';
export * from './session-manager.js';
export * from './logger.js';
