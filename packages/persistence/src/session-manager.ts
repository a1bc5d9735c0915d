/**
 * Browser Session Manager
 *
 * Owns the typed BrowserSession records behind a SessionStore. Every mutation
 * goes through update(), which holds the session's lock for the whole
 * read-modify-write so concurrent requests on one session cannot interleave.
 */

import { randomUUID } from 'node:crypto';
import type { SessionStore } from './interfaces/session-store.js';
import { KeyedLock } from './keyed-lock.js';
import { logger } from './logger.js';
import { SessionDecodeError, parseSession, serializeSession } from './session-serialization.js';
import type { BrowserSession } from './types.js';

export interface BrowserSessionManagerOptions {
  /** Session lifetime in milliseconds (default: 24 hours) */
  ttlMs?: number;
}

export class BrowserSessionManager {
  private readonly ttlMs: number;
  private readonly lock = new KeyedLock();

  constructor(private readonly store: SessionStore, options: BrowserSessionManagerOptions = {}) {
    this.ttlMs = options.ttlMs ?? 24 * 60 * 60 * 1000;
  }

  async createSession(): Promise<BrowserSession> {
    const now = Date.now();
    const session: BrowserSession = {
      sessionId: randomUUID(),
      createdAt: now,
      expiresAt: now + this.ttlMs,
      flashes: [],
    };

    await this.store.set(session.sessionId, serializeSession(session), session.expiresAt);
    logger.debug('Created browser session', { sessionId: session.sessionId.substring(0, 8) + '...' });
    return session;
  }

  async getSession(sessionId: string): Promise<BrowserSession | undefined> {
    return this.read(sessionId);
  }

  /**
   * Apply a mutation to a session under its lock and persist the result.
   * Nothing is written when the mutator throws.
   *
   * @returns the mutator's result, or undefined when the session does not exist
   */
  async update<T>(sessionId: string, mutator: (session: BrowserSession) => T | Promise<T>): Promise<T | undefined> {
    return this.lock.run(sessionId, async () => {
      const session = await this.read(sessionId);
      if (!session) {
        return undefined;
      }

      const result = await mutator(session);
      await this.store.set(sessionId, serializeSession(session), session.expiresAt);
      return result;
    });
  }

  async destroySession(sessionId: string): Promise<boolean> {
    const existed = await this.lock.run(sessionId, () => this.store.delete(sessionId));
    if (existed) {
      logger.debug('Destroyed browser session', { sessionId: sessionId.substring(0, 8) + '...' });
    }
    return existed;
  }

  async getSessionCount(): Promise<number> {
    return this.store.count();
  }

  dispose(): void {
    this.store.dispose();
  }

  private async read(sessionId: string): Promise<BrowserSession | undefined> {
    const raw = await this.store.get(sessionId);
    if (raw === undefined) {
      return undefined;
    }

    try {
      return parseSession(raw);
    } catch (error) {
      if (!(error instanceof SessionDecodeError)) {
        throw error;
      }
      logger.warn('Discarding unreadable session record', {
        sessionId: sessionId.substring(0, 8) + '...',
        issues: error.issues
      });
      await this.store.delete(sessionId);
      return undefined;
    }
  }
}
