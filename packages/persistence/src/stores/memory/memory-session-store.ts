/**
 * In-Memory Browser Session Store
 *
 * Map-based storage for serialized session records. Suitable for the
 * single-process demo server and for tests.
 *
 * WARNING: All sessions are lost on server restart!
 */

import type { SessionStore } from '../../interfaces/session-store.js';
import { logger } from '../../logger.js';

interface StoredRecord {
  record: string;
  expiresAt: number;
}

export class MemorySessionStore implements SessionStore {
  private readonly records = new Map<string, StoredRecord>();
  private cleanupInterval?: NodeJS.Timeout;

  constructor(cleanupIntervalMs: number = 5 * 60 * 1000) {
    this.cleanupInterval = setInterval(() => {
      this.cleanup().catch((error: unknown) => {
        logger.error('Session cleanup failed', { error: error instanceof Error ? error.message : String(error) });
      });
    }, cleanupIntervalMs);
    if (typeof this.cleanupInterval.unref === 'function') {
      this.cleanupInterval.unref();
    }
  }

  async get(sessionId: string): Promise<string | undefined> {
    const stored = this.records.get(sessionId);
    if (!stored) {
      return undefined;
    }

    if (stored.expiresAt <= Date.now()) {
      this.records.delete(sessionId);
      logger.debug('Session expired', {
        sessionId: sessionId.substring(0, 8) + '...',
        expiredAt: new Date(stored.expiresAt).toISOString()
      });
      return undefined;
    }

    return stored.record;
  }

  async set(sessionId: string, record: string, expiresAt: number): Promise<void> {
    this.records.set(sessionId, { record, expiresAt });
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.records.delete(sessionId);
  }

  async cleanup(): Promise<number> {
    const now = Date.now();
    let cleanedCount = 0;

    for (const [sessionId, stored] of this.records.entries()) {
      if (stored.expiresAt <= now) {
        this.records.delete(sessionId);
        cleanedCount++;
      }
    }

    if (cleanedCount > 0) {
      logger.info('Expired sessions cleanup completed', {
        cleanedCount,
        remainingCount: this.records.size
      });
    }

    return cleanedCount;
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  dispose(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
    this.records.clear();
  }
}
