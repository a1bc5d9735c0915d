/**
 * Session Credential Store
 *
 * Credentials live in the browser session. Reads that find them expired
 * refresh in place while holding the session lock, so concurrent requests on
 * one session see a single refresh.
 */

import { logger } from '@warehouse-oauth-demo/observability';
import type { BrowserSessionManager, Credentials } from '@warehouse-oauth-demo/persistence';
import type { OAuthClient } from './oauth-client.js';

export interface SessionCredentialStoreOptions {
  /**
   * Treat credentials as expired this long before their real expiry (default: 60 seconds).
   * Never more than half the issued lifetime.
   */
  expiryBufferMs?: number;
}

export class SessionCredentialStore {
  private readonly expiryBufferMs: number;

  constructor(
    private readonly oauthClient: Pick<OAuthClient, 'refresh'>,
    private readonly sessions: BrowserSessionManager,
    options: SessionCredentialStoreOptions = {}
  ) {
    this.expiryBufferMs = options.expiryBufferMs ?? 60 * 1000;
  }

  isExpired(credentials: Credentials, now: number = Date.now()): boolean {
    return credentials.expiresAt - this.bufferFor(credentials) <= now;
  }

  private bufferFor(credentials: Credentials): number {
    if (credentials.issuedAt === undefined) {
      return this.expiryBufferMs;
    }
    const lifetime = Math.max(credentials.expiresAt - credentials.issuedAt, 0);
    return Math.min(this.expiryBufferMs, Math.floor(lifetime / 2));
  }

  /**
   * Current credentials for a session, refreshed when expired.
   *
   * @returns undefined when the session must log in again
   */
  async getOrRefresh(sessionId: string): Promise<Credentials | undefined> {
    return this.sessions.update(sessionId, async (session): Promise<Credentials | undefined> => {
      const credentials = session.credentials;
      if (!credentials) {
        return undefined;
      }

      if (!this.isExpired(credentials)) {
        return credentials;
      }

      if (!credentials.refreshToken) {
        logger.oauthInfo('Credentials expired without a refresh token, login required');
        delete session.credentials;
        return undefined;
      }

      try {
        const refreshed = await this.oauthClient.refresh(credentials);
        session.credentials = refreshed;
        return refreshed;
      } catch (error) {
        logger.oauthWarn('Token refresh failed, clearing session credentials', {
          reason: error instanceof Error ? error.message : String(error)
        });
        delete session.credentials;
        return undefined;
      }
    });
  }

  /**
   * Store freshly exchanged credentials
   * @returns false when the session no longer exists
   */
  async store(sessionId: string, credentials: Credentials): Promise<boolean> {
    const stored = await this.sessions.update(sessionId, (session) => {
      session.credentials = credentials;
      return true;
    });
    return stored ?? false;
  }
}
