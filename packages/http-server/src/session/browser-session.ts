/**
 * Browser session cookie middleware
 *
 * The cookie carries only the session id, signed by cookie-parser with the
 * server's secret. Everything else lives server-side in the session manager.
 */

import type { CookieOptions, NextFunction, Request, Response } from 'express';
import { logger } from '@warehouse-oauth-demo/observability';
import type { BrowserSessionManager } from '@warehouse-oauth-demo/persistence';

/**
 * Extend Express Request with the resolved browser session id
 */
declare global {
   
  namespace Express {
    interface Request {
      sessionId?: string;
    }
  }
}

export const SESSION_COOKIE_NAME = 'wod.sid';

export interface BrowserSessionOptions {
  /** Mark the cookie Secure (only when served over HTTPS) */
  secureCookies?: boolean;
}

function cookieOptions(options: BrowserSessionOptions): CookieOptions {
  return {
    httpOnly: true,
    sameSite: 'lax',
    secure: options.secureCookies ?? false,
    path: '/',
  };
}

/**
 * Session id from a validly signed cookie; tampered or unsigned values read as absent
 */
export function readSessionCookie(req: Request): string | undefined {
  const signedCookies: Record<string, unknown> = req.signedCookies ?? {};
  const value = signedCookies[SESSION_COOKIE_NAME];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Resolve the caller's session, creating one (and setting the cookie) when
 * the cookie is missing, tampered with or points at an expired session
 */
export function browserSession(sessions: BrowserSessionManager, options: BrowserSessionOptions = {}) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const cookieSessionId = readSessionCookie(req);
      if (cookieSessionId && await sessions.getSession(cookieSessionId)) {
        req.sessionId = cookieSessionId;
        next();
        return;
      }

      const session = await sessions.createSession();
      res.cookie(SESSION_COOKIE_NAME, session.sessionId, {
        ...cookieOptions(options),
        signed: true,
        expires: new Date(session.expiresAt),
      });
      req.sessionId = session.sessionId;

      logger.debug('Started browser session', {
        replacedCookie: cookieSessionId !== undefined,
        path: req.path
      });
      next();
    } catch (error) {
      next(error);
    }
  };
}

export function clearSessionCookie(res: Response, options: BrowserSessionOptions = {}): void {
  res.clearCookie(SESSION_COOKIE_NAME, cookieOptions(options));
}

/**
 * Session id set by browserSession(); a route mounted without it is a wiring bug
 */
export function requireSessionId(req: Request): string {
  if (!req.sessionId) {
    throw new Error('Browser session middleware is not installed on this route');
  }
  return req.sessionId;
}
