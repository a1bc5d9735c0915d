/**
 * OAuth Routes
 *
 * Starting a login stores a fresh consent in the browser session and sends
 * the browser to the workspace. The callback takes that consent out of the
 * session before anything else, so every consent is used at most once.
 */

import type { IRouter, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { OAuthError, StateMismatchError } from '@warehouse-oauth-demo/auth';
import { logger } from '@warehouse-oauth-demo/observability';
import { browserSession, clearSessionCookie, readSessionCookie, requireSessionId } from '../../session/browser-session.js';
import { describeError, renderErrorView } from '../responses/error-response.js';
import type { RouteDependencies } from './types.js';

const QueryValueSchema = z.preprocess(
  (value) => (Array.isArray(value) ? value[0] : value),
  z.string().optional()
).catch(undefined);

const CallbackQuerySchema = z.object({
  code: QueryValueSchema,
  state: QueryValueSchema,
  error: QueryValueSchema,
  error_description: QueryValueSchema,
});

function setNoStore(res: Response): void {
  res.set('Cache-Control', 'no-store');
}

/**
 * Begin a login attempt for the session and redirect to the authorization endpoint.
 * A newer attempt replaces any consent still pending.
 */
export async function redirectToConsent(deps: RouteDependencies, sessionId: string, res: Response): Promise<void> {
  const consent = await deps.oauthClient.initiateConsent();
  await deps.sessions.update(sessionId, (session) => {
    session.consent = consent;
  });

  logger.oauthInfo('Redirecting to workspace for consent');
  setNoStore(res);
  res.redirect(302, consent.authUrl);
}

export function setupAuthRoutes(router: IRouter, deps: RouteDependencies): void {
  router.get('/callback', browserSession(deps.sessions, deps.sessionOptions), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = requireSessionId(req);
      const params = CallbackQuerySchema.parse(req.query);

      const consent = await deps.sessions.update(sessionId, (session) => {
        const pending = session.consent;
        delete session.consent;
        return pending;
      });

      if (!consent) {
        logger.oauthWarn('Callback without a pending consent', { hasState: Boolean(params.state) });
        throw new StateMismatchError();
      }

      const credentials = await deps.oauthClient.exchangeCallback(consent, params);
      await deps.credentialStore.store(sessionId, credentials);

      setNoStore(res);
      res.redirect(302, '/');
    } catch (error) {
      if (!(error instanceof OAuthError)) {
        next(error);
        return;
      }

      const view = describeError(error);
      logger.oauthWarn('Login failed', { code: error.code, status: view.status });
      setNoStore(res);
      res.status(view.status).type('html').send(renderErrorView(view));
    }
  });

  router.get('/logout', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = readSessionCookie(req);
      if (sessionId) {
        await deps.sessions.destroySession(sessionId);
        logger.oauthInfo('Signed out');
      }
      clearSessionCookie(res, deps.sessionOptions);
      setNoStore(res);
      res.redirect(302, '/');
    } catch (error) {
      next(error);
    }
  });
}
