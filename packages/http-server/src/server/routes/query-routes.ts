/**
 * Query Routes
 *
 * GET / shows the statement form, POST / runs the statement with the
 * session's delegated credentials. Both start a login when the session has
 * no usable credentials.
 */

import type { IRouter, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { logger } from '@warehouse-oauth-demo/observability';
import { QueryExecutionError } from '@warehouse-oauth-demo/sql';
import { browserSession, requireSessionId } from '../../session/browser-session.js';
import { drainFlashes, pushFlash } from '../../session/flash.js';
import { renderIndexPage } from '../../views/index-page.js';
import { redirectToConsent } from './auth-routes.js';
import type { RouteDependencies } from './types.js';

export const QueryFormSchema = z.object({
  sql: z.string({ required_error: 'Enter a SQL statement' }).trim().min(1, 'Enter a SQL statement'),
});

export function setupQueryRoutes(router: IRouter, deps: RouteDependencies): void {
  const session = browserSession(deps.sessions, deps.sessionOptions);

  router.get('/', session, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = requireSessionId(req);
      const credentials = await deps.credentialStore.getOrRefresh(sessionId);
      if (!credentials) {
        await redirectToConsent(deps, sessionId, res);
        return;
      }

      const flashes = await drainFlashes(deps.sessions, sessionId);
      res.type('html').send(renderIndexPage({ flashes }));
    } catch (error) {
      next(error);
    }
  });

  router.post('/', session, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = requireSessionId(req);
      const credentials = await deps.credentialStore.getOrRefresh(sessionId);
      if (!credentials) {
        await redirectToConsent(deps, sessionId, res);
        return;
      }

      const form = QueryFormSchema.safeParse(req.body);
      if (!form.success) {
        const message = form.error.issues[0]?.message ?? 'Enter a SQL statement';
        await pushFlash(deps.sessions, sessionId, { category: 'warning', message });
        const flashes = await drainFlashes(deps.sessions, sessionId);
        res.status(400).type('html').send(renderIndexPage({ flashes }));
        return;
      }

      const statement = form.data.sql;
      try {
        const result = await deps.statementClient.executeQuery(credentials, statement);
        const flashes = await drainFlashes(deps.sessions, sessionId);
        res.type('html').send(renderIndexPage({ flashes, statement, result }));
      } catch (error) {
        if (!(error instanceof QueryExecutionError)) {
          throw error;
        }
        logger.sqlError('Query failed', { code: error.code });
        await pushFlash(deps.sessions, sessionId, { category: 'danger', message: error.message });
        const flashes = await drainFlashes(deps.sessions, sessionId);
        res.type('html').send(renderIndexPage({ flashes, statement }));
      }
    } catch (error) {
      next(error);
    }
  });
}
