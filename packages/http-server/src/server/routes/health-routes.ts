/**
 * Health Routes
 */

import type { IRouter, Request, Response, NextFunction } from 'express';
import type { BrowserSessionManager } from '@warehouse-oauth-demo/persistence';
import { buildHealthResponse } from '../responses/health-response.js';

export function setupHealthRoutes(router: IRouter, sessions: BrowserSessionManager): void {
  router.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(buildHealthResponse({ activeSessions: await sessions.getSessionCount() }));
    } catch (error) {
      next(error);
    }
  });
}
