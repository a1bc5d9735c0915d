/**
 * Request logging middleware
 */

import { randomUUID } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { logger } from '@warehouse-oauth-demo/observability';

declare global {
   
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export function requestLogging() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const requestId = randomUUID().substring(0, 8);
    const startTime = Date.now();
    req.requestId = requestId;

    res.on('finish', () => {
      logger.debug('Request completed', {
        requestId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs: Date.now() - startTime
      });
    });

    next();
  };
}
