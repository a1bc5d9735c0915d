/**
 * HTTP server for the warehouse query demo
 *
 * Wires the page routes, the signed browser-session cookie and security
 * headers onto an Express app, and owns the listening socket.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import { createServer, Server as HttpServer } from 'node:http';
import cookieParser from 'cookie-parser';
import helmet from 'helmet';
import { logger } from '@warehouse-oauth-demo/observability';
import { requestLogging } from '../middleware/request-logging.js';
import { BOOTSTRAP_CSS_URL } from '../views/html.js';
import { describeError, renderErrorView } from './responses/error-response.js';
import { setupAuthRoutes } from './routes/auth-routes.js';
import { setupHealthRoutes } from './routes/health-routes.js';
import { setupQueryRoutes } from './routes/query-routes.js';
import type { RouteDependencies } from './routes/types.js';

export interface WarehouseDemoServerOptions extends Omit<RouteDependencies, 'sessionOptions'> {
  port: number;
  host: string;
  /** Secret for signing the session cookie */
  sessionSecret: string;
  secureCookies?: boolean;
}

export class WarehouseDemoServer {
  private readonly app: Express;
  private server?: HttpServer;

  constructor(private readonly options: WarehouseDemoServerOptions) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    const workspaceOrigin = new URL(this.options.oauthClient.config.host).origin;

    this.app.disable('x-powered-by');
    this.app.use(helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", new URL(BOOTSTRAP_CSS_URL).origin],
          // POST / may answer with a redirect to the workspace login
          formAction: ["'self'", workspaceOrigin],
          upgradeInsecureRequests: null, // Served over http://localhost
        },
      },
      strictTransportSecurity: false, // Disable HSTS for localhost development
    }));

    this.app.use(requestLogging());
    this.app.use(express.urlencoded({ extended: false, limit: '100kb' }));
    this.app.use(cookieParser(this.options.sessionSecret));
  }

  private setupRoutes(): void {
    const deps: RouteDependencies = {
      sessions: this.options.sessions,
      oauthClient: this.options.oauthClient,
      credentialStore: this.options.credentialStore,
      statementClient: this.options.statementClient,
      sessionOptions: { secureCookies: this.options.secureCookies },
    };

    setupHealthRoutes(this.app, deps.sessions);
    setupQueryRoutes(this.app, deps);
    setupAuthRoutes(this.app, deps);

    // Catch-all error handler
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    this.app.use((error: Error, req: Request, res: Response, next: NextFunction) => {
      const view = describeError(error);

      logger.error('Express error handler caught error', {
        requestId: req.requestId ?? 'unknown',
        errorName: error.name,
        errorMessage: error.message,
        method: req.method,
        path: req.path,
        statusCode: view.status
      });

      if (res.headersSent) {
        logger.warn('Headers already sent, cannot send error response', { requestId: req.requestId });
        return;
      }
      res.status(view.status).type('html').send(renderErrorView(view));
    });
  }

  /**
   * Start the HTTP server
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = createServer(this.app);

      this.server.on('error', (error: Error) => {
        logger.error('HTTP server error', error);
        reject(error);
      });

      this.server.listen(this.options.port, this.options.host, () => {
        logger.info('Warehouse demo server listening', {
          url: `http://${this.options.host}:${this.options.port}`
        });
        resolve();
      });
    });
  }

  /**
   * Stop the HTTP server and release session resources
   */
  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server;
      if (!server) {
        this.options.sessions.dispose();
        resolve();
        return;
      }

      server.close((error?: Error) => {
        if (error) {
          reject(error);
          return;
        }
        this.server = undefined;
        this.options.sessions.dispose();
        logger.info('Warehouse demo server stopped');
        resolve();
      });
    });
  }

  /**
   * Get the Express app for testing or customization
   */
  getApp(): Express {
    return this.app;
  }
}
