/**
 * Express Application
 *
 * Built around an existing HandlerSession, so the host process decides how
 * the store pool and node state are created.
 */

import express, { Express } from 'express';
import helmet from 'helmet';
import { errorHandler, notFoundHandler } from './errors';
import { requestLogger } from './middleware/requestLogger';
import { registerRoutes } from './routes';
import type { HandlerSession } from './handlers';

export interface AppOptions {
  session: HandlerSession;
  /** Request body size limit (default 5mb) */
  bodyLimit?: string;
}

export function createApp({ session, bodyLimit = '5mb' }: AppOptions): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(express.json({ limit: bodyLimit }));

  // Request logging and correlation IDs
  app.use(requestLogger);

  registerRoutes(app, session);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
