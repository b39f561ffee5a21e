/**
 * Route Registration
 *
 * Centralizes route mounting to keep app.ts focused on middleware wiring.
 */

import type { Express, Router } from 'express';
import type { HandlerSession } from './handlers';
import { createAccountsRouter } from './api/accounts';
import { createAddressesRouter } from './api/addresses';
import { createTransactionsRouter } from './api/transactions';
import { createOfflineRouter } from './api/offline';
import { createNodeRouter } from './api/node';
import { createSyncRouter } from './api/sync';
import { createHealthRouter } from './api/health';

export const API_PREFIX = '/api/v1';

type RouterFactory = (session: HandlerSession) => Router;

const routers: RouterFactory[] = [
  createHealthRouter,
  createAccountsRouter,
  createAddressesRouter,
  createTransactionsRouter,
  createOfflineRouter,
  createNodeRouter,
  createSyncRouter,
];

export function registerRoutes(app: Express, session: HandlerSession): void {
  for (const createRouter of routers) {
    app.use(API_PREFIX, createRouter(session));
  }
}
