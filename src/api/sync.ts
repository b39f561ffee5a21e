/**
 * Sync API Routes
 *
 * GET /accounts/:name/sync/:blockHash?maxBlocks=N
 *
 * Main-chain blocks after `blockHash`, oldest first, each with the account
 * transactions it confirmed. maxBlocks=0 (the default) returns every block
 * up to the wallet's best block.
 */

import { Router, Request, Response } from 'express';
import { asyncHandler } from '../errors';
import { sync, type HandlerSession } from '../handlers';
import { SyncParamSchema, SyncQuerySchema } from './schemas';

export function createSyncRouter(session: HandlerSession): Router {
  const router = Router();

  router.get(
    '/accounts/:name/sync/:blockHash',
    asyncHandler(async (req: Request, res: Response) => {
      const { name, blockHash } = SyncParamSchema.parse(req.params);
      const { maxBlocks } = SyncQuerySchema.parse(req.query);
      res.json(await sync.getSync(session, name, blockHash, maxBlocks));
    })
  );

  return router;
}
