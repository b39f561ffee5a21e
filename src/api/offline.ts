/**
 * Offline Signing API Routes
 */

import { Router, Request, Response } from 'express';
import { asyncHandler } from '../errors';
import { offline, type HandlerSession } from '../handlers';
import { AccountParamSchema, AccountTxParamSchema, SignOfflineTxSchema } from './schemas';

export function createOfflineRouter(session: HandlerSession): Router {
  const router = Router();

  /**
   * GET /accounts/:name/txs/:txid/offline
   * Unsigned PSBT plus the data an offline signer needs
   */
  router.get(
    '/accounts/:name/txs/:txid/offline',
    asyncHandler(async (req: Request, res: Response) => {
      const { name, txid } = AccountTxParamSchema.parse(req.params);
      res.json(await offline.getOfflineTx(session, name, txid));
    })
  );

  /**
   * POST /accounts/:name/offline
   * Sign a PSBT with the account key; reports whether it is complete
   */
  router.post(
    '/accounts/:name/offline',
    asyncHandler(async (req: Request, res: Response) => {
      const { name } = AccountParamSchema.parse(req.params);
      const { masterKey, psbt, coins } = SignOfflineTxSchema.parse(req.body);
      res.json(await offline.signOfflineTx(session, name, masterKey, psbt, coins));
    })
  );

  return router;
}
