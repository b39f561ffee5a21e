/**
 * Transaction API Routes
 *
 * GET    /accounts/:name/txs          list account transactions
 * POST   /accounts/:name/txs          create, import or sign a transaction
 * GET    /accounts/:name/txs/:txid    get one transaction
 * DELETE /txs/:txid                   delete a transaction from the wallet
 */

import { Router, Request, Response } from 'express';
import { asyncHandler } from '../errors';
import { transactions, type HandlerSession } from '../handlers';
import { AccountParamSchema, AccountTxParamSchema, ListQuerySchema, PostTxSchema, TxidParamSchema } from './schemas';

export function createTransactionsRouter(session: HandlerSession): Router {
  const router = Router();

  router.get(
    '/accounts/:name/txs',
    asyncHandler(async (req: Request, res: Response) => {
      const { name } = AccountParamSchema.parse(req.params);
      const list = ListQuerySchema.parse(req.query);
      res.json(await transactions.listTxs(session, name, list));
    })
  );

  router.post(
    '/accounts/:name/txs',
    asyncHandler(async (req: Request, res: Response) => {
      const { name } = AccountParamSchema.parse(req.params);
      const { masterKey, action } = PostTxSchema.parse(req.body);
      res.json(await transactions.postTx(session, name, masterKey, action));
    })
  );

  router.get(
    '/accounts/:name/txs/:txid',
    asyncHandler(async (req: Request, res: Response) => {
      const { name, txid } = AccountTxParamSchema.parse(req.params);
      res.json(await transactions.getTx(session, name, txid));
    })
  );

  router.delete(
    '/txs/:txid',
    asyncHandler(async (req: Request, res: Response) => {
      const { txid } = TxidParamSchema.parse(req.params);
      await transactions.deleteTx(session, txid);
      res.status(204).send();
    })
  );

  return router;
}
