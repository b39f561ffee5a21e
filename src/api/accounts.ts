/**
 * Account API Routes
 *
 * GET    /accounts                 list accounts
 * POST   /accounts                 create an account
 * GET    /accounts/:name           get one account
 * POST   /accounts/:name/rename    rename
 * POST   /accounts/:name/keys      add co-signer keys
 * POST   /accounts/:name/gap       set the address gap
 * GET    /accounts/:name/balance   confirmed (or offline) balance
 */

import { Router, Request, Response } from 'express';
import { asyncHandler } from '../errors';
import { accounts, transactions, type HandlerSession } from '../handlers';
import {
  AccountGapSchema,
  AccountKeysSchema,
  AccountParamSchema,
  BalanceQuerySchema,
  CreateAccountSchema,
  ListQuerySchema,
  RenameAccountSchema,
} from './schemas';

export function createAccountsRouter(session: HandlerSession): Router {
  const router = Router();

  router.get(
    '/accounts',
    asyncHandler(async (req: Request, res: Response) => {
      const list = ListQuerySchema.parse(req.query);
      res.json(await accounts.listAccounts(session, list));
    })
  );

  router.post(
    '/accounts',
    asyncHandler(async (req: Request, res: Response) => {
      const body = CreateAccountSchema.parse(req.body);
      res.status(201).json(await accounts.createAccount(session, body));
    })
  );

  router.get(
    '/accounts/:name',
    asyncHandler(async (req: Request, res: Response) => {
      const { name } = AccountParamSchema.parse(req.params);
      res.json(await accounts.getAccount(session, name));
    })
  );

  router.post(
    '/accounts/:name/rename',
    asyncHandler(async (req: Request, res: Response) => {
      const { name } = AccountParamSchema.parse(req.params);
      const { newName } = RenameAccountSchema.parse(req.body);
      res.json(await accounts.renameAccount(session, name, newName));
    })
  );

  router.post(
    '/accounts/:name/keys',
    asyncHandler(async (req: Request, res: Response) => {
      const { name } = AccountParamSchema.parse(req.params);
      const { keys } = AccountKeysSchema.parse(req.body);
      res.json(await accounts.addAccountKeys(session, name, keys));
    })
  );

  router.post(
    '/accounts/:name/gap',
    asyncHandler(async (req: Request, res: Response) => {
      const { name } = AccountParamSchema.parse(req.params);
      const { gap } = AccountGapSchema.parse(req.body);
      res.json(await accounts.setAccountGap(session, name, gap));
    })
  );

  router.get(
    '/accounts/:name/balance',
    asyncHandler(async (req: Request, res: Response) => {
      const { name } = AccountParamSchema.parse(req.params);
      const { minconf, offline } = BalanceQuerySchema.parse(req.query);
      const balance = await transactions.getBalance(session, name, minconf, offline);
      res.json({ balance });
    })
  );

  return router;
}
