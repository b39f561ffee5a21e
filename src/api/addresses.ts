/**
 * Address API Routes
 *
 * The address type (external | internal) is taken from the `type` query
 * parameter on reads and from the body on writes; it defaults to external.
 */

import { Router, Request, Response } from 'express';
import { asyncHandler } from '../errors';
import { addresses, transactions, type HandlerSession } from '../handlers';
import {
  AccountParamSchema,
  AddressIndexParamSchema,
  AddressLabelSchema,
  AddressTypeQuerySchema,
  BalanceQuerySchema,
  GenerateAddressesSchema,
  ListQuerySchema,
} from './schemas';

export function createAddressesRouter(session: HandlerSession): Router {
  const router = Router();

  router.get(
    '/accounts/:name/addrs',
    asyncHandler(async (req: Request, res: Response) => {
      const { name } = AccountParamSchema.parse(req.params);
      const { type } = AddressTypeQuerySchema.parse(req.query);
      const { minconf, offline } = BalanceQuerySchema.parse(req.query);
      const list = ListQuerySchema.parse(req.query);
      res.json(await addresses.listAddresses(session, name, type, { minConf: minconf, offline }, list));
    })
  );

  // Registered before /:index so "unused" is not read as an index
  router.get(
    '/accounts/:name/addrs/unused',
    asyncHandler(async (req: Request, res: Response) => {
      const { name } = AccountParamSchema.parse(req.params);
      const { type } = AddressTypeQuerySchema.parse(req.query);
      const list = ListQuerySchema.parse(req.query);
      res.json(await addresses.listUnusedAddresses(session, name, type, list));
    })
  );

  router.post(
    '/accounts/:name/addrs',
    asyncHandler(async (req: Request, res: Response) => {
      const { name } = AccountParamSchema.parse(req.params);
      const { index, type } = GenerateAddressesSchema.parse(req.body);
      const created = await addresses.generateAddresses(session, name, index, type);
      res.json({ created });
    })
  );

  router.get(
    '/accounts/:name/addrs/:index',
    asyncHandler(async (req: Request, res: Response) => {
      const { name, index } = AddressIndexParamSchema.parse(req.params);
      const { type } = AddressTypeQuerySchema.parse(req.query);
      const { minconf, offline } = BalanceQuerySchema.parse(req.query);
      res.json(await addresses.getAddress(session, name, index, type, { minConf: minconf, offline }));
    })
  );

  router.put(
    '/accounts/:name/addrs/:index',
    asyncHandler(async (req: Request, res: Response) => {
      const { name, index } = AddressIndexParamSchema.parse(req.params);
      const { label, type } = AddressLabelSchema.parse(req.body);
      res.json(await addresses.setAddressLabel(session, name, index, type, label));
    })
  );

  router.get(
    '/accounts/:name/addrs/:index/txs',
    asyncHandler(async (req: Request, res: Response) => {
      const { name, index } = AddressIndexParamSchema.parse(req.params);
      const { type } = AddressTypeQuerySchema.parse(req.query);
      const list = ListQuerySchema.parse(req.query);
      res.json(await transactions.listAddressTxs(session, name, index, type, list));
    })
  );

  return router;
}
