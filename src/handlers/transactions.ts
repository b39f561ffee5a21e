/**
 * Transaction Handlers
 *
 * `postTx` drives the create / import / sign actions. The store work for one
 * request runs in a single transaction; afterwards, in online mode, the
 * bloom filter is refreshed for any addresses the action generated and only
 * then is a pending transaction handed to the node for broadcast.
 */

import { ValidationError, WalletError, ErrorCodes } from '../errors';
import { createLogger } from '../utils/logger';
import { validateAddress } from '../services/bitcoin/utils';
import { toJsonTx, type JsonTx } from './serialization';
import type { HandlerSession } from './session';
import type {
  Account,
  AddressType,
  BestBlock,
  CreateTxRequest,
  ListRequest,
  ListResult,
  TxImportResult,
  WalletAddress,
  WalletStore,
  WalletTx,
} from '../repositories/types';

const log = createLogger('TRANSACTIONS');

export type TxAction =
  | ({ type: 'createTx' } & CreateTxRequest)
  | { type: 'importTx'; tx: string }
  | { type: 'signTx'; txid: string };

interface ActionOutcome {
  tx: WalletTx;
  best: BestBlock;
  newAddresses: WalletAddress[];
}

function assertNever(value: never): never {
  throw new Error(`Unhandled transaction action: ${JSON.stringify(value)}`);
}

/**
 * The record of an import or signing result that belongs to `account`
 */
function accountRecord(account: Account, result: TxImportResult): WalletTx {
  const record = result.txs.find((tx) => tx.accountId === account.id);
  if (!record) {
    throw new WalletError('Could not import the transaction', { account: account.name });
  }
  return record;
}

function assertRecipientsValid(session: HandlerSession, request: CreateTxRequest): void {
  for (const recipient of request.recipients) {
    const result = validateAddress(recipient.address, session.config.wallet.network);
    if (!result.valid) {
      throw new ValidationError(`Invalid recipient address ${recipient.address}: ${result.error}`, ErrorCodes.INVALID_INPUT, {
        address: recipient.address,
      });
    }
  }
}

async function runAction(
  store: WalletStore,
  account: Account,
  masterKey: string | undefined,
  action: TxAction
): Promise<{ tx: WalletTx; newAddresses: WalletAddress[] }> {
  switch (action.type) {
    case 'createTx': {
      return store.createTx(account, masterKey, {
        recipients: action.recipients,
        fee: action.fee,
        minConf: action.minConf,
        rcptFee: action.rcptFee,
        sign: action.sign,
      });
    }
    case 'importTx': {
      const result = await store.importTx(action.tx, account.id);
      return { tx: accountRecord(account, result), newAddresses: result.newAddresses };
    }
    case 'signTx': {
      const result = await store.signAccountTx(account, masterKey, action.txid);
      return { tx: accountRecord(account, result), newAddresses: result.newAddresses };
    }
    default:
      return assertNever(action);
  }
}

function describeAction(action: TxAction): Record<string, unknown> {
  switch (action.type) {
    case 'createTx':
      return {
        recipients: action.recipients.length,
        fee: action.fee,
        minConf: action.minConf,
        rcptFee: action.rcptFee,
        sign: action.sign,
      };
    case 'importTx':
      return { txBytes: action.tx.length / 2 };
    case 'signTx':
      return { txid: action.txid };
    default:
      return assertNever(action);
  }
}

export async function postTx(
  session: HandlerSession,
  name: string,
  masterKey: string | undefined,
  action: TxAction
): Promise<JsonTx> {
  log.info(`Post transaction: ${action.type}`, { name, ...describeAction(action) });

  if (action.type === 'createTx') {
    assertRecipientsValid(session, action);
  }

  const outcome = await session.runStorage<ActionOutcome>(async (store) => {
    const account = await store.getAccount(name);
    const best = await store.getBestBlock();
    const { tx, newAddresses } = await runAction(store, account, masterKey, action);
    return { tx, best, newAddresses };
  });

  await session.whenOnline(async () => {
    if (outcome.newAddresses.length > 0) {
      await session.updateNodeFilter();
    }
    if (outcome.tx.confidence === 'pending') {
      log.info('Broadcasting transaction', { txid: outcome.tx.txid });
      await session.runSync('broadcastTxs', { txids: [outcome.tx.txid] });
    }
  });

  return toJsonTx(outcome.tx, outcome.best);
}

export async function listTxs(session: HandlerSession, name: string, list: ListRequest): Promise<ListResult<JsonTx>> {
  log.info('List transactions', { name, ...list });

  return session.runStorage(async (store) => {
    const account = await store.getAccount(name);
    const best = await store.getBestBlock();
    const page = await store.txs(account.id, list);
    return { items: page.items.map((tx) => toJsonTx(tx, best)), total: page.total };
  });
}

export async function listAddressTxs(
  session: HandlerSession,
  name: string,
  index: number,
  type: AddressType,
  list: ListRequest
): Promise<ListResult<JsonTx>> {
  log.info('List address transactions', { name, index, type, ...list });

  return session.runStorage(async (store) => {
    const account = await store.getAccount(name);
    const address = await store.getAddress(account, type, index);
    const best = await store.getBestBlock();
    const page = await store.addrTxs(account, address, list);
    return { items: page.items.map((tx) => toJsonTx(tx, best)), total: page.total };
  });
}

export async function getTx(session: HandlerSession, name: string, txid: string): Promise<JsonTx> {
  log.info('Get transaction', { name, txid });

  return session.runStorage(async (store) => {
    const account = await store.getAccount(name);
    const best = await store.getBestBlock();
    const tx = await store.getAccountTx(account.id, txid);
    return toJsonTx(tx, best);
  });
}

export async function deleteTx(session: HandlerSession, txid: string): Promise<void> {
  log.info('Delete transaction', { txid });

  await session.runStorage((store) => store.deleteTx(txid));
}

export async function getBalance(
  session: HandlerSession,
  name: string,
  minConf: number,
  offline: boolean
): Promise<number> {
  log.info('Get balance', { name, minConf, offline });

  return session.runStorage(async (store) => {
    const account = await store.getAccount(name);
    return store.accountBalance(account.id, minConf, offline);
  });
}
