/**
 * Account Handlers
 *
 * Completing an account, adding co-signer keys or widening the gap changes
 * the set of addresses the node has to watch, so those handlers refresh the
 * bloom filter before returning.
 */

import { createLogger } from '../utils/logger';
import { isCompleteAccount, toJsonAccount, type JsonAccount } from './serialization';
import type { HandlerSession } from './session';
import type { ListRequest, ListResult, NewAccount } from '../repositories/types';

const log = createLogger('ACCOUNTS');

export async function listAccounts(session: HandlerSession, list: ListRequest): Promise<ListResult<JsonAccount>> {
  log.info('List accounts', { ...list });

  const result = await session.runStorage((store) => store.accounts(list));
  return {
    items: result.items.map((account) => toJsonAccount(account)),
    total: result.total,
  };
}

export async function createAccount(session: HandlerSession, newAccount: NewAccount): Promise<JsonAccount> {
  log.info('Create account', { name: newAccount.name, type: newAccount.type.kind });

  const { account, mnemonic } = await session.runStorage((store) => store.newAccount(newAccount));

  if (isCompleteAccount(account)) {
    await session.whenOnline(() => session.updateNodeFilter());
  }
  return toJsonAccount(account, mnemonic);
}

export async function getAccount(session: HandlerSession, name: string): Promise<JsonAccount> {
  log.info('Get account', { name });

  const account = await session.runStorage((store) => store.getAccount(name));
  return toJsonAccount(account);
}

export async function renameAccount(session: HandlerSession, name: string, newName: string): Promise<JsonAccount> {
  log.info('Rename account', { name, newName });

  const account = await session.runStorage(async (store) => {
    const current = await store.getAccount(name);
    return store.renameAccount(current, newName);
  });
  return toJsonAccount(account);
}

export async function addAccountKeys(session: HandlerSession, name: string, keys: string[]): Promise<JsonAccount> {
  log.info('Add account keys', { name, keyCount: keys.length });

  const account = await session.runStorage(async (store) => {
    const current = await store.getAccount(name);
    return store.addAccountKeys(current, keys);
  });

  if (isCompleteAccount(account)) {
    await session.whenOnline(() => session.updateNodeFilter());
  }
  return toJsonAccount(account);
}

export async function setAccountGap(session: HandlerSession, name: string, gap: number): Promise<JsonAccount> {
  log.info('Set account gap', { name, gap });

  const account = await session.runStorage(async (store) => {
    const current = await store.getAccount(name);
    return store.setAccountGap(current, gap);
  });

  await session.whenOnline(() => session.updateNodeFilter());
  return toJsonAccount(account);
}
