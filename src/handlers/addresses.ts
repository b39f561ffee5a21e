/**
 * Address Handlers
 */

import { createLogger } from '../utils/logger';
import { toJsonAddress, type JsonAddress } from './serialization';
import type { HandlerSession } from './session';
import type { AddressBalance, AddressType, ListRequest, ListResult, WalletAddress } from '../repositories/types';

const log = createLogger('ADDRESSES');

export interface BalanceQuery {
  minConf: number;
  offline: boolean;
}

/**
 * Pair each address with the balance row of the same index. Addresses
 * without a balance row are dropped.
 */
export function joinAddressBalances(addresses: WalletAddress[], balances: AddressBalance[]): JsonAddress[] {
  const byIndex = new Map(balances.map((row) => [row.index, row.balance]));
  const joined: JsonAddress[] = [];
  for (const address of addresses) {
    const balance = byIndex.get(address.index);
    if (balance) {
      joined.push(toJsonAddress(address, balance));
    }
  }
  return joined.sort((a, b) => a.index - b.index);
}

export async function listAddresses(
  session: HandlerSession,
  name: string,
  type: AddressType,
  query: BalanceQuery,
  list: ListRequest
): Promise<ListResult<JsonAddress>> {
  log.info('List addresses', { name, type, ...list, ...query });

  return session.runStorage(async (store) => {
    const account = await store.getAccount(name);
    const page = await store.addressList(account, type, list);
    if (page.items.length === 0) {
      return { items: [], total: page.total };
    }

    const indexes = page.items.map((address) => address.index);
    const balances = await store.addressBalances(
      account,
      Math.min(...indexes),
      Math.max(...indexes),
      type,
      query.minConf,
      query.offline
    );
    return { items: joinAddressBalances(page.items, balances), total: page.total };
  });
}

export async function listUnusedAddresses(
  session: HandlerSession,
  name: string,
  type: AddressType,
  list: ListRequest
): Promise<ListResult<JsonAddress>> {
  log.info('List unused addresses', { name, type, ...list });

  const page = await session.runStorage(async (store) => {
    const account = await store.getAccount(name);
    return store.unusedAddresses(account, type, list);
  });
  return {
    items: page.items.map((address) => toJsonAddress(address)),
    total: page.total,
  };
}

export async function getAddress(
  session: HandlerSession,
  name: string,
  index: number,
  type: AddressType,
  query: BalanceQuery
): Promise<JsonAddress> {
  log.info('Get address', { name, index, type });

  const { address, balances } = await session.runStorage(async (store) => {
    const account = await store.getAccount(name);
    const found = await store.getAddress(account, type, index);
    const rows = await store.addressBalances(account, index, index, type, query.minConf, query.offline);
    return { address: found, balances: rows };
  });

  return toJsonAddress(address, balances[0]?.balance);
}

export async function setAddressLabel(
  session: HandlerSession,
  name: string,
  index: number,
  type: AddressType,
  label: string
): Promise<JsonAddress> {
  log.info('Set address label', { name, index, type, label });

  const address = await session.runStorage(async (store) => {
    const account = await store.getAccount(name);
    return store.setAddrLabel(account, index, type, label);
  });
  return toJsonAddress(address);
}

/**
 * Generate addresses up to `index`. Returns how many were created.
 */
export async function generateAddresses(
  session: HandlerSession,
  name: string,
  index: number,
  type: AddressType
): Promise<number> {
  log.info('Generate addresses', { name, index, type });

  const created = await session.runStorage(async (store) => {
    const account = await store.getAccount(name);
    return store.generateAddrs(account, type, index);
  });

  await session.whenOnline(() => session.updateNodeFilter());
  return created;
}
