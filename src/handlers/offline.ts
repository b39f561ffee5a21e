/**
 * Offline Transaction Handlers
 *
 * An unsigned transaction is exported together with the data needed to sign
 * it; the signing step reads only the account and never touches the coins in
 * the store.
 */

import { createLogger } from '../utils/logger';
import { signOfflineTx as signPsbt, type OfflineSignResult } from '../services/bitcoin/offlineSigning';
import type { HandlerSession } from './session';
import type { CoinSignData, OfflineTxData } from '../repositories/types';

const log = createLogger('OFFLINE');

export async function getOfflineTx(session: HandlerSession, name: string, txid: string): Promise<OfflineTxData> {
  log.info('Get offline transaction', { name, txid });

  return session.runStorage(async (store) => {
    const account = await store.getAccount(name);
    return store.getOfflineTxData(account.id, txid);
  });
}

export async function signOfflineTx(
  session: HandlerSession,
  name: string,
  masterKey: string | undefined,
  psbt: string,
  coins: CoinSignData[]
): Promise<OfflineSignResult> {
  log.info('Sign offline transaction', { name, coins: coins.length, externalKey: masterKey !== undefined });

  const account = await session.runStorage((store) => store.getAccount(name));
  const result = signPsbt(account, masterKey, psbt, coins, session.network);

  log.info('Offline transaction signed', { name, complete: result.complete });
  return result;
}
