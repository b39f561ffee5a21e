/**
 * Response shapes
 *
 * Store entities as they are sent to clients. Private key material never
 * leaves through these types.
 */

import type {
  Account,
  AccountType,
  BalanceInfo,
  BestBlock,
  TxConfidence,
  TxType,
  WalletAddress,
  WalletTx,
} from '../repositories/types';

export interface JsonAccount {
  name: string;
  type: AccountType;
  derivation?: string;
  keys: string[];
  gap: number;
  created: string;
  complete: boolean;
  /** Only present right after the store generated one */
  mnemonic?: string;
}

export interface JsonAddress {
  index: number;
  type: WalletAddress['type'];
  address: string;
  label: string;
  created: string;
  balance?: BalanceInfo;
}

export interface JsonTx {
  txid: string;
  type: TxType;
  value: number;
  confidence: TxConfidence;
  offline: boolean;
  confirmedBy?: string;
  confirmedHeight?: number;
  confirmations: number;
  created: string;
  tx: string;
}

/**
 * Whether the account has every co-signer key it needs to derive addresses
 */
export function isCompleteAccount(account: Account): boolean {
  const required = account.type.kind === 'multisig' ? account.type.total : 1;
  return account.keys.length >= required;
}

export function toJsonAccount(account: Account, mnemonic?: string): JsonAccount {
  return {
    name: account.name,
    type: account.type,
    derivation: account.derivation,
    keys: account.keys,
    gap: account.gap,
    created: account.created.toISOString(),
    complete: isCompleteAccount(account),
    ...(mnemonic ? { mnemonic } : {}),
  };
}

export function toJsonAddress(address: WalletAddress, balance?: BalanceInfo): JsonAddress {
  return {
    index: address.index,
    type: address.type,
    address: address.address,
    label: address.label,
    created: address.created.toISOString(),
    ...(balance ? { balance } : {}),
  };
}

/** Blocks on top of and including the confirming block; 0 while unconfirmed */
export function confirmations(tx: WalletTx, best: BestBlock): number {
  if (tx.confirmedHeight === undefined) return 0;
  return Math.max(0, best.height - tx.confirmedHeight + 1);
}

export function toJsonTx(tx: WalletTx, best: BestBlock): JsonTx {
  return {
    txid: tx.txid,
    type: tx.type,
    value: tx.value,
    confidence: tx.confidence,
    offline: tx.offline,
    confirmedBy: tx.confirmedBy,
    confirmedHeight: tx.confirmedHeight,
    confirmations: confirmations(tx, best),
    created: tx.created.toISOString(),
    tx: tx.tx,
  };
}
