import { describe, it, expect, vi } from 'vitest';
import * as bitcoin from 'bitcoinjs-lib';

vi.mock('../../../src/utils/logger', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import {
  deleteTx,
  getBalance,
  getTx,
  listAddressTxs,
  listTxs,
  postTx,
  type TxAction,
} from '../../../src/handlers/transactions';
import { TransactionNotFoundError, ValidationError, WalletError } from '../../../src/errors';
import { createTestSession } from '../../helpers/session';
import { sampleAccount, sampleAddress, sampleTx } from '../../fixtures/wallet';

const recipient = bitcoin.payments.p2wpkh({
  hash: Buffer.alloc(20, 7),
  network: bitcoin.networks.regtest,
}).address;

function createAction(address: string): TxAction {
  return {
    type: 'createTx',
    recipients: [{ address, amount: 5000 }],
    fee: { kind: 'feeRate', satPerVbyte: 2 },
    minConf: 1,
    rcptFee: false,
    sign: true,
  };
}

describe('transaction handlers', () => {
  describe('postTx', () => {
    it('broadcasts a pending created transaction', async () => {
      const { session, node, store } = createTestSession({ state: { accounts: [sampleAccount()] } });

      const tx = await postTx(session, 'savings', undefined, createAction(recipient ?? ''));

      expect(store.createTx).toHaveBeenCalledWith(expect.objectContaining({ name: 'savings' }), undefined, {
        recipients: [{ address: recipient, amount: 5000 }],
        fee: { kind: 'feeRate', satPerVbyte: 2 },
        minConf: 1,
        rcptFee: false,
        sign: true,
      });
      expect(tx.confidence).toBe('pending');
      expect(node.events).toEqual([`broadcastTxs:${tx.txid}`]);
    });

    it('refreshes the filter for change addresses of a created transaction before broadcasting', async () => {
      const { session, node, store } = createTestSession({ state: { accounts: [sampleAccount()] } });
      const created = sampleTx(7, { confidence: 'pending' });
      store.createTx.mockResolvedValueOnce({ tx: created, newAddresses: [sampleAddress(30)] });

      const tx = await postTx(session, 'savings', undefined, createAction(recipient ?? ''));

      expect(tx.txid).toBe(created.txid);
      expect(node.events).toEqual(['sendBloomFilter:4', `broadcastTxs:${created.txid}`]);
    });

    it('rejects a recipient address of another network before touching the store', async () => {
      const { session, store } = createTestSession({ state: { accounts: [sampleAccount()] } });
      const mainnet = bitcoin.payments.p2wpkh({ hash: Buffer.alloc(20, 7) }).address ?? '';

      await expect(postTx(session, 'savings', undefined, createAction(mainnet))).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(store.createTx).not.toHaveBeenCalled();
    });

    it('refreshes the filter for new addresses before broadcasting', async () => {
      const { session, node, store } = createTestSession({ state: { accounts: [sampleAccount()] } });
      const imported = sampleTx(5, { confidence: 'pending' });
      store.importTx.mockResolvedValueOnce({
        txs: [sampleTx(6, { accountId: 9 }), imported],
        newAddresses: [sampleAddress(20), sampleAddress(21)],
      });

      await postTx(session, 'savings', undefined, { type: 'importTx', tx: '0200' });

      expect(store.importTx).toHaveBeenCalledWith('0200', 1);
      expect(node.events).toEqual(['sendBloomFilter:4', `broadcastTxs:${imported.txid}`]);
    });

    it('does not broadcast a transaction that is already building', async () => {
      const { session, node, store } = createTestSession({ state: { accounts: [sampleAccount()] } });
      store.importTx.mockResolvedValueOnce({
        txs: [sampleTx(5, { confidence: 'building', confirmedHeight: 100 })],
        newAddresses: [],
      });

      const tx = await postTx(session, 'savings', undefined, { type: 'importTx', tx: '0200' });

      expect(tx.confirmations).toBe(1);
      expect(node.events).toEqual([]);
    });

    it('fails an import that does not touch the account and sends nothing', async () => {
      const { session, node, store } = createTestSession({ state: { accounts: [sampleAccount()] } });
      store.importTx.mockResolvedValueOnce({
        txs: [sampleTx(6, { accountId: 9, confidence: 'pending' })],
        newAddresses: [sampleAddress(1)],
      });

      const result = postTx(session, 'savings', undefined, { type: 'importTx', tx: '0200' });

      await expect(result).rejects.toBeInstanceOf(WalletError);
      await expect(result).rejects.toThrow('Could not import the transaction');
      expect(node.events).toEqual([]);
    });

    it('signs with the supplied master key and reports the same failure for foreign results', async () => {
      const { session, store } = createTestSession({ state: { accounts: [sampleAccount()] } });
      const txid = sampleTx(3).txid;

      await expect(
        postTx(session, 'savings', 'test-master-key', { type: 'signTx', txid })
      ).rejects.toThrow('Could not import the transaction');
      expect(store.signAccountTx).toHaveBeenCalledWith(expect.objectContaining({ id: 1 }), 'test-master-key', txid);
    });

    it('skips the filter and broadcast in offline mode', async () => {
      const { session, node, store } = createTestSession({
        mode: 'offline',
        state: { accounts: [sampleAccount()] },
      });
      store.importTx.mockResolvedValueOnce({
        txs: [sampleTx(5, { confidence: 'pending' })],
        newAddresses: [sampleAddress(20)],
      });

      const tx = await postTx(session, 'savings', undefined, { type: 'importTx', tx: '0200' });

      expect(tx.confidence).toBe('pending');
      expect(node.events).toEqual([]);
    });

    it('reads the account, best block and action in one store transaction', async () => {
      const { session, pool } = createTestSession({ mode: 'offline', state: { accounts: [sampleAccount()] } });

      await postTx(session, 'savings', undefined, createAction(recipient ?? ''));

      expect(pool.started).toBe(1);
    });
  });

  describe('listTxs', () => {
    it('computes confirmations against the best block', async () => {
      const { session } = createTestSession({
        state: {
          accounts: [sampleAccount()],
          txs: [sampleTx(1, { confirmedHeight: 95, confirmedBy: 'c'.repeat(64) }), sampleTx(2, { confidence: 'pending' })],
        },
      });

      const result = await listTxs(session, 'savings', { offset: 0, limit: 10, reverse: false });

      expect(result.total).toBe(2);
      expect(result.items.map((tx) => tx.confirmations)).toEqual([6, 0]);
    });
  });

  describe('listAddressTxs', () => {
    it('fails when the address does not exist', async () => {
      const { session } = createTestSession({ state: { accounts: [sampleAccount()] } });

      await expect(
        listAddressTxs(session, 'savings', 4, 'internal', { offset: 0, limit: 10, reverse: false })
      ).rejects.toThrow('Address internal/4 does not exist in account savings');
    });
  });

  describe('getTx', () => {
    it('fails with TransactionNotFoundError for an unknown txid', async () => {
      const { session } = createTestSession({ state: { accounts: [sampleAccount()] } });

      await expect(getTx(session, 'savings', 'd'.repeat(64))).rejects.toBeInstanceOf(TransactionNotFoundError);
    });
  });

  describe('deleteTx', () => {
    it('removes the transaction from the store', async () => {
      const tx = sampleTx(1);
      const { session, state } = createTestSession({ state: { accounts: [sampleAccount()], txs: [tx] } });

      await deleteTx(session, tx.txid);

      expect(state.txs).toEqual([]);
    });
  });

  describe('getBalance', () => {
    it('returns the store balance of the account', async () => {
      const { session, store } = createTestSession({
        state: { accounts: [sampleAccount()], txs: [sampleTx(1), sampleTx(2)] },
      });

      const balance = await getBalance(session, 'savings', 3, true);

      expect(balance).toBe(30000);
      expect(store.accountBalance).toHaveBeenCalledWith(1, 3, true);
    });
  });
});
