import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockLogError } = vi.hoisted(() => ({
  mockLogError: vi.fn(),
}));

vi.mock('../../../src/utils/logger', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: mockLogError,
  }),
}));

import {
  AccountNotFoundError,
  BlockNotFoundError,
  ConfigurationDefect,
  ErrorCodes,
  NodeFault,
  WalletError,
} from '../../../src/errors';
import { createTestSession } from '../../helpers/session';
import { sampleBloomFilter } from '../../fixtures/wallet';

describe('HandlerSession', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('runStorage', () => {
    it('runs each operation in its own store transaction', async () => {
      const { session, pool } = createTestSession();

      const best = await session.runStorage((store) => store.getBestBlock());

      expect(best.height).toBe(100);
      expect(pool.started).toBe(1);
    });

    it('never runs more store transactions at once than the configured concurrency', async () => {
      const { session, pool } = createTestSession({ maxConcurrency: 2 });
      let open: () => void = () => undefined;
      pool.gate = new Promise<void>((resolve) => {
        open = resolve;
      });

      const requests = Array.from({ length: 6 }, () => session.runStorage((store) => store.getBestBlock()));
      await new Promise((resolve) => setImmediate(resolve));

      expect(pool.active).toBe(2);
      expect(session.pendingStorage).toBe(4);

      open();
      await Promise.all(requests);

      expect(pool.maxActive).toBe(2);
      expect(pool.started).toBe(6);
    });

    it('wraps store failures and returns the permit', async () => {
      const { session, store } = createTestSession({ maxConcurrency: 1 });
      store.getBestBlock.mockRejectedValueOnce(new Error('disk full'));

      await expect(session.runStorage((s) => s.getBestBlock())).rejects.toMatchObject({
        code: ErrorCodes.DATABASE_ERROR,
        description: 'Error: disk full',
      });
      await expect(session.runStorage((s) => s.getBestBlock())).resolves.toEqual({
        hash: 'f'.repeat(64),
        height: 100,
      });
    });
  });

  describe('tryStorage', () => {
    it('logs a store failure and yields undefined', async () => {
      const { session, store } = createTestSession();
      store.getBestBlock.mockRejectedValueOnce(new Error('connection reset'));

      const result = await session.tryStorage((s) => s.getBestBlock());

      expect(result).toBeUndefined();
      expect(mockLogError).toHaveBeenCalledWith('A database error occurred', {
        description: 'Error: connection reset',
      });
    });

    it('still rejects with not-found errors', async () => {
      const { session } = createTestSession();

      await expect(session.tryStorage((s) => s.getAccount('missing'))).rejects.toBeInstanceOf(AccountNotFoundError);
      expect(mockLogError).not.toHaveBeenCalled();
    });

    it('still rejects with wallet errors', async () => {
      const { session } = createTestSession();

      await expect(
        session.tryStorage(async () => {
          throw new WalletError('No keys have been generated in the wallet');
        })
      ).rejects.toThrow('No keys have been generated in the wallet');
    });
  });

  describe('runSync', () => {
    it('forwards the message to the node state', async () => {
      const { session, node } = createTestSession();

      await session.runSync('broadcastTxs', { txids: ['ab'] });

      expect(node.broadcastTxs).toHaveBeenCalledWith(['ab']);
    });

    it('fails with a configuration defect when there is no node state', async () => {
      const { session } = createTestSession({ withoutNode: true });

      await expect(session.runSync('status', {})).rejects.toBeInstanceOf(ConfigurationDefect);
    });

    it('wraps peer node failures', async () => {
      const { session, node } = createTestSession();
      node.broadcastTxs.mockRejectedValueOnce(new Error('socket closed'));

      const result = session.runSync('broadcastTxs', { txids: ['ab'] });

      await expect(result).rejects.toBeInstanceOf(NodeFault);
      await expect(result).rejects.toMatchObject({
        statusCode: 503,
        code: ErrorCodes.NODE_ERROR,
        description: 'Error: socket closed',
      });
    });

    it('passes API errors from the node state through unchanged', async () => {
      const { session } = createTestSession();

      await expect(session.runSync('mainChain', { tip: 'a'.repeat(64), target: 'b'.repeat(64) })).rejects.toBeInstanceOf(
        BlockNotFoundError
      );
    });
  });

  describe('whenOnline', () => {
    it('runs the step in online mode', async () => {
      const { session } = createTestSession({ mode: 'online' });
      const step = vi.fn(async () => undefined);

      await session.whenOnline(step);

      expect(step).toHaveBeenCalledTimes(1);
    });

    it('skips the step in offline mode', async () => {
      const { session } = createTestSession({ mode: 'offline' });
      const step = vi.fn(async () => undefined);

      await session.whenOnline(step);

      expect(step).not.toHaveBeenCalled();
    });
  });

  describe('updateNodeFilter', () => {
    it('reads the filter from the store and sends it to the node', async () => {
      const { session, store, node } = createTestSession();

      await session.updateNodeFilter();

      expect(store.getBloomFilter).toHaveBeenCalledTimes(1);
      expect(node.sendBloomFilter).toHaveBeenCalledWith(sampleBloomFilter);
    });
  });
});
