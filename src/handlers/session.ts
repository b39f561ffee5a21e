/**
 * Handler Session
 *
 * Everything a request handler needs to reach the outside world: the loaded
 * configuration, the pooled wallet store and, on nodes that talk to peers,
 * the shared node state.
 *
 * Store transactions are bounded by a semaphore sized from
 * `database.maxConcurrency`; handlers never open a transaction themselves.
 *
 * ```typescript
 * const session = new HandlerSession({ config, pool, nodeState });
 * const account = await session.runStorage((store) => store.getAccount('savings'));
 * await session.whenOnline(() => session.updateNodeFilter());
 * ```
 */

import type * as bitcoin from 'bitcoinjs-lib';
import { ConfigurationDefect, NodeFault, StorageFault } from '../errors';
import { createLogger } from '../utils/logger';
import { Semaphore } from '../utils/semaphore';
import { getNetwork } from '../services/bitcoin/utils';
import type { Config } from '../config/types';
import type { StorePool, WalletStore } from '../repositories/types';
import type { SharedNodeState } from '../services/node/sharedNodeState';
import type { NodeOperation, NodeRequestMap, NodeResponseMap } from '../services/node/types';

const log = createLogger('SESSION');

export type StorageOperation<T> = (store: WalletStore) => Promise<T>;

export interface HandlerSessionOptions {
  config: Config;
  pool: StorePool;
  /** Absent on offline deployments */
  nodeState?: SharedNodeState;
}

export class HandlerSession {
  readonly config: Config;
  private readonly pool: StorePool;
  private readonly nodeState?: SharedNodeState;
  private readonly semaphore: Semaphore;

  constructor(options: HandlerSessionOptions) {
    this.config = options.config;
    this.pool = options.pool;
    this.nodeState = options.nodeState;
    this.semaphore = new Semaphore(options.config.database.maxConcurrency);
  }

  get hasNodeState(): boolean {
    return this.nodeState !== undefined;
  }

  get isOnline(): boolean {
    return this.config.wallet.mode === 'online';
  }

  get network(): bitcoin.Network {
    return getNetwork(this.config.wallet.network);
  }

  /** Store transactions currently waiting for a permit */
  get pendingStorage(): number {
    return this.semaphore.pending;
  }

  /**
   * Run `op` inside one store transaction once a permit is free. The permit
   * is returned on every exit path. Failures of the store itself reject as
   * StorageFault; API errors raised inside `op` reject unchanged.
   */
  async runStorage<T>(op: StorageOperation<T>): Promise<T> {
    try {
      return await this.semaphore.use(() => this.pool.transaction(op));
    } catch (error) {
      throw StorageFault.from(error);
    }
  }

  /**
   * Like runStorage, but a storage fault is logged and yields undefined.
   * Not-found and wallet errors still reject.
   */
  async tryStorage<T>(op: StorageOperation<T>): Promise<T | undefined> {
    try {
      return await this.runStorage(op);
    } catch (error) {
      if (!(error instanceof StorageFault)) {
        throw error;
      }
      log.error('A database error occurred', { description: error.description });
      return undefined;
    }
  }

  /**
   * Send one message to the shared node state and wait for its reply.
   * Failures of the peer node reject as NodeFault; API errors raised by the
   * operation reject unchanged.
   *
   * @throws ConfigurationDefect when the session was built without node state
   */
  async runSync<K extends NodeOperation>(op: K, payload: NodeRequestMap[K]): Promise<NodeResponseMap[K]> {
    if (!this.nodeState) {
      throw new ConfigurationDefect(`Node operation ${op} requested without node state`);
    }
    try {
      return await this.nodeState.atomically(op, payload);
    } catch (error) {
      throw NodeFault.from(error);
    }
  }

  /**
   * Run a network step in online mode; skip it offline
   */
  async whenOnline(step: () => Promise<void>): Promise<void> {
    if (!this.isOnline) {
      log.debug('Offline mode, skipping network step');
      return;
    }
    await step();
  }

  /**
   * Rebuild the bloom filter from the store and hand it to the node
   */
  async updateNodeFilter(): Promise<void> {
    const filter = await this.runStorage((store) => store.getBloomFilter());
    log.info('Updating node bloom filter', { elements: filter.elements });
    await this.runSync('sendBloomFilter', { filter });
  }
}
