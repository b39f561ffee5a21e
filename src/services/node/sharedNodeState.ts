/**
 * Shared Node State
 *
 * Single owner of the peer node handle. Callers send named messages; the
 * messages run one at a time in arrival order, so two operations never
 * interleave and no caller holds a reference into the node itself.
 *
 * ```typescript
 * const nodeState = new SharedNodeState(peerNode);
 * await nodeState.atomically('broadcastTxs', { txids: [txid] });
 * const headers = await nodeState.atomically('mainChain', { tip, target });
 * ```
 */

import { createLogger } from '../../utils/logger';
import { walkMainChain } from './headerChain';
import type { NodeOperation, NodeRequestMap, NodeResponseMap, PeerNode } from './types';

const log = createLogger('NODE');

type NodeHandlers = {
  [K in NodeOperation]: (payload: NodeRequestMap[K]) => Promise<NodeResponseMap[K]>;
};

export class SharedNodeState {
  private readonly handlers: NodeHandlers;
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  constructor(node: PeerNode) {
    this.handlers = {
      sendBloomFilter: ({ filter }) => node.sendBloomFilter(filter),
      broadcastTxs: ({ txids }) => node.broadcastTxs(txids),
      rescanFrom: ({ timestamp }) => node.rescanFrom(timestamp),
      status: () => node.status(),
      mainChain: ({ tip, target }) => walkMainChain((hash) => node.getBlockHeader(hash), tip, target),
    };
  }

  /** Messages waiting or running */
  get queueDepth(): number {
    return this.queued;
  }

  /**
   * Queue one message and wait for its reply. A failing message rejects its
   * own caller only; later messages still run.
   */
  atomically<K extends NodeOperation>(op: K, payload: NodeRequestMap[K]): Promise<NodeResponseMap[K]> {
    this.queued++;
    log.debug('Queued node operation', { op, queueDepth: this.queued });

    const result = this.tail.then(() => this.dispatch(op, payload));
    const settled = (): void => {
      this.queued--;
    };
    this.tail = result.then(settled, settled);
    return result;
  }

  private dispatch<K extends NodeOperation>(op: K, payload: NodeRequestMap[K]): Promise<NodeResponseMap[K]> {
    const handler = this.handlers[op];
    return handler(payload);
  }
}
