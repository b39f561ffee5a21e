/**
 * Peer Node Types
 *
 * The SPV node (peer connections, header sync, merkle blocks) is provided by
 * the host process. This package reaches it only through the messages below.
 */

import type { BloomFilterData } from '../../repositories/types';

export interface BlockHeader {
  hash: string;
  prevHash: string;
  height: number;
  /** Block time, unix seconds */
  timestamp: number;
}

export interface PeerStatus {
  host: string;
  connected: boolean;
  height?: number;
  bloomFilterSent: boolean;
}

export interface NodeStatus {
  bestHeader: { hash: string; height: number };
  bestBlock: { hash: string; height: number };
  /** Unix seconds a rescan restarts from, when one is running */
  rescanFrom?: number;
  synced: boolean;
  mempoolRequested: boolean;
  peers: PeerStatus[];
}

/**
 * Host-side node interface
 */
export interface PeerNode {
  sendBloomFilter(filter: BloomFilterData): Promise<void>;
  broadcastTxs(txids: string[]): Promise<void>;
  rescanFrom(timestamp: number): Promise<void>;
  status(): Promise<NodeStatus>;
  /** Header from the locally stored header chain */
  getBlockHeader(hash: string): Promise<BlockHeader | undefined>;
}

// =============================================================================
// Messages
// =============================================================================

/** Payload of each message the node state accepts */
export interface NodeRequestMap {
  sendBloomFilter: { filter: BloomFilterData };
  broadcastTxs: { txids: string[] };
  rescanFrom: { timestamp: number };
  status: Record<string, never>;
  /** Main chain from `tip` back to, not including, `target` */
  mainChain: { tip: string; target: string };
}

/** Reply to each message */
export interface NodeResponseMap {
  sendBloomFilter: void;
  broadcastTxs: void;
  rescanFrom: void;
  status: NodeStatus;
  mainChain: BlockHeader[];
}

export type NodeOperation = keyof NodeRequestMap;
