/**
 * Node Handlers
 */

import { WalletError } from '../errors';
import { createLogger } from '../utils/logger';
import type { HandlerSession } from './session';
import type { BestBlock } from '../repositories/types';
import type { NodeStatus } from '../services/node/types';

const log = createLogger('NODE');

/** Rescans start one week before the requested time */
export const RESCAN_SAFETY_MARGIN_SECONDS = 7 * 24 * 60 * 60;

export type NodeAction = { type: 'rescan'; timestamp?: number } | { type: 'status' };

export interface RescanResult {
  timestamp: number;
}

export interface NodeStatusResult extends NodeStatus {
  /** Best block the wallet store has processed; absent when it could not be read */
  walletBestBlock?: BestBlock;
}

export function adjustRescanTime(timestamp: number): number {
  return Math.max(0, timestamp - RESCAN_SAFETY_MARGIN_SECONDS);
}

/**
 * Restart block download from `timestamp`, or from the creation time of the
 * first address in the wallet
 */
export async function rescan(session: HandlerSession, timestamp?: number): Promise<RescanResult> {
  const requested = timestamp ?? (await session.runStorage((store) => store.firstAddrTime()));
  if (requested === undefined) {
    throw new WalletError('No keys have been generated in the wallet');
  }

  const from = adjustRescanTime(requested);
  log.info('Rescan', { timestamp: from });

  await session.whenOnline(async () => {
    await session.runStorage((store) => store.resetRescan());
    await session.runSync('rescanFrom', { timestamp: from });
  });

  return { timestamp: from };
}

export async function status(session: HandlerSession): Promise<NodeStatusResult> {
  log.info('Node status');

  const nodeStatus = await session.runSync('status', {});
  const walletBestBlock = await session.tryStorage((store) => store.getBestBlock());
  return walletBestBlock ? { ...nodeStatus, walletBestBlock } : nodeStatus;
}

export async function postNode(
  session: HandlerSession,
  action: NodeAction
): Promise<RescanResult | NodeStatusResult> {
  switch (action.type) {
    case 'rescan':
      return rescan(session, action.timestamp);
    case 'status':
      return status(session);
  }
}
