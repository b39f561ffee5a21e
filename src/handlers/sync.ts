/**
 * Chain Window Sync
 *
 * Lets a client that has processed blocks up to `blockHash` catch up: the
 * main-chain blocks after it, each with the account transactions it
 * confirmed.
 */

import { WalletError } from '../errors';
import { createLogger } from '../utils/logger';
import { toJsonTx, type JsonTx } from './serialization';
import type { HandlerSession } from './session';
import type { BestBlock, WalletTx } from '../repositories/types';
import type { BlockHeader } from '../services/node/types';

const log = createLogger('SYNC');

export interface BlockTxs {
  header: BlockHeader;
  txs: JsonTx[];
}

/**
 * One bundle per block, in block order, holding the transactions that block
 * confirmed
 */
export function groupBlockTxs(blocks: BlockHeader[], txs: WalletTx[], best: BestBlock): BlockTxs[] {
  const byBlock = new Map<string, WalletTx[]>();
  for (const tx of txs) {
    if (!tx.confirmedBy) continue;
    const bucket = byBlock.get(tx.confirmedBy);
    if (bucket) {
      bucket.push(tx);
    } else {
      byBlock.set(tx.confirmedBy, [tx]);
    }
  }

  return blocks.map((header) => ({
    header,
    txs: (byBlock.get(header.hash) ?? []).map((tx) => toJsonTx(tx, best)),
  }));
}

/**
 * Blocks after `blockHash` on the main chain, oldest first, at most
 * `maxBlocks` of them (0 = no limit)
 */
export async function getSync(
  session: HandlerSession,
  name: string,
  blockHash: string,
  maxBlocks: number
): Promise<BlockTxs[]> {
  if (!session.hasNodeState) {
    throw new WalletError('No node state available');
  }

  log.info('Get sync', { name, blockHash, maxBlocks });

  return session.runStorage(async (store) => {
    const best = await store.getBestBlock();
    const chain = await session.runSync('mainChain', { tip: best.hash, target: blockHash });
    const blocks = maxBlocks > 0 ? chain.slice(0, maxBlocks) : chain;
    if (blocks.length === 0) {
      return [];
    }

    const account = await store.getAccount(name);
    const txs = await store.accTxsFromBlock(account.id, blocks[0].height, maxBlocks);
    return groupBlockTxs(blocks, txs, best);
  });
}
