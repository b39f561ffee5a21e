/**
 * Header Chain Walk
 *
 * Follows prevHash links through locally stored headers. No peer is queried.
 */

import { BlockNotFoundError, WalletError } from '../../errors';
import type { BlockHeader } from './types';

export type HeaderLookup = (hash: string) => Promise<BlockHeader | undefined>;

/**
 * Headers on the chain ending at `tipHash` that come after `targetHash`,
 * oldest first. Returns [] when both hashes are equal.
 *
 * @throws BlockNotFoundError when either block is unknown
 * @throws WalletError when `targetHash` is not an ancestor of `tipHash`
 */
export async function walkMainChain(
  getHeader: HeaderLookup,
  tipHash: string,
  targetHash: string
): Promise<BlockHeader[]> {
  if (tipHash === targetHash) return [];

  const target = await getHeader(targetHash);
  if (!target) {
    throw new BlockNotFoundError(targetHash);
  }

  const chain: BlockHeader[] = [];
  let current = await getHeader(tipHash);
  if (!current) {
    throw new BlockNotFoundError(tipHash);
  }

  while (current.height > target.height) {
    chain.push(current);
    const parent: BlockHeader | undefined = await getHeader(current.prevHash);
    if (!parent) {
      throw new BlockNotFoundError(current.prevHash);
    }
    current = parent;
  }

  if (current.hash !== target.hash) {
    throw new WalletError(`Block ${targetHash} is not an ancestor of the best block ${tipHash}`, {
      target: targetHash,
      tip: tipHash,
    });
  }

  return chain.reverse();
}
