/**
 * SPV Wallet Server
 *
 * Library entry point. The host process owns the wallet store and the peer
 * node; it hands them over here and gets an HTTP server back.
 *
 * ```typescript
 * import { startServer } from 'spv-wallet-server';
 *
 * const server = await startServer({ pool, peerNode });
 * ```
 */

import type { Server } from 'http';
import { getConfig, type Config } from './config';
import { createApp } from './app';
import { HandlerSession } from './handlers';
import { SharedNodeState } from './services/node/sharedNodeState';
import { createLogger, setLogLevel } from './utils/logger';
import type { StorePool } from './repositories/types';
import type { PeerNode } from './services/node/types';

const log = createLogger('SERVER');

export interface StartServerOptions {
  pool: StorePool;
  /** Required in online mode */
  peerNode?: PeerNode;
  config?: Config;
}

/**
 * Build the session and listen on the configured port
 */
export function startServer({ pool, peerNode, config = getConfig() }: StartServerOptions): Promise<Server> {
  setLogLevel(config.logging.level);

  if (config.wallet.mode === 'online' && !peerNode) {
    log.warn('Online mode without a peer node; network operations will fail');
  }

  const session = new HandlerSession({
    config,
    pool,
    nodeState: peerNode ? new SharedNodeState(peerNode) : undefined,
  });
  const app = createApp({ session });

  return new Promise((resolve, reject) => {
    const server = app.listen(config.server.port);
    server.once('listening', () => {
      log.info('Wallet server listening', {
        port: config.server.port,
        mode: config.wallet.mode,
        network: config.wallet.network,
        storeConcurrency: config.database.maxConcurrency,
      });
      resolve(server);
    });
    server.once('error', reject);
  });
}

export { createApp, type AppOptions } from './app';
export { HandlerSession, type HandlerSessionOptions } from './handlers';
export * as handlers from './handlers';
export { SharedNodeState } from './services/node/sharedNodeState';
export { walkMainChain } from './services/node/headerChain';
export { signOfflineTx, isFullySigned, type OfflineSignResult } from './services/bitcoin/offlineSigning';
export { loadConfig, getConfig, type Config } from './config';
export * from './errors';
export type * from './repositories/types';
export type * from './services/node/types';
