/**
 * Health Check API
 *
 * Aggregates the state of the wallet store, the peer node and the process.
 *
 * GET /health        component report (503 when unhealthy)
 * GET /health/live   liveness check
 */

import { Router, Request, Response } from 'express';
import { asyncHandler } from '../errors';
import { createLogger, extractError } from '../utils/logger';
import type { HandlerSession } from '../handlers';

const log = createLogger('HEALTH');

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentHealth {
  status: HealthStatus;
  message?: string;
  latency?: number;
  details?: Record<string, unknown>;
}

export interface HealthResponse {
  status: HealthStatus;
  timestamp: string;
  uptime: number;
  mode: string;
  network: string;
  components: {
    database: ComponentHealth;
    node: ComponentHealth;
    memory: ComponentHealth;
  };
}

const startTime = Date.now();

// Memory threshold for degraded status (500MB heap usage)
const MEMORY_THRESHOLD_DEGRADED = 500 * 1024 * 1024;
// Memory threshold for unhealthy status (1GB heap usage)
const MEMORY_THRESHOLD_UNHEALTHY = 1024 * 1024 * 1024;

/**
 * Check the wallet store by reading the best block
 */
async function checkDatabase(session: HandlerSession): Promise<ComponentHealth> {
  const start = Date.now();
  try {
    const best = await session.runStorage((store) => store.getBestBlock());
    return {
      status: 'healthy',
      latency: Date.now() - start,
      details: { bestHeight: best.height, waiting: session.pendingStorage },
    };
  } catch (error) {
    log.error('Database health check failed', extractError(error));
    return {
      status: 'unhealthy',
      message: 'Wallet store unreachable',
      latency: Date.now() - start,
    };
  }
}

/**
 * Check the peer node. Offline deployments run without one.
 */
async function checkNode(session: HandlerSession): Promise<ComponentHealth> {
  if (!session.hasNodeState) {
    return session.isOnline
      ? { status: 'degraded', message: 'No node state configured' }
      : { status: 'healthy', message: 'Offline mode' };
  }

  try {
    const status = await session.runSync('status', {});
    const connected = status.peers.filter((peer) => peer.connected).length;
    return {
      status: connected > 0 ? 'healthy' : 'degraded',
      message: connected > 0 ? undefined : 'No connected peers',
      details: {
        synced: status.synced,
        bestHeader: status.bestHeader.height,
        peers: connected,
      },
    };
  } catch (error) {
    log.error('Node health check failed', extractError(error));
    return { status: 'unhealthy', message: 'Node status unavailable' };
  }
}

function checkMemory(): ComponentHealth {
  const mem = process.memoryUsage();
  const heapUsedMB = Math.round(mem.heapUsed / 1024 / 1024);

  let status: HealthStatus = 'healthy';
  let message: string | undefined;

  if (mem.heapUsed >= MEMORY_THRESHOLD_UNHEALTHY) {
    status = 'unhealthy';
    message = `High memory usage: ${heapUsedMB}MB heap`;
  } else if (mem.heapUsed >= MEMORY_THRESHOLD_DEGRADED) {
    status = 'degraded';
    message = `Elevated memory usage: ${heapUsedMB}MB heap`;
  }

  return {
    status,
    message,
    details: {
      heapUsed: `${heapUsedMB}MB`,
      rss: `${Math.round(mem.rss / 1024 / 1024)}MB`,
    },
  };
}

/**
 * Database unhealthy = overall unhealthy; anything else only degrades
 */
function determineOverallStatus(components: HealthResponse['components']): HealthStatus {
  if (components.database.status === 'unhealthy') {
    return 'unhealthy';
  }

  const statuses = Object.values(components).map((c) => c.status);
  if (statuses.includes('unhealthy') || statuses.includes('degraded')) {
    return 'degraded';
  }
  return 'healthy';
}

export function createHealthRouter(session: HandlerSession): Router {
  const router = Router();

  router.get(
    '/health',
    asyncHandler(async (req: Request, res: Response) => {
      const components = {
        database: await checkDatabase(session),
        node: await checkNode(session),
        memory: checkMemory(),
      };

      const status = determineOverallStatus(components);
      const response: HealthResponse = {
        status,
        timestamp: new Date().toISOString(),
        uptime: Math.floor((Date.now() - startTime) / 1000),
        mode: session.config.wallet.mode,
        network: session.config.wallet.network,
        components,
      };

      res.status(status === 'unhealthy' ? 503 : 200).json(response);
    })
  );

  router.get('/health/live', (req: Request, res: Response) => {
    res.status(200).json({ status: 'alive' });
  });

  return router;
}
