/**
 * Server Configuration
 *
 * Reads the environment (and a .env file, when present) into a validated
 * Config object.
 *
 *   NODE_ENV            development | production | test
 *   PORT                HTTP port (default 8555)
 *   WALLET_MODE         online | offline (default online)
 *   BITCOIN_NETWORK     mainnet | testnet | signet | regtest (default mainnet)
 *   DATABASE_URL        connection string of the wallet store
 *   DB_MAX_CONCURRENCY  store transactions allowed at once (default 10)
 *   LOG_LEVEL           debug | info | warn | error (default info)
 */

import dotenv from 'dotenv';
import { parseConfig } from './schema';
import type { Config } from './types';

export type { Config, NetworkType, WalletMode, LogLevel } from './types';
export { validateConfigSchema, parseConfig } from './schema';

type Env = Record<string, string | undefined>;

/**
 * Build and validate the configuration from an environment map
 */
export function loadConfig(env: Env = process.env): Config {
  const config = parseConfig({
    server: {
      nodeEnv: env.NODE_ENV || 'development',
      port: parseInt(env.PORT || '8555', 10),
    },
    wallet: {
      mode: env.WALLET_MODE || 'online',
      network: env.BITCOIN_NETWORK || 'mainnet',
    },
    database: {
      url: env.DATABASE_URL || '',
      maxConcurrency: parseInt(env.DB_MAX_CONCURRENCY || '10', 10),
    },
    logging: {
      level: env.LOG_LEVEL?.toLowerCase() || 'info',
    },
  });

  if (config.server.nodeEnv === 'production' && !config.database.url) {
    throw new Error('DATABASE_URL is required in production');
  }

  return config;
}

let cachedConfig: Config | undefined;

/**
 * Process-wide configuration, loaded on first use
 */
export function getConfig(): Config {
  if (!cachedConfig) {
    dotenv.config();
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export default getConfig;
