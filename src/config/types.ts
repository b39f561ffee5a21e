/**
 * Configuration Type Definitions
 */

export type NetworkType = 'mainnet' | 'testnet' | 'signet' | 'regtest';
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * online: the server is attached to a peer node and refreshes the bloom filter,
 * broadcasts and rescans. offline: storage only.
 */
export type WalletMode = 'online' | 'offline';

export interface ServerConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
}

export interface WalletConfig {
  mode: WalletMode;
  network: NetworkType;
}

export interface DatabaseConfig {
  url: string;
  /** Upper bound on store transactions running at the same time */
  maxConcurrency: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface Config {
  server: ServerConfig;
  wallet: WalletConfig;
  database: DatabaseConfig;
  logging: LoggingConfig;
}
