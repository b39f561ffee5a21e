/**
 * Configuration Validation Schema
 *
 * Zod schemas for runtime validation of application configuration.
 */

import { z } from 'zod';
import type { Config } from './types';

export const NetworkTypeSchema = z.enum(['mainnet', 'testnet', 'signet', 'regtest']);
export const WalletModeSchema = z.enum(['online', 'offline']);
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);

export const ServerConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  port: z.number().int().min(1).max(65535),
});

export const WalletConfigSchema = z.object({
  mode: WalletModeSchema,
  network: NetworkTypeSchema,
});

export const DatabaseConfigSchema = z.object({
  url: z.string(),
  maxConcurrency: z.number().int().min(1).max(64),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

export const ConfigSchema = z.object({
  server: ServerConfigSchema,
  wallet: WalletConfigSchema,
  database: DatabaseConfigSchema,
  logging: LoggingConfigSchema,
}) satisfies z.ZodType<Config>;

export type ConfigValidationResult =
  | { success: true; config: Config; errors: [] }
  | { success: false; errors: string[] };

/**
 * Validate configuration and return detailed errors
 */
export function validateConfigSchema(config: unknown): ConfigValidationResult {
  const result = ConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, config: result.data, errors: [] };
  }

  const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  return { success: false, errors };
}

/**
 * Validate configuration and throw if invalid
 */
export function parseConfig(config: unknown): Config {
  const result = validateConfigSchema(config);

  if (!result.success) {
    throw new Error(`Configuration validation failed: ${result.errors.join('; ')}`);
  }

  return result.config;
}
