/**
 * Common Validation Schemas
 *
 * Reusable Zod schemas for request parameters shared across routes.
 */

import { z } from 'zod';

// =============================================================================
// Basic Types
// =============================================================================

/** Non-empty string */
export const NonEmptyStringSchema = z.string().min(1);

/** Query-string boolean ("true" / "false") */
export const QueryBooleanSchema = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

// =============================================================================
// Pagination
// =============================================================================

export const ListQuerySchema = z.object({
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(50),
  reverse: QueryBooleanSchema,
});

// =============================================================================
// Bitcoin-specific
// =============================================================================

/** Transaction ID (64 hex chars) */
export const TxidSchema = z.string().regex(/^[a-fA-F0-9]{64}$/, 'Invalid transaction ID');

/** Block hash (64 hex chars) */
export const BlockHashSchema = z.string().regex(/^[a-fA-F0-9]{64}$/, 'Invalid block hash');

/** Hex string */
export const HexStringSchema = z.string().regex(/^([a-fA-F0-9]{2})*$/, 'Must be a valid hex string');

/** PSBT base64 */
export const PsbtSchema = z.string().min(1, 'PSBT is required');

/** Extended public key (xpub, tpub) */
export const XpubSchema = z.string().regex(/^[xt]pub[1-9A-HJ-NP-Za-km-z]{79,108}$/, 'Invalid extended public key format');

/** Extended private key (xprv, tprv) */
export const XprvSchema = z.string().regex(/^[xt]prv[1-9A-HJ-NP-Za-km-z]{79,108}$/, 'Invalid extended private key format');

/** Key derivation path relative to the account key, e.g. 0/12 */
export const RelativePathSchema = z.string().regex(/^\d+'?(\/\d+'?)*$/, "Invalid derivation path format (e.g., 0/12)");

/** Satoshi amount (positive integer) */
export const SatoshiAmountSchema = z.number().int().positive();

export const AddressTypeSchema = z.enum(['external', 'internal']);

/** Address type from the query string; external when absent */
export const AddressTypeQuerySchema = z.object({
  type: AddressTypeSchema.default('external'),
});

export const BalanceQuerySchema = z.object({
  minconf: z.coerce.number().int().min(0).default(0),
  offline: QueryBooleanSchema,
});

// =============================================================================
// Route Parameters
// =============================================================================

export const AccountParamSchema = z.object({
  name: NonEmptyStringSchema,
});

export const AddressIndexParamSchema = z.object({
  name: NonEmptyStringSchema,
  index: z.coerce.number().int().min(0).max(0x7fffffff),
});

export const AccountTxParamSchema = z.object({
  name: NonEmptyStringSchema,
  txid: TxidSchema,
});

export const TxidParamSchema = z.object({
  txid: TxidSchema,
});

// =============================================================================
// Type Exports
// =============================================================================

export type ListQuery = z.infer<typeof ListQuerySchema>;
export type BalanceQuery = z.infer<typeof BalanceQuerySchema>;
