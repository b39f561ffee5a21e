/**
 * Transaction Validation Schemas
 */

import { z } from 'zod';
import {
  HexStringSchema,
  NonEmptyStringSchema,
  PsbtSchema,
  RelativePathSchema,
  SatoshiAmountSchema,
  TxidSchema,
  XprvSchema,
} from './common';

export const RecipientSchema = z.object({
  address: NonEmptyStringSchema,
  amount: SatoshiAmountSchema,
});

export const FeePolicySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('feeRate'), satPerVbyte: z.number().positive() }),
  z.object({ kind: z.literal('absolute'), amount: z.number().int().min(0) }),
]);

export const TxActionSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('createTx'),
    recipients: z.array(RecipientSchema).min(1, 'At least one recipient is required'),
    fee: FeePolicySchema,
    minConf: z.number().int().min(0).default(1),
    rcptFee: z.boolean().default(false),
    sign: z.boolean().default(true),
  }),
  z.object({
    type: z.literal('importTx'),
    tx: HexStringSchema.min(2, 'Transaction is required'),
  }),
  z.object({
    type: z.literal('signTx'),
    txid: TxidSchema,
  }),
]);

export const PostTxSchema = z.object({
  masterKey: XprvSchema.optional(),
  action: TxActionSchema,
});

export const CoinSignDataSchema = z.object({
  txid: TxidSchema,
  vout: z.number().int().min(0),
  script: HexStringSchema.min(2),
  value: z.number().int().min(0),
  derivation: RelativePathSchema,
  witnessScript: HexStringSchema.min(2).optional(),
  redeemScript: HexStringSchema.min(2).optional(),
});

export const SignOfflineTxSchema = z.object({
  masterKey: XprvSchema.optional(),
  psbt: PsbtSchema,
  coins: z.array(CoinSignDataSchema).min(1, 'Signing data is required'),
});

export type PostTxInput = z.infer<typeof PostTxSchema>;
export type SignOfflineTxInput = z.infer<typeof SignOfflineTxSchema>;
