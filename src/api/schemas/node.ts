/**
 * Node & Sync Validation Schemas
 */

import { z } from 'zod';
import { BlockHashSchema, NonEmptyStringSchema } from './common';

export const NodeActionSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('rescan'),
    /** Unix seconds */
    timestamp: z.number().int().min(0).optional(),
  }),
  z.object({ type: z.literal('status') }),
]);

export const SyncParamSchema = z.object({
  name: NonEmptyStringSchema,
  blockHash: BlockHashSchema,
});

export const SyncQuerySchema = z.object({
  maxBlocks: z.coerce.number().int().min(0).default(0),
});

export type NodeActionInput = z.infer<typeof NodeActionSchema>;
