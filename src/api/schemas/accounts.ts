/**
 * Account & Address Validation Schemas
 */

import { z } from 'zod';
import { AddressTypeSchema, NonEmptyStringSchema, XprvSchema, XpubSchema } from './common';

export const AccountNameSchema = z
  .string()
  .min(1, 'Account name is required')
  .max(64, 'Account name must be at most 64 characters');

export const AccountTypeSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('regular'),
    readOnly: z.boolean().default(false),
  }),
  z.object({
    kind: z.literal('multisig'),
    readOnly: z.boolean().default(false),
    required: z.number().int().min(1).max(15),
    total: z.number().int().min(1).max(15),
  }),
]);

/**
 * Create account request
 */
export const CreateAccountSchema = z
  .object({
    name: AccountNameSchema,
    type: AccountTypeSchema,
    masterKey: XprvSchema.optional(),
    mnemonic: NonEmptyStringSchema.optional(),
    passphrase: z.string().optional(),
    keys: z.array(XpubSchema).default([]),
  })
  .superRefine((account, ctx) => {
    if (account.type.kind === 'multisig' && account.type.required > account.type.total) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['type', 'required'],
        message: 'Required signatures cannot exceed the number of keys',
      });
    }
    if (account.masterKey && account.mnemonic) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['masterKey'],
        message: 'Provide either a master key or a mnemonic, not both',
      });
    }
  });

export const RenameAccountSchema = z.object({
  newName: AccountNameSchema,
});

export const AccountKeysSchema = z.object({
  keys: z.array(XpubSchema).min(1, 'At least one key is required'),
});

export const AccountGapSchema = z.object({
  gap: z.number().int().min(1).max(1000),
});

export const AddressLabelSchema = z.object({
  label: z.string().max(255),
  type: AddressTypeSchema.default('external'),
});

export const GenerateAddressesSchema = z.object({
  index: z.number().int().min(0).max(0x7fffffff),
  type: AddressTypeSchema.default('external'),
});

export type CreateAccountInput = z.infer<typeof CreateAccountSchema>;
