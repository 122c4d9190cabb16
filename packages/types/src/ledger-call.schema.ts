/**
 * Ledger call payload schemas
 * One variant per dispatchable operation, discriminated on `call`
 */

import { z } from 'zod';
import { AccountIdSchema, AmountSchema, TokenLabelSchema } from './amount.schema.js';

export const IssueCallSchema = z.object({
  call: z.literal('issue'),
  name: TokenLabelSchema,
  ticker: TokenLabelSchema,
  totalSupply: AmountSchema,
});

export const TransferCallSchema = z.object({
  call: z.literal('transfer'),
  to: AccountIdSchema,
  value: AmountSchema,
});

export const ApproveCallSchema = z.object({
  call: z.literal('approve'),
  spender: AccountIdSchema,
  value: AmountSchema,
});

export const TransferFromCallSchema = z.object({
  call: z.literal('transferFrom'),
  from: AccountIdSchema,
  to: AccountIdSchema,
  value: AmountSchema,
});

export const LedgerCallSchema = z.discriminatedUnion('call', [
  IssueCallSchema,
  TransferCallSchema,
  ApproveCallSchema,
  TransferFromCallSchema,
]);

/** Parsed call, amounts already converted to bigint */
export type LedgerCall = z.output<typeof LedgerCallSchema>;

/** Call as the host submits it */
export type LedgerCallInput = z.input<typeof LedgerCallSchema>;
