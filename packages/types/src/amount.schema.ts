/**
 * Primitive schemas shared by ledger call payloads
 * Used to validate values the host hands to the ledger before dispatch
 */

import { z } from 'zod';

/**
 * Unsigned token amount
 * - bigint: taken as is
 * - number: must be a safe, non-negative integer
 * - string: non-negative decimal digits (the lossless form for wide balances)
 *
 * The width bound is enforced by the ledger itself, not here.
 */
export const AmountSchema = z
  .union([
    z.bigint().nonnegative('Amount cannot be negative'),
    z
      .number()
      .int('Amount must be a whole number')
      .nonnegative('Amount cannot be negative')
      .refine(Number.isSafeInteger, 'Amount exceeds the safe integer range, pass it as a string'),
    z.string().trim().regex(/^\d+$/, 'Amount must be a non-negative decimal integer'),
  ])
  .transform((value) => BigInt(value));

export type AmountInput = z.input<typeof AmountSchema>;

/**
 * Opaque account identity issued by the host's authentication layer
 */
export const AccountIdSchema = z.string().min(1, 'Account id is required');

/**
 * Token name or ticker, as UTF-8 text or raw bytes
 * Byte-length limits are checked by the token registry
 */
export const TokenLabelSchema = z.union([z.string(), z.instanceof(Uint8Array)]);

export type TokenLabelInput = z.infer<typeof TokenLabelSchema>;
