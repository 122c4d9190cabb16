/**
 * Read-side schemas for the host and UI layers
 * Amounts are rendered as decimal strings so they survive JSON
 */

import { z } from 'zod';

const DecimalStringSchema = z.string().regex(/^\d+$/);

/**
 * Token metadata as exposed by token_details
 * Labels are UTF-8 decoded; invalid sequences become U+FFFD
 */
export const TokenDetailsResponseSchema = z.object({
  name: z.string().max(64),
  ticker: z.string().max(32),
  totalSupply: DecimalStringSchema,
});

export type TokenDetailsResponse = z.infer<typeof TokenDetailsResponseSchema>;

/**
 * Event record handed to the host's event log
 */
export const LedgerEventResponseSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('Transfer'),
    from: z.string(),
    to: z.string(),
    value: DecimalStringSchema,
  }),
  z.object({
    type: z.literal('Approval'),
    owner: z.string(),
    spender: z.string(),
    value: DecimalStringSchema,
  }),
]);

export type LedgerEventResponse = z.infer<typeof LedgerEventResponseSchema>;
