/**
 * Host entry point
 *
 * Validates an untrusted call payload and routes it to the engine.
 */

import { LedgerCallSchema } from '@tokenledger/types';
import type { TokenDetailsResponse } from '@tokenledger/types';
import { InvalidCallError } from './ledger-errors.js';
import { failure } from './ledger-types.js';
import type { LedgerResult, Origin, Token } from './ledger-types.js';
import { decodeTokenLabel } from './token-registry.js';
import type { TransferEngine } from './transfer-engine.js';

export function dispatch(engine: TransferEngine, origin: Origin, payload: unknown): LedgerResult {
  const parsed = LedgerCallSchema.safeParse(payload);
  if (!parsed.success) {
    return failure(new InvalidCallError(parsed.error.issues));
  }

  const call = parsed.data;
  switch (call.call) {
    case 'issue':
      return engine.issue(origin, call.name, call.ticker, call.totalSupply);
    case 'transfer':
      return engine.transfer(origin, call.to, call.value);
    case 'approve':
      return engine.approve(origin, call.spender, call.value);
    case 'transferFrom':
      return engine.transferFrom(origin, call.from, call.to, call.value);
  }
}

export function toTokenDetailsResponse(token: Token): TokenDetailsResponse {
  return {
    name: decodeTokenLabel(token.name),
    ticker: decodeTokenLabel(token.ticker),
    totalSupply: token.totalSupply.toString(),
  };
}
