/**
 * Allowance Ledger
 *
 * Read view over (owner, spender) limits and the checked arithmetic used to
 * change them. The engine writes the planned values.
 */

import { checkedAdd, checkedSub } from './checked-math.js';
import type { LedgerConfig } from './ledger-config.js';
import { InsufficientAllowanceError, OverflowError } from './ledger-errors.js';
import type { LedgerReader } from './ledger-store.js';
import { failure, successWith } from './ledger-types.js';
import type { AccountId, LedgerResult } from './ledger-types.js';

export class AllowanceLedger {
  constructor(
    private readonly store: LedgerReader,
    private readonly config: LedgerConfig
  ) {}

  allowance(owner: AccountId, spender: AccountId): bigint {
    return this.store.getAllowance(owner, spender) ?? 0n;
  }

  /**
   * Allowance after approve adds `delta` to the current limit
   */
  planIncrease(owner: AccountId, spender: AccountId, delta: bigint): LedgerResult<bigint> {
    const updated = checkedAdd(this.allowance(owner, spender), delta, this.config.maxBalance);
    if (updated === null) {
      return failure(
        new OverflowError(`Allowance of ${spender} over ${owner}`, this.config.balanceBits)
      );
    }
    return successWith(updated);
  }

  /**
   * Allowance after a spender consumes `value`
   */
  planDecrease(owner: AccountId, spender: AccountId, value: bigint): LedgerResult<bigint> {
    const current = this.allowance(owner, spender);
    const updated = checkedSub(current, value);
    if (updated === null) {
      return failure(new InsufficientAllowanceError(owner, spender, current, value));
    }
    return successWith(updated);
  }
}
