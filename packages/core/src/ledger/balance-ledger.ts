/**
 * Balance Ledger
 *
 * Read view over balances. There is no write method here: the engine
 * applies the BalanceMove this ledger plans.
 */

import { checkedAdd, checkedSub } from './checked-math.js';
import type { LedgerConfig } from './ledger-config.js';
import { InsufficientBalanceError, OverflowError } from './ledger-errors.js';
import type { LedgerReader } from './ledger-store.js';
import { failure, successWith } from './ledger-types.js';
import type { AccountId, LedgerResult } from './ledger-types.js';

export interface BalanceMove {
  from: AccountId;
  to: AccountId;
  value: bigint;
  /** Sender balance after the move */
  fromBalance: bigint;
  /** Receiver balance after the move */
  toBalance: bigint;
}

export class BalanceLedger {
  constructor(
    private readonly store: LedgerReader,
    private readonly config: LedgerConfig
  ) {}

  balanceOf(account: AccountId): bigint {
    return this.store.getBalance(account) ?? 0n;
  }

  /**
   * Sum of every balance entry; equals total supply while conservation holds
   */
  totalBalance(): bigint {
    let total = 0n;
    for (const [, balance] of this.store.balanceEntries()) {
      total += balance;
    }
    return total;
  }

  /**
   * Compute both post-move balances with checked arithmetic
   *
   * A move to oneself leaves the balance where it is.
   */
  planMove(from: AccountId, to: AccountId, value: bigint): LedgerResult<BalanceMove> {
    const senderBalance = this.balanceOf(from);
    const fromBalance = checkedSub(senderBalance, value);
    if (fromBalance === null) {
      return failure(new InsufficientBalanceError(from, senderBalance, value));
    }

    if (from === to) {
      return successWith({ from, to, value, fromBalance: senderBalance, toBalance: senderBalance });
    }

    const toBalance = checkedAdd(this.balanceOf(to), value, this.config.maxBalance);
    if (toBalance === null) {
      return failure(new OverflowError(`Balance of ${to}`, this.config.balanceBits));
    }

    return successWith({ from, to, value, fromBalance, toBalance });
  }
}
