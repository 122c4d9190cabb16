/**
 * Transfer Engine
 *
 * The four state transitions of the token ledger. Each operation checks the
 * origin, then runs inside one LedgerContext transaction: every precondition
 * failure returns before commit, so no partial write survives.
 */

import type { Logger } from '@tokenledger/observability';
import { AllowanceLedger } from './allowance-ledger.js';
import { BalanceLedger } from './balance-ledger.js';
import { depositEvent } from './ledger-context.js';
import type { LedgerContext, LedgerTransaction } from './ledger-context.js';
import { InvalidAmountError } from './ledger-errors.js';
import type { LedgerReader } from './ledger-store.js';
import { failure, success } from './ledger-types.js';
import type { AccountId, LedgerResult, Origin, Token, TokenLabel } from './ledger-types.js';
import { ensureAccounts, ensureSigned } from './origin.js';
import { TokenRegistry } from './token-registry.js';

type Operation = 'issue' | 'transfer' | 'approve' | 'transferFrom';

export class TransferEngine {
  private readonly logger: Logger;

  constructor(private readonly ctx: LedgerContext) {
    this.logger = ctx.logger.child({ module: 'transfer-engine' });
  }

  /**
   * Create the token and credit its whole supply to the caller
   *
   * Fails with NameTooLong, TickerTooLong, InvalidAmount, Overflow,
   * AlreadyIssued or BadOrigin
   */
  issue(origin: Origin, name: TokenLabel, ticker: TokenLabel, totalSupply: bigint): LedgerResult {
    return this.execute('issue', origin, {}, { totalSupply }, (tx, caller) => {
      const planned = new TokenRegistry(tx.store, tx.config).planIssue(name, ticker, totalSupply);
      if (!planned.ok) {
        return planned;
      }

      tx.store.setToken(planned.value);
      tx.store.setBalance(caller, totalSupply);
      return success();
    });
  }

  /**
   * Move `value` from the caller to `to`
   */
  transfer(origin: Origin, to: AccountId, value: bigint): LedgerResult {
    return this.execute('transfer', origin, { to }, { value }, (tx, caller) =>
      this.moveBalance(tx, caller, to, value)
    );
  }

  /**
   * Raise the caller's allowance for `spender` by `value`
   *
   * Additive: two approvals of 10 and 5 leave an allowance of 15.
   * The Approval event carries the delta.
   */
  approve(origin: Origin, spender: AccountId, value: bigint): LedgerResult {
    return this.execute('approve', origin, { spender }, { value }, (tx, caller) => {
      if (value < 0n) {
        return failure(new InvalidAmountError(value));
      }

      const planned = new AllowanceLedger(tx.store, tx.config).planIncrease(caller, spender, value);
      if (!planned.ok) {
        return planned;
      }

      tx.store.setAllowance(caller, spender, planned.value);
      depositEvent(tx, { type: 'Approval', owner: caller, spender, value });
      return success();
    });
  }

  /**
   * Spend `value` of `from`'s tokens on behalf of the caller
   *
   * Consumes allowance(from, caller), emits Approval with the consumed
   * amount, then moves the balance. A failed move discards the allowance
   * decrement along with everything else staged.
   */
  transferFrom(origin: Origin, from: AccountId, to: AccountId, value: bigint): LedgerResult {
    return this.execute('transferFrom', origin, { from, to }, { value }, (tx, spender) => {
      if (value < 0n) {
        return failure(new InvalidAmountError(value));
      }

      const planned = new AllowanceLedger(tx.store, tx.config).planDecrease(from, spender, value);
      if (!planned.ok) {
        return planned;
      }

      tx.store.setAllowance(from, spender, planned.value);
      depositEvent(tx, { type: 'Approval', owner: from, spender, value });
      return this.moveBalance(tx, from, to, value);
    });
  }

  tokenDetails(): Token | null {
    return new TokenRegistry(this.ctx.store, this.ctx.config).tokenDetails();
  }

  balanceOf(account: AccountId): bigint {
    return this.balances(this.ctx.store).balanceOf(account);
  }

  allowance(owner: AccountId, spender: AccountId): bigint {
    return new AllowanceLedger(this.ctx.store, this.ctx.config).allowance(owner, spender);
  }

  /**
   * Sum of all balances, for conservation audits
   */
  totalBalance(): bigint {
    return this.balances(this.ctx.store).totalBalance();
  }

  private balances(store: LedgerReader): BalanceLedger {
    return new BalanceLedger(store, this.ctx.config);
  }

  private moveBalance(
    tx: LedgerTransaction,
    from: AccountId,
    to: AccountId,
    value: bigint
  ): LedgerResult {
    if (value < 0n) {
      return failure(new InvalidAmountError(value));
    }

    const planned = this.balances(tx.store).planMove(from, to, value);
    if (!planned.ok) {
      return planned;
    }

    tx.store.setBalance(from, planned.value.fromBalance);
    tx.store.setBalance(to, planned.value.toBalance);
    depositEvent(tx, { type: 'Transfer', from, to, value });
    return success();
  }

  private execute(
    operation: Operation,
    origin: Origin,
    accounts: Record<string, AccountId>,
    amounts: Record<string, bigint>,
    body: (tx: LedgerTransaction, caller: AccountId) => LedgerResult
  ): LedgerResult {
    const caller = ensureSigned(origin);
    if (!caller.ok) {
      this.logger.info(
        { operation, code: caller.error.code, origin: origin.kind },
        'Ledger call rejected'
      );
      return caller;
    }

    const account = caller.value;
    const details = { ...accounts, ...amounts };
    const counterparties = ensureAccounts(accounts);
    const result = counterparties.ok
      ? this.ctx.transaction((tx) => body(tx, account))
      : counterparties;

    if (result.ok) {
      this.logger.debug({ operation, caller: account, ...details }, 'Ledger call committed');
    } else {
      this.logger.info(
        { operation, caller: account, code: result.error.code, ...details },
        'Ledger call rejected'
      );
    }
    return result;
  }
}
