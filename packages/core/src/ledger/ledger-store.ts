/**
 * Ledger Storage
 *
 * The three pieces of persisted state (token record, balances, allowances)
 * behind one interface so a host can back them with its own storage.
 * A missing entry reads as undefined; callers treat it as zero.
 */

import type { AccountId, Token } from './ledger-types.js';

export interface LedgerReader {
  getToken(): Token | null;
  getBalance(account: AccountId): bigint | undefined;
  getAllowance(owner: AccountId, spender: AccountId): bigint | undefined;
  balanceEntries(): Iterable<[AccountId, bigint]>;
}

export interface LedgerStore extends LedgerReader {
  setToken(token: Token): void;
  setBalance(account: AccountId, value: bigint): void;
  setAllowance(owner: AccountId, spender: AccountId, value: bigint): void;
}

export class InMemoryLedgerStore implements LedgerStore {
  private token: Token | null = null;
  private balances = new Map<AccountId, bigint>();
  private allowances = new Map<AccountId, Map<AccountId, bigint>>();

  getToken(): Token | null {
    return this.token;
  }

  setToken(token: Token): void {
    this.token = token;
  }

  getBalance(account: AccountId): bigint | undefined {
    return this.balances.get(account);
  }

  setBalance(account: AccountId, value: bigint): void {
    this.balances.set(account, value);
  }

  getAllowance(owner: AccountId, spender: AccountId): bigint | undefined {
    return this.allowances.get(owner)?.get(spender);
  }

  setAllowance(owner: AccountId, spender: AccountId, value: bigint): void {
    let spenders = this.allowances.get(owner);
    if (!spenders) {
      spenders = new Map();
      this.allowances.set(owner, spenders);
    }
    spenders.set(spender, value);
  }

  balanceEntries(): Iterable<[AccountId, bigint]> {
    return this.balances.entries();
  }
}

/**
 * Write overlay on top of another store
 *
 * Reads fall through to the parent for anything not written here.
 * Nothing reaches the parent until commit(); dropping the overlay discards
 * every staged write.
 */
export class StagedLedgerStore implements LedgerStore {
  private token: Token | null = null;
  private balances = new Map<AccountId, bigint>();
  private allowances = new Map<AccountId, Map<AccountId, bigint>>();

  constructor(private readonly parent: LedgerStore) {}

  getToken(): Token | null {
    return this.token ?? this.parent.getToken();
  }

  setToken(token: Token): void {
    this.token = token;
  }

  getBalance(account: AccountId): bigint | undefined {
    return this.balances.get(account) ?? this.parent.getBalance(account);
  }

  setBalance(account: AccountId, value: bigint): void {
    this.balances.set(account, value);
  }

  getAllowance(owner: AccountId, spender: AccountId): bigint | undefined {
    return this.allowances.get(owner)?.get(spender) ?? this.parent.getAllowance(owner, spender);
  }

  setAllowance(owner: AccountId, spender: AccountId, value: bigint): void {
    let spenders = this.allowances.get(owner);
    if (!spenders) {
      spenders = new Map();
      this.allowances.set(owner, spenders);
    }
    spenders.set(spender, value);
  }

  *balanceEntries(): Iterable<[AccountId, bigint]> {
    for (const [account, value] of this.parent.balanceEntries()) {
      yield [account, this.balances.get(account) ?? value];
    }
    for (const [account, value] of this.balances) {
      if (this.parent.getBalance(account) === undefined) {
        yield [account, value];
      }
    }
  }

  commit(): void {
    if (this.token) {
      this.parent.setToken(this.token);
    }
    for (const [account, value] of this.balances) {
      this.parent.setBalance(account, value);
    }
    for (const [owner, spenders] of this.allowances) {
      for (const [spender, value] of spenders) {
        this.parent.setAllowance(owner, spender, value);
      }
    }
    this.token = null;
    this.balances.clear();
    this.allowances.clear();
  }
}
