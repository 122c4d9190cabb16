import { BadOriginError, InvalidAccountError } from './ledger-errors.js';
import { failure, success, successWith } from './ledger-types.js';
import type { AccountId, LedgerResult, Origin } from './ledger-types.js';

export function signed(account: AccountId): Origin {
  return { kind: 'signed', account };
}

export const ROOT_ORIGIN: Origin = { kind: 'root' };
export const NONE_ORIGIN: Origin = { kind: 'none' };

/**
 * Extract the calling account, rejecting unsigned and root origins
 */
export function ensureSigned(origin: Origin): LedgerResult<AccountId> {
  if (origin.kind !== 'signed') {
    return failure(new BadOriginError(origin.kind));
  }
  if (origin.account.length === 0) {
    return failure(new BadOriginError('signed with an empty account'));
  }
  return successWith(origin.account);
}

/**
 * Reject empty counterparty ids, keyed by the role they play in the call
 */
export function ensureAccounts(accounts: Record<string, AccountId>): LedgerResult {
  for (const [role, account] of Object.entries(accounts)) {
    if (account.length === 0) {
      return failure(new InvalidAccountError(role));
    }
  }
  return success();
}
