/**
 * Ledger Domain Types
 */

import type { LedgerError } from './ledger-errors.js';

/** Opaque account identity supplied by the host's authentication layer */
export type AccountId = string;

/** Token name or ticker as UTF-8 text or raw bytes */
export type TokenLabel = string | Uint8Array;

export interface Token {
  name: Uint8Array;
  ticker: Uint8Array;
  totalSupply: bigint;
}

/**
 * Who submitted the call. Only signed origins may invoke ledger operations.
 */
export type Origin =
  | { kind: 'signed'; account: AccountId }
  | { kind: 'root' }
  | { kind: 'none' };

export interface LedgerSuccess<T> {
  readonly ok: true;
  readonly value: T;
}

export interface LedgerFailure {
  readonly ok: false;
  readonly error: LedgerError;
}

export type LedgerResult<T = void> = LedgerSuccess<T> | LedgerFailure;

export function success(): LedgerSuccess<void> {
  return { ok: true, value: undefined };
}

export function successWith<T>(value: T): LedgerSuccess<T> {
  return { ok: true, value };
}

export function failure(error: LedgerError): LedgerFailure {
  return { ok: false, error };
}
