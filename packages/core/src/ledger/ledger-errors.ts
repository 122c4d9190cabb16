/**
 * Ledger Domain Errors
 *
 * Every failure an operation can report. Errors are returned inside a
 * LedgerResult, never thrown, and the host maps `code` to its own dispatch
 * error type.
 */

import type { ZodIssue } from 'zod';
import type { AccountId } from './ledger-types.js';

export const LedgerErrorCode = {
  NameTooLong: 'NameTooLong',
  TickerTooLong: 'TickerTooLong',
  InsufficientBalance: 'InsufficientBalance',
  InsufficientAllowance: 'InsufficientAllowance',
  AlreadyIssued: 'AlreadyIssued',
  InvalidAmount: 'InvalidAmount',
  InvalidCall: 'InvalidCall',
  InvalidAccount: 'InvalidAccount',
  BadOrigin: 'BadOrigin',
  Overflow: 'Overflow',
} as const;

export type LedgerErrorCode = (typeof LedgerErrorCode)[keyof typeof LedgerErrorCode];

/**
 * validation: caller-correctable, detected before any write
 * arithmetic: the integer domain is exhausted
 * origin: the call was not signed by an account
 */
export type LedgerErrorCategory = 'validation' | 'arithmetic' | 'origin';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly category: LedgerErrorCategory;

  constructor(code: LedgerErrorCode, category: LedgerErrorCategory, message: string) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
    this.category = category;
  }
}

export class NameTooLongError extends LedgerError {
  constructor(length: number, max: number) {
    super('NameTooLong', 'validation', `Token name cannot exceed ${max} bytes, got ${length}`);
    this.name = 'NameTooLongError';
  }
}

export class TickerTooLongError extends LedgerError {
  constructor(length: number, max: number) {
    super('TickerTooLong', 'validation', `Token ticker cannot exceed ${max} bytes, got ${length}`);
    this.name = 'TickerTooLongError';
  }
}

export class InsufficientBalanceError extends LedgerError {
  constructor(
    readonly account: AccountId,
    readonly balance: bigint,
    readonly requested: bigint
  ) {
    super(
      'InsufficientBalance',
      'validation',
      `Not enough balance: ${account} holds ${balance}, needs ${requested}`
    );
    this.name = 'InsufficientBalanceError';
  }
}

export class InsufficientAllowanceError extends LedgerError {
  constructor(
    readonly owner: AccountId,
    readonly spender: AccountId,
    readonly allowance: bigint,
    readonly requested: bigint
  ) {
    super(
      'InsufficientAllowance',
      'validation',
      `Not enough allowance: ${spender} may spend ${allowance} of ${owner}, needs ${requested}`
    );
    this.name = 'InsufficientAllowanceError';
  }
}

export class AlreadyIssuedError extends LedgerError {
  constructor() {
    super('AlreadyIssued', 'validation', 'Token has already been issued');
    this.name = 'AlreadyIssuedError';
  }
}

export class InvalidAmountError extends LedgerError {
  constructor(readonly amount: bigint) {
    super('InvalidAmount', 'validation', `Amount must be a non-negative integer, got ${amount}`);
    this.name = 'InvalidAmountError';
  }
}

export class InvalidCallError extends LedgerError {
  constructor(readonly issues: ZodIssue[]) {
    const details = issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    super('InvalidCall', 'validation', `Invalid ledger call: ${details}`);
    this.name = 'InvalidCallError';
  }
}

export class InvalidAccountError extends LedgerError {
  constructor(readonly role: string) {
    super('InvalidAccount', 'validation', `Account id for ${role} is required`);
    this.name = 'InvalidAccountError';
  }
}

export class BadOriginError extends LedgerError {
  constructor(kind: string) {
    super('BadOrigin', 'origin', `Operation requires a signed origin, got ${kind}`);
    this.name = 'BadOriginError';
  }
}

export class OverflowError extends LedgerError {
  constructor(subject: string, bits: number) {
    super('Overflow', 'arithmetic', `${subject} would exceed the ${bits}-bit balance width`);
    this.name = 'OverflowError';
  }
}
