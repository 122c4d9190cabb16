/**
 * Token Registry
 *
 * Read side of the single token record plus the issuance rules.
 * Writes happen in TransferEngine.issue.
 */

import { MAX_NAME_BYTES, MAX_TICKER_BYTES } from './ledger-config.js';
import type { LedgerConfig } from './ledger-config.js';
import {
  AlreadyIssuedError,
  InvalidAmountError,
  NameTooLongError,
  OverflowError,
  TickerTooLongError,
} from './ledger-errors.js';
import type { LedgerReader } from './ledger-store.js';
import { failure, successWith } from './ledger-types.js';
import type { LedgerResult, Token, TokenLabel } from './ledger-types.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function encodeTokenLabel(label: TokenLabel): Uint8Array {
  return typeof label === 'string' ? encoder.encode(label) : label.slice();
}

export function decodeTokenLabel(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

function copyToken(token: Token): Token {
  return {
    name: token.name.slice(),
    ticker: token.ticker.slice(),
    totalSupply: token.totalSupply,
  };
}

export class TokenRegistry {
  constructor(
    private readonly store: LedgerReader,
    private readonly config: LedgerConfig
  ) {}

  /**
   * Token metadata, or null before issuance
   */
  tokenDetails(): Token | null {
    const token = this.store.getToken();
    return token ? copyToken(token) : null;
  }

  isIssued(): boolean {
    return this.store.getToken() !== null;
  }

  /**
   * Validate an issuance and build the token record
   *
   * Business rules:
   * - Only one issuance unless the reissue policy is overwrite
   * - Name at most 64 bytes, ticker at most 32 bytes (UTF-8 for text)
   * - Supply is non-negative and fits the balance width
   */
  planIssue(name: TokenLabel, ticker: TokenLabel, totalSupply: bigint): LedgerResult<Token> {
    if (this.isIssued() && this.config.reissuePolicy === 'reject') {
      return failure(new AlreadyIssuedError());
    }

    const nameBytes = encodeTokenLabel(name);
    if (nameBytes.length > MAX_NAME_BYTES) {
      return failure(new NameTooLongError(nameBytes.length, MAX_NAME_BYTES));
    }

    const tickerBytes = encodeTokenLabel(ticker);
    if (tickerBytes.length > MAX_TICKER_BYTES) {
      return failure(new TickerTooLongError(tickerBytes.length, MAX_TICKER_BYTES));
    }

    if (totalSupply < 0n) {
      return failure(new InvalidAmountError(totalSupply));
    }
    if (totalSupply > this.config.maxBalance) {
      return failure(new OverflowError('Total supply', this.config.balanceBits));
    }

    return successWith({ name: nameBytes, ticker: tickerBytes, totalSupply });
  }
}
