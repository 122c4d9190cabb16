import { maxValueForBits } from './checked-math.js';

export const MAX_NAME_BYTES = 64;
export const MAX_TICKER_BYTES = 32;
export const DEFAULT_BALANCE_BITS = 128;

/**
 * reject: a second issue fails with AlreadyIssued
 * overwrite: a second issue replaces the token and resets only the caller's
 * balance, which breaks conservation for every other holder
 */
export type ReissuePolicy = 'reject' | 'overwrite';

export type LedgerConfig = {
  balanceBits: number;
  maxBalance: bigint;
  reissuePolicy: ReissuePolicy;
};

export type LedgerConfigInput = {
  balanceBits?: number;
  reissuePolicy?: ReissuePolicy;
};

function assertBalanceBits(bits: number): void {
  if (!Number.isInteger(bits) || bits < 8 || bits > 256 || bits % 8 !== 0) {
    throw new Error(`Balance width must be a multiple of 8 between 8 and 256, got ${bits}`);
  }
}

export function createLedgerConfig(input: LedgerConfigInput = {}): LedgerConfig {
  const balanceBits = input.balanceBits ?? DEFAULT_BALANCE_BITS;
  assertBalanceBits(balanceBits);

  return {
    balanceBits,
    maxBalance: maxValueForBits(balanceBits),
    reissuePolicy: input.reissuePolicy ?? 'reject',
  };
}

function parseBalanceBits(raw: string | undefined): number | undefined {
  if (raw === undefined || !raw.trim()) {
    return undefined;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new Error(`LEDGER_BALANCE_BITS must be an integer, got "${raw}"`);
  }
  return Number(raw.trim());
}

function parseReissuePolicy(raw: string | undefined): ReissuePolicy | undefined {
  if (raw === undefined || !raw.trim()) {
    return undefined;
  }
  const value = raw.trim().toLowerCase();
  if (value !== 'reject' && value !== 'overwrite') {
    throw new Error(`LEDGER_REISSUE_POLICY must be "reject" or "overwrite", got "${raw}"`);
  }
  return value;
}

export function loadLedgerConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  return createLedgerConfig({
    balanceBits: parseBalanceBits(env.LEDGER_BALANCE_BITS),
    reissuePolicy: parseReissuePolicy(env.LEDGER_REISSUE_POLICY),
  });
}
