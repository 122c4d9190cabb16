/**
 * Ledger Domain
 *
 * Public exports for the fungible token ledger
 */

// Storage and transaction context
export { InMemoryLedgerStore, StagedLedgerStore } from './ledger-store.js';
export type { LedgerReader, LedgerStore } from './ledger-store.js';
export { LedgerContext, LedgerTransaction, depositEvent } from './ledger-context.js';
export type { LedgerContextOptions } from './ledger-context.js';

// Components
export { TokenRegistry, encodeTokenLabel, decodeTokenLabel } from './token-registry.js';
export { BalanceLedger } from './balance-ledger.js';
export type { BalanceMove } from './balance-ledger.js';
export { AllowanceLedger } from './allowance-ledger.js';
export { TransferEngine } from './transfer-engine.js';
export { dispatch, toTokenDetailsResponse } from './dispatch.js';

// Configuration
export {
  createLedgerConfig,
  loadLedgerConfig,
  DEFAULT_BALANCE_BITS,
  MAX_NAME_BYTES,
  MAX_TICKER_BYTES,
} from './ledger-config.js';
export type { LedgerConfig, LedgerConfigInput, ReissuePolicy } from './ledger-config.js';

// Arithmetic
export { checkedAdd, checkedSub, maxValueForBits } from './checked-math.js';

// Origins
export { signed, ensureSigned, ensureAccounts, ROOT_ORIGIN, NONE_ORIGIN } from './origin.js';

// Domain types
export { success, successWith, failure } from './ledger-types.js';
export type {
  AccountId,
  Token,
  TokenLabel,
  Origin,
  LedgerResult,
  LedgerSuccess,
  LedgerFailure,
} from './ledger-types.js';

// Events
export { LedgerEventRecorder, toLedgerEventResponse } from './ledger-events.js';
export type {
  LedgerEvent,
  LedgerEventType,
  LedgerEventSink,
  LedgerEventHandler,
  TransferEvent,
  ApprovalEvent,
} from './ledger-events.js';

// Domain errors
export {
  LedgerError,
  LedgerErrorCode,
  NameTooLongError,
  TickerTooLongError,
  InsufficientBalanceError,
  InsufficientAllowanceError,
  AlreadyIssuedError,
  InvalidAmountError,
  InvalidCallError,
  InvalidAccountError,
  BadOriginError,
  OverflowError,
} from './ledger-errors.js';
export type { LedgerErrorCategory } from './ledger-errors.js';
