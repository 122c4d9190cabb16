/**
 * @tokenledger/observability
 *
 * Structured logging for the ledger core and its host bindings.
 */

export { createLogger, logger, normalizeLogValue } from './logger.js';
export type { Logger } from './logger.js';
