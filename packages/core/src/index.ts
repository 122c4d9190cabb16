/**
 * @tokenledger/core - Fungible token ledger accounting
 *
 * Balance and allowance ledgers, the token record, and the four state
 * transitions over them. The host supplies caller identity and records the
 * events each committed call emits.
 */

export * from './ledger/index.js';
