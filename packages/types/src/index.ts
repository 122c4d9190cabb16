export * from './amount.schema.js';
export * from './ledger-call.schema.js';
export * from './token.schema.js';
