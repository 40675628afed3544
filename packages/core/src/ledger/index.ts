/**
 * Ledger module: accounts, transactions, posting and validation.
 */

export { Account, normalSide, debitSign } from './account.js';
export type { BalanceSide } from './account.js';
export { Transaction } from './transaction.js';
export type { TransactionEntry } from './transaction.js';
export { Ledger } from './ledger.js';
export type { LedgerEntryInput } from './ledger.js';
export { inferAccountType, parseAccountType, resolveAccountType, resolveAccount } from './account-resolve.js';
export { validateLedger, validateTransaction } from './validate.js';
