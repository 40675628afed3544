// Types (re-exported from shared)
export type {
    AccountType,
    ImportResult,
    RecordError,
    JsonRecord,
    JsonExportRecord,
    LedgerValidationResult,
    CsvValidationResult,
} from '@ducat-ledger/shared';

export { ACCOUNT_TYPES } from '@ducat-ledger/shared';

// Money
export { Money } from './money/money.js';
export type { MoneyInput } from './money/money.js';

// Errors
export {
    LedgerError,
    UnbalancedTransactionError,
    MalformedRecordError,
    UnknownAccountTypeError,
    isLedgerError,
} from './errors.js';
export type { LedgerErrorCode } from './errors.js';

// Ledger
export {
    Account,
    normalSide,
    debitSign,
    Transaction,
    Ledger,
    inferAccountType,
    parseAccountType,
    resolveAccountType,
    resolveAccount,
    validateLedger,
    validateTransaction,
} from './ledger/index.js';
export type { BalanceSide, TransactionEntry, LedgerEntryInput } from './ledger/index.js';

// Codecs
export {
    importCsv,
    exportCsv,
    draftFromCsvRow,
    importJson,
    exportJson,
    draftFromJsonRecord,
    validateCsvRecords,
    postDraft,
    importRecords,
} from './codec/index.js';
export type { CsvExport, DraftLeg, TransactionDraft } from './codec/index.js';

// Reports
export { trialBalance, trialBalanceLine, balanceSheet, incomeStatement } from './report/index.js';
export type {
    BalanceSheet,
    IncomeStatement,
    StatementLine,
    StatementSection,
    TrialBalance,
    TrialBalanceLine,
} from './report/index.js';

// Utils
export { parseIsoDate, formatIsoDate, toIsoDate, isValidDate } from './utils/date-parse.js';
export { normalizeAccountName } from './utils/normalize.js';
