/**
 * Ledger error taxonomy.
 *
 * Every failure the engine raises on purpose is a LedgerError with a code.
 * Import paths treat any LedgerError as "skip this record"; anything else
 * (I/O, programming errors) propagates.
 */

export type LedgerErrorCode =
    | 'UNBALANCED'
    | 'MALFORMED_RECORD'
    | 'UNKNOWN_ACCOUNT_TYPE'
    | 'INVALID_AMOUNT'
    | 'DUPLICATE_ACCOUNT'
    | 'INVALID_ACCOUNT_NAME'
    | 'ACCOUNT_TYPE_CONFLICT'
    | 'UNKNOWN_ACCOUNT'
    | 'ALREADY_POSTED';

export class LedgerError extends Error {
    public readonly code: LedgerErrorCode;

    constructor(code: LedgerErrorCode, message: string) {
        super(message);
        this.name = 'LedgerError';
        this.code = code;
    }
}

/**
 * Debits and credits of a transaction do not net to zero.
 */
export class UnbalancedTransactionError extends LedgerError {
    constructor(message: string) {
        super('UNBALANCED', message);
        this.name = 'UnbalancedTransactionError';
    }
}

/**
 * Missing or invalid field in an external record (date, amount, account).
 */
export class MalformedRecordError extends LedgerError {
    constructor(message: string) {
        super('MALFORMED_RECORD', message);
        this.name = 'MalformedRecordError';
    }
}

/**
 * account_type outside ASSET/LIABILITY/EQUITY/REVENUE/EXPENSE.
 */
export class UnknownAccountTypeError extends LedgerError {
    constructor(accountType: string) {
        super('UNKNOWN_ACCOUNT_TYPE', `Unknown account type: "${accountType}"`);
        this.name = 'UnknownAccountTypeError';
    }
}

export function isLedgerError(err: unknown): err is LedgerError {
    return err instanceof LedgerError;
}
