/**
 * Record-level helpers shared by the CSV and JSON importers.
 *
 * Every import runs the same sequence per record: parse into a draft,
 * check the draft balances, fix every account's type, and only then
 * create accounts and post. A record that fails any step leaves both the
 * chart of accounts and the balances untouched.
 */

import type { AccountType, ImportResult, RecordError } from '@ducat-ledger/shared';
import { Money } from '../money/money.js';
import { isLedgerError, LedgerError, MalformedRecordError, UnbalancedTransactionError } from '../errors.js';
import { Transaction } from '../ledger/transaction.js';
import { resolveAccountType } from '../ledger/account-resolve.js';
import type { Ledger } from '../ledger/ledger.js';
import { parseIsoDate } from '../utils/date-parse.js';

/**
 * A transaction leg before its account is resolved.
 * `type` is absent when the source format has no type field.
 */
export interface DraftLeg {
    account: string;
    type?: AccountType;
    amount: Money;
}

export interface TransactionDraft {
    date: string;
    description: string;
    debits: DraftLeg[];
    credits: DraftLeg[];
}

/**
 * Parse a record date (YYYY-MM-DD).
 */
export function parseRecordDate(value: unknown): string {
    const text = typeof value === 'string' ? value.trim() : '';
    if (text === '') {
        throw new MalformedRecordError('Missing required field: date');
    }
    if (!parseIsoDate(text)) {
        throw new MalformedRecordError(`Invalid date "${text}", expected YYYY-MM-DD`);
    }
    return text;
}

/**
 * Parse a non-negative record amount. Strings may carry thousands
 * separators ("1,250.00"); numbers are taken as given.
 */
export function parseRecordAmount(value: unknown, field: string): Money {
    let amount: Money;
    try {
        if (typeof value === 'number') {
            amount = Money.of(value);
        } else if (typeof value === 'string' && value.trim() !== '') {
            amount = Money.of(value.trim().replace(/,/g, ''));
        } else {
            throw new MalformedRecordError(`Missing required field: ${field}`);
        }
    } catch (err) {
        if (err instanceof LedgerError && err.code === 'INVALID_AMOUNT') {
            throw new MalformedRecordError(`Invalid ${field}: "${String(value)}"`);
        }
        throw err;
    }

    if (amount.isNegative()) {
        throw new MalformedRecordError(`Negative ${field}: ${amount.toString()}`);
    }
    return amount;
}

/**
 * Trimmed, non-empty text field.
 */
export function requireText(value: unknown, field: string): string {
    const text = typeof value === 'string' ? value.trim() : '';
    if (text === '') {
        throw new MalformedRecordError(`Missing required field: ${field}`);
    }
    return text;
}

/**
 * Balance-check a draft, resolve its accounts and post it.
 *
 * @throws UnbalancedTransactionError when debit and credit totals differ
 * @throws LedgerError (ACCOUNT_TYPE_CONFLICT) when a leg's declared type
 *   disagrees with the ledger or with another leg of the same record
 */
export function postDraft(ledger: Ledger, draft: TransactionDraft): Transaction {
    if (draft.debits.length === 0 || draft.credits.length === 0) {
        throw new UnbalancedTransactionError(
            `Transaction "${draft.description}" needs at least one debit and one credit`
        );
    }
    const debitTotal = Money.sum(draft.debits.map((leg) => leg.amount));
    const creditTotal = Money.sum(draft.credits.map((leg) => leg.amount));
    if (!debitTotal.equals(creditTotal)) {
        throw new UnbalancedTransactionError(
            `Transaction "${draft.description}" unbalanced: debits=${debitTotal.toString()}, credits=${creditTotal.toString()}`
        );
    }

    const transaction = new Transaction(draft.date, draft.description);

    const types = new Map<string, AccountType>();
    for (const leg of [...draft.debits, ...draft.credits]) {
        const type = resolveAccountType(ledger, leg.account, leg.type ?? types.get(leg.account));
        const seen = types.get(leg.account);
        if (seen && seen !== type) {
            throw new LedgerError(
                'ACCOUNT_TYPE_CONFLICT',
                `Account "${leg.account}" appears as both ${seen} and ${type} in one record`
            );
        }
        types.set(leg.account, type);
    }

    for (const leg of draft.debits) {
        const account = ledger.getOrCreateAccount(leg.account, typeOf(types, leg.account));
        transaction.addDebit({ account, amount: leg.amount });
    }
    for (const leg of draft.credits) {
        const account = ledger.getOrCreateAccount(leg.account, typeOf(types, leg.account));
        transaction.addCredit({ account, amount: leg.amount });
    }

    return ledger.post(transaction);
}

function typeOf(types: Map<string, AccountType>, name: string): AccountType {
    const type = types.get(name);
    if (!type) {
        throw new LedgerError('UNKNOWN_ACCOUNT', `No resolved type for account "${name}"`);
    }
    return type;
}

/**
 * Run `importRecord` over every record with per-record failure isolation.
 *
 * LedgerErrors mark the record as skipped and are returned as data;
 * anything else is a bug or an I/O failure and propagates.
 */
export function importRecords<T>(
    records: readonly T[],
    importRecord: (record: T) => void,
    recordId: (record: T) => string | undefined
): ImportResult {
    const errors: RecordError[] = [];
    let imported = 0;

    records.forEach((record, index) => {
        try {
            importRecord(record);
            imported++;
        } catch (err) {
            if (!isLedgerError(err)) {
                throw err;
            }
            errors.push({
                record: index + 1,
                id: recordId(record),
                code: err.code,
                message: err.message,
            });
        }
    });

    const warnings: string[] = [];
    if (errors.length > 0) {
        warnings.push(`Skipped ${errors.length} of ${records.length} records`);
    }

    return { imported, skipped: errors.length, errors, warnings };
}
