/**
 * JSON record format: the round-trip-safe one.
 *
 * Each record lists its debits and credits explicitly, with the account
 * type and exact amount of every leg, so nothing is inferred or split.
 */

import type { ImportResult, JsonEntry, JsonExportEntry, JsonExportRecord } from '@ducat-ledger/shared';
import { JsonRecordSchema } from '@ducat-ledger/shared';
import { MalformedRecordError } from '../errors.js';
import type { Ledger } from '../ledger/ledger.js';
import { parseAccountType } from '../ledger/account-resolve.js';
import type { TransactionEntry } from '../ledger/transaction.js';
import { importRecords, parseRecordAmount, postDraft, type DraftLeg, type TransactionDraft } from './record.js';

/**
 * Parse one JSON record into a transaction draft.
 *
 * @throws MalformedRecordError on shape errors (missing fields, bad date,
 *   non-numeric amount)
 * @throws UnknownAccountTypeError when account_type is not one of the five
 */
export function draftFromJsonRecord(record: unknown): TransactionDraft {
    const parsed = JsonRecordSchema.safeParse(record);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`)
            .join('; ');
        throw new MalformedRecordError(`Invalid record: ${issues}`);
    }

    const { date, description, debits, credits } = parsed.data;
    return {
        date,
        description,
        debits: debits.map((entry, index) => toDraftLeg(entry, `debits.${index}.amount`)),
        credits: credits.map((entry, index) => toDraftLeg(entry, `credits.${index}.amount`)),
    };
}

function toDraftLeg(entry: JsonEntry, field: string): DraftLeg {
    return {
        account: entry.account,
        type: parseAccountType(entry.account_type),
        amount: parseRecordAmount(entry.amount, field),
    };
}

function recordId(record: unknown): string | undefined {
    if (typeof record !== 'object' || record === null || !('id' in record)) {
        return undefined;
    }
    const id = record.id;
    return typeof id === 'string' || typeof id === 'number' ? String(id) : undefined;
}

/**
 * Import JSON records into the ledger.
 *
 * @param data - JSON text, or an already-parsed value
 * @throws MalformedRecordError when the text is not JSON or the container
 *   is not an array (the whole import fails); individual bad records are
 *   skipped and returned as errors
 */
export function importJson(ledger: Ledger, data: unknown): ImportResult {
    let records: unknown = data;
    if (typeof data === 'string') {
        try {
            records = JSON.parse(data);
        } catch (err) {
            throw new MalformedRecordError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
        }
    }

    if (!Array.isArray(records)) {
        throw new MalformedRecordError('JSON transactions must be a list of records');
    }

    return importRecords<unknown>(
        records,
        (record) => {
            postDraft(ledger, draftFromJsonRecord(record));
        },
        recordId
    );
}

function toExportEntry(entry: TransactionEntry): JsonExportEntry {
    return {
        account: entry.account.name,
        account_type: entry.account.type,
        amount: entry.amount.toString(),
    };
}

/**
 * Export every transaction with its full debit and credit lists.
 */
export function exportJson(ledger: Ledger): JsonExportRecord[] {
    return ledger.transactions.map((transaction, index) => ({
        id: index + 1,
        date: transaction.date,
        description: transaction.description,
        debits: transaction.debits.map(toExportEntry),
        credits: transaction.credits.map(toExportEntry),
    }));
}
