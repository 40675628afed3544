/**
 * Flat CSV record format.
 *
 * Columns: id, date, description, debit_account, debit_amount,
 * credit_account, credit_amount, credit_account_2, credit_amount_2.
 *
 * Format limits (the format is lossy):
 * - debit_account lists one or more comma-joined names sharing a single
 *   debit_amount. Import splits that amount equally across the names;
 *   export writes the SUM of all debits. Uneven multi-debit transactions
 *   come back as even splits.
 * - At most two credit legs. Export drops any further legs and reports
 *   them in its warnings.
 * - A debit account name containing the separator cannot be told apart
 *   from two names; export writes it anyway and warns.
 * - No type column: account categories are inferred from names.
 *
 * Use the JSON format when any of this matters.
 */

import type { ImportResult } from '@ducat-ledger/shared';
import { CSV_COLUMNS, CSV_REQUIRED_COLUMNS, DEBIT_ACCOUNT_SEPARATOR } from '@ducat-ledger/shared';
import { MalformedRecordError } from '../errors.js';
import type { Ledger } from '../ledger/ledger.js';
import { readCsvTable, writeCsv, type CsvRow } from '../utils/csv.js';
import {
    importRecords,
    parseRecordAmount,
    parseRecordDate,
    postDraft,
    requireText,
    type DraftLeg,
    type TransactionDraft,
} from './record.js';

export interface CsvExport {
    content: string;
    count: number;
    warnings: string[];
}

/**
 * Parse one CSV row into a transaction draft.
 */
export function draftFromCsvRow(row: CsvRow): TransactionDraft {
    const date = parseRecordDate(row['date']);
    const description = row['description'] ?? '';

    const debitNames = requireText(row['debit_account'], 'debit_account')
        .split(DEBIT_ACCOUNT_SEPARATOR)
        .map((name) => name.trim())
        .filter((name) => name !== '');
    if (debitNames.length === 0) {
        throw new MalformedRecordError(`No account names in debit_account "${row['debit_account']}"`);
    }
    const debitAmount = parseRecordAmount(row['debit_amount'], 'debit_amount');
    const shares = debitAmount.split(debitNames.length);
    const debits: DraftLeg[] = debitNames.map((account, index) => ({ account, amount: shares[index] }));

    const credits: DraftLeg[] = [{
        account: requireText(row['credit_account'], 'credit_account'),
        amount: parseRecordAmount(row['credit_amount'], 'credit_amount'),
    }];

    // Second credit leg only counts when its amount is present and positive
    const rawSecondAmount = row['credit_amount_2'] ?? '';
    if (rawSecondAmount !== '') {
        const amount = parseRecordAmount(rawSecondAmount, 'credit_amount_2');
        if (amount.isPositive()) {
            credits.push({ account: requireText(row['credit_account_2'], 'credit_account_2'), amount });
        }
    }

    return { date, description, debits, credits };
}

/**
 * Import CSV text into the ledger.
 *
 * Rows that fail to parse or balance are skipped and returned as errors;
 * the rest are posted. A missing header row or required column fails the
 * whole import.
 */
export function importCsv(ledger: Ledger, content: string): ImportResult {
    const table = readCsvTable(content);
    if (table.columns.length === 0) {
        throw new MalformedRecordError('CSV has no header row');
    }

    const missing = CSV_REQUIRED_COLUMNS.filter((column) => !table.columns.includes(column));
    if (missing.length > 0) {
        throw new MalformedRecordError(
            `CSV missing required columns: ${missing.join(', ')}. Found: ${table.columns.join(', ')}`
        );
    }

    return importRecords(
        table.rows,
        (row) => {
            postDraft(ledger, draftFromCsvRow(row));
        },
        (row) => (row['id'] ? row['id'] : undefined)
    );
}

/**
 * Export every transaction as one CSV row, ids numbered from 1.
 */
export function exportCsv(ledger: Ledger): CsvExport {
    const warnings: string[] = [];
    const lines: string[][] = [[...CSV_COLUMNS]];

    ledger.transactions.forEach((transaction, index) => {
        const id = index + 1;
        const [first, second, ...dropped] = transaction.credits;

        const joined = transaction.debits
            .map((entry) => entry.account.name)
            .filter((name) => name.includes(DEBIT_ACCOUNT_SEPARATOR));
        if (joined.length > 0) {
            warnings.push(
                `Transaction ${id} ("${transaction.description}"): debit account name(s) containing ` +
                `"${DEBIT_ACCOUNT_SEPARATOR}" will split on re-import (${joined.join('; ')}); use JSON export instead`
            );
        }

        if (dropped.length > 0) {
            const names = dropped.map((entry) => entry.account.name).join(', ');
            warnings.push(
                `Transaction ${id} ("${transaction.description}"): dropped ${dropped.length} credit leg(s) ` +
                `beyond the second (${names}); use JSON export for full fidelity`
            );
        }

        lines.push([
            String(id),
            transaction.date,
            transaction.description,
            transaction.debits.map((entry) => entry.account.name).join(DEBIT_ACCOUNT_SEPARATOR),
            transaction.debitTotal().toString(),
            first ? first.account.name : '',
            first ? first.amount.toString() : '',
            second ? second.account.name : '',
            second ? second.amount.toString() : '',
        ]);
    });

    return {
        content: writeCsv(lines),
        count: ledger.transactions.length,
        warnings,
    };
}
