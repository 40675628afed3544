/**
 * Record-level check of a CSV file, without posting anything.
 *
 * Meant for externally generated data (float amounts with stray digits),
 * so rows balance within RECORD_VALIDATION.TOLERANCE instead of exactly.
 * The importer itself stays exact.
 */

import { Decimal } from 'decimal.js';
import type { CsvValidationResult } from '@ducat-ledger/shared';
import { RECORD_VALIDATION } from '@ducat-ledger/shared';
import { parseIsoDate } from '../utils/date-parse.js';
import { readCsvTable } from '../utils/csv.js';

const WideDecimal = Decimal.clone({ precision: 1e9 });

const VALIDATION_REQUIRED_COLUMNS = [
    'id',
    'date',
    'description',
    'debit_account',
    'debit_amount',
    'credit_account',
    'credit_amount',
];

function parseDecimal(value: string | undefined): Decimal | null {
    const text = (value ?? '').trim().replace(/,/g, '');
    if (!/^[-+]?\d+(\.\d+)?$/.test(text)) {
        return null;
    }
    return new WideDecimal(text);
}

export function validateCsvRecords(content: string): CsvValidationResult {
    const table = readCsvTable(content);
    const problems: string[] = [];
    const tolerance = new WideDecimal(RECORD_VALIDATION.TOLERANCE);

    let totalDebits = new WideDecimal(0);
    let totalCredits = new WideDecimal(0);
    let errorCount = 0;

    const missing = VALIDATION_REQUIRED_COLUMNS.filter((column) => !table.columns.includes(column));
    if (missing.length > 0) {
        return {
            valid: false,
            columns: table.columns,
            recordCount: table.rows.length,
            errorCount: 1,
            totalDebits: '0.00',
            totalCredits: '0.00',
            difference: '0.00',
            problems: [`Missing required columns: ${missing.join(', ')}`],
        };
    }

    table.rows.forEach((row, index) => {
        const n = index + 1;

        const date = row['date'] ?? '';
        if (!parseIsoDate(date)) {
            problems.push(`Record ${n}: invalid date "${date}"`);
            errorCount++;
            return;
        }

        const debit = parseDecimal(row['debit_amount']);
        let credit = parseDecimal(row['credit_amount']);
        if (!debit || !credit) {
            problems.push(
                `Record ${n}: invalid amounts debit="${row['debit_amount'] ?? ''}", credit="${row['credit_amount'] ?? ''}"`
            );
            errorCount++;
            return;
        }

        const secondAmount = row['credit_amount_2'] ?? '';
        if (secondAmount !== '') {
            if ((row['credit_account_2'] ?? '') === '') {
                problems.push(`Record ${n}: credit_amount_2 without credit_account_2`);
                errorCount++;
                return;
            }
            const second = parseDecimal(secondAmount);
            if (!second) {
                problems.push(`Record ${n}: invalid credit_amount_2 "${secondAmount}"`);
                errorCount++;
                return;
            }
            credit = credit.plus(second);
        }

        totalDebits = totalDebits.plus(debit);
        totalCredits = totalCredits.plus(credit);

        if (debit.minus(credit).abs().greaterThan(tolerance)) {
            problems.push(`Record ${n}: unbalanced, debit=${debit.toFixed(2)}, credit=${credit.toFixed(2)}`);
            errorCount++;
        }
    });

    return {
        valid: errorCount === 0,
        columns: table.columns,
        recordCount: table.rows.length,
        errorCount,
        totalDebits: totalDebits.toFixed(2),
        totalCredits: totalCredits.toFixed(2),
        difference: totalDebits.minus(totalCredits).abs().toFixed(2),
        problems,
    };
}
