/**
 * Path-based import/export of ledger transactions.
 *
 * Core codecs work on strings; this layer owns the file I/O and the
 * console reporting of what the codecs return as data.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { exportCsv, exportJson, importCsv, importJson, type ImportResult, type Ledger } from '@ducat-ledger/core';
import { warn } from '../utils/console.js';

export interface FileImportOptions {
    /** Log each skipped record as a warning. */
    verbose?: boolean;
}

function reportSkipped(path: string, result: ImportResult, verbose: boolean): void {
    if (!verbose) {
        return;
    }
    for (const error of result.errors) {
        const id = error.id ? ` (id ${error.id})` : '';
        warn(`${path}: record ${error.record}${id} skipped [${error.code}]: ${error.message}`);
    }
    for (const message of result.warnings) {
        warn(`${path}: ${message}`);
    }
}

/**
 * Import a CSV file. Returns the number of transactions posted.
 * A missing file or header fails the whole call.
 */
export async function importTransactionsFromCsv(
    ledger: Ledger,
    path: string,
    options: FileImportOptions = {}
): Promise<number> {
    const content = await readFile(path, 'utf-8');
    const result = importCsv(ledger, content);
    reportSkipped(path, result, options.verbose ?? false);
    return result.imported;
}

/**
 * Import a JSON file. Returns the number of transactions posted.
 * A missing file, invalid JSON or a non-list container fails the whole call.
 */
export async function importTransactionsFromJson(
    ledger: Ledger,
    path: string,
    options: FileImportOptions = {}
): Promise<number> {
    const content = await readFile(path, 'utf-8');
    const result = importJson(ledger, content);
    reportSkipped(path, result, options.verbose ?? false);
    return result.imported;
}

/**
 * Write all transactions as CSV. Returns the number of rows written.
 * Legs the format cannot hold are reported as warnings.
 */
export async function exportTransactionsToCsv(ledger: Ledger, path: string): Promise<number> {
    const result = exportCsv(ledger);
    await writeFile(path, `${result.content}\n`, 'utf-8');
    for (const message of result.warnings) {
        warn(message);
    }
    return result.count;
}

export async function exportTransactionsToJson(ledger: Ledger, path: string): Promise<number> {
    const records = exportJson(ledger);
    await writeFile(path, `${JSON.stringify(records, null, 2)}\n`, 'utf-8');
    return records.length;
}

/**
 * Import by file extension (.csv or .json).
 */
export async function importTransactionsFromFile(
    ledger: Ledger,
    path: string,
    options: FileImportOptions = {}
): Promise<number> {
    const lower = path.toLowerCase();
    if (lower.endsWith('.csv')) {
        return importTransactionsFromCsv(ledger, path, options);
    }
    if (lower.endsWith('.json')) {
        return importTransactionsFromJson(ledger, path, options);
    }
    throw new Error(`Unsupported file type: ${path} (expected .csv or .json)`);
}

/**
 * Export by file extension (.csv or .json).
 */
export async function exportTransactionsToFile(ledger: Ledger, path: string): Promise<number> {
    const lower = path.toLowerCase();
    if (lower.endsWith('.csv')) {
        return exportTransactionsToCsv(ledger, path);
    }
    if (lower.endsWith('.json')) {
        return exportTransactionsToJson(ledger, path);
    }
    throw new Error(`Unsupported file type: ${path} (expected .csv or .json)`);
}
