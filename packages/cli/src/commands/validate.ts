import { readFile } from 'node:fs/promises';
import { validateCsvRecords } from '@ducat-ledger/core';
import { openWorkspace } from '../workspace/config.js';
import { log, success, error, heading } from '../utils/console.js';
import type { ValidateOptions } from '../types.js';

const RULE_WIDTH = 60;

/**
 * Record-level check of a CSV file; nothing is posted.
 * Returns the process exit code.
 */
export async function validateFile(path: string, options: ValidateOptions): Promise<number> {
    heading(`Validating CSV file: ${path}`, RULE_WIDTH);

    let content: string;
    try {
        content = await readFile(path, 'utf-8');
    } catch (err) {
        error(`Error reading file: ${err instanceof Error ? err.message : String(err)}`);
        return 1;
    }

    const label = openWorkspace(options.workspace).config.currency_label;
    const result = validateCsvRecords(content);

    if (options.verbose) {
        log(`Columns: ${result.columns.join(', ')}`);
    }
    for (const problem of result.problems) {
        error(problem);
    }

    log('');
    log('Validation results:');
    log(`  Total records: ${result.recordCount}`);
    log(`  Errors found:  ${result.errorCount}`);
    log(`  Total debits:  ${result.totalDebits} ${label}`);
    log(`  Total credits: ${result.totalCredits} ${label}`);
    log(`  Difference:    ${result.difference} ${label}`);
    log('');

    if (result.valid) {
        success('All records are valid');
        return 0;
    }
    error(`Found ${result.errorCount} errors`);
    return 1;
}
