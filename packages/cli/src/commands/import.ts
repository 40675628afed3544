import { mkdir } from 'node:fs/promises';
import { basename, dirname } from 'node:path';
import { validateLedger, type Ledger } from '@ducat-ledger/core';
import { openWorkspace, buildLedger, type OpenedWorkspace } from '../workspace/config.js';
import { resolveOutputPath } from '../workspace/paths.js';
import { importTransactionsFromFile, exportTransactionsToFile } from '../io/ledger-files.js';
import { printTrialBalance, printBalanceSheet, printIncomeStatement } from '../report/print.js';
import { generateLedgerWorkbook } from '../excel/ledger.js';
import { log, success, warn, arrow, info, error } from '../utils/console.js';
import type { ImportOptions } from '../types.js';

function message(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Import one or more transaction files into a fresh ledger and print the
 * reports. Returns the process exit code.
 */
export async function importFiles(files: string[], options: ImportOptions): Promise<number> {
    if (files.length === 0) {
        error('No input files. Usage: ducat import <file.csv|file.json>...');
        return 1;
    }

    // 1. Workspace and chart of accounts
    let opened: OpenedWorkspace;
    try {
        opened = openWorkspace(options.workspace);
    } catch (err) {
        error(`Failed to load ledger config: ${message(err)}`);
        return 1;
    }
    const { workspace, config } = opened;
    if (workspace) {
        success(`Workspace: ${workspace.root}`);
    } else {
        info('No workspace found; starting from an empty chart of accounts.');
    }

    let ledger: Ledger;
    try {
        ledger = buildLedger(config);
    } catch (err) {
        error(`Invalid chart of accounts: ${message(err)}`);
        return 1;
    }

    // 2. Import
    for (const file of files) {
        arrow(`Importing ${file}...`);
        try {
            const count = await importTransactionsFromFile(ledger, file, { verbose: options.verbose });
            success(`Imported ${count} transactions from ${basename(file)}`);
        } catch (err) {
            error(`Failed to import ${file}: ${message(err)}`);
            return 1;
        }
    }

    // 3. Audit and reports
    const validation = validateLedger(ledger);
    for (const problem of validation.errors) {
        warn(problem);
    }

    log('');
    printTrialBalance(ledger, config.currency_label);
    log('');
    printBalanceSheet(ledger, config.currency_label);
    log('');
    printIncomeStatement(ledger, config.currency_label);

    // 4. Optional exports
    try {
        if (options.exportPath) {
            const path = resolveOutputPath(workspace, options.exportPath);
            await mkdir(dirname(path), { recursive: true });
            const count = await exportTransactionsToFile(ledger, path);
            success(`Exported ${count} transactions to ${path}`);
        }
        if (options.xlsxPath) {
            const path = resolveOutputPath(workspace, options.xlsxPath);
            await mkdir(dirname(path), { recursive: true });
            const workbook = await generateLedgerWorkbook(ledger);
            await workbook.xlsx.writeFile(path);
            success(`Wrote workbook ${path}`);
        }
    } catch (err) {
        error(`Export failed: ${message(err)}`);
        return 1;
    }

    return validation.valid ? 0 : 1;
}
