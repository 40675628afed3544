import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { Ledger } from '@ducat-ledger/core';
import { LEDGER_DEFAULTS } from '@ducat-ledger/shared';
import { buildDemoLedger } from '../demo/scenario.js';
import {
    exportTransactionsToCsv,
    exportTransactionsToJson,
    importTransactionsFromCsv,
    importTransactionsFromJson,
} from '../io/ledger-files.js';
import {
    printTrialBalance,
    printBalanceSheet,
    printIncomeStatement,
    printTransaction,
} from '../report/print.js';
import { log, success, arrow } from '../utils/console.js';
import type { DemoOptions } from '../types.js';

const LABEL = LEDGER_DEFAULTS.CURRENCY_LABEL;

/**
 * Record the 1397 scenario, print it, and optionally round-trip it
 * through both file formats.
 */
export async function runDemo(options: DemoOptions): Promise<number> {
    const ledger = buildDemoLedger();

    log(`=== ${ledger.name.toUpperCase()}: YEAR 1397 ===`);
    for (const transaction of ledger.transactions) {
        log('');
        printTransaction(transaction);
    }

    log('');
    printTrialBalance(ledger, LABEL);
    log('');
    printBalanceSheet(ledger, LABEL);
    log('');
    printIncomeStatement(ledger, LABEL);

    if (!options.out) {
        return 0;
    }

    await mkdir(options.out, { recursive: true });
    const csvPath = join(options.out, 'transactions.csv');
    const jsonPath = join(options.out, 'transactions.json');

    log('');
    arrow('Exporting transactions...');
    success(`Wrote ${await exportTransactionsToCsv(ledger, csvPath)} transactions to ${csvPath}`);
    success(`Wrote ${await exportTransactionsToJson(ledger, jsonPath)} transactions to ${jsonPath}`);

    arrow('Re-importing into fresh ledgers...');
    const fromCsv = new Ledger(`${ledger.name} (from CSV)`);
    const csvCount = await importTransactionsFromCsv(fromCsv, csvPath, { verbose: options.verbose });
    success(`Imported ${csvCount} transactions from CSV`);

    const fromJson = new Ledger(`${ledger.name} (from JSON)`);
    const jsonCount = await importTransactionsFromJson(fromJson, jsonPath, { verbose: options.verbose });
    success(`Imported ${jsonCount} transactions from JSON`);

    log('');
    printTrialBalance(fromCsv, LABEL);
    log('');
    printTrialBalance(fromJson, LABEL);

    return 0;
}
