import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Ledger } from '@ducat-ledger/core';
import {
    exportTransactionsToCsv,
    exportTransactionsToJson,
    importTransactionsFromCsv,
    importTransactionsFromJson,
    importTransactionsFromFile,
} from '../src/io/ledger-files.js';

const HEADER = 'id,date,description,debit_account,debit_amount,credit_account,credit_amount,credit_account_2,credit_amount_2';

function seededLedger(): Ledger {
    const ledger = new Ledger('Test');
    const cash = ledger.createAccount('Cash', 'ASSET');
    const capital = ledger.createAccount("Owner's Capital", 'EQUITY');
    const wages = ledger.createAccount('Wages', 'EXPENSE');
    ledger.recordTransaction('1397-01-01', 'Initial capital', { account: cash, amount: '10000' }, { account: capital, amount: '10000' });
    ledger.recordTransaction('1397-12-01', 'Wages', { account: wages, amount: '800' }, { account: cash, amount: '-800' });
    return ledger;
}

describe('ledger files', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'ducat-files-'));
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        rmSync(dir, { recursive: true, force: true });
    });

    it('exports CSV with a trailing newline and re-imports it', async () => {
        const path = join(dir, 'transactions.csv');
        expect(await exportTransactionsToCsv(seededLedger(), path)).toBe(2);
        expect(readFileSync(path, 'utf-8')).toBe([
            HEADER,
            "1,1397-01-01,Initial capital,Cash,10000.00,Owner's Capital,10000.00,,",
            '2,1397-12-01,Wages,Wages,800.00,Cash,800.00,,',
            '',
        ].join('\n'));

        const copy = new Ledger('Copy');
        expect(await importTransactionsFromCsv(copy, path)).toBe(2);
        expect(copy.getAccount('Cash')?.balance.toString()).toBe('9200.00');
        expect(copy.getAccount('Wages')?.type).toBe('EXPENSE');
    });

    it('exports JSON and re-imports it', async () => {
        const path = join(dir, 'transactions.json');
        expect(await exportTransactionsToJson(seededLedger(), path)).toBe(2);

        const records: unknown = JSON.parse(readFileSync(path, 'utf-8'));
        expect(Array.isArray(records) ? records.length : -1).toBe(2);

        const copy = new Ledger('Copy');
        expect(await importTransactionsFromJson(copy, path)).toBe(2);
        expect(copy.getAccount("Owner's Capital")?.balance.toString()).toBe('10000.00');
    });

    it('logs skipped records only when verbose', async () => {
        const path = join(dir, 'mixed.csv');
        writeFileSync(path, [
            HEADER,
            '1,1397-01-01,Seed,Cash,5.00,Capital,5.00,,',
            '2,bad,Broken,Cash,5.00,Capital,5.00,,',
        ].join('\n'));

        expect(await importTransactionsFromCsv(new Ledger('Quiet'), path)).toBe(1);
        expect(console.warn).not.toHaveBeenCalled();

        expect(await importTransactionsFromCsv(new Ledger('Loud'), path, { verbose: true })).toBe(1);
        expect(console.warn).toHaveBeenCalledWith(
            `⚠️  ${path}: record 2 (id 2) skipped [MALFORMED_RECORD]: Invalid date "bad", expected YYYY-MM-DD`
        );
        expect(console.warn).toHaveBeenCalledWith(`⚠️  ${path}: Skipped 1 of 2 records`);
    });

    it('warns when CSV export drops credit legs', async () => {
        const ledger = new Ledger('Test');
        const cash = ledger.createAccount('Cash', 'ASSET');
        const a = ledger.createAccount('Revenue', 'REVENUE');
        const b = ledger.createAccount('Interest Income', 'REVENUE');
        const c = ledger.createAccount('Fee Income', 'REVENUE');
        ledger.recordTransaction('1397-06-01', 'Three credits',
            { account: cash, amount: '3' }, { account: a, amount: '1' }, { account: b, amount: '1' }, { account: c, amount: '1' });

        await exportTransactionsToCsv(ledger, join(dir, 'lossy.csv'));
        expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it('fails the whole call for a missing file', async () => {
        await expect(importTransactionsFromCsv(new Ledger('Test'), join(dir, 'missing.csv'))).rejects.toThrow(/ENOENT/);
    });

    it('fails the whole call for a JSON object container', async () => {
        const path = join(dir, 'object.json');
        writeFileSync(path, '{"transactions": []}');
        await expect(importTransactionsFromJson(new Ledger('Test'), path)).rejects.toThrow(
            'JSON transactions must be a list of records'
        );
    });

    it('picks the format from the extension', async () => {
        const path = join(dir, 'transactions.JSON');
        await exportTransactionsToJson(seededLedger(), path);
        expect(await importTransactionsFromFile(new Ledger('Copy'), path)).toBe(2);
        await expect(importTransactionsFromFile(new Ledger('Copy'), join(dir, 'x.txt'))).rejects.toThrow(
            'Unsupported file type'
        );
    });
});
