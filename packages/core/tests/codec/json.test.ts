import { describe, it, expect } from 'vitest';
import { importJson, exportJson } from '../../src/codec/json.js';
import { Ledger } from '../../src/ledger/ledger.js';
import { MalformedRecordError } from '../../src/errors.js';

function seedRecord(overrides: Record<string, unknown> = {}) {
    return {
        id: 1,
        date: '1397-01-01',
        description: 'Initial capital',
        debits: [{ account: 'Cash', account_type: 'ASSET', amount: '10000.00' }],
        credits: [{ account: "Owner's Capital", account_type: 'EQUITY', amount: '10000.00' }],
        ...overrides,
    };
}

function bookedLedger(): Ledger {
    const ledger = new Ledger('Test');
    const cash = ledger.createAccount('Cash', 'ASSET');
    const land = ledger.createAccount('Land', 'ASSET');
    const equipment = ledger.createAccount('Equipment', 'ASSET');
    const capital = ledger.createAccount("Owner's Capital", 'EQUITY');
    const revenue = ledger.createAccount('Revenue', 'REVENUE');
    const interest = ledger.createAccount('Interest Income', 'REVENUE');
    const fees = ledger.createAccount('Fee Income', 'REVENUE');
    // Inferred type would be ASSET; the JSON format must keep EXPENSE
    const misc = ledger.createAccount('Miscellaneous', 'EXPENSE');

    ledger.recordTransaction('1397-01-01', 'Initial capital', { account: cash, amount: '10000' }, { account: capital, amount: '10000' });
    ledger.recordTransaction('1397-03-01', 'Uneven purchase',
        { account: land, amount: '1000.10' },
        { account: equipment, amount: '499.90' },
        { account: cash, amount: '-1500' });
    ledger.recordTransaction('1397-06-01', 'Three credits',
        { account: cash, amount: '300' },
        { account: revenue, amount: '100' },
        { account: interest, amount: '150' },
        { account: fees, amount: '50' });
    ledger.recordTransaction('1397-07-01', 'Sundries', { account: misc, amount: '12.34' }, { account: cash, amount: '-12.34' });
    return ledger;
}

describe('exportJson', () => {
    it('writes explicit legs with types and two-decimal amounts', () => {
        const ledger = new Ledger('Test');
        const cash = ledger.createAccount('Cash', 'ASSET');
        const capital = ledger.createAccount('Capital', 'EQUITY');
        ledger.recordTransaction('1397-01-01', 'seed', { account: cash, amount: '1000' }, { account: capital, amount: '1000' });

        expect(exportJson(ledger)).toEqual([
            {
                id: 1,
                date: '1397-01-01',
                description: 'seed',
                debits: [{ account: 'Cash', account_type: 'ASSET', amount: '1000.00' }],
                credits: [{ account: 'Capital', account_type: 'EQUITY', amount: '1000.00' }],
            },
        ]);
    });
});

describe('importJson', () => {
    it('round-trips a ledger exactly', () => {
        const original = bookedLedger();
        const exported = exportJson(original);

        const copy = new Ledger('Copy');
        const result = importJson(copy, JSON.stringify(exported));

        expect(result).toEqual({ imported: 4, skipped: 0, errors: [], warnings: [] });
        expect(exportJson(copy)).toEqual(exported);
        expect(copy.accounts.map((a) => a.toString()).sort()).toEqual(original.accounts.map((a) => a.toString()).sort());
        expect(copy.getAccount('Miscellaneous')?.type).toBe('EXPENSE');
    });

    it('accepts already-parsed records and numeric amounts', () => {
        const ledger = new Ledger('Test');
        const record = seedRecord({
            debits: [{ account: 'Cash', account_type: 'asset', amount: 10000 }],
        });
        expect(importJson(ledger, [record]).imported).toBe(1);
        expect(ledger.getAccount('Cash')?.balance.toString()).toBe('10000.00');
    });

    it('skips a record with an unknown account type', () => {
        const ledger = new Ledger('Test');
        const result = importJson(ledger, [
            seedRecord(),
            seedRecord({
                id: 2,
                debits: [{ account: 'Allowance', account_type: 'CONTRA', amount: '5.00' }],
                credits: [{ account: 'Cash', account_type: 'ASSET', amount: '5.00' }],
            }),
        ]);

        expect(result.imported).toBe(1);
        expect(result.errors).toEqual([
            { record: 2, id: '2', code: 'UNKNOWN_ACCOUNT_TYPE', message: 'Unknown account type: "CONTRA"' },
        ]);
        expect(ledger.getAccount('Allowance')).toBeUndefined();
        expect(ledger.getAccount('Cash')?.balance.toString()).toBe('10000.00');
    });

    it('reports a non-text account type as unknown', () => {
        const ledger = new Ledger('Test');
        const result = importJson(ledger, [
            seedRecord({ debits: [{ account: 'Cash', account_type: 123, amount: '10000.00' }] }),
        ]);

        expect(result.errors).toEqual([
            { record: 1, id: '1', code: 'UNKNOWN_ACCOUNT_TYPE', message: 'Unknown account type: "123"' },
        ]);
        expect(ledger.accounts).toHaveLength(0);
    });

    it('keeps padded account names identical through export and import', () => {
        const ledger = new Ledger('Test');
        const cash = ledger.createAccount('Cash ', 'ASSET');
        const capital = ledger.createAccount('Capital', 'EQUITY');
        ledger.recordTransaction('1397-01-01', 'seed', { account: cash, amount: '10' }, { account: capital, amount: '10' });

        const copy = new Ledger('Copy');
        expect(importJson(copy, exportJson(ledger)).imported).toBe(1);
        expect(copy.accounts.map((a) => a.name)).toEqual(ledger.accounts.map((a) => a.name));
        expect(copy.accounts.map((a) => a.name)).toEqual(['Cash', 'Capital']);
    });

    it('skips a record whose type disagrees with the ledger', () => {
        const ledger = new Ledger('Test');
        ledger.createAccount('Cash', 'ASSET');
        const result = importJson(ledger, [
            seedRecord({ debits: [{ account: 'Cash', account_type: 'REVENUE', amount: '10000.00' }] }),
        ]);

        expect(result.errors).toEqual([
            { record: 1, id: '1', code: 'ACCOUNT_TYPE_CONFLICT', message: 'Account "Cash" is ASSET, record declares REVENUE' },
        ]);
        expect(ledger.getAccount("Owner's Capital")).toBeUndefined();
    });

    it('skips a record that types one account two ways', () => {
        const result = importJson(new Ledger('Test'), [
            seedRecord({
                debits: [{ account: 'Till', account_type: 'ASSET', amount: '1.00' }],
                credits: [{ account: 'Till', account_type: 'REVENUE', amount: '1.00' }],
            }),
        ]);
        expect(result.errors[0].code).toBe('ACCOUNT_TYPE_CONFLICT');
        expect(result.errors[0].message).toBe('Account "Till" appears as both ASSET and REVENUE in one record');
    });

    it('skips unbalanced and malformed records', () => {
        const result = importJson(new Ledger('Test'), [
            seedRecord({ credits: [{ account: "Owner's Capital", account_type: 'EQUITY', amount: '9999.99' }] }),
            { id: 'x7', date: '1397-01-01' },
            seedRecord({ id: 3, debits: [{ account: 'Cash', account_type: 'ASSET', amount: '-5' }] }),
        ]);

        expect(result.imported).toBe(0);
        expect(result.errors).toEqual([
            {
                record: 1,
                id: '1',
                code: 'UNBALANCED',
                message: 'Transaction "Initial capital" unbalanced: debits=10000.00, credits=9999.99',
            },
            {
                record: 2,
                id: 'x7',
                code: 'MALFORMED_RECORD',
                message: 'Invalid record: description: Required; debits: Required; credits: Required',
            },
            { record: 3, id: '3', code: 'MALFORMED_RECORD', message: 'Negative debits.0.amount: -5.00' },
        ]);
        expect(result.warnings).toEqual(['Skipped 3 of 3 records']);
    });

    it('fails the whole import for a non-list container', () => {
        const ledger = new Ledger('Test');
        expect(() => importJson(ledger, '{"transactions": []}')).toThrow(MalformedRecordError);
        expect(() => importJson(ledger, { transactions: [] })).toThrow('JSON transactions must be a list of records');
    });

    it('fails the whole import for invalid JSON text', () => {
        expect(() => importJson(new Ledger('Test'), '[{')).toThrow(/^Invalid JSON: /);
    });
});
