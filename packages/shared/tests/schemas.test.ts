import { describe, it, expect } from 'vitest';
import {
    AccountTypeSchema,
    AccountDefinitionSchema,
    JsonRecordSchema,
    JsonExportRecordSchema,
    LedgerConfigSchema,
    ImportResultSchema,
} from '../src/schemas.js';

describe('AccountTypeSchema', () => {
    it('accepts the five categories', () => {
        for (const type of ['ASSET', 'LIABILITY', 'EQUITY', 'REVENUE', 'EXPENSE']) {
            expect(AccountTypeSchema.safeParse(type).success).toBe(true);
        }
    });

    it('rejects lower-case and unknown values', () => {
        expect(AccountTypeSchema.safeParse('asset').success).toBe(false);
        expect(AccountTypeSchema.safeParse('CONTRA').success).toBe(false);
    });
});

describe('AccountDefinitionSchema', () => {
    it('upper-cases the type', () => {
        const result = AccountDefinitionSchema.parse({ name: 'Cash', type: ' asset ' });
        expect(result).toEqual({ name: 'Cash', type: 'ASSET' });
    });

    it('rejects an empty name', () => {
        expect(AccountDefinitionSchema.safeParse({ name: '  ', type: 'ASSET' }).success).toBe(false);
    });
});

describe('JsonRecordSchema', () => {
    const validRecord = {
        id: 1,
        date: '1397-01-01',
        description: 'Initial investment',
        debits: [{ account: 'Cash', account_type: 'ASSET', amount: '10000.00' }],
        credits: [{ account: "Owner's Capital", account_type: 'EQUITY', amount: 10000 }],
    };

    it('validates a complete record', () => {
        expect(JsonRecordSchema.safeParse(validRecord).success).toBe(true);
    });

    it('accepts a record without id', () => {
        const { id: _id, ...withoutId } = validRecord;
        expect(JsonRecordSchema.safeParse(withoutId).success).toBe(true);
    });

    it('keeps account_type as raw text', () => {
        const record = {
            ...validRecord,
            debits: [{ account: 'Cash', account_type: 'CONTRA', amount: '1.00' }],
        };
        expect(JsonRecordSchema.safeParse(record).success).toBe(true);
    });

    it('leaves a non-text account_type to the importer', () => {
        const record = {
            ...validRecord,
            debits: [{ account: 'Cash', account_type: 7, amount: '1.00' }],
        };
        expect(JsonRecordSchema.safeParse(record).success).toBe(true);
    });

    it('rejects an empty credit list', () => {
        const result = JsonRecordSchema.safeParse({ ...validRecord, credits: [] });
        expect(result.success).toBe(false);
    });

    it('rejects a non-numeric amount string', () => {
        const record = {
            ...validRecord,
            debits: [{ account: 'Cash', account_type: 'ASSET', amount: 'ten' }],
        };
        expect(JsonRecordSchema.safeParse(record).success).toBe(false);
    });

    it('rejects a non-ISO date', () => {
        expect(JsonRecordSchema.safeParse({ ...validRecord, date: '01/01/1397' }).success).toBe(false);
    });
});

describe('JsonExportRecordSchema', () => {
    it('requires a positive integer id', () => {
        const record = {
            id: 0,
            date: '1397-01-01',
            description: 'x',
            debits: [],
            credits: [],
        };
        expect(JsonExportRecordSchema.safeParse(record).success).toBe(false);
        expect(JsonExportRecordSchema.safeParse({ ...record, id: 1 }).success).toBe(true);
    });
});

describe('LedgerConfigSchema', () => {
    it('fills defaults for an empty config', () => {
        expect(LedgerConfigSchema.parse({})).toEqual({
            name: 'Ducat Ledger',
            currency_label: 'ducats',
            accounts: [],
        });
    });

    it('parses a chart of accounts', () => {
        const config = LedgerConfigSchema.parse({
            name: 'Branch Books',
            currency_label: 'florins',
            accounts: [
                { name: 'Cash', type: 'asset' },
                { name: 'Loans', type: 'LIABILITY' },
            ],
        });
        expect(config.accounts).toEqual([
            { name: 'Cash', type: 'ASSET' },
            { name: 'Loans', type: 'LIABILITY' },
        ]);
    });

    it('rejects an unknown account type', () => {
        const result = LedgerConfigSchema.safeParse({ accounts: [{ name: 'Cash', type: 'money' }] });
        expect(result.success).toBe(false);
    });
});

describe('ImportResultSchema', () => {
    it('validates an import result with a skipped record', () => {
        const result = ImportResultSchema.safeParse({
            imported: 2,
            skipped: 1,
            errors: [{ record: 3, id: '7', code: 'UNBALANCED', message: 'unbalanced' }],
            warnings: ['Skipped 1 of 3 records'],
        });
        expect(result.success).toBe(true);
    });
});
