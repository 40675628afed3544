/**
 * Zod schemas for Ducat Ledger data structures.
 *
 * IMPORTANT: amounts cross every external boundary as decimal strings
 * (JSON import also takes plain numbers, as produced by generators).
 * Convert to Money at the ledger boundary, back to string at output.
 */

import { z } from 'zod';
import { ACCOUNT_TYPES, LEDGER_DEFAULTS } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
export const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Decimal amount as string (never native number for money).
 */
export const decimalString = z.string().regex(/^[-+]?\d+(\.\d+)?$/, 'Must be valid decimal string');

// ============================================================================
// Account Schemas
// ============================================================================

/**
 * One of the five account categories, upper-case.
 */
export const AccountTypeSchema = z.enum(ACCOUNT_TYPES);

export type AccountType = z.infer<typeof AccountTypeSchema>;

/**
 * Account declaration in a chart of accounts.
 * Type is matched case-insensitively ("asset" and "ASSET" are the same).
 */
export const AccountDefinitionSchema = z.object({
    name: z.string().trim().min(1),
    type: z.preprocess(
        (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
        AccountTypeSchema
    ),
});

export type AccountDefinition = z.infer<typeof AccountDefinitionSchema>;

// ============================================================================
// JSON Record Schemas
// ============================================================================

/**
 * One debit or credit leg of a JSON record.
 * account_type is kept as a raw value here; the importer maps it so that
 * an unrecognized category (a non-string included) is reported as such,
 * not as a shape error.
 */
export const JsonEntrySchema = z.object({
    account: z.string().trim().min(1),
    account_type: z.unknown(),
    amount: z.union([decimalString, z.number().finite()]),
});

export type JsonEntry = z.infer<typeof JsonEntrySchema>;

/**
 * JSON record: explicit debits/credits with per-entry type and amount.
 */
export const JsonRecordSchema = z.object({
    id: z.union([z.number(), z.string()]).optional(),
    date: isoDateString,
    description: z.string(),
    debits: z.array(JsonEntrySchema).min(1, 'At least one debit entry is required'),
    credits: z.array(JsonEntrySchema).min(1, 'At least one credit entry is required'),
});

export type JsonRecord = z.infer<typeof JsonRecordSchema>;

/**
 * Entry shape written by JSON export.
 */
export const JsonExportEntrySchema = z.object({
    account: z.string(),
    account_type: AccountTypeSchema,
    amount: decimalString,
});

export type JsonExportEntry = z.infer<typeof JsonExportEntrySchema>;

export const JsonExportRecordSchema = z.object({
    id: z.number().int().min(1),
    date: isoDateString,
    description: z.string(),
    debits: z.array(JsonExportEntrySchema),
    credits: z.array(JsonExportEntrySchema),
});

export type JsonExportRecord = z.infer<typeof JsonExportRecordSchema>;

// ============================================================================
// Import / Validation Results
// ============================================================================

/**
 * A record skipped during import.
 * Import functions return data, not side effects; the caller decides
 * whether to report these.
 */
export const RecordErrorSchema = z.object({
    record: z.number().int().min(1),
    id: z.string().optional(),
    code: z.string(),
    message: z.string(),
});

export type RecordError = z.infer<typeof RecordErrorSchema>;

export const ImportResultSchema = z.object({
    imported: z.number().int().min(0),
    skipped: z.number().int().min(0),
    errors: z.array(RecordErrorSchema),
    warnings: z.array(z.string()),
});

export type ImportResult = z.infer<typeof ImportResultSchema>;

/**
 * Result of checking a ledger's transactions and balances.
 */
export const LedgerValidationResultSchema = z.object({
    valid: z.boolean(),
    total_debits: decimalString,
    total_credits: decimalString,
    difference: decimalString,
    errors: z.array(z.string()),
});

export type LedgerValidationResult = z.infer<typeof LedgerValidationResultSchema>;

/**
 * Result of a record-level check of a CSV file, without a ledger.
 */
export const CsvValidationResultSchema = z.object({
    valid: z.boolean(),
    columns: z.array(z.string()),
    recordCount: z.number().int().min(0),
    errorCount: z.number().int().min(0),
    totalDebits: decimalString,
    totalCredits: decimalString,
    difference: decimalString,
    problems: z.array(z.string()),
});

export type CsvValidationResult = z.infer<typeof CsvValidationResultSchema>;

// ============================================================================
// Ledger Configuration
// ============================================================================

/**
 * Workspace ledger configuration (config/ledger.yaml).
 */
export const LedgerConfigSchema = z.object({
    name: z.string().trim().min(1).default(LEDGER_DEFAULTS.NAME),
    currency_label: z.string().trim().min(1).default(LEDGER_DEFAULTS.CURRENCY_LABEL),
    accounts: z.array(AccountDefinitionSchema).default([]),
});

export type LedgerConfig = z.infer<typeof LedgerConfigSchema>;
