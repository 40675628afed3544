// Schemas
export {
    isoDateString,
    decimalString,
    AccountTypeSchema,
    AccountDefinitionSchema,
    JsonEntrySchema,
    JsonRecordSchema,
    JsonExportEntrySchema,
    JsonExportRecordSchema,
    RecordErrorSchema,
    ImportResultSchema,
    LedgerValidationResultSchema,
    CsvValidationResultSchema,
    LedgerConfigSchema,
} from './schemas.js';

// Types
export type {
    AccountType,
    AccountDefinition,
    JsonEntry,
    JsonRecord,
    JsonExportEntry,
    JsonExportRecord,
    RecordError,
    ImportResult,
    LedgerValidationResult,
    CsvValidationResult,
    LedgerConfig,
} from './schemas.js';

// Constants
export {
    ACCOUNT_TYPES,
    MONEY_SCALE,
    CSV_COLUMNS,
    CSV_REQUIRED_COLUMNS,
    DEBIT_ACCOUNT_SEPARATOR,
    ACCOUNT_TYPE_KEYWORDS,
    DEFAULT_ACCOUNT_TYPE,
    RECORD_VALIDATION,
    LEDGER_DEFAULTS,
} from './constants.js';
