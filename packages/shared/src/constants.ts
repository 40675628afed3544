/**
 * Constants for Ducat Ledger.
 */

/**
 * Account categories, in chart-of-accounts order.
 */
export const ACCOUNT_TYPES = ['ASSET', 'LIABILITY', 'EQUITY', 'REVENUE', 'EXPENSE'] as const;

type AccountTypeName = (typeof ACCOUNT_TYPES)[number];

/**
 * Fixed number of fractional digits carried by every amount (cents).
 */
export const MONEY_SCALE = 2;

/**
 * Column order of the flat CSV record format.
 * Header row is required on import; extra columns are ignored.
 */
export const CSV_COLUMNS = [
    'id',
    'date',
    'description',
    'debit_account',
    'debit_amount',
    'credit_account',
    'credit_amount',
    'credit_account_2',
    'credit_amount_2',
] as const;

/**
 * Columns a CSV record must carry to be importable.
 */
export const CSV_REQUIRED_COLUMNS = [
    'date',
    'description',
    'debit_account',
    'debit_amount',
    'credit_account',
    'credit_amount',
] as const;

/**
 * Separator between account names sharing one debit_amount.
 */
export const DEBIT_ACCOUNT_SEPARATOR = ',';

/**
 * Keywords for inferring an account's category from its name.
 * Checked in this order against the lower-cased name; first hit wins.
 * Order matters: "Loans Receivable" is an ASSET, not a LIABILITY.
 */
export const ACCOUNT_TYPE_KEYWORDS: ReadonlyArray<{ type: AccountTypeName; keywords: readonly string[] }> = [
    { type: 'ASSET', keywords: ['cash', 'receivable', 'inventory', 'land', 'building', 'equipment', 'asset'] },
    { type: 'LIABILITY', keywords: ['payable', 'loan', 'debt', 'liability'] },
    { type: 'EQUITY', keywords: ['capital', 'equity', 'retained earnings', 'owner'] },
    { type: 'REVENUE', keywords: ['revenue', 'income', 'sales', 'interest income', 'fee'] },
    { type: 'EXPENSE', keywords: ['expense', 'wages', 'rent', 'supplies', 'maintenance', 'courier', 'cost'] },
];

/**
 * Category used when no keyword matches.
 */
export const DEFAULT_ACCOUNT_TYPE: AccountTypeName = 'ASSET';

/**
 * Record-level validation settings for external CSV files.
 * Generated data carries float amounts, so rows are checked within a cent.
 */
export const RECORD_VALIDATION = {
    TOLERANCE: '0.01',
} as const;

/**
 * Ledger defaults when no workspace config is present.
 */
export const LEDGER_DEFAULTS = {
    NAME: 'Ducat Ledger',
    CURRENCY_LABEL: 'ducats',
} as const;
