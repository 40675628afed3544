import type { AccountType } from '@ducat-ledger/shared';
import { AccountTypeSchema, ACCOUNT_TYPE_KEYWORDS, DEFAULT_ACCOUNT_TYPE } from '@ducat-ledger/shared';
import { LedgerError, UnknownAccountTypeError } from '../errors.js';
import { normalizeAccountName } from '../utils/normalize.js';
import type { Account } from './account.js';
import type { Ledger } from './ledger.js';

/**
 * Infer an account category from a free-text name.
 *
 * Only the flat CSV format needs this: it carries no type column.
 * Categories are tried in ACCOUNT_TYPE_KEYWORDS order against the
 * lower-cased name; first keyword hit wins, otherwise ASSET.
 *
 * @example
 * inferAccountType('Accounts Payable') // 'LIABILITY'
 * inferAccountType('Miscellaneous')    // 'ASSET'
 */
export function inferAccountType(name: string): AccountType {
    const normalized = normalizeAccountName(name);
    for (const { type, keywords } of ACCOUNT_TYPE_KEYWORDS) {
        if (keywords.some((keyword) => normalized.includes(keyword))) {
            return type;
        }
    }
    return DEFAULT_ACCOUNT_TYPE;
}

/**
 * Map an external account_type value to AccountType (case-insensitive).
 * Anything that is not one of the five names, strings or not, is unknown.
 */
export function parseAccountType(value: unknown): AccountType {
    if (typeof value !== 'string') {
        throw new UnknownAccountTypeError(String(value));
    }
    const result = AccountTypeSchema.safeParse(value.trim().toUpperCase());
    if (!result.success) {
        throw new UnknownAccountTypeError(value);
    }
    return result.data;
}

/**
 * Type an account name will have once resolved against the ledger,
 * without creating anything.
 *
 * Existing accounts keep their type; a declared type that disagrees with
 * it is an ACCOUNT_TYPE_CONFLICT. Unknown names take the declared type,
 * or the inferred one.
 */
export function resolveAccountType(ledger: Ledger, name: string, declared?: AccountType): AccountType {
    const existing = ledger.getAccount(name);
    if (!existing) {
        return declared ?? inferAccountType(name);
    }
    if (declared && declared !== existing.type) {
        throw new LedgerError(
            'ACCOUNT_TYPE_CONFLICT',
            `Account "${name}" is ${existing.type}, record declares ${declared}`
        );
    }
    return existing.type;
}

/**
 * Existing account by exact name, or a new one with an inferred type.
 */
export function resolveAccount(ledger: Ledger, name: string): Account {
    return ledger.getAccount(name) ?? ledger.createAccount(name, inferAccountType(name));
}
