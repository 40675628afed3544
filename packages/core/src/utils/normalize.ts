/**
 * Account name normalization for keyword matching.
 *
 * NOTE: This is for type inference only. Accounts are looked up by their
 * exact name; "cash" and "Cash" are two different accounts.
 */

/**
 * Transformations:
 * - Convert to lowercase
 * - Collapse multiple whitespace to single space
 * - Trim leading/trailing whitespace
 */
export function normalizeAccountName(raw: string): string {
    return raw
        .toLowerCase()
        .replace(/\s+/g, ' ')
        .trim();
}
