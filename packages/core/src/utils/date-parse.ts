/**
 * Date handling for transaction dates.
 * Dates travel as ISO YYYY-MM-DD strings; Date objects are read in UTC.
 */

/**
 * Parse YYYY-MM-DD date string to Date (UTC).
 * Returns null for malformed strings and impossible dates (2024-02-30).
 */
export function parseIsoDate(value: string): Date | null {
    const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) return null;

    const year = parseInt(match[1]);
    const month = parseInt(match[2]);
    const day = parseInt(match[3]);

    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    // Date.UTC also maps years 0-99 onto 1900-1999
    date.setUTCFullYear(year);

    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = String(date.getUTCFullYear()).padStart(4, '0');
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Normalize a Date or ISO string to YYYY-MM-DD, or null if invalid.
 */
export function toIsoDate(value: string | Date): string | null {
    if (value instanceof Date) {
        return isValidDate(value) ? formatIsoDate(value) : null;
    }
    const trimmed = value.trim();
    return parseIsoDate(trimmed) ? trimmed : null;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}
