/**
 * CSV parsing utilities.
 *
 * Reading and writing go through SheetJS. Cells are read as plain text
 * (raw) so that dates and amounts reach the codec exactly as written.
 */

import * as XLSX from 'xlsx';

/**
 * A CSV data row keyed by (trimmed) header name. Every value is a trimmed
 * string; cells missing from a short row are ''.
 */
export type CsvRow = Record<string, string>;

export interface CsvTable {
    columns: string[];
    rows: CsvRow[];
}

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * BOM (\uFEFF) can interfere with column header matching in CSVs.
 */
export function stripBom(value: string): string {
    if (value.startsWith('\uFEFF')) {
        return value.slice(1);
    }
    return value;
}

function cellText(value: unknown): string {
    if (value === null || value === undefined) return '';
    return String(value).trim();
}

/**
 * Read CSV text into header columns and keyed rows.
 * The first non-empty line is the header. Blank lines are dropped.
 */
export function readCsvTable(content: string): CsvTable {
    const text = stripBom(content);
    if (text.trim() === '') {
        return { columns: [], rows: [] };
    }

    const workbook = XLSX.read(text, { type: 'string', raw: true });
    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: '' });

    const lines = grid
        .map((line) => line.map(cellText))
        .filter((line) => line.some((cell) => cell !== ''));

    if (lines.length === 0) {
        return { columns: [], rows: [] };
    }

    const [header, ...body] = lines;
    const columns = header.map((name) => stripBom(name));

    const rows = body.map((line) => {
        const row: CsvRow = {};
        columns.forEach((column, index) => {
            if (column !== '') {
                row[column] = line[index] ?? '';
            }
        });
        return row;
    });

    return { columns, rows };
}

/**
 * Write rows of text cells as CSV (first row is the header).
 * Cells holding the separator, quotes or newlines are quoted.
 */
export function writeCsv(lines: string[][]): string {
    const sheet = XLSX.utils.aoa_to_sheet(lines);
    return XLSX.utils.sheet_to_csv(sheet);
}
