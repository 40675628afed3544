import exceljs from 'exceljs';
import type { Row, Worksheet, Workbook } from 'exceljs';

const HEADER_FILL = 'FF4472C4';
const FOOTER_FILL = 'FFE0E0E0';

/**
 * New workbook stamped with the ledger's name.
 */
export function createWorkbook(title: string): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Ducat Ledger';
    workbook.title = title;
    workbook.created = new Date();
    return workbook;
}

/**
 * Bold white-on-blue header row, frozen.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = {
        bold: true,
        color: { argb: 'FFFFFFFF' },
        size: 11
    };

    headerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: HEADER_FILL }
    };

    headerRow.alignment = {
        vertical: 'middle',
        horizontal: 'center'
    };

    worksheet.views = [
        { state: 'frozen', xSplit: 0, ySplit: 1 }
    ];
}

export function formatFooterRow(row: Row): void {
    row.font = { bold: true };
    row.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: FOOTER_FILL }
    };
}

/**
 * Width of each column from its longest value, between 10 and 100.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach(column => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, cell => {
            if (cell.value !== null && cell.value !== undefined) {
                const len = cell.value.toString().length;
                if (len > maxLen) maxLen = len;
            }
        });
        column.width = Math.min(maxLen + 2, 100);
    });
}

/**
 * Two-decimal number format, negatives in red.
 */
export function formatCurrencyColumn(worksheet: Worksheet, col: string | number): void {
    const column = worksheet.getColumn(col);
    column.numFmt = '#,##0.00;[Red]-#,##0.00';
    column.alignment = { horizontal: 'right' };
}
