import exceljs from 'exceljs';
import type { Worksheet, Workbook } from 'exceljs';

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Expense Audit';
    workbook.created = new Date();
    return workbook;
}

/**
 * Bold white-on-blue header, frozen.
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
        fgColor: { argb: 'FF4472C4' }
    };

    headerRow.alignment = {
        vertical: 'middle',
        horizontal: 'center'
    };

    worksheet.views = [
        { state: 'frozen', xSplit: 0, ySplit: 1 }
    ];
}

/**
 * Widths from the longest cell text, between 10 and 100 characters.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach(column => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, cell => {
            if (cell.value) {
                const len = cell.value.toString().length;
                if (len > maxLen) maxLen = len;
            }
        });
        column.width = Math.min(maxLen + 2, 100);
    });
}

/**
 * Dollar format for a whole column, negatives in red.
 */
export function formatCurrencyCell(worksheet: Worksheet, col: string | number): void {
    const column = worksheet.getColumn(col);
    column.numFmt = '"$"#,##0.00;[Red]-"$"#,##0.00';
    column.alignment = { horizontal: 'right' };
}

/**
 * Adds a styled sheet of string-keyed rows; the header is the given columns.
 */
export function addTableSheet(
    workbook: Workbook,
    name: string,
    columns: readonly string[],
    rows: readonly Readonly<Record<string, string | number | boolean | undefined>>[]
): Worksheet {
    const sheet = workbook.addWorksheet(name);
    sheet.columns = columns.map(key => ({ header: key, key }));

    for (const row of rows) {
        sheet.addRow(Object.fromEntries(columns.map(key => [key, row[key] ?? ''])));
    }

    formatHeaderRow(sheet);
    autoFitColumns(sheet);
    return sheet;
}
