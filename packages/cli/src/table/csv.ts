/**
 * CSV codec for expense tables.
 *
 * Parsing goes through SheetJS with raw text cells: nothing is coerced to a
 * number or date, so '007' and '100.00' survive exactly as written.
 */

import * as XLSX from 'xlsx';
import { collectColumns, type ExpenseRecord } from '@expense-audit/core';

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * A BOM glued to the first header breaks column lookups.
 */
export function stripBom(value: string): string {
    if (value.startsWith('\uFEFF')) {
        return value.slice(1);
    }
    return value;
}

/**
 * Decode file bytes: strict UTF-8 first, Windows-1252 when that fails.
 */
export function decodeText(bytes: Uint8Array): string {
    try {
        return stripBom(new TextDecoder('utf-8', { fatal: true }).decode(bytes));
    } catch (err) {
        if (!(err instanceof TypeError)) throw err;
        return stripBom(new TextDecoder('windows-1252').decode(bytes));
    }
}

/**
 * Parse CSV text into records. Every value is a string; empty cells become ''.
 */
export function parseCsv(text: string): ExpenseRecord[] {
    if (!text.trim()) {
        return [];
    }

    const workbook = XLSX.read(text, { type: 'string', raw: true });
    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    if (!sheet) {
        return [];
    }

    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '', raw: true });
    return rows.map(row => {
        const record: Record<string, string> = {};
        for (const [key, value] of Object.entries(row)) {
            record[stripBom(key)] = value === null || value === undefined ? '' : String(value);
        }
        return record;
    });
}

/**
 * Serialize rows to CSV. The header defaults to the union of keys in
 * first-seen order; missing values are written as empty cells.
 */
export function serializeCsv(
    rows: readonly Readonly<Record<string, string | undefined>>[],
    columns: readonly string[] = collectColumns(rows)
): string {
    const header = [...columns];
    const data = rows.map(row => {
        const out: Record<string, string> = {};
        for (const column of header) {
            out[column] = row[column] ?? '';
        }
        return out;
    });

    const sheet = XLSX.utils.json_to_sheet(data, { header });
    return XLSX.utils.sheet_to_csv(sheet);
}
