import type { Workbook } from 'exceljs';
import {
    collectColumns,
    flattenFindings,
    parseAmount,
    type BenfordResult,
    type DatasetSummary,
    type Finding,
} from '@expense-audit/core';
import { RESERVED_KEYS } from '@expense-audit/shared';
import { addTableSheet, createWorkbook, formatCurrencyCell } from './utils.js';

export const SHEET_NAMES = {
    FINDINGS: 'Findings',
    BENFORD: 'Benford',
    SUMMARY: 'Summary',
} as const;

/**
 * Generates the audit workbook: Findings, Benford and Summary sheets.
 */
export async function generateAuditExcel(
    findings: readonly Finding[],
    benford: BenfordResult,
    summary: DatasetSummary
): Promise<Workbook> {
    const workbook = createWorkbook();

    addFindingsSheet(workbook, findings);
    addBenfordSheet(workbook, benford);
    addSummarySheet(workbook, summary);

    return workbook;
}

/**
 * Sheet: Findings
 * One row per flattened finding; columns are the union of keys, cells as text.
 */
function addFindingsSheet(workbook: Workbook, findings: readonly Finding[]): void {
    const rows = flattenFindings(findings);
    const columns = rows.length > 0 ? collectColumns(rows) : [RESERVED_KEYS.REASON];
    addTableSheet(workbook, SHEET_NAMES.FINDINGS, columns, rows);
}

/**
 * Sheet: Benford
 * Columns: digit, actual_count, actual_pct, expected_pct, diff_pct.
 * When there was nothing to analyze, a single message row instead.
 */
function addBenfordSheet(workbook: Workbook, benford: BenfordResult): void {
    if (benford.status === 'insufficient_data') {
        addTableSheet(workbook, SHEET_NAMES.BENFORD, ['message'], [{ message: benford.message }]);
        return;
    }

    const { report } = benford;
    const sheet = addTableSheet(
        workbook,
        SHEET_NAMES.BENFORD,
        ['digit', 'actual_count', 'actual_pct', 'expected_pct', 'diff_pct'],
        report.stats
    );

    sheet.addRow([]);
    sheet.addRow(['total_analyzed', report.total_analyzed]);
    sheet.addRow(['max_deviation_pct', report.max_deviation_pct]);
    sheet.addRow(['is_suspicious', report.is_suspicious]);
}

/**
 * Sheet: Summary
 * Rows: Total rows, Total amount, First date, Last date
 */
function addSummarySheet(workbook: Workbook, summary: DatasetSummary): void {
    const total = parseAmount(summary.total_amount);
    const sheet = addTableSheet(workbook, SHEET_NAMES.SUMMARY, ['metric', 'value'], [
        { metric: 'Total rows', value: summary.total_rows },
        { metric: 'Total amount', value: total ? total.toNumber() : summary.total_amount },
        { metric: 'First date', value: summary.date_range?.start ?? 'N/A' },
        { metric: 'Last date', value: summary.date_range?.end ?? 'N/A' },
    ]);
    formatCurrencyCell(sheet, 'value');
}
