import {
    analyzeBenford,
    findDuplicateInvoices,
    flagDiscrepancies,
    flagSuspiciousKeywords,
    flagThreshold,
    flagWeekends,
    summarizeRecords,
    type AuditConfig,
    type Finding,
} from '@expense-audit/core';
import { openTable } from './context.js';
import { log, printRows, warn } from '../utils/console.js';
import type { GlobalOptions, QueryOptions, ThresholdQueryOptions } from '../types.js';

type Columns = AuditConfig['columns'];

/**
 * Prints the count line and the first `show` findings, one per line.
 */
function printFindings<F extends Finding>(
    label: string,
    findings: readonly F[],
    show: number,
    format: (finding: F) => string[]
): void {
    log(`Found ${findings.length} ${label} (showing first ${Math.min(show, findings.length)}):`);
    printRows(findings.slice(0, show).map(format));
}

const cell = (value: string | undefined): string => value ?? '';

export async function findDuplicatesCommand(csvPath: string, options: QueryOptions): Promise<void> {
    const { context, store } = await openTable(csvPath, options);
    const { columns, duplicates } = context.config;

    const findings = findDuplicateInvoices(store.snapshot(), {
        merchantColumn: columns.merchant,
        invoiceColumn: columns.invoice,
        amountColumn: columns.amount,
        includeMerchant: duplicates.include_merchant,
    });

    printFindings('duplicates', findings, options.show, ({ record }) => [
        cell(record[columns.merchant]),
        cell(record[columns.invoice]),
        `$${cell(record[columns.amount])}`,
    ]);
}

export async function flagWeekendsCommand(csvPath: string, options: QueryOptions): Promise<void> {
    const { context, store } = await openTable(csvPath, options);
    const { columns, date_formats } = context.config;

    const findings = flagWeekends(store.snapshot(), {
        dateColumn: columns.date,
        dateFormats: date_formats,
    });

    printFindings('weekend transactions', findings, options.show, ({ record }) =>
        datedRow(record, columns));
}

export async function flagThresholdCommand(csvPath: string, options: ThresholdQueryOptions): Promise<void> {
    const { context, store } = await openTable(csvPath, options);
    const { columns, threshold } = context.config;
    const limit = options.limit ?? threshold.limit;
    const buffer = options.buffer ?? threshold.buffer;

    if (buffer > limit) {
        warn(`Buffer (${buffer}) exceeds limit (${limit}); the near-limit band reaches below zero.`);
    }

    const findings = flagThreshold(store.snapshot(), {
        amountColumn: columns.amount,
        limit,
        buffer,
    });

    printFindings('threshold violations', findings, options.show, finding => {
        const row = datedRow(finding.record, columns);
        row[row.length - 1] += ` (${finding.reason})`;
        return row;
    });
}

export async function benfordCommand(csvPath: string, options: GlobalOptions): Promise<void> {
    const { context, store } = await openTable(csvPath, options);

    const result = analyzeBenford(store.snapshot(), { amountColumn: context.config.columns.amount });
    if (result.status === 'insufficient_data') {
        warn(result.message);
        return;
    }

    const { report } = result;
    log(`Benford Analysis (Analyzed ${report.total_analyzed} records)`);
    log(`Suspicious: ${report.is_suspicious} (Max deviation: ${report.max_deviation_pct}%)`);
    log('');
    printRows([
        ['Digit', 'Count', 'Actual %', 'Expected %', 'Diff %'],
        ...report.stats.map(s => [
            String(s.digit),
            String(s.actual_count),
            String(s.actual_pct),
            String(s.expected_pct),
            String(s.diff_pct),
        ]),
    ]);
}

export async function suspiciousKeywordsCommand(csvPath: string, options: QueryOptions): Promise<void> {
    const { context, store } = await openTable(csvPath, options);
    const { columns, keywords } = context.config;

    const findings = flagSuspiciousKeywords(store.snapshot(), {
        columns: keywords.columns,
        terms: keywords.terms,
    });

    printFindings('records with suspicious keywords', findings, options.show, ({ record, details }) => [
        cell(record[columns.merchant]),
        cell(record[columns.category]),
        details,
    ]);
}

export async function paymentDiscrepanciesCommand(csvPath: string, options: QueryOptions): Promise<void> {
    const { context, store } = await openTable(csvPath, options);
    const { columns } = context.config;

    const findings = flagDiscrepancies(store.snapshot(), {
        incurredColumn: columns.amount,
        paidColumn: columns.paid,
    });

    printFindings('payment discrepancies', findings, options.show, ({ record, details }) => [
        cell(record[columns.invoice]),
        `Amount: ${cell(record[columns.amount])}`,
        `Paid: ${cell(record[columns.paid])}`,
        details,
    ]);
}

export async function summaryCommand(csvPath: string, options: GlobalOptions): Promise<void> {
    const { context, store } = await openTable(csvPath, options);
    const { columns, date_formats } = context.config;

    const summary = summarizeRecords(store.snapshot(), {
        amountColumn: columns.amount,
        dateColumn: columns.date,
        dateFormats: date_formats,
    });

    log(`Total rows: ${summary.total_rows}`);
    log(`Total amount: $${summary.total_amount}`);
    log(`Date range: ${summary.date_range ? `${summary.date_range.start} to ${summary.date_range.end}` : 'N/A'}`);
}

function datedRow(record: Finding['record'], columns: Columns): string[] {
    return [
        cell(record[columns.date]),
        cell(record[columns.merchant]),
        `$${cell(record[columns.amount])}`,
    ];
}
