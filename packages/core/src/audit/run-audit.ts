/**
 * Run every detector against one snapshot with one configuration.
 *
 * Detectors are independent; none reads another's output. The snapshot is
 * read-only for the duration of the call.
 */

import type {
    AuditConfig,
    BenfordResult,
    DiscrepancyFinding,
    DuplicateFinding,
    ExpenseRecord,
    Finding,
    KeywordFinding,
    ThresholdFinding,
    WeekendFinding,
} from '../types/index.js';
import { AuditConfigSchema } from '../types/index.js';
import { findDuplicateInvoices } from '../detectors/duplicates.js';
import { flagWeekends } from '../detectors/weekends.js';
import { flagThreshold } from '../detectors/threshold.js';
import { flagSuspiciousKeywords } from '../detectors/keywords.js';
import { flagDiscrepancies } from '../detectors/discrepancies.js';
import { analyzeBenford } from '../benford/analyze.js';

export interface AuditResult {
    duplicates: DuplicateFinding[];
    weekends: WeekendFinding[];
    thresholds: ThresholdFinding[];
    keywords: KeywordFinding[];
    discrepancies: DiscrepancyFinding[];
    benford: BenfordResult;
}

/**
 * @param records - Snapshot of expense records (not mutated)
 * @param config - Audit configuration; defaults apply when omitted
 */
export function runAudit(
    records: readonly ExpenseRecord[],
    config: AuditConfig = AuditConfigSchema.parse({})
): AuditResult {
    const { columns } = config;

    return {
        duplicates: findDuplicateInvoices(records, {
            merchantColumn: columns.merchant,
            invoiceColumn: columns.invoice,
            amountColumn: columns.amount,
            includeMerchant: config.duplicates.include_merchant,
        }),
        weekends: flagWeekends(records, {
            dateColumn: columns.date,
            dateFormats: config.date_formats,
        }),
        thresholds: flagThreshold(records, {
            amountColumn: columns.amount,
            limit: config.threshold.limit,
            buffer: config.threshold.buffer,
        }),
        keywords: flagSuspiciousKeywords(records, {
            columns: config.keywords.columns,
            terms: config.keywords.terms,
        }),
        discrepancies: flagDiscrepancies(records, {
            incurredColumn: columns.amount,
            paidColumn: columns.paid,
        }),
        benford: analyzeBenford(records, { amountColumn: columns.amount }),
    };
}

/**
 * All findings of an audit in detector order.
 */
export function allFindings(result: AuditResult): Finding[] {
    return [
        ...result.duplicates,
        ...result.weekends,
        ...result.thresholds,
        ...result.keywords,
        ...result.discrepancies,
    ];
}
