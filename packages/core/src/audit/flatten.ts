/**
 * Flat annotated rows for display and export.
 *
 * A finding keeps metadata apart from the record; only here do they meet.
 * Reserved keys (_reason, _dup_count, _details) overwrite caller columns of
 * the same name in the returned row. The finding's record is never touched.
 */

import type { Finding, FindingReason } from '../types/index.js';
import { RESERVED_KEYS } from '../types/index.js';

export type FindingRow = Record<string, string | undefined>;

export function flattenFinding(finding: Finding): FindingRow {
    const row: FindingRow = { ...finding.record, [RESERVED_KEYS.REASON]: finding.reason };

    if ('dup_count' in finding) {
        row[RESERVED_KEYS.DUP_COUNT] = String(finding.dup_count);
    }
    if ('details' in finding) {
        row[RESERVED_KEYS.DETAILS] = finding.details;
    }

    return row;
}

export function flattenFindings(findings: readonly Finding[]): FindingRow[] {
    return findings.map(flattenFinding);
}

/**
 * Union of keys across rows, in first-seen order. Used as the export header.
 */
export function collectColumns(rows: readonly Readonly<Record<string, unknown>>[]): string[] {
    const seen = new Set<string>();
    for (const row of rows) {
        for (const key of Object.keys(row)) {
            seen.add(key);
        }
    }
    return [...seen];
}

/**
 * Finding count per reason; every reason is present, zero when absent.
 */
export function countByReason(findings: readonly Finding[]): Record<FindingReason, number> {
    const counts: Record<FindingReason, number> = {
        duplicate: 0,
        weekend: 0,
        over_limit: 0,
        near_limit: 0,
        suspicious_keyword: 0,
        discrepancy: 0,
    };
    for (const finding of findings) {
        counts[finding.reason]++;
    }
    return counts;
}
