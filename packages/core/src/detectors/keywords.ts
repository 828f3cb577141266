/**
 * Suspicious vocabulary detection.
 *
 * Plain substring matching on normalized text: "cash" also hits "cashier".
 * The false positives are accepted; reviewers see which column matched.
 */

import type { ExpenseRecord, KeywordFinding, KeywordHit } from '../types/index.js';
import { DEFAULT_KEYWORD_COLUMNS, SUSPICIOUS_TERMS } from '../types/index.js';
import { normalizeText } from '../utils/normalize.js';
import type { KeywordOptions } from './types.js';

/**
 * Flag records mentioning a suspicious term in any scanned column.
 *
 * Hits are reported column by column, term by term, in the configured order.
 *
 * @param records - Snapshot of expense records (not mutated)
 * @param options - Columns to scan and vocabulary override
 * @returns One finding per record with at least one hit
 */
export function flagSuspiciousKeywords(
    records: readonly ExpenseRecord[],
    options: KeywordOptions = {}
): KeywordFinding[] {
    const { columns = DEFAULT_KEYWORD_COLUMNS, terms = SUSPICIOUS_TERMS } = options;
    const normalizedTerms = terms.map(term => ({ term, needle: normalizeText(term) }));
    const flagged: KeywordFinding[] = [];

    for (const record of records) {
        const hits: KeywordHit[] = [];

        for (const column of columns) {
            const value = normalizeText(record[column]);
            if (!value) continue;

            for (const { term, needle } of normalizedTerms) {
                if (needle && value.includes(needle)) {
                    hits.push({ term, column });
                }
            }
        }

        if (hits.length > 0) {
            flagged.push({
                reason: 'suspicious_keyword',
                record: { ...record },
                details: formatHits(hits),
                hits,
            });
        }
    }

    return flagged;
}

/**
 * "cash (in merchant), gift (in category)"
 */
export function formatHits(hits: readonly KeywordHit[]): string {
    return hits.map(hit => `${hit.term} (in ${hit.column})`).join(', ');
}
