import type { ExpenseRecord, DiscrepancyFinding } from '../types/index.js';
import { DEFAULT_COLUMNS, DISCREPANCY_EPSILON } from '../types/index.js';
import { parseAmount, formatAmount } from '../utils/amount.js';
import type { DiscrepancyOptions } from './types.js';

/**
 * Flag records whose paid amount differs from the incurred amount.
 *
 * Gaps up to DISCREPANCY_EPSILON (0.01) are rounding noise and not flagged.
 * Rows where either amount is unparseable are skipped.
 */
export function flagDiscrepancies(
    records: readonly ExpenseRecord[],
    options: DiscrepancyOptions = {}
): DiscrepancyFinding[] {
    const { incurredColumn = DEFAULT_COLUMNS.amount, paidColumn = DEFAULT_COLUMNS.paid } = options;
    const flagged: DiscrepancyFinding[] = [];

    for (const record of records) {
        const incurred = parseAmount(record[incurredColumn]);
        const paid = parseAmount(record[paidColumn]);
        if (!incurred || !paid) continue;

        const difference = paid.minus(incurred);
        const gap = difference.abs();
        if (gap.lte(DISCREPANCY_EPSILON)) continue;

        flagged.push({
            reason: 'discrepancy',
            record: { ...record },
            details: `Diff: $${formatAmount(gap)}`,
            difference: formatAmount(difference),
        });
    }

    return flagged;
}
