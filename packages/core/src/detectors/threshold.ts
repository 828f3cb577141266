/**
 * Policy limit checks.
 *
 * Classification, first match wins:
 * - amount > limit                   -> over_limit
 * - limit - buffer < amount <= limit -> near_limit
 *
 * A buffer larger than the limit pushes the band below zero. That is kept
 * as configured; callers should treat it as a configuration smell.
 */

import { Decimal } from 'decimal.js';
import type { ExpenseRecord, ThresholdFinding } from '../types/index.js';
import { DEFAULT_COLUMNS, THRESHOLD_DEFAULTS } from '../types/index.js';
import { parseAmount } from '../utils/amount.js';
import type { ThresholdOptions } from './types.js';

export function flagThreshold(
    records: readonly ExpenseRecord[],
    options: ThresholdOptions = {}
): ThresholdFinding[] {
    const {
        amountColumn = DEFAULT_COLUMNS.amount,
        limit = THRESHOLD_DEFAULTS.LIMIT,
        buffer = THRESHOLD_DEFAULTS.BUFFER,
    } = options;

    const upper = new Decimal(limit);
    const lower = upper.minus(buffer);
    const flagged: ThresholdFinding[] = [];

    for (const record of records) {
        const amount = parseAmount(record[amountColumn]);
        if (!amount) continue;

        if (amount.gt(upper)) {
            flagged.push({ reason: 'over_limit', record: { ...record } });
        } else if (amount.gt(lower)) {
            flagged.push({ reason: 'near_limit', record: { ...record } });
        }
    }

    return flagged;
}
