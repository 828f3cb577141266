/**
 * Benford's Law leading-digit analysis.
 *
 * The leading digit is read from the raw cell text, not from a parsed number:
 * the first character in 1-9 wins, so '$0.99' counts as 9 and '1,999' as 1.
 *
 * ARCHITECTURAL NOTE: An empty sample is a result, not an exception.
 */

import type { ExpenseRecord, BenfordDigitStat, BenfordResult } from '../types/index.js';
import { DEFAULT_COLUMNS, BENFORD_SUSPICION_THRESHOLD } from '../types/index.js';

export interface BenfordOptions {
    amountColumn?: string;
}

export const BENFORD_DIGITS = [1, 2, 3, 4, 5, 6, 7, 8, 9] as const;

/**
 * Expected share of leading digit d: log10(1 + 1/d).
 */
export function benfordProbability(digit: number): number {
    return Math.log10(1 + 1 / digit);
}

/**
 * First nonzero ASCII digit in the text, or null.
 */
export function leadingDigit(value: string | null | undefined): number | null {
    const match = (value ?? '').match(/[1-9]/);
    return match ? Number(match[0]) : null;
}

/**
 * Compare the leading-digit distribution of an amount column with Benford's Law.
 *
 * is_suspicious is set when any digit's observed share is more than 5
 * percentage points from expected. This is a tripwire, not a significance test.
 *
 * @param records - Snapshot of expense records (not mutated)
 * @param options - Amount column to scan
 * @returns Report, or insufficient_data when no row has a leading digit
 */
export function analyzeBenford(
    records: readonly ExpenseRecord[],
    options: BenfordOptions = {}
): BenfordResult {
    const { amountColumn = DEFAULT_COLUMNS.amount } = options;
    const counts = new Map<number, number>(BENFORD_DIGITS.map((d): [number, number] => [d, 0]));
    let totalValid = 0;

    for (const record of records) {
        const digit = leadingDigit(record[amountColumn]);
        if (digit === null) continue;

        counts.set(digit, (counts.get(digit) ?? 0) + 1);
        totalValid++;
    }

    if (totalValid === 0) {
        return {
            status: 'insufficient_data',
            message: `No valid amounts found in column "${amountColumn}"`,
        };
    }

    const stats: BenfordDigitStat[] = [];
    let maxDeviation = 0;

    for (const digit of BENFORD_DIGITS) {
        const actualCount = counts.get(digit) ?? 0;
        const actual = actualCount / totalValid;
        const expected = benfordProbability(digit);
        const deviation = Math.abs(actual - expected);
        maxDeviation = Math.max(maxDeviation, deviation);

        stats.push({
            digit,
            actual_count: actualCount,
            actual_pct: toPercent(actual),
            expected_pct: toPercent(expected),
            diff_pct: toPercent(deviation),
        });
    }

    return {
        status: 'ok',
        report: {
            total_analyzed: totalValid,
            stats,
            is_suspicious: maxDeviation > BENFORD_SUSPICION_THRESHOLD,
            max_deviation_pct: toPercent(maxDeviation),
        },
    };
}

/**
 * Fraction -> percentage rounded to two decimals.
 */
function toPercent(fraction: number): number {
    return Math.round(fraction * 10000) / 100;
}
