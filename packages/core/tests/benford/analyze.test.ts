import { describe, it, expect } from 'vitest';
import { analyzeBenford, benfordProbability, leadingDigit } from '../../src/benford/analyze.js';
import type { ExpenseRecord } from '../../src/types/index.js';

function recordsWithLeadingDigits(counts: Record<number, number>): ExpenseRecord[] {
    const records: ExpenseRecord[] = [];
    for (const [digit, count] of Object.entries(counts)) {
        for (let i = 0; i < count; i++) {
            records.push({ amount_usd: `${digit}${i}.00` });
        }
    }
    return records;
}

describe('leadingDigit', () => {
    it('reads the first nonzero digit of the raw text', () => {
        expect(leadingDigit('1999')).toBe(1);
        expect(leadingDigit('$0.99')).toBe(9);
        expect(leadingDigit('-0.05')).toBe(5);
        expect(leadingDigit('$3,400')).toBe(3);
    });

    it('returns null when there is no nonzero digit', () => {
        expect(leadingDigit('')).toBeNull();
        expect(leadingDigit(undefined)).toBeNull();
        expect(leadingDigit('0.00')).toBeNull();
        expect(leadingDigit('N/A')).toBeNull();
    });
});

describe('benfordProbability', () => {
    it('follows log10(1 + 1/d)', () => {
        expect(benfordProbability(1)).toBeCloseTo(0.30103, 5);
        expect(benfordProbability(9)).toBeCloseTo(0.04576, 5);
    });
});

describe('analyzeBenford', () => {
    it('counts leading digits and flags a skewed sample', () => {
        const result = analyzeBenford([{ amount_usd: '1999' }, { amount_usd: '$0.99' }]);

        expect(result.status).toBe('ok');
        if (result.status !== 'ok') return;

        const { report } = result;
        expect(report.total_analyzed).toBe(2);
        expect(report.stats[0]).toEqual({
            digit: 1,
            actual_count: 1,
            actual_pct: 50,
            expected_pct: 30.1,
            diff_pct: 19.9,
        });
        expect(report.stats[8].actual_count).toBe(1);
        expect(report.is_suspicious).toBe(true);
        expect(report.max_deviation_pct).toBe(45.42);
    });

    it('does not flag a sample that follows the expected curve', () => {
        const records = recordsWithLeadingDigits({ 1: 30, 2: 18, 3: 12, 4: 10, 5: 8, 6: 7, 7: 6, 8: 5, 9: 4 });

        const result = analyzeBenford(records);

        expect(result.status).toBe('ok');
        if (result.status !== 'ok') return;
        expect(result.report.total_analyzed).toBe(100);
        expect(result.report.is_suspicious).toBe(false);
        expect(result.report.max_deviation_pct).toBe(0.58);
    });

    it('keeps histogram counts summing to total_analyzed', () => {
        const records: ExpenseRecord[] = [
            { amount_usd: '12' }, { amount_usd: '250' }, { amount_usd: '0.07' },
            { amount_usd: '' }, { amount_usd: 'void' }, { amount_usd: '980' },
        ];

        const result = analyzeBenford(records);

        expect(result.status).toBe('ok');
        if (result.status !== 'ok') return;
        const sum = result.report.stats.reduce((acc, s) => acc + s.actual_count, 0);
        expect(result.report.total_analyzed).toBe(4);
        expect(sum).toBe(4);
    });

    it('reports expected percentages that sum to 100', () => {
        const result = analyzeBenford([{ amount_usd: '5' }]);

        expect(result.status).toBe('ok');
        if (result.status !== 'ok') return;
        const sum = result.report.stats.reduce((acc, s) => acc + s.expected_pct, 0);
        expect(sum).toBeCloseTo(100, 1);
        expect(result.report.stats.map(s => s.expected_pct)).toEqual([
            30.1, 17.61, 12.49, 9.69, 7.92, 6.69, 5.8, 5.12, 4.58,
        ]);
    });

    it('returns insufficient_data when no row has a leading digit', () => {
        const result = analyzeBenford([{ amount_usd: '' }, { amount_usd: '0.00' }, { merchant: 'Acme' }]);

        expect(result).toEqual({
            status: 'insufficient_data',
            message: 'No valid amounts found in column "amount_usd"',
        });
    });

    it('reads the configured column', () => {
        const result = analyzeBenford([{ total: '7' }], { amountColumn: 'total' });
        expect(result.status).toBe('ok');
    });
});
