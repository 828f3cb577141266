import { describe, it, expect } from 'vitest';
import { flagSuspiciousKeywords, formatHits } from '../../src/detectors/keywords.js';
import type { ExpenseRecord } from '../../src/types/index.js';

describe('flagSuspiciousKeywords', () => {
    it('reports every hit with its column, in scan order', () => {
        const records: ExpenseRecord[] = [
            { merchant: 'Cashier Deli', category: 'Client Gift', employee: 'Pat' },
        ];

        const result = flagSuspiciousKeywords(records);

        expect(result).toHaveLength(1);
        expect(result[0].reason).toBe('suspicious_keyword');
        expect(result[0].details).toBe('cash (in merchant), gift (in category)');
        expect(result[0].hits).toEqual([
            { term: 'cash', column: 'merchant' },
            { term: 'gift', column: 'category' },
        ]);
        expect(result[0].record).toEqual(records[0]);
    });

    it('lists several terms from one column in vocabulary order', () => {
        const result = flagSuspiciousKeywords([{ merchant: 'Personal Spa Party' }]);
        expect(result[0].details).toBe('party (in merchant), spa (in merchant), personal (in merchant)');
    });

    it('drops records with no hits', () => {
        const records: ExpenseRecord[] = [
            { merchant: 'Office Depot', category: 'Supplies', employee: 'Lee' },
            { merchant: 'Gift Shop', category: 'Meal', employee: 'Lee' },
        ];

        const result = flagSuspiciousKeywords(records);

        expect(result.map(f => f.record.merchant)).toEqual(['Gift Shop']);
    });

    it('matches on normalized text', () => {
        const result = flagSuspiciousKeywords([{ merchant: 'ＣＡＳＨ Advance' }]);
        expect(result[0].details).toBe('cash (in merchant)');
    });

    it('scans only the configured columns', () => {
        const records: ExpenseRecord[] = [{ merchant: 'Cash & Carry', department: 'Casino Ops' }];

        const result = flagSuspiciousKeywords(records, { columns: ['department'] });

        expect(result[0].details).toBe('casino (in department)');
    });

    it('accepts a vocabulary override', () => {
        const records: ExpenseRecord[] = [{ merchant: 'Pine Golf Club' }, { merchant: 'Cash Mart' }];

        const result = flagSuspiciousKeywords(records, { terms: ['Golf'] });

        expect(result).toHaveLength(1);
        expect(result[0].details).toBe('Golf (in merchant)');
    });
});

describe('formatHits', () => {
    it('joins hits with commas', () => {
        expect(formatHits([{ term: 'misc', column: 'category' }])).toBe('misc (in category)');
        expect(formatHits([])).toBe('');
    });
});
