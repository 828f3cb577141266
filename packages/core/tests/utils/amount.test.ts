import { describe, it, expect } from 'vitest';
import { parseAmount, normalizeAmount } from '../../src/utils/amount.js';

describe('parseAmount', () => {
    it('strips currency symbol and thousands separators', () => {
        expect(parseAmount('$1,200.50')?.toNumber()).toBe(1200.5);
    });

    it('trims whitespace', () => {
        expect(parseAmount('  99 ')?.toNumber()).toBe(99);
    });

    it('handles negative and exponent forms', () => {
        expect(parseAmount('-$5.00')?.toNumber()).toBe(-5);
        expect(parseAmount('1e3')?.toNumber()).toBe(1000);
        expect(parseAmount('.5')?.toNumber()).toBe(0.5);
    });

    it('returns null for missing values', () => {
        expect(parseAmount('')).toBeNull();
        expect(parseAmount(undefined)).toBeNull();
        expect(parseAmount(null)).toBeNull();
        expect(parseAmount('   ')).toBeNull();
        expect(parseAmount('$')).toBeNull();
    });

    it('returns null for non-numeric text', () => {
        expect(parseAmount('abc')).toBeNull();
        expect(parseAmount('12abc')).toBeNull();
        expect(parseAmount('Infinity')).toBeNull();
        expect(parseAmount('NaN')).toBeNull();
        expect(parseAmount('0x1F')).toBeNull();
        expect(parseAmount('(5.00)')).toBeNull();
    });
});

describe('parseAmount magnitude', () => {
    it('rejects exponents past double range', () => {
        expect(parseAmount('1e600000000')).toBeNull();
        expect(parseAmount('-1e400')).toBeNull();
        expect(normalizeAmount('1e600000000')).toBe('');
    });

    it('keeps large finite values', () => {
        expect(parseAmount('1e308')?.toNumber()).toBe(1e308);
    });
});

describe('normalizeAmount', () => {
    it('formats to exactly two decimals', () => {
        expect(normalizeAmount('100')).toBe('100.00');
        expect(normalizeAmount('100.00')).toBe('100.00');
        expect(normalizeAmount('$100.00')).toBe('100.00');
        expect(normalizeAmount('1,234.5')).toBe('1234.50');
        expect(normalizeAmount('0')).toBe('0.00');
    });

    it('rounds half up at the second decimal', () => {
        expect(normalizeAmount('2.345')).toBe('2.35');
    });

    it('never uses scientific notation', () => {
        expect(normalizeAmount('1e21')).toBe('1000000000000000000000.00');
    });

    it('normalizes unparseable input to empty string, distinct from zero', () => {
        expect(normalizeAmount('')).toBe('');
        expect(normalizeAmount(undefined)).toBe('');
        expect(normalizeAmount('n/a')).toBe('');
        expect(normalizeAmount('n/a')).not.toBe(normalizeAmount('0'));
    });
});
