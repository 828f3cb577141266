import { describe, it, expect } from 'vitest';
import { normalizeText } from '../../src/utils/normalize.js';

describe('normalizeText', () => {
    it('converts to lowercase', () => {
        expect(normalizeText('ACME Corp')).toBe('acme corp');
    });

    it('trims leading and trailing whitespace', () => {
        expect(normalizeText('  Acme  ')).toBe('acme');
    });

    it('folds dash variants to ASCII hyphen', () => {
        expect(normalizeText('INV–001')).toBe('inv-001');
        expect(normalizeText('INV—001')).toBe('inv-001');
        expect(normalizeText('INV‐001')).toBe('inv-001');
        expect(normalizeText('INV−001')).toBe('inv-001');
    });

    it('applies compatibility composition to fullwidth forms', () => {
        expect(normalizeText('ＩＮＶ－１')).toBe('inv-1');
    });

    it('preserves inner whitespace and punctuation', () => {
        expect(normalizeText('Joe\'s  Diner, LLC')).toBe('joe\'s  diner, llc');
    });

    it('handles missing values', () => {
        expect(normalizeText('')).toBe('');
        expect(normalizeText(undefined)).toBe('');
        expect(normalizeText(null)).toBe('');
    });
});
