/**
 * Amount parsing utilities.
 *
 * Amounts come in as cell text ("$1,200.50", " 99 ", "") and become Decimal.
 * Unparseable text is a normal outcome (null), never an exception.
 */

import { Decimal } from 'decimal.js';

/**
 * Optional sign, digits with optional fraction (or a bare fraction), optional exponent.
 * Same grammar decimal.js accepts, minus its hex/binary/Infinity/NaN forms.
 */
const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Remove currency symbol and thousands separators.
 */
function stripAmount(value: string): string {
    return value.replace(/[$,]/g, '').trim();
}

/**
 * Parse an amount cell to Decimal.
 *
 * @param value - Raw cell text
 * @returns Decimal, or null when empty, not numeric after stripping, or beyond double range
 */
export function parseAmount(value: string | null | undefined): Decimal | null {
    if (!value) {
        return null;
    }

    const raw = stripAmount(value);
    if (!NUMERIC_PATTERN.test(raw)) {
        return null;
    }

    const amount = new Decimal(raw);
    // Magnitudes past double range ('1e600000000') are rejected; toFixed would spell them out in full
    if (!Number.isFinite(amount.toNumber())) {
        return null;
    }
    return amount;
}

/**
 * Canonical amount string used as a grouping key: fixed-point, two decimals.
 *
 * '' means unknown. It is NOT zero and must not be compared as one.
 */
export function normalizeAmount(value: string | null | undefined): string {
    const amount = parseAmount(value);
    return amount ? amount.toFixed(2) : '';
}

/**
 * Format a Decimal as a plain two-decimal string.
 */
export function formatAmount(amount: Decimal): string {
    return amount.toFixed(2);
}
