/**
 * Constants for the Expense Audit engine.
 */

/**
 * Default column names of an expense table.
 * Every detector takes its column as an option; these are only the fallbacks.
 */
export const DEFAULT_COLUMNS = {
    id: 'expense_id',
    merchant: 'merchant',
    invoice: 'invoice_no',
    amount: 'amount_usd',
    paid: 'paid_amount_usd',
    date: 'expense_date',
    category: 'category',
    employee: 'employee',
} as const;

/**
 * Accepted date formats, tried in order.
 * Order matters: 03/04/2024 is ambiguous and the first match wins.
 */
export const DEFAULT_DATE_FORMATS = ['YYYY-MM-DD', 'MM/DD/YYYY', 'YYYY/MM/DD'] as const;

/**
 * Policy threshold defaults (USD).
 */
export const THRESHOLD_DEFAULTS = {
    LIMIT: 5000,
    BUFFER: 200,
} as const;

/**
 * Incurred vs paid gaps at or below this value are treated as rounding noise.
 */
export const DISCREPANCY_EPSILON = '0.01';

/**
 * Max per-digit deviation (as a fraction) before a Benford run is called suspicious.
 * A tripwire, not a significance test.
 */
export const BENFORD_SUSPICION_THRESHOLD = 0.05;

/**
 * Vocabulary for the suspicious-keyword detector.
 * Matched as lowercase substrings, so "cash" also hits "cashier".
 */
export const SUSPICIOUS_TERMS = [
    'cash',
    'gift',
    'party',
    'casino',
    'spa',
    'personal',
    'misc',
    'various',
    'round',
    'facilitation',
    'consulting',
] as const;

export const DEFAULT_KEYWORD_COLUMNS = ['merchant', 'category', 'employee'] as const;

/**
 * Keys added to flattened finding rows. They shadow caller columns of the same name.
 */
export const RESERVED_KEYS = {
    REASON: '_reason',
    DUP_COUNT: '_dup_count',
    DETAILS: '_details',
} as const;

export const DEFAULT_CURRENCY = 'USD';

export const ENGINE_VERSION = '1.0.0';
