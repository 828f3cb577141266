/**
 * Options for the rule detectors.
 * Column names are configuration; missing columns read as "no value".
 */

import type { DateFormat } from '../utils/date-parse.js';

export interface DuplicateOptions {
    merchantColumn?: string;
    invoiceColumn?: string;
    amountColumn?: string;
    /** When false, the key is (invoice, amount) only. */
    includeMerchant?: boolean;
}

export interface WeekendOptions {
    dateColumn?: string;
    dateFormats?: readonly DateFormat[];
}

export interface ThresholdOptions {
    amountColumn?: string;
    limit?: number;
    /** Width of the near-limit band below `limit`. Not clamped at zero. */
    buffer?: number;
}

export interface KeywordOptions {
    columns?: readonly string[];
    terms?: readonly string[];
}

export interface DiscrepancyOptions {
    incurredColumn?: string;
    paidColumn?: string;
}
