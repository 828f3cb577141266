/**
 * Zod schemas for Expense Audit data structures.
 *
 * IMPORTANT: Money is stored as strings in schemas.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import {
    DEFAULT_COLUMNS,
    DEFAULT_DATE_FORMATS,
    DEFAULT_KEYWORD_COLUMNS,
    SUSPICIOUS_TERMS,
    THRESHOLD_DEFAULTS,
} from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Decimal amount as string (never native number for money).
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

const columnName = z.string().min(1);

// ============================================================================
// Record Schema
// ============================================================================

/**
 * One expense line: column name -> raw cell text.
 * An absent key and an empty string both mean "no value".
 */
export const ExpenseRecordSchema = z.record(z.string(), z.string().optional());

export type ExpenseRecord = Readonly<z.infer<typeof ExpenseRecordSchema>>;

/**
 * Column names a new record is checked against; the `columns` section of the config.
 */
export interface RecordColumnNames {
    id: string;
    employee: string;
    date: string;
    amount: string;
    category: string;
    merchant: string;
    invoice: string;
}

/**
 * Schema for a record added through the store, keyed on the configured columns.
 * Required fields must be non-blank and the date YYYY-MM-DD; all values are
 * trimmed and extra columns pass through.
 */
export function createNewExpenseSchema(columns: RecordColumnNames = DEFAULT_COLUMNS) {
    const required = [
        columns.id,
        columns.employee,
        'department',
        columns.date,
        columns.amount,
        columns.category,
        columns.merchant,
        columns.invoice,
    ];

    return z
        .record(z.string(), z.string())
        .superRefine((record, ctx) => {
            for (const field of required) {
                if (!record[field]?.trim()) {
                    ctx.addIssue({ code: z.ZodIssueCode.custom, path: [field], message: `${field} is required` });
                }
            }
            const date = record[columns.date]?.trim();
            if (date && !isoDateString.safeParse(date).success) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: [columns.date], message: 'Must be YYYY-MM-DD format' });
            }
        })
        .transform(record =>
            Object.fromEntries(Object.entries(record).map(([key, value]) => [key, value.trim()]))
        );
}

export const NewExpenseSchema = createNewExpenseSchema();

export type NewExpense = z.infer<typeof NewExpenseSchema>;

// ============================================================================
// Finding Schemas
// ============================================================================

export const FindingReasonSchema = z.enum([
    'duplicate',
    'weekend',
    'over_limit',
    'near_limit',
    'suspicious_keyword',
    'discrepancy',
]);

export type FindingReason = z.infer<typeof FindingReasonSchema>;

/**
 * Member of a duplicate cluster. dup_count is the cluster size.
 */
export const DuplicateFindingSchema = z.object({
    reason: z.literal('duplicate'),
    record: ExpenseRecordSchema,
    dup_count: z.number().int().min(2),
});

export type DuplicateFinding = z.infer<typeof DuplicateFindingSchema>;

export const WeekendFindingSchema = z.object({
    reason: z.literal('weekend'),
    record: ExpenseRecordSchema,
});

export type WeekendFinding = z.infer<typeof WeekendFindingSchema>;

export const ThresholdFindingSchema = z.object({
    reason: z.enum(['over_limit', 'near_limit']),
    record: ExpenseRecordSchema,
});

export type ThresholdFinding = z.infer<typeof ThresholdFindingSchema>;

export const KeywordHitSchema = z.object({
    term: z.string(),
    column: z.string(),
});

export type KeywordHit = z.infer<typeof KeywordHitSchema>;

export const KeywordFindingSchema = z.object({
    reason: z.literal('suspicious_keyword'),
    record: ExpenseRecordSchema,
    details: z.string(),
    hits: z.array(KeywordHitSchema).min(1),
});

export type KeywordFinding = z.infer<typeof KeywordFindingSchema>;

/**
 * difference is paid minus incurred, signed, two decimals.
 */
export const DiscrepancyFindingSchema = z.object({
    reason: z.literal('discrepancy'),
    record: ExpenseRecordSchema,
    details: z.string(),
    difference: decimalString,
});

export type DiscrepancyFinding = z.infer<typeof DiscrepancyFindingSchema>;

export const FindingSchema = z.union([
    DuplicateFindingSchema,
    WeekendFindingSchema,
    ThresholdFindingSchema,
    KeywordFindingSchema,
    DiscrepancyFindingSchema,
]);

export type Finding = z.infer<typeof FindingSchema>;

// ============================================================================
// Benford Schemas
// ============================================================================

/**
 * Percentages are rounded to two decimals.
 */
export const BenfordDigitStatSchema = z.object({
    digit: z.number().int().min(1).max(9),
    actual_count: z.number().int().min(0),
    actual_pct: z.number().min(0).max(100),
    expected_pct: z.number().min(0).max(100),
    diff_pct: z.number().min(0).max(100),
});

export type BenfordDigitStat = z.infer<typeof BenfordDigitStatSchema>;

export const BenfordReportSchema = z.object({
    total_analyzed: z.number().int().min(1),
    stats: z.array(BenfordDigitStatSchema).length(9),
    is_suspicious: z.boolean(),
    max_deviation_pct: z.number().min(0).max(100),
});

export type BenfordReport = z.infer<typeof BenfordReportSchema>;

/**
 * Either a report, or the explicit no-sample outcome callers must check for.
 */
export const BenfordResultSchema = z.union([
    z.object({
        status: z.literal('ok'),
        report: BenfordReportSchema,
    }),
    z.object({
        status: z.literal('insufficient_data'),
        message: z.string(),
    }),
]);

export type BenfordResult = z.infer<typeof BenfordResultSchema>;

// ============================================================================
// Summary & Manifest Schemas
// ============================================================================

export const DatasetSummarySchema = z.object({
    total_rows: z.number().int().min(0),
    total_amount: decimalString,
    date_range: z
        .object({
            start: isoDateString,
            end: isoDateString,
        })
        .nullable(),
});

export type DatasetSummary = z.infer<typeof DatasetSummarySchema>;

/**
 * Written next to every exported report.
 */
export const AuditManifestSchema = z.object({
    input_file: z.string(),
    input_hash: z.string().regex(/^sha256:[0-9a-f]{64}$/),
    run_timestamp: z.string(),
    record_count: z.number().int().min(0),
    finding_counts: z.record(FindingReasonSchema, z.number().int().min(0)),
    benford_status: z.enum(['ok', 'insufficient_data']),
    version: z.string(),
});

export type AuditManifest = z.infer<typeof AuditManifestSchema>;

// ============================================================================
// Configuration Schema
// ============================================================================

/**
 * Audit configuration (expense-audit.yaml).
 * Every field has a default, so `{}` parses to a complete config.
 */
export const AuditConfigSchema = z.object({
    columns: z
        .object({
            id: columnName.default(DEFAULT_COLUMNS.id),
            merchant: columnName.default(DEFAULT_COLUMNS.merchant),
            invoice: columnName.default(DEFAULT_COLUMNS.invoice),
            amount: columnName.default(DEFAULT_COLUMNS.amount),
            paid: columnName.default(DEFAULT_COLUMNS.paid),
            date: columnName.default(DEFAULT_COLUMNS.date),
            category: columnName.default(DEFAULT_COLUMNS.category),
            employee: columnName.default(DEFAULT_COLUMNS.employee),
        })
        .strict()
        .default({}),
    duplicates: z
        .object({
            include_merchant: z.boolean().default(true),
        })
        .strict()
        .default({}),
    threshold: z
        .object({
            limit: z.number().min(0).default(THRESHOLD_DEFAULTS.LIMIT),
            buffer: z.number().min(0).default(THRESHOLD_DEFAULTS.BUFFER),
        })
        .strict()
        .default({}),
    date_formats: z.array(z.string().min(1)).min(1).default([...DEFAULT_DATE_FORMATS]),
    keywords: z
        .object({
            columns: z.array(columnName).default([...DEFAULT_KEYWORD_COLUMNS]),
            terms: z.array(z.string().min(1)).min(1).default([...SUSPICIOUS_TERMS]),
        })
        .strict()
        .default({}),
});

export type AuditConfig = z.infer<typeof AuditConfigSchema>;
export type AuditConfigInput = z.input<typeof AuditConfigSchema>;
