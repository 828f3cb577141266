/**
 * Record validation for the add and update workflows.
 *
 * The core never validates records; only data entering the store is checked.
 * Field names come from the configured columns, so a table keyed on `ref`
 * requires `ref`, not `expense_id`.
 */

import { createNewExpenseSchema, DEFAULT_COLUMNS, DEFAULT_CURRENCY } from '@expense-audit/shared';
import { parseAmount, parseIsoDate, type AuditConfig, type ExpenseRecord } from '@expense-audit/core';

export type RecordColumns = AuditConfig['columns'];

export type RecordValidationResult =
    | { valid: true; record: ExpenseRecord; errors: [] }
    | { valid: false; errors: string[] };

/**
 * Validate a full record to add.
 * Fills currency (USD) and the paid amount (= amount) when left blank.
 */
export function validateNewRecord(
    input: Readonly<Record<string, string>>,
    columns: RecordColumns = DEFAULT_COLUMNS
): RecordValidationResult {
    const parsed = createNewExpenseSchema(columns).safeParse(input);
    if (!parsed.success) {
        return {
            valid: false,
            errors: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        };
    }

    const record: Record<string, string> = {
        ...parsed.data,
        currency: parsed.data['currency'] || DEFAULT_CURRENCY,
        [columns.paid]: parsed.data[columns.paid] || parsed.data[columns.amount],
    };

    const errors = checkValues(record, columns);
    return errors.length > 0 ? { valid: false, errors } : { valid: true, record, errors: [] };
}

/**
 * Validate a partial update. Only the fields present are checked; values are trimmed.
 */
export function validatePatch(
    patch: Readonly<Record<string, string>>,
    columns: RecordColumns = DEFAULT_COLUMNS
): RecordValidationResult {
    const errors: string[] = [];

    if (Object.keys(patch).length === 0) {
        errors.push('Nothing to update. Pass at least one --set field=value.');
    }
    if (columns.id in patch) {
        errors.push(`${columns.id} cannot be changed.`);
    }
    const record = Object.fromEntries(
        Object.entries(patch).map(([key, value]) => [key, value.trim()])
    );
    errors.push(...checkValues(record, columns));

    return errors.length > 0 ? { valid: false, errors } : { valid: true, record, errors: [] };
}

function checkValues(record: Readonly<Record<string, string>>, columns: RecordColumns): string[] {
    const errors: string[] = [];

    const date = record[columns.date];
    if (date !== undefined && !parseIsoDate(date)) {
        errors.push(`${columns.date}: Invalid date '${date}'. Use YYYY-MM-DD.`);
    }

    for (const field of [columns.amount, columns.paid]) {
        const value = record[field];
        if (value !== undefined && parseAmount(value) === null) {
            errors.push(`${field}: Invalid amount '${value}'.`);
        }
    }

    return errors;
}
