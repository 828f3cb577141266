import { Decimal } from 'decimal.js';
import type { ExpenseRecord, DatasetSummary } from '../types/index.js';
import { DEFAULT_COLUMNS, DEFAULT_DATE_FORMATS } from '../types/index.js';
import { parseAmount, formatAmount } from '../utils/amount.js';
import { parseDate, formatIsoDate, type DateFormat } from '../utils/date-parse.js';

export interface SummaryOptions {
    amountColumn?: string;
    dateColumn?: string;
    dateFormats?: readonly DateFormat[];
}

/**
 * Headline numbers for a table: row count, total of parseable amounts,
 * and the span of parseable dates (null when there are none).
 */
export function summarizeRecords(
    records: readonly ExpenseRecord[],
    options: SummaryOptions = {}
): DatasetSummary {
    const {
        amountColumn = DEFAULT_COLUMNS.amount,
        dateColumn = DEFAULT_COLUMNS.date,
        dateFormats = DEFAULT_DATE_FORMATS,
    } = options;

    let total = new Decimal(0);
    let earliest: Date | null = null;
    let latest: Date | null = null;

    for (const record of records) {
        const amount = parseAmount(record[amountColumn]);
        if (amount) {
            total = total.plus(amount);
        }

        const date = parseDate(record[dateColumn], dateFormats);
        if (date) {
            if (!earliest || date < earliest) earliest = date;
            if (!latest || date > latest) latest = date;
        }
    }

    return {
        total_rows: records.length,
        total_amount: formatAmount(total),
        date_range: earliest && latest
            ? { start: formatIsoDate(earliest), end: formatIsoDate(latest) }
            : null,
    };
}
