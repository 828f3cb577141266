import type { ExpenseRecord, WeekendFinding } from '../types/index.js';
import { DEFAULT_COLUMNS, DEFAULT_DATE_FORMATS } from '../types/index.js';
import { parseDate, isWeekend } from '../utils/date-parse.js';
import type { WeekendOptions } from './types.js';

/**
 * Flag expenses dated on a Saturday or Sunday.
 * Rows without a parseable date are skipped. Input order is preserved.
 */
export function flagWeekends(
    records: readonly ExpenseRecord[],
    options: WeekendOptions = {}
): WeekendFinding[] {
    const { dateColumn = DEFAULT_COLUMNS.date, dateFormats = DEFAULT_DATE_FORMATS } = options;
    const flagged: WeekendFinding[] = [];

    for (const record of records) {
        const date = parseDate(record[dateColumn], dateFormats);
        if (!date) continue;

        if (isWeekend(date)) {
            flagged.push({ reason: 'weekend', record: { ...record } });
        }
    }

    return flagged;
}
