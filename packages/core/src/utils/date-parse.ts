/**
 * Date parsing utilities for expense dates.
 * All dates returned as UTC (00:00:00Z).
 */

import { DEFAULT_DATE_FORMATS } from '../types/index.js';

/**
 * A format pattern built from YYYY, MM and DD tokens and literal separators,
 * e.g. 'YYYY-MM-DD' or 'MM/DD/YYYY'.
 */
export type DateFormat = string;

type DatePart = 'year' | 'month' | 'day';

interface CompiledFormat {
    regex: RegExp;
    parts: DatePart[];
}

const TOKEN_PATTERN = /YYYY|MM|DD/g;

const TOKENS: Record<string, { part: DatePart; digits: string }> = {
    YYYY: { part: 'year', digits: '(\\d{4})' },
    MM: { part: 'month', digits: '(\\d{1,2})' },
    DD: { part: 'day', digits: '(\\d{1,2})' },
};

const compiled = new Map<DateFormat, CompiledFormat | null>();

function escapeRegex(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a format pattern to a regex. Returns null unless the pattern
 * names each of YYYY, MM and DD exactly once.
 */
function compileFormat(format: DateFormat): CompiledFormat | null {
    const cached = compiled.get(format);
    if (cached !== undefined) return cached;

    const parts: DatePart[] = [];
    let source = '';
    let lastIndex = 0;

    for (const match of format.matchAll(TOKEN_PATTERN)) {
        const token = TOKENS[match[0]];
        const index = match.index ?? 0;
        source += escapeRegex(format.slice(lastIndex, index)) + token.digits;
        parts.push(token.part);
        lastIndex = index + match[0].length;
    }
    source += escapeRegex(format.slice(lastIndex));

    const complete = parts.length === 3 && new Set(parts).size === 3;
    const result = complete ? { regex: new RegExp(`^${source}$`), parts } : null;
    compiled.set(format, result);
    return result;
}

/**
 * Parse a date string against a single format.
 * Calendar-invalid dates (2024-02-30) do not parse.
 */
export function parseDateWithFormat(value: string, format: DateFormat): Date | null {
    const compiled = compileFormat(format);
    if (!compiled) return null;

    const match = value.match(compiled.regex);
    if (!match) return null;

    const fields: Record<DatePart, number> = { year: 0, month: 0, day: 0 };
    compiled.parts.forEach((part, i) => {
        fields[part] = parseInt(match[i + 1], 10);
    });

    return buildUtcDate(fields.year, fields.month, fields.day);
}

/**
 * Parse a date cell, trying formats strictly in order. First success wins,
 * so an ambiguous value like '03/04/2024' resolves by list order.
 *
 * @param value - Raw cell text
 * @param formats - Accepted formats, in priority order
 * @returns UTC date, or null when empty or no format matches
 */
export function parseDate(
    value: string | null | undefined,
    formats: readonly DateFormat[] = DEFAULT_DATE_FORMATS
): Date | null {
    const trimmed = (value ?? '').trim();
    if (!trimmed) return null;

    for (const format of formats) {
        const date = parseDateWithFormat(trimmed, format);
        if (date) return date;
    }

    return null;
}

/**
 * Parse YYYY-MM-DD date string to Date (UTC). Two-digit month and day required.
 */
export function parseIsoDate(value: string): Date | null {
    const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) return null;

    return buildUtcDate(parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10));
}

function buildUtcDate(year: number, month: number, day: number): Date | null {
    if (year < 1) return null;

    // setUTCFullYear, not Date.UTC: the latter reads years 0-99 as 1900-1999
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    if (!isValidDate(date)) return null;

    // 02-30 rolls over to 03-01; reject instead
    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = String(date.getUTCFullYear()).padStart(4, '0');
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}

/**
 * Saturday or Sunday (UTC).
 */
export function isWeekend(date: Date): boolean {
    const day = date.getUTCDay();
    return day === 0 || day === 6;
}
