/**
 * Text normalization for comparison.
 *
 * NOTE: This is for keying and matching, NOT for display.
 * Findings always carry the raw, un-normalized values.
 */

/**
 * Dash-like code points folded to ASCII '-':
 * hyphen, non-breaking hyphen, figure dash, en dash, em dash, horizontal bar,
 * minus sign, small em dash, small hyphen-minus, fullwidth hyphen-minus.
 */
const DASH_PATTERN = /[\u2010\u2011\u2012\u2013\u2014\u2015\u2212\uFE58\uFE63\uFF0D]/g;

/**
 * Normalize free text for consistent comparison.
 *
 * Transformations:
 * - Unicode NFKC (fullwidth and compatibility forms fold to their plain form)
 * - Dash variants become '-'
 * - Trim leading/trailing whitespace
 * - Convert to lowercase
 *
 * @param value - Raw cell text; missing values normalize to ''
 */
export function normalizeText(value: string | null | undefined): string {
    if (!value) {
        return '';
    }

    return value
        .normalize('NFKC')
        .replace(DASH_PATTERN, '-')
        .trim()
        .toLowerCase();
}
