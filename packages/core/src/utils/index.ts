export { normalizeText } from './normalize.js';
export { parseAmount, normalizeAmount, formatAmount } from './amount.js';
export {
    parseDate,
    parseDateWithFormat,
    parseIsoDate,
    formatIsoDate,
    isValidDate,
    isWeekend,
} from './date-parse.js';
export type { DateFormat } from './date-parse.js';
