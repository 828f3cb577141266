// Types (re-exported from shared)
export type {
    ExpenseRecord,
    FindingReason,
    DuplicateFinding,
    WeekendFinding,
    ThresholdFinding,
    KeywordHit,
    KeywordFinding,
    DiscrepancyFinding,
    Finding,
    BenfordDigitStat,
    BenfordReport,
    BenfordResult,
    DatasetSummary,
    AuditConfig,
} from './types/index.js';

export {
    AuditConfigSchema,
    DEFAULT_COLUMNS,
    DEFAULT_DATE_FORMATS,
    THRESHOLD_DEFAULTS,
    DISCREPANCY_EPSILON,
    BENFORD_SUSPICION_THRESHOLD,
    SUSPICIOUS_TERMS,
    DEFAULT_KEYWORD_COLUMNS,
    RESERVED_KEYS,
} from './types/index.js';

// Utils
export { normalizeText, parseAmount, normalizeAmount, formatAmount } from './utils/index.js';
export { parseDate, parseDateWithFormat, parseIsoDate, formatIsoDate, isValidDate, isWeekend } from './utils/index.js';
export type { DateFormat } from './utils/index.js';

// Detectors
export {
    findDuplicateInvoices,
    flagWeekends,
    flagThreshold,
    flagSuspiciousKeywords,
    flagDiscrepancies,
    formatHits,
} from './detectors/index.js';
export type {
    DuplicateOptions,
    WeekendOptions,
    ThresholdOptions,
    KeywordOptions,
    DiscrepancyOptions,
} from './detectors/index.js';

// Benford
export { analyzeBenford, benfordProbability, leadingDigit, BENFORD_DIGITS } from './benford/index.js';
export type { BenfordOptions } from './benford/index.js';

// Audit
export {
    runAudit,
    allFindings,
    summarizeRecords,
    flattenFinding,
    flattenFindings,
    collectColumns,
    countByReason,
} from './audit/index.js';
export type { AuditResult, SummaryOptions, FindingRow } from './audit/index.js';
