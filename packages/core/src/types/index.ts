/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
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
} from '@expense-audit/shared';

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
} from '@expense-audit/shared';
