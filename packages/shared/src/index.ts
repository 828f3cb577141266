// Schemas
export {
    ExpenseRecordSchema,
    NewExpenseSchema,
    createNewExpenseSchema,
    FindingReasonSchema,
    DuplicateFindingSchema,
    WeekendFindingSchema,
    ThresholdFindingSchema,
    KeywordHitSchema,
    KeywordFindingSchema,
    DiscrepancyFindingSchema,
    FindingSchema,
    BenfordDigitStatSchema,
    BenfordReportSchema,
    BenfordResultSchema,
    DatasetSummarySchema,
    AuditManifestSchema,
    AuditConfigSchema,
} from './schemas.js';

// Types
export type {
    ExpenseRecord,
    NewExpense,
    RecordColumnNames,
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
    AuditManifest,
    AuditConfig,
    AuditConfigInput,
} from './schemas.js';

// Constants
export {
    DEFAULT_COLUMNS,
    DEFAULT_DATE_FORMATS,
    THRESHOLD_DEFAULTS,
    DISCREPANCY_EPSILON,
    BENFORD_SUSPICION_THRESHOLD,
    SUSPICIOUS_TERMS,
    DEFAULT_KEYWORD_COLUMNS,
    RESERVED_KEYS,
    DEFAULT_CURRENCY,
    ENGINE_VERSION,
} from './constants.js';
