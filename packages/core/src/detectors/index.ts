/**
 * Detectors module: independent single-pass rule checks over a record snapshot.
 */

export { findDuplicateInvoices } from './duplicates.js';
export { flagWeekends } from './weekends.js';
export { flagThreshold } from './threshold.js';
export { flagSuspiciousKeywords, formatHits } from './keywords.js';
export { flagDiscrepancies } from './discrepancies.js';
export type {
    DuplicateOptions,
    WeekendOptions,
    ThresholdOptions,
    KeywordOptions,
    DiscrepancyOptions,
} from './types.js';
