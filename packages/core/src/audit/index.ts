/**
 * Audit module: whole-table runs, summaries and the flat export form of findings.
 */

export { runAudit, allFindings } from './run-audit.js';
export { summarizeRecords } from './summary.js';
export { flattenFinding, flattenFindings, collectColumns, countByReason } from './flatten.js';
export type { AuditResult } from './run-audit.js';
export type { SummaryOptions } from './summary.js';
export type { FindingRow } from './flatten.js';
