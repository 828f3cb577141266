/**
 * Expense Audit CLI - Core Types
 */

import type { AuditConfig } from '@expense-audit/shared';

export interface GlobalOptions {
    /** Explicit config path; otherwise expense-audit.yaml is searched upward. */
    config?: string;
}

export interface QueryOptions extends GlobalOptions {
    /** Rows to print; all findings are still counted. */
    show: number;
}

export interface ThresholdQueryOptions extends QueryOptions {
    limit?: number;
    buffer?: number;
}

export interface ReportOptions extends GlobalOptions {
    out: string;
    dryRun: boolean;
}

export interface RecordOptions extends GlobalOptions {
    yes: boolean;
    set: Record<string, string>;
}

/**
 * Where a command reads from and how it is configured.
 */
export interface AuditContext {
    csvPath: string;
    config: AuditConfig;
    configPath: string | null;
}
