import type {
    AuditConfig,
    AuditResult,
    DatasetSummary,
    ExpenseRecord,
} from '@expense-audit/core';
import type { ReportOptions } from '../types.js';

/**
 * The audited input file.
 */
export interface InputFile {
    path: string;
    filename: string;
    hash: string;
}

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the report pipeline.
 */
export interface PipelineState {
    inputPath: string;
    config: AuditConfig;
    options: ReportOptions;

    // Accumulated during pipeline execution
    input?: InputFile;
    records: readonly ExpenseRecord[];
    summary?: DatasetSummary;
    audit?: AuditResult;
    outputs: string[];

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
