import { runAudit, summarizeRecords } from '@expense-audit/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 2: Audit
 * Summarizes the snapshot and runs every detector over it.
 */
export const auditRecords: PipelineStep = async (state) => {
    const { columns, date_formats } = state.config;

    state.summary = summarizeRecords(state.records, {
        amountColumn: columns.amount,
        dateColumn: columns.date,
        dateFormats: date_formats,
    });
    state.audit = runAudit(state.records, state.config);

    if (state.audit.benford.status === 'insufficient_data') {
        state.warnings.push(`Benford analysis skipped: ${state.audit.benford.message}`);
    }

    return state;
};
