import type { AuditConfig } from '@expense-audit/core';
import type { PipelineState, PipelineStep } from './types.js';
import { loadInput } from './steps/load.js';
import { auditRecords } from './steps/audit.js';
import { exportResults } from './steps/export.js';
import type { ReportOptions } from '../types.js';
import { arrow, log } from '../utils/console.js';

/**
 * Orchestrates the execution of the report pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    inputPath: string,
    config: AuditConfig,
    options: ReportOptions
): Promise<PipelineState> {
    let state: PipelineState = {
        inputPath,
        config,
        options,
        records: [],
        outputs: [],
        warnings: [],
        errors: [],
    };

    const steps: { name: string; fn: PipelineStep }[] = [
        { name: 'Load Input', fn: loadInput },
        { name: 'Audit', fn: auditRecords },
        { name: 'Export Results', fn: exportResults },
    ];

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        arrow(`Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            log(`\n✖ Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
