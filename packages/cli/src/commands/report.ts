import { allFindings, countByReason } from '@expense-audit/core';
import { runPipeline } from '../pipeline/runner.js';
import { detectConfigPath } from '../config/detect.js';
import { loadConfig, type LoadedConfig } from '../config/load.js';
import { arrow, error, fail, log, success, warn } from '../utils/console.js';
import { errorMessage } from './context.js';
import type { ReportOptions } from '../types.js';

export async function reportCommand(csvPath: string, options: ReportOptions): Promise<void> {
    log(`\nExpense Audit - Report for ${csvPath}`);

    // 1. Configuration
    const configPath = options.config ?? detectConfigPath();
    let loaded: LoadedConfig;
    try {
        loaded = await loadConfig(configPath);
    } catch (err) {
        fail(`Failed to load configuration. ${errorMessage(err)}`);
    }
    success(configPath ? `Config: ${configPath}` : 'Config: defaults');

    // 2. Run Pipeline
    const state = await runPipeline(csvPath, loaded.config, options);
    state.warnings.unshift(...loaded.warnings);

    // 3. Report Final Status
    log('\n--- Audit Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            error(`[${e.step}] ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            log('\n✖ Audit failed with fatal errors.');
            process.exit(1);
        }
    }

    success(`Audit complete: ${state.records.length} records.`);
    if (state.audit) {
        for (const [reason, count] of Object.entries(countByReason(allFindings(state.audit)))) {
            arrow(`${reason}: ${count}`);
        }
    }

    if (!options.dryRun) {
        for (const path of state.outputs) {
            arrow(`Wrote ${path}`);
        }
    } else {
        log('\n[DRY RUN] No files were written.');
    }
}
