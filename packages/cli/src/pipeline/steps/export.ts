import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { allFindings, countByReason, flattenFindings } from '@expense-audit/core';
import { ENGINE_VERSION, RESERVED_KEYS, type AuditManifest } from '@expense-audit/shared';
import type { PipelineStep } from '../types.js';
import { serializeCsv } from '../../table/csv.js';
import { generateAuditExcel } from '../../excel/report.js';

export const FINDINGS_FILENAME = 'findings.csv';
export const WORKBOOK_FILENAME = 'audit.xlsx';
export const MANIFEST_FILENAME = 'audit_manifest.json';

/**
 * Step 3: Export
 * Writes the findings CSV, the Excel workbook and the run manifest.
 */
export const exportResults: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping file export.');
        return state;
    }

    const { audit, input, summary } = state;
    if (!audit || !input || !summary) {
        state.errors.push({ step: 'export', message: 'Nothing to export: audit did not run.', fatal: true });
        return state;
    }

    const outputPath = state.options.out;
    const findings = allFindings(audit);

    try {
        await mkdir(outputPath, { recursive: true });

        // 1. Findings CSV (header row only when there are no findings)
        const findingsPath = join(outputPath, FINDINGS_FILENAME);
        const rows = flattenFindings(findings);
        const csv = rows.length > 0 ? serializeCsv(rows) : RESERVED_KEYS.REASON;
        await writeFile(findingsPath, '\uFEFF' + csv, 'utf-8');
        state.outputs.push(findingsPath);

        // 2. Excel workbook
        const workbookPath = join(outputPath, WORKBOOK_FILENAME);
        const workbook = await generateAuditExcel(findings, audit.benford, summary);
        await workbook.xlsx.writeFile(workbookPath);
        state.outputs.push(workbookPath);

        // 3. Run manifest
        const manifest: AuditManifest = {
            input_file: input.filename,
            input_hash: input.hash,
            run_timestamp: new Date().toISOString(),
            record_count: state.records.length,
            finding_counts: countByReason(findings),
            benford_status: audit.benford.status,
            version: ENGINE_VERSION,
        };
        const manifestPath = join(outputPath, MANIFEST_FILENAME);
        await writeFile(manifestPath, JSON.stringify(manifest, null, 2));
        state.outputs.push(manifestPath);
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export results to ${outputPath}: ${err instanceof Error ? err.message : String(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
