import { basename } from 'node:path';
import type { PipelineStep } from '../types.js';
import { loadRecords } from '../../table/file.js';
import { hashContent } from '../../utils/hash.js';

/**
 * Step 1: Load
 * Reads and hashes the input CSV. An unreadable or empty table is fatal.
 */
export const loadInput: PipelineStep = async (state) => {
    try {
        const { records, content } = await loadRecords(state.inputPath);
        state.input = {
            path: state.inputPath,
            filename: basename(state.inputPath),
            hash: hashContent(content),
        };
        state.records = Object.freeze(records);
    } catch (err) {
        state.errors.push({
            step: 'load',
            message: `Failed to read ${state.inputPath}: ${err instanceof Error ? err.message : String(err)}`,
            fatal: true,
            error: err,
        });
        return state;
    }

    if (state.records.length === 0) {
        state.errors.push({
            step: 'load',
            message: `No records found in ${state.inputPath}.`,
            fatal: true,
        });
    }

    return state;
};
