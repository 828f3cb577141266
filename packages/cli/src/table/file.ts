import { readFile, writeFile, rename, rm } from 'node:fs/promises';
import type { ExpenseRecord } from '@expense-audit/core';
import { decodeText, parseCsv, serializeCsv } from './csv.js';

export interface LoadedTable {
    records: ExpenseRecord[];
    /** Raw bytes, kept for hashing. */
    content: Uint8Array;
}

/**
 * Reads an expense CSV from disk.
 */
export async function loadRecords(path: string): Promise<LoadedTable> {
    const content = await readFile(path);
    return { records: parseCsv(decodeText(content)), content };
}

/**
 * Writes records back to disk with a UTF-8 BOM.
 *
 * The file is written to a .tmp sibling and renamed over the target, so a
 * failed write never leaves a half-written table. Refuses to write an empty
 * table.
 */
export async function saveRecords(path: string, records: readonly ExpenseRecord[]): Promise<void> {
    if (records.length === 0) {
        throw new Error('Refusing to save an empty table.');
    }

    const tempPath = `${path}.tmp`;
    try {
        await writeFile(tempPath, '\uFEFF' + serializeCsv(records), 'utf-8');
        await rename(tempPath, path);
    } catch (err) {
        await rm(tempPath, { force: true });
        throw err;
    }
}
