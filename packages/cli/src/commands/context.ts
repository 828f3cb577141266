import { existsSync } from 'node:fs';
import { detectConfigPath } from '../config/detect.js';
import { loadConfig } from '../config/load.js';
import { ExpenseStore } from '../store/expense-store.js';
import { loadRecords, saveRecords } from '../table/file.js';
import { fail, warn } from '../utils/console.js';
import type { AuditContext, GlobalOptions } from '../types.js';

export interface OpenedTable {
    context: AuditContext;
    store: ExpenseStore;
}

/**
 * Resolves the configuration and loads the table into a store.
 * Exits on a bad config, a missing file or an empty table.
 */
export async function openTable(csvPath: string, options: GlobalOptions): Promise<OpenedTable> {
    const configPath = options.config ?? detectConfigPath();

    let context: AuditContext;
    try {
        const { config, warnings } = await loadConfig(configPath);
        for (const w of warnings) {
            warn(w);
        }
        context = { csvPath, config, configPath };
    } catch (err) {
        fail(`Failed to load configuration${configPath ? ` (${configPath})` : ''}. ${errorMessage(err)}`);
    }

    if (!existsSync(csvPath)) {
        fail(`Not found: ${csvPath}`);
    }

    let store: ExpenseStore;
    try {
        const { records } = await loadRecords(csvPath);
        store = new ExpenseStore(records, context.config.columns.id);
    } catch (err) {
        fail(`Failed to read ${csvPath}. ${errorMessage(err)}`);
    }

    if (store.size === 0) {
        fail('No data loaded from the CSV file.');
    }

    return { context, store };
}

/**
 * Saves the store; on failure undoes the in-memory change and exits.
 */
export async function persist(context: AuditContext, store: ExpenseStore, rollback: () => void): Promise<void> {
    try {
        await saveRecords(context.csvPath, store.snapshot());
    } catch (err) {
        rollback();
        fail(`Failed to save to ${context.csvPath}. ${errorMessage(err)}`);
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
