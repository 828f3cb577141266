import type { ExpenseRecord } from '@expense-audit/core';
import { openTable, persist } from './context.js';
import { validateNewRecord, validatePatch } from '../store/validate.js';
import { fail, log, success } from '../utils/console.js';
import { confirm } from '../utils/prompt.js';
import type { GlobalOptions, RecordOptions } from '../types.js';

function printRecord(record: ExpenseRecord): void {
    for (const [key, value] of Object.entries(record)) {
        log(`  ${key}: ${value ?? ''}`);
    }
}

function notFound(idColumn: string, id: string): never {
    fail(`Record with ${idColumn} '${id}' not found.`);
}

export async function showCommand(csvPath: string, id: string, options: GlobalOptions): Promise<void> {
    const { store } = await openTable(csvPath, options);
    const record = store.get(id);
    if (!record) notFound(store.idColumn, id);

    printRecord(record);
}

export async function addCommand(csvPath: string, options: RecordOptions): Promise<void> {
    const { context, store } = await openTable(csvPath, options);

    const result = validateNewRecord(options.set, context.config.columns);
    if (!result.valid) {
        fail(`Invalid record. ${result.errors.join('; ')}`);
    }

    const id = result.record[store.idColumn] ?? '';
    try {
        store.add(result.record);
    } catch (err) {
        fail(err instanceof Error ? err.message : String(err));
    }

    await persist(context, store, () => store.remove(id));
    success(`Record '${id}' added.`);
}

export async function updateCommand(csvPath: string, id: string, options: RecordOptions): Promise<void> {
    const { context, store } = await openTable(csvPath, options);
    if (!store.has(id)) notFound(store.idColumn, id);

    const result = validatePatch(options.set, context.config.columns);
    if (!result.valid) {
        fail(`Invalid update. ${result.errors.join('; ')}`);
    }

    const previous = store.update(id, result.record);
    await persist(context, store, () => store.restore(id, previous));

    success(`Record '${id}' updated.`);
    const current = store.get(id);
    if (current) printRecord(current);
}

export async function deleteCommand(csvPath: string, id: string, options: RecordOptions): Promise<void> {
    const { context, store } = await openTable(csvPath, options);
    const record = store.get(id);
    if (!record) notFound(store.idColumn, id);

    log('Record to delete:');
    printRecord(record);

    if (!(await confirm(`Delete record '${id}'?`, { yes: options.yes }))) {
        log('Deletion cancelled.');
        return;
    }

    const { position } = store.remove(id);
    await persist(context, store, () => store.insertAt(position, record));
    success(`Record '${id}' deleted.`);
}
