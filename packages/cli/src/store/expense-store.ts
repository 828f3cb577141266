import { DEFAULT_COLUMNS, type ExpenseRecord } from '@expense-audit/core';

type MutableRecord = Record<string, string | undefined>;

/**
 * The single current view of all records.
 *
 * Rows live in an arena (array, file order) with a lookup index by record id.
 * Analyses never see the arena itself: they get snapshot(), a frozen copy,
 * so a CRUD call can never change a table mid-audit.
 *
 * Rows without an id stay in the arena but cannot be addressed. When an id
 * repeats, the first row wins the index slot.
 */
export class ExpenseStore {
    private readonly rows: MutableRecord[];
    private index = new Map<string, number>();

    constructor(
        records: readonly ExpenseRecord[],
        readonly idColumn: string = DEFAULT_COLUMNS.id
    ) {
        this.rows = records.map(r => ({ ...r }));
        this.reindex();
    }

    get size(): number {
        return this.rows.length;
    }

    snapshot(): readonly ExpenseRecord[] {
        return Object.freeze(this.rows.map(r => Object.freeze({ ...r })));
    }

    has(id: string): boolean {
        return this.index.has(id);
    }

    get(id: string): ExpenseRecord | undefined {
        const i = this.index.get(id);
        return i === undefined ? undefined : { ...this.rows[i] };
    }

    /**
     * Append a record. Throws on a missing or duplicate id.
     */
    add(record: ExpenseRecord): void {
        const id = record[this.idColumn];
        if (!id) {
            throw new Error(`Record has no ${this.idColumn}.`);
        }
        if (this.index.has(id)) {
            throw new Error(`${this.idColumn} '${id}' already exists.`);
        }
        this.rows.push({ ...record });
        this.index.set(id, this.rows.length - 1);
    }

    /**
     * Merge a patch into an existing record.
     * @returns The record as it was before the patch
     */
    update(id: string, patch: ExpenseRecord): ExpenseRecord {
        const i = this.requireIndex(id);
        const previous = { ...this.rows[i] };
        const next = { ...this.rows[i], ...patch };
        if (next[this.idColumn] !== id) {
            throw new Error(`${this.idColumn} cannot be changed.`);
        }
        this.rows[i] = next;
        return previous;
    }

    /**
     * Put a record back exactly as given, replacing the one with the same id.
     */
    restore(id: string, record: ExpenseRecord): void {
        this.rows[this.requireIndex(id)] = { ...record };
    }

    /**
     * @returns The removed record and its position, for insertAt()
     */
    remove(id: string): { record: ExpenseRecord; position: number } {
        const position = this.requireIndex(id);
        const [record] = this.rows.splice(position, 1);
        this.reindex();
        return { record, position };
    }

    insertAt(position: number, record: ExpenseRecord): void {
        this.rows.splice(position, 0, { ...record });
        this.reindex();
    }

    private requireIndex(id: string): number {
        const i = this.index.get(id);
        if (i === undefined) {
            throw new Error(`Record with ${this.idColumn} '${id}' not found.`);
        }
        return i;
    }

    private reindex(): void {
        this.index = new Map();
        this.rows.forEach((row, i) => {
            const id = row[this.idColumn];
            if (id && !this.index.has(id)) {
                this.index.set(id, i);
            }
        });
    }
}
