/**
 * Duplicate invoice detection.
 *
 * Records are keyed on normalized (merchant, invoice, amount), never on the
 * full row. Every member of a cluster of 2+ becomes a finding.
 *
 * PURE FUNCTION: Does not mutate input. Findings hold copies.
 */

import type { ExpenseRecord, DuplicateFinding } from '../types/index.js';
import { DEFAULT_COLUMNS } from '../types/index.js';
import { normalizeText } from '../utils/normalize.js';
import { normalizeAmount } from '../utils/amount.js';
import type { DuplicateOptions } from './types.js';

type DuplicateKey = [merchant: string, invoice: string, amount: string];

/**
 * Find all duplicate invoice clusters.
 *
 * Output is sorted by (merchant, invoice, amount) on normalized values, with
 * merchant read as '' when excluded from the key. The sort is stable, so
 * members of one cluster keep their input order and two runs over the same
 * data produce the same sequence.
 *
 * @param records - Snapshot of expense records (not mutated)
 * @param options - Key columns and whether merchant participates
 * @returns Findings for every record whose key is shared, singletons dropped
 */
export function findDuplicateInvoices(
    records: readonly ExpenseRecord[],
    options: DuplicateOptions = {}
): DuplicateFinding[] {
    const {
        merchantColumn = DEFAULT_COLUMNS.merchant,
        invoiceColumn = DEFAULT_COLUMNS.invoice,
        amountColumn = DEFAULT_COLUMNS.amount,
        includeMerchant = true,
    } = options;

    const buildKey = (record: ExpenseRecord): DuplicateKey => [
        includeMerchant ? normalizeText(record[merchantColumn]) : '',
        normalizeText(record[invoiceColumn]),
        normalizeAmount(record[amountColumn]),
    ];

    const buckets = new Map<string, { key: DuplicateKey; members: ExpenseRecord[] }>();

    for (const record of records) {
        const key = buildKey(record);
        const id = JSON.stringify(key);
        const bucket = buckets.get(id);
        if (bucket) {
            bucket.members.push(record);
        } else {
            buckets.set(id, { key, members: [record] });
        }
    }

    const keyed: { key: DuplicateKey; finding: DuplicateFinding }[] = [];
    for (const { key, members } of buckets.values()) {
        if (members.length < 2) continue;

        for (const record of members) {
            keyed.push({
                key,
                finding: { reason: 'duplicate', record: { ...record }, dup_count: members.length },
            });
        }
    }

    keyed.sort((a, b) => compareKeys(a.key, b.key));
    return keyed.map(k => k.finding);
}

function compareKeys(a: DuplicateKey, b: DuplicateKey): number {
    for (let i = 0; i < a.length; i++) {
        if (a[i] < b[i]) return -1;
        if (a[i] > b[i]) return 1;
    }
    return 0;
}
