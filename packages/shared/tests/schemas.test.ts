import { describe, it, expect } from 'vitest';
import {
    AuditConfigSchema,
    AuditManifestSchema,
    BenfordResultSchema,
    DatasetSummarySchema,
    FindingSchema,
    NewExpenseSchema,
} from '../src/schemas.js';

describe('NewExpenseSchema', () => {
    const valid = {
        expense_id: 'E1',
        employee: 'Ana',
        department: 'Sales',
        expense_date: '2024-03-01',
        amount_usd: '100.00',
        category: 'Meals',
        merchant: 'Cafe Uno',
        invoice_no: 'INV-1',
    };

    it('accepts a complete record and keeps extra columns', () => {
        const result = NewExpenseSchema.safeParse({ ...valid, note: 'late' });
        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.data.note).toBe('late');
        }
    });

    it('trims required fields', () => {
        const result = NewExpenseSchema.safeParse({ ...valid, merchant: '  Cafe Uno ' });
        expect(result.success && result.data.merchant).toBe('Cafe Uno');
    });

    it('rejects blank required fields', () => {
        const result = NewExpenseSchema.safeParse({ ...valid, invoice_no: '   ' });
        expect(result.success).toBe(false);
    });

    it('rejects dates not written as YYYY-MM-DD', () => {
        expect(NewExpenseSchema.safeParse({ ...valid, expense_date: '03/01/2024' }).success).toBe(false);
    });
});

describe('FindingSchema', () => {
    it('accepts each finding kind', () => {
        const findings = [
            { reason: 'duplicate', record: { expense_id: 'E1' }, dup_count: 2 },
            { reason: 'weekend', record: { expense_id: 'E2' } },
            { reason: 'near_limit', record: { expense_id: 'E3' } },
            {
                reason: 'suspicious_keyword',
                record: { expense_id: 'E4' },
                details: 'gift (in category)',
                hits: [{ term: 'gift', column: 'category' }],
            },
            { reason: 'discrepancy', record: { expense_id: 'E5' }, details: 'Diff: $5.00', difference: '-5.00' },
        ];
        for (const finding of findings) {
            expect(FindingSchema.safeParse(finding).success).toBe(true);
        }
    });

    it('rejects a duplicate cluster of one', () => {
        const result = FindingSchema.safeParse({ reason: 'duplicate', record: {}, dup_count: 1 });
        expect(result.success).toBe(false);
    });

    it('rejects a keyword finding without hits', () => {
        const result = FindingSchema.safeParse({
            reason: 'suspicious_keyword',
            record: {},
            details: '',
            hits: [],
        });
        expect(result.success).toBe(false);
    });
});

describe('BenfordResultSchema', () => {
    it('accepts the insufficient-data outcome', () => {
        const result = BenfordResultSchema.safeParse({ status: 'insufficient_data', message: 'No valid amounts' });
        expect(result.success).toBe(true);
    });

    it('requires nine digit rows in a report', () => {
        const result = BenfordResultSchema.safeParse({
            status: 'ok',
            report: { total_analyzed: 1, stats: [], is_suspicious: false, max_deviation_pct: 0 },
        });
        expect(result.success).toBe(false);
    });
});

describe('DatasetSummarySchema', () => {
    it('allows a missing date range', () => {
        const result = DatasetSummarySchema.safeParse({ total_rows: 0, total_amount: '0.00', date_range: null });
        expect(result.success).toBe(true);
    });
});

describe('AuditManifestSchema', () => {
    const manifest = {
        input_file: 'expenses.csv',
        input_hash: `sha256:${'a'.repeat(64)}`,
        run_timestamp: '2024-03-01T00:00:00.000Z',
        record_count: 4,
        finding_counts: { duplicate: 2, weekend: 1 },
        benford_status: 'ok',
        version: '1.0.0',
    };

    it('validates a manifest', () => {
        expect(AuditManifestSchema.safeParse(manifest).success).toBe(true);
    });

    it('rejects a hash without the sha256 prefix', () => {
        const result = AuditManifestSchema.safeParse({ ...manifest, input_hash: 'a'.repeat(64) });
        expect(result.success).toBe(false);
    });

    it('rejects unknown reasons in finding_counts', () => {
        const result = AuditManifestSchema.safeParse({ ...manifest, finding_counts: { fraud: 1 } });
        expect(result.success).toBe(false);
    });
});

describe('AuditConfigSchema', () => {
    it('fills every default from an empty object', () => {
        const config = AuditConfigSchema.parse({});
        expect(config.columns.id).toBe('expense_id');
        expect(config.threshold).toEqual({ limit: 5000, buffer: 200 });
        expect(config.keywords.terms).toHaveLength(11);
    });

    it('rejects unknown keys in a section', () => {
        expect(AuditConfigSchema.safeParse({ threshold: { limti: 10 } }).success).toBe(false);
    });

    it('rejects negative limits and an empty term list', () => {
        expect(AuditConfigSchema.safeParse({ threshold: { buffer: -1 } }).success).toBe(false);
        expect(AuditConfigSchema.safeParse({ keywords: { terms: [] } }).success).toBe(false);
    });
});
