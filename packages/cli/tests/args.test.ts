import { describe, it, expect } from 'vitest';
import { parseArgs, DEFAULT_OUT_DIR, DEFAULT_SHOW } from '../src/args.js';

describe('parseArgs', () => {
    it('reads file and command with defaults', () => {
        const args = parseArgs(['data.csv', 'summary']);
        expect(args.file).toBe('data.csv');
        expect(args.command).toBe('summary');
        expect(args.id).toBeUndefined();
        expect(args.show).toBe(DEFAULT_SHOW);
        expect(args.out).toBe(DEFAULT_OUT_DIR);
        expect(args.dryRun).toBe(false);
        expect(args.yes).toBe(false);
        expect(args.set).toEqual({});
    });

    it('parses threshold options in both spellings', () => {
        const args = parseArgs(['data.csv', 'flag-threshold', '--limit', '1000', '--buffer=50.5', '--show', '5']);
        expect(args.limit).toBe(1000);
        expect(args.buffer).toBe(50.5);
        expect(args.show).toBe(5);
    });

    it('collects repeated --set pairs, keeping "=" inside values', () => {
        const args = parseArgs(['data.csv', 'add', '--set', 'expense_id=E9', '--set', 'merchant=A=B']);
        expect(args.set).toEqual({ expense_id: 'E9', merchant: 'A=B' });
    });

    it('takes the id for show, update and delete', () => {
        const args = parseArgs(['data.csv', 'delete', 'E1', '--yes']);
        expect(args.id).toBe('E1');
        expect(args.yes).toBe(true);
    });

    it('reads report flags', () => {
        const args = parseArgs(['data.csv', 'report', '--out', 'reports', '--dry-run', '--config', 'audit.yaml']);
        expect(args.out).toBe('reports');
        expect(args.dryRun).toBe(true);
        expect(args.config).toBe('audit.yaml');
    });

    it('rejects malformed input', () => {
        expect(() => parseArgs(['data.csv'])).toThrow('Usage: expense-audit <file.csv> <command> [options]');
        expect(() => parseArgs(['data.csv', 'explode'])).toThrow('Unknown command: explode');
        expect(() => parseArgs(['data.csv', 'show'])).toThrow('show requires a record id.');
        expect(() => parseArgs(['data.csv', 'summary', 'E1'])).toThrow('Unexpected argument: E1');
        expect(() => parseArgs(['data.csv', 'summary', '--verbose'])).toThrow('Unknown option: --verbose');
        expect(() => parseArgs(['data.csv', 'summary', '--show'])).toThrow('--show requires a value.');
        expect(() => parseArgs(['data.csv', 'summary', '--show', '-1'])).toThrow('--show expects a non-negative integer, got "-1".');
        expect(() => parseArgs(['data.csv', 'add', '--set', 'novalue'])).toThrow('--set expects field=value, got "novalue".');
        expect(() => parseArgs(['data.csv', 'report', '--dry-run=yes'])).toThrow('--dry-run takes no value.');
    });
});
