import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile, realpath } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CONFIG_FILENAME, detectConfigPath } from '../src/config/detect.js';
import { loadConfig, resolveConfig } from '../src/config/load.js';

describe('resolveConfig', () => {
    it('applies every default to an empty object', () => {
        const { config, warnings } = resolveConfig({});
        expect(config.columns.amount).toBe('amount_usd');
        expect(config.threshold).toEqual({ limit: 5000, buffer: 200 });
        expect(config.duplicates.include_merchant).toBe(true);
        expect(config.date_formats).toEqual(['YYYY-MM-DD', 'MM/DD/YYYY', 'YYYY/MM/DD']);
        expect(config.keywords.columns).toEqual(['merchant', 'category', 'employee']);
        expect(warnings).toEqual([]);
    });

    it('treats null as empty', () => {
        expect(resolveConfig(null).config.threshold.limit).toBe(5000);
    });

    it('merges partial sections with defaults', () => {
        const { config } = resolveConfig({ threshold: { limit: 1000 }, columns: { amount: 'total' } });
        expect(config.threshold).toEqual({ limit: 1000, buffer: 200 });
        expect(config.columns.amount).toBe('total');
        expect(config.columns.merchant).toBe('merchant');
    });

    it('warns when the buffer exceeds the limit', () => {
        const { warnings } = resolveConfig({ threshold: { limit: 100, buffer: 200 } });
        expect(warnings).toHaveLength(1);
        expect(warnings[0]).toContain('threshold.buffer (200) exceeds threshold.limit (100)');
    });

    it('lists the path of every invalid field', () => {
        expect(() => resolveConfig({ threshold: { limit: -1 } })).toThrow(/^Invalid configuration\. threshold\.limit: /);
    });
});

describe('Config files', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await realpath(await mkdtemp(join(tmpdir(), 'expense-audit-')));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('loads YAML and validates it', async () => {
        const path = join(dir, CONFIG_FILENAME);
        await writeFile(path, 'threshold:\n  limit: 2500\n  buffer: 100\nduplicates:\n  include_merchant: false\n');

        const { config } = await loadConfig(path);
        expect(config.threshold).toEqual({ limit: 2500, buffer: 100 });
        expect(config.duplicates.include_merchant).toBe(false);
    });

    it('treats an empty file and no file as defaults', async () => {
        const path = join(dir, CONFIG_FILENAME);
        await writeFile(path, '');

        expect((await loadConfig(path)).config).toEqual((await loadConfig(null)).config);
    });

    it('finds the config in a parent directory', async () => {
        const nested = join(dir, 'a', 'b');
        await mkdir(nested, { recursive: true });
        await writeFile(join(dir, CONFIG_FILENAME), '');

        expect(detectConfigPath(nested)).toBe(join(dir, CONFIG_FILENAME));
    });
});
