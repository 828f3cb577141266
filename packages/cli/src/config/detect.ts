import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

export const CONFIG_FILENAME = 'expense-audit.yaml';

/**
 * Searches for expense-audit.yaml.
 * Starts at startPath and bubbles up to the filesystem root.
 */
export function detectConfigPath(startPath: string = process.cwd()): string | null {
    let current = resolve(startPath);
    while (true) {
        const candidate = join(current, CONFIG_FILENAME);
        if (existsSync(candidate)) {
            return candidate;
        }
        const parent = dirname(current);
        if (parent === current) {
            break;
        }
        current = parent;
    }
    return null;
}
