import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { AuditConfigSchema, type AuditConfig } from '@expense-audit/shared';

export interface LoadedConfig {
    config: AuditConfig;
    warnings: string[];
}

/**
 * Validates a raw config object (already parsed from YAML) and applies defaults.
 * Throws with every zod issue listed when the object is invalid.
 */
export function resolveConfig(data: unknown): LoadedConfig {
    const result = AuditConfigSchema.safeParse(data ?? {});
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration. ${issues}`);
    }

    const config = result.data;
    const warnings: string[] = [];

    // Legal, but the near-limit band then reaches below zero
    if (config.threshold.buffer > config.threshold.limit) {
        warnings.push(
            `threshold.buffer (${config.threshold.buffer}) exceeds threshold.limit (${config.threshold.limit}); ` +
            'negative amounts will be reported as near_limit.'
        );
    }

    return { config, warnings };
}

/**
 * Loads expense-audit.yaml. No path means defaults only.
 * An empty file is the same as no file.
 */
export async function loadConfig(path: string | null): Promise<LoadedConfig> {
    if (!path) {
        return resolveConfig({});
    }

    const content = await readFile(path, 'utf-8');
    const data: unknown = parse(content);
    return resolveConfig(data);
}
