import { createHash } from 'node:crypto';

/**
 * SHA-256 of raw file content, prefixed with 'sha256:'.
 * Takes bytes already read so the file is read only once per run.
 */
export function hashContent(content: Uint8Array): string {
    const hash = createHash('sha256').update(content).digest('hex');
    return `sha256:${hash}`;
}
