/**
 * Formatted console output helpers.
 * The core never logs; everything user-facing goes through here.
 */

export function log(message: string): void {
    console.log(message);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}

export function error(message: string): void {
    console.error(`\n✖ Error: ${message}`);
}

/**
 * Print an error and exit with status 1.
 */
export function fail(message: string): never {
    error(message);
    process.exit(1);
}

/**
 * One line per row, cells joined with ' | '.
 */
export function printRows(rows: readonly (readonly string[])[]): void {
    for (const row of rows) {
        console.log(row.join(' | '));
    }
}
