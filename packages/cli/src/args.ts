/**
 * argv parsing: `expense-audit <file.csv> <command> [id] [options]`.
 */

export const COMMANDS = [
    'find-duplicates',
    'flag-weekends',
    'flag-threshold',
    'benford-analysis',
    'suspicious-keywords',
    'payment-discrepancies',
    'summary',
    'report',
    'show',
    'add',
    'update',
    'delete',
] as const;

export type Command = (typeof COMMANDS)[number];

export const DEFAULT_SHOW = 20;
export const DEFAULT_OUT_DIR = 'audit-output';

export interface ParsedArgs {
    file: string;
    command: Command;
    /** Record id for show, update and delete. */
    id?: string;
    config?: string;
    show: number;
    limit?: number;
    buffer?: number;
    out: string;
    dryRun: boolean;
    yes: boolean;
    set: Record<string, string>;
}

const VALUE_FLAGS = new Set(['--config', '--show', '--limit', '--buffer', '--out', '--set']);
const BOOLEAN_FLAGS = new Set(['--dry-run', '--yes']);
const ID_COMMANDS = new Set<Command>(['show', 'update', 'delete']);

function isCommand(value: string): value is Command {
    return COMMANDS.some(c => c === value);
}

function parseNumber(flag: string, value: string, integer: boolean): number {
    const n = Number(value);
    if (value.trim() === '' || !Number.isFinite(n) || n < 0 || (integer && !Number.isInteger(n))) {
        throw new Error(`${flag} expects a non-negative ${integer ? 'integer' : 'number'}, got "${value}".`);
    }
    return n;
}

/**
 * @param argv - Arguments after the script name (process.argv.slice(2))
 * @throws Error with a user-facing message on any malformed input
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
    const positionals: string[] = [];
    const values = new Map<string, string[]>();
    const booleans = new Set<string>();

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (!arg.startsWith('--')) {
            positionals.push(arg);
            continue;
        }

        const eq = arg.indexOf('=');
        const flag = eq === -1 ? arg : arg.slice(0, eq);

        if (BOOLEAN_FLAGS.has(flag)) {
            if (eq !== -1) throw new Error(`${flag} takes no value.`);
            booleans.add(flag);
        } else if (VALUE_FLAGS.has(flag)) {
            let value: string | undefined;
            if (eq !== -1) {
                value = arg.slice(eq + 1);
            } else {
                value = argv[i + 1];
                i++;
            }
            if (value === undefined) throw new Error(`${flag} requires a value.`);
            values.set(flag, [...(values.get(flag) ?? []), value]);
        } else {
            throw new Error(`Unknown option: ${flag}`);
        }
    }

    const [file, commandName, id, ...extra] = positionals;
    if (!file || !commandName) {
        throw new Error('Usage: expense-audit <file.csv> <command> [options]');
    }
    if (!isCommand(commandName)) {
        throw new Error(`Unknown command: ${commandName}`);
    }
    if (ID_COMMANDS.has(commandName) ? !id : id !== undefined) {
        throw new Error(ID_COMMANDS.has(commandName)
            ? `${commandName} requires a record id.`
            : `Unexpected argument: ${id}`);
    }
    if (extra.length > 0) {
        throw new Error(`Unexpected argument: ${extra[0]}`);
    }

    const last = (flag: string): string | undefined => values.get(flag)?.at(-1);

    const set: Record<string, string> = {};
    for (const pair of values.get('--set') ?? []) {
        const eq = pair.indexOf('=');
        if (eq <= 0) throw new Error(`--set expects field=value, got "${pair}".`);
        set[pair.slice(0, eq).trim()] = pair.slice(eq + 1);
    }

    const show = last('--show');
    const limit = last('--limit');
    const buffer = last('--buffer');

    return {
        file,
        command: commandName,
        id,
        config: last('--config'),
        show: show === undefined ? DEFAULT_SHOW : parseNumber('--show', show, true),
        limit: limit === undefined ? undefined : parseNumber('--limit', limit, false),
        buffer: buffer === undefined ? undefined : parseNumber('--buffer', buffer, false),
        out: last('--out') ?? DEFAULT_OUT_DIR,
        dryRun: booleans.has('--dry-run'),
        yes: booleans.has('--yes'),
        set,
    };
}

export const USAGE = `Usage: expense-audit <file.csv> <command> [options]

Commands:
  find-duplicates          Duplicate invoices
  flag-weekends            Expenses dated on a Saturday or Sunday
  flag-threshold           Expenses over or near the policy limit
  benford-analysis         Leading-digit distribution of amounts
  suspicious-keywords      Expenses mentioning a suspicious term
  payment-discrepancies    Paid amount differs from the incurred amount
  summary                  Row count, total amount and date range
  report                   Write findings.csv, audit.xlsx and audit_manifest.json
  show <id>                Print one record
  add                      Add a record (--set field=value ...)
  update <id>              Change fields of a record (--set field=value ...)
  delete <id>              Delete a record

Options:
  --config <path>   Configuration file (default: nearest expense-audit.yaml)
  --show <n>        Rows to print (default: ${DEFAULT_SHOW})
  --limit <x>       Policy limit for flag-threshold
  --buffer <y>      Near-limit band for flag-threshold
  --out <dir>       Report output directory (default: ${DEFAULT_OUT_DIR})
  --dry-run         Run the report without writing files
  --yes             Skip the delete confirmation`;
