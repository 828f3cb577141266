#!/usr/bin/env node
/**
 * Expense Audit CLI
 *
 * - CLI handles all file I/O (node:fs) and all console output
 * - Core receives record snapshots, returns findings
 */

import { parseArgs, USAGE, type ParsedArgs } from './args.js';
import {
    benfordCommand,
    findDuplicatesCommand,
    flagThresholdCommand,
    flagWeekendsCommand,
    paymentDiscrepanciesCommand,
    summaryCommand,
    suspiciousKeywordsCommand,
} from './commands/query.js';
import { addCommand, deleteCommand, showCommand, updateCommand } from './commands/records.js';
import { reportCommand } from './commands/report.js';
import { errorMessage } from './commands/context.js';
import { error, log } from './utils/console.js';

async function run(args: ParsedArgs): Promise<void> {
    const { file, id = '' } = args;

    switch (args.command) {
        case 'find-duplicates':
            return findDuplicatesCommand(file, args);
        case 'flag-weekends':
            return flagWeekendsCommand(file, args);
        case 'flag-threshold':
            return flagThresholdCommand(file, args);
        case 'benford-analysis':
            return benfordCommand(file, args);
        case 'suspicious-keywords':
            return suspiciousKeywordsCommand(file, args);
        case 'payment-discrepancies':
            return paymentDiscrepanciesCommand(file, args);
        case 'summary':
            return summaryCommand(file, args);
        case 'report':
            return reportCommand(file, args);
        case 'show':
            return showCommand(file, id, args);
        case 'add':
            return addCommand(file, args);
        case 'update':
            return updateCommand(file, id, args);
        case 'delete':
            return deleteCommand(file, id, args);
    }
}

async function main(): Promise<void> {
    const argv = process.argv.slice(2);

    if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
        log(USAGE);
        process.exit(0);
    }

    let args: ParsedArgs;
    try {
        args = parseArgs(argv);
    } catch (err) {
        error(errorMessage(err));
        log(`\n${USAGE}`);
        process.exit(1);
    }

    await run(args);
}

main().catch((err) => {
    console.error('Unexpected error:', errorMessage(err));
    process.exit(1);
});
