#!/usr/bin/env node
/**
 * Ducat Ledger CLI
 *
 * The CLI owns all file I/O and console output; the core receives
 * strings and returns results, warnings and record errors as data.
 */

import { importFiles } from './commands/import.js';
import { validateFile } from './commands/validate.js';
import { runDemo } from './commands/demo.js';
import { parseArgs } from './args.js';
import { log, error } from './utils/console.js';

const USAGE = [
    'Ducat Ledger CLI v1.0.0',
    '',
    'Usage: ducat <command> [options]',
    '',
    'Commands:',
    '  import <file...>     Import CSV/JSON transaction files and print reports',
    '      --verbose        Report every skipped record',
    '      --export <file>  Write the ledger as .csv or .json',
    '      --xlsx <file>    Write an Excel workbook (Journal, Trial Balance)',
    '      --workspace <dir>  Workspace root (default: detected from cwd)',
    '  validate <file.csv>  Check a CSV file record by record without posting',
    '  demo                 Record and print the 1397 sample year',
    '      --out <dir>      Export and re-import the sample transactions',
    '',
    'Example:',
    '  ducat import transactions.csv --export ledger.json',
].join('\n');

async function main(): Promise<number> {
    const args = parseArgs(process.argv.slice(2));

    if (!args.command || args.command === 'help' || args.flags.has('--help')) {
        log(USAGE);
        return 0;
    }

    const verbose = args.flags.has('--verbose');

    switch (args.command) {
        case 'import':
            return importFiles(args.positionals, {
                verbose,
                exportPath: args.values.get('--export'),
                xlsxPath: args.values.get('--xlsx'),
                workspace: args.values.get('--workspace'),
            });
        case 'validate': {
            const [file] = args.positionals;
            if (!file) {
                error('Usage: ducat validate <file.csv>');
                return 1;
            }
            return validateFile(file, { verbose, workspace: args.values.get('--workspace') });
        }
        case 'demo':
            return runDemo({ out: args.values.get('--out'), verbose });
        default:
            error(`Unknown command: ${args.command}`);
            log(USAGE);
            return 1;
    }
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        error(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
    });
