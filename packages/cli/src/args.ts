export interface ParsedArgs {
    command: string | undefined;
    positionals: string[];
    flags: Set<string>;
    values: Map<string, string>;
}

const VALUE_OPTIONS = new Set(['--export', '--xlsx', '--workspace', '--out']);

/**
 * Split argv into command, positionals, boolean flags and `--name value` options.
 */
export function parseArgs(argv: string[]): ParsedArgs {
    const positionals: string[] = [];
    const flags = new Set<string>();
    const values = new Map<string, string>();

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (VALUE_OPTIONS.has(arg)) {
            const value = argv[i + 1];
            if (value === undefined || value.startsWith('--')) {
                throw new Error(`Option ${arg} requires a value`);
            }
            values.set(arg, value);
            i++;
        } else if (arg.startsWith('--')) {
            flags.add(arg);
        } else {
            positionals.push(arg);
        }
    }

    const [command, ...rest] = positionals;
    return { command, positionals: rest, flags, values };
}
