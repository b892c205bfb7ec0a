const VALUE_FLAGS = new Set([
    "--dir", "--filter", "--sort", "--limit", "--csv", "--html", "--message",
    "--name", "--email", "--user", "--repo", "--remote", "--branch",
]);

export interface ParsedArgs {
    command: string | undefined;
    positionals: string[];
    values: Map<string, string>;
    flags: Set<string>;
}

/**
 * Split argv into command, positionals, valued options and boolean flags
 */
export function parseArgs(argv: string[]): ParsedArgs {
    // Filter out standalone "--" which npm passes through
    const args = argv.filter(a => a !== "--");
    const positionals: string[] = [];
    const values = new Map<string, string>();
    const flags = new Set<string>();

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const nextArg = args[i + 1];
        if (arg === undefined) continue;

        if (VALUE_FLAGS.has(arg)) {
            if (nextArg === undefined) {
                throw new Error(`${arg} requires a value`);
            }
            values.set(arg, nextArg);
            i++;
        } else if (arg === "-t") {
            flags.add("--timing");
        } else if (arg === "-h") {
            flags.add("--help");
        } else if (arg.startsWith("-")) {
            flags.add(arg);
        } else {
            positionals.push(arg);
        }
    }

    const [command, ...rest] = positionals;
    return { command, positionals: rest, values, flags };
}
