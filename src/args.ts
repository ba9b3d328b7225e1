export interface CliArgs {
    file: string | null;
    verbose: boolean;
    dryRun: boolean;
    showTime: boolean;
    help: boolean;
}

export const USAGE = `
Whitespace Interpreter

Usage: wsvm [options] <file>

Options:
  --verbose, -v   Trace assembled and executed instructions on stderr
  --dry-run, -n   Assemble the program without running it
  --time, -t      Show execution time
  --help, -h      Show this help
`;

export const parseArgs = (args: string[]): CliArgs => {
    const parsed: CliArgs = { file: null, verbose: false, dryRun: false, showTime: false, help: false };

    for (const arg of args) {
        if (arg === '--help' || arg === '-h') {
            parsed.help = true;
        } else if (arg === '--verbose' || arg === '-v') {
            parsed.verbose = true;
        } else if (arg === '--dry-run' || arg === '--dry_run' || arg === '-n') {
            parsed.dryRun = true;
        } else if (arg === '--time' || arg === '-t') {
            parsed.showTime = true;
        } else if (arg.startsWith('-')) {
            throw new Error(`Unknown option: ${arg}`);
        } else {
            parsed.file = arg;
        }
    }
    return parsed;
};
