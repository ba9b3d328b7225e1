#!/usr/bin/env node
// src/cli.ts
import fs from 'fs';
import { parseArgs, USAGE } from './args.js';
import { run } from './index.js';

function main(): void {
    try {
        const args = parseArgs(process.argv.slice(2));

        if (args.help) {
            console.log(USAGE);
            process.exit(0);
        }
        if (!args.file) {
            console.error('No input file specified');
            console.log(USAGE);
            process.exit(1);
        }

        const content = fs.readFileSync(args.file);
        const start = process.hrtime.bigint();

        run(content, { verbose: args.verbose, dryRun: args.dryRun });

        if (args.showTime) {
            const end = process.hrtime.bigint();
            const timeMs = Number(end - start) / 1e6;
            console.error(`\nExecution time: ${timeMs.toFixed(2)}ms`);
        }
    } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : 'Unknown error'}`);
        process.exit(1);
    }
}

main();
