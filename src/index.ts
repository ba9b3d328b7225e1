import { resolveOptions } from './config.js';
import type { RunOptions } from './config.js';
import { Interpreter } from './interp.js';
import type { ExitStatus } from './interp.js';
import { create_program } from './parser.js';
import type { Program } from './types.js';

export interface RunResult {
    program: Program;
    status: ExitStatus | 'skipped';
    steps: number;
}

/** Assembles the whole program, then executes it unless dryRun is set. */
export const run = (bytes: Buffer | Uint8Array, options: RunOptions = {}): RunResult => {
    const opts = resolveOptions(options);
    const trace = opts.verbose ? opts.trace : null;

    if (trace) trace('\n* Parsing the program:\n');
    const program = create_program(bytes, { trace });

    if (opts.dryRun) {
        return { program, status: 'skipped', steps: 0 };
    }

    if (trace) trace('\n\n* Running the program:\n');
    const machine = new Interpreter(program, { ...opts, trace });
    return { program, ...machine.run() };
};

export { create_program } from './parser.js';
export { SymbolDecoder } from './decoder.js';
export { Interpreter } from './interp.js';
export type { ExecResult, ExitStatus, MachineOptions } from './interp.js';
export { Heap, Stack } from './memory.js';
export { BufferedOutput, StdinInput, StdoutOutput, StringInput } from './io.js';
export type { Input, Output } from './io.js';
export { DEFAULT_OPTIONS, resolveOptions } from './config.js';
export type { RunOptions } from './config.js';
export * from './errors.js';
export * from './types.js';
