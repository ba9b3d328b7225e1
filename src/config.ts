import { ConfigError } from './errors.js';
import { StdinInput, StdoutOutput } from './io.js';
import type { Input, Output } from './io.js';
import type { Trace } from './types.js';

export interface RunOptions {
    verbose?: boolean;
    dryRun?: boolean;
    heapSize?: number;
    maxHeapSize?: number;
    input?: Input;
    output?: Output;
    trace?: Trace;
}

export type ResolvedOptions = Required<RunOptions>;

export const DEFAULT_OPTIONS = {
    HEAP_SIZE: 128,
    MAX_HEAP_SIZE: 1 << 24,
};

const checkSize = (name: string, value: number, min: number): number => {
    if (!Number.isSafeInteger(value) || value < min) {
        throw new ConfigError(name, value);
    }
    return value;
};

export const resolveOptions = (options: RunOptions = {}): ResolvedOptions => {
    const verbose = options.verbose ?? false;
    const heapSize = checkSize('heapSize', options.heapSize ?? DEFAULT_OPTIONS.HEAP_SIZE, 0);
    const maxHeapSize = checkSize('maxHeapSize', options.maxHeapSize ?? DEFAULT_OPTIONS.MAX_HEAP_SIZE, 1);
    if (heapSize > maxHeapSize) {
        throw new ConfigError('heapSize', `${heapSize} exceeds maxHeapSize ${maxHeapSize}`);
    }

    return {
        verbose,
        dryRun: options.dryRun ?? false,
        heapSize,
        maxHeapSize,
        input: options.input ?? new StdinInput(),
        output: options.output ?? new StdoutOutput(),
        // only consulted when verbose is on
        trace: options.trace ?? ((line: string) => console.error(line)),
    };
};
