import { ErrorCode, RuntimeError } from './errors.js';
import type { Input, Output } from './io.js';
import { Heap, Stack } from './memory.js';
import { Group, OpType } from './types.js';
import type { Op, Program, Trace } from './types.js';

export type ExitStatus = 'finished' | 'fell-off';

export interface MachineOptions {
    input: Input;
    output: Output;
    heapSize: number;
    maxHeapSize: number;
    trace?: Trace | null;
}

export interface ExecResult {
    status: ExitStatus;
    steps: number;
}

const REPLACEMENT_CHAR = '\uFFFD';

// negative, surrogate and past-unicode values are not characters
const toChar = (value: bigint): string =>
    value < 0n || value > 0x10FFFFn || (value >= 0xD800n && value <= 0xDFFFn)
        ? REPLACEMENT_CHAR
        : String.fromCodePoint(Number(value));

export class Interpreter {
    readonly stack = new Stack<bigint>();
    readonly frames = new Stack<number>();
    readonly heap: Heap;
    private pc = 0;
    private steps = 0;
    private readonly trace: Trace | null;

    constructor(private readonly program: Program, private readonly options: MachineOptions) {
        this.heap = new Heap(options.heapSize, options.maxHeapSize);
        this.trace = options.trace ?? null;
    }

    run(): ExecResult {
        const { ops } = this.program;
        while (this.pc < ops.length) {
            const op = ops[this.pc];
            if (this.trace) this.trace(`${op.display} [stack] ${this.stack}`);
            const at = this.pc;
            this.pc++;
            this.steps++;

            try {
                if (op.type === OpType.END) {
                    return { status: 'finished', steps: this.steps };
                }
                this.step(op);
            } catch (e) {
                if (e instanceof RuntimeError && e.pc === null) {
                    throw e.locate(at, op.display);
                }
                throw e;
            }
        }
        return { status: 'fell-off', steps: this.steps };
    }

    private step(op: Op): void {
        if (op.group === Group.ARITH) {
            const b = this.stack.pop();
            const a = this.stack.pop();
            this.stack.push(this.arith(op.type, a, b));
            return;
        }

        switch (op.type) {
            case OpType.PUSH:
                this.stack.push(this.operand(op));
                break;
            case OpType.DUP:
                this.stack.push(this.stack.get(0));
                break;
            case OpType.COPY:
                this.stack.copy(this.operand(op));
                break;
            case OpType.SWAP:
                this.stack.swap();
                break;
            case OpType.DISCARD:
                this.stack.pop();
                break;
            case OpType.SLIDE:
                this.stack.slide(this.operand(op));
                break;
            case OpType.STORE: {
                const value = this.stack.pop();
                const address = this.stack.pop();
                if (this.trace) this.trace(`value:${value} address:${address}`);
                this.heap.put(address, value);
                break;
            }
            case OpType.RETRIEVE:
                this.stack.push(this.heap.get(this.stack.pop()));
                break;
            case OpType.MARK:
                break;
            case OpType.CALL: {
                const target = this.resolve(op);
                this.frames.push(this.pc);
                this.pc = target;
                break;
            }
            case OpType.JMP:
                this.pc = this.resolve(op);
                break;
            case OpType.JMP_IF_ZERO:
                if (this.stack.pop() === 0n) {
                    this.pc = this.resolve(op);
                }
                break;
            case OpType.JMP_IF_NEG:
                if (this.stack.pop() < 0n) {
                    this.pc = this.resolve(op);
                }
                break;
            case OpType.RET:
                if (this.frames.length === 0) {
                    throw RuntimeError.of(ErrorCode.RETURN_WITHOUT_CALL);
                }
                this.pc = this.frames.pop();
                break;
            case OpType.PUTCHAR:
                this.options.output.write(toChar(this.stack.pop()));
                break;
            case OpType.PUTNUM:
                this.options.output.write(this.stack.pop().toString());
                break;
            case OpType.READCHAR: {
                const ch = this.options.input.readChar();
                if (ch === null) {
                    throw RuntimeError.of(ErrorCode.IO_ERROR, { reason: 'end of input while reading a character' });
                }
                this.heap.put(this.stack.pop(), BigInt(ch));
                break;
            }
            case OpType.READNUM: {
                const n = this.options.input.readNumber();
                this.heap.put(this.stack.pop(), n);
                break;
            }
        }
    }

    private arith(type: OpType, a: bigint, b: bigint): bigint {
        switch (type) {
            case OpType.ADD:
                return a + b;
            case OpType.SUB:
                return a - b;
            case OpType.MUL:
                return a * b;
            case OpType.DIV:
                if (b === 0n) throw RuntimeError.of(ErrorCode.ARITHMETIC_FAULT, { operation: 'division' });
                return a / b;
            case OpType.MOD:
                if (b === 0n) throw RuntimeError.of(ErrorCode.ARITHMETIC_FAULT, { operation: 'modulo' });
                return a % b;
            default:
                throw new Error(`not an arithmetic op: ${type}`);
        }
    }

    private operand(op: Op): bigint {
        if (op.operand === null) {
            throw new Error(`${op.type} has no operand`);
        }
        return op.operand;
    }

    private resolve(op: Op): number {
        const label = this.operand(op);
        const target = this.program.labels.get(label);
        if (target === undefined) {
            throw RuntimeError.of(ErrorCode.UNDEFINED_LABEL, { label });
        }
        return target;
    }
}
