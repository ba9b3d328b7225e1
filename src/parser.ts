import { SymbolDecoder } from './decoder.js';
import { ErrorCode, ParseError } from './errors.js';
import type { ErrorParams } from './errors.js';
import { COMMANDS, GROUPS, takesOperand } from './grammar.js';
import type { PrefixCode } from './grammar.js';
import { Op, OpType, Sym } from './types.js';
import type { Program, Trace } from './types.js';

class Parser {
    private readonly decoder: SymbolDecoder;
    private readonly ops: Op[] = [];
    private readonly labels = new Map<bigint, number>();
    private start = 0;

    constructor(bytes: Buffer | Uint8Array, private readonly trace: Trace | null) {
        this.decoder = new SymbolDecoder(bytes);
    }

    parse(): Program {
        for (;;) {
            const first = this.decoder.next();
            // end of input is only clean between instructions
            if (first === null) break;
            this.start = this.decoder.offset;

            const group = this.decode(GROUPS, first, 'instruction group', ErrorCode.UNRECOGNIZED_GROUP_PREFIX, {});
            const lead = this.expect(`${group} instruction`);
            const type = this.decode(COMMANDS[group], lead, `${group} instruction`, ErrorCode.UNRECOGNIZED_OPCODE, { group });
            const operand = takesOperand.has(type) ? this.readNumber(type) : null;
            this.emit(new Op(group, type, operand, this.start));
        }
        return { ops: this.ops, labels: this.labels };
    }

    private emit(op: Op): void {
        this.ops.push(op);
        // last MARK of a label wins
        if (op.type === OpType.MARK && op.operand !== null) {
            this.labels.set(op.operand, this.ops.length - 1);
        }
        if (this.trace) this.trace(op.display);
    }

    private expect(expected: string): Sym {
        const sym = this.decoder.next();
        if (sym === null) {
            throw new ParseError(ErrorCode.UNEXPECTED_END_OF_INPUT, { expected }, this.start);
        }
        return sym;
    }

    private decode<V>(code: PrefixCode<V>, lead: Sym, expected: string, miss: ErrorCode, params: ErrorParams): V {
        let key: string = lead;
        for (;;) {
            const hit = code.match(key);
            if (hit !== undefined) return hit;
            if (!code.isPrefix(key)) {
                throw new ParseError(miss, { ...params, key }, this.start);
            }
            key += this.expect(expected);
        }
    }

    // sign (TAB negative), then bits MSB first, terminated by LF
    private readNumber(type: OpType): bigint {
        const expected = `${type} operand`;
        const negative = this.expect(expected) === Sym.TAB;
        let n = 0n;
        for (;;) {
            const bit = this.expect(expected);
            if (bit === Sym.LF) break;
            n = n * 2n + (bit === Sym.TAB ? 1n : 0n);
        }
        return negative ? -n : n;
    }
}

export interface ParseOptions {
    trace?: Trace | null;
}

/** Assembles program bytes into a Program; labels are resolved as MARKs are read. */
export const create_program = (bytes: Buffer | Uint8Array, options: ParseOptions = {}): Program =>
    new Parser(bytes, options.trace ?? null).parse();
