import { Group, OpType, Sym } from './types.js';

const { SPACE: S, TAB: T, LF: L } = Sym;

/** A prefix-free code: symbol strings mapped to values. */
export class PrefixCode<V> {
    private readonly codes: ReadonlyMap<string, V>;
    private readonly prefixes = new Set<string>();

    constructor(entries: Array<[string, V]>) {
        this.codes = new Map(entries);
        for (const key of this.codes.keys()) {
            for (let i = 1; i < key.length; i++) {
                this.prefixes.add(key.slice(0, i));
            }
        }
    }

    match(key: string): V | undefined {
        return this.codes.get(key);
    }

    isPrefix(key: string): boolean {
        return this.prefixes.has(key);
    }
}

export const GROUPS = new PrefixCode<Group>([
    [S, Group.STACK],
    [L, Group.FLOW],
    [T + S, Group.ARITH],
    [T + T, Group.HEAP],
    [T + L, Group.IO],
]);

export const COMMANDS: Record<Group, PrefixCode<OpType>> = {
    [Group.STACK]: new PrefixCode<OpType>([
        [S, OpType.PUSH],
        [L + S, OpType.DUP],
        [L + T, OpType.SWAP],
        [L + L, OpType.DISCARD],
        [T + S, OpType.COPY],
        [T + L, OpType.SLIDE],
    ]),
    [Group.ARITH]: new PrefixCode<OpType>([
        [S + S, OpType.ADD],
        [S + T, OpType.SUB],
        [S + L, OpType.MUL],
        [T + S, OpType.DIV],
        [T + T, OpType.MOD],
    ]),
    [Group.HEAP]: new PrefixCode<OpType>([
        [S, OpType.STORE],
        [T, OpType.RETRIEVE],
    ]),
    [Group.FLOW]: new PrefixCode<OpType>([
        [S + S, OpType.MARK],
        [S + T, OpType.CALL],
        [S + L, OpType.JMP],
        [T + S, OpType.JMP_IF_ZERO],
        [T + T, OpType.JMP_IF_NEG],
        [T + L, OpType.RET],
        [L + L, OpType.END],
    ]),
    [Group.IO]: new PrefixCode<OpType>([
        [S + S, OpType.PUTCHAR],
        [S + T, OpType.PUTNUM],
        [T + S, OpType.READCHAR],
        [T + T, OpType.READNUM],
    ]),
};

// Commands followed by a number literal
export const takesOperand = new Set<OpType>([
    OpType.PUSH,
    OpType.COPY,
    OpType.SLIDE,
    OpType.MARK,
    OpType.CALL,
    OpType.JMP,
    OpType.JMP_IF_ZERO,
    OpType.JMP_IF_NEG,
]);
