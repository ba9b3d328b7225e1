// src/types.ts
export enum Group {
  STACK = 'STACK',
  ARITH = 'ARITH',
  HEAP = 'HEAP',
  FLOW = 'FLOW',
  IO = 'IO',
}

export enum OpType {
  PUSH = 'PUSH',
  DUP = 'DUP',
  COPY = 'COPY',
  SWAP = 'SWAP',
  DISCARD = 'DISCARD',
  SLIDE = 'SLIDE',
  ADD = 'ADD',
  SUB = 'SUB',
  MUL = 'MUL',
  DIV = 'DIV',
  MOD = 'MOD',
  STORE = 'STORE',
  RETRIEVE = 'RETRIEVE',
  MARK = 'MARK',
  CALL = 'CALL',
  JMP = 'JMP',
  JMP_IF_ZERO = 'JMP_IF_ZERO',
  JMP_IF_NEG = 'JMP_IF_NEG',
  RET = 'RET',
  END = 'END',
  PUTCHAR = 'PUTCHAR',
  PUTNUM = 'PUTNUM',
  READCHAR = 'READCHAR',
  READNUM = 'READNUM',
}

// Significant symbols, spelled the way prefix-code keys are written.
export enum Sym {
  SPACE = 'S',
  TAB = 'T',
  LF = 'L',
}

export enum CharCode {
  TAB = 9,    // '\t'
  LF = 10,    // '\n'
  SPACE = 32, // ' '
}

export class Op {
  readonly display: string;

  constructor(
    public readonly group: Group,
    public readonly type: OpType,
    public readonly operand: bigint | null = null,
    public readonly offset: number = 0
  ) {
    this.display = operand === null ? type : `${type} ${operand}`;
  }
}

export interface Program {
  readonly ops: readonly Op[];
  // label value -> index of its MARK in ops
  readonly labels: ReadonlyMap<bigint, number>;
}

export type Trace = (line: string) => void;
