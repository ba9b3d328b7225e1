/**
 * Error catalog for the interpreter.
 * Every failure is raised as a WhitespaceError subclass carrying one of these codes.
 */

export enum ErrorCode {
  // malformed program, raised before anything runs
  UNEXPECTED_END_OF_INPUT = 'UNEXPECTED_END_OF_INPUT',
  UNRECOGNIZED_GROUP_PREFIX = 'UNRECOGNIZED_GROUP_PREFIX',
  UNRECOGNIZED_OPCODE = 'UNRECOGNIZED_OPCODE',
  // execution
  STACK_UNDERFLOW = 'STACK_UNDERFLOW',
  HEAP_INDEX_OUT_OF_RANGE = 'HEAP_INDEX_OUT_OF_RANGE',
  ARITHMETIC_FAULT = 'ARITHMETIC_FAULT',
  UNDEFINED_LABEL = 'UNDEFINED_LABEL',
  RETURN_WITHOUT_CALL = 'RETURN_WITHOUT_CALL',
  IO_ERROR = 'IO_ERROR',
  // configuration
  INVALID_OPTION = 'INVALID_OPTION',
}

export type ErrorParams = Record<string, string | number | bigint>;

export interface ErrorDefinition {
  code: ErrorCode;
  format: (params: ErrorParams) => string;
}

function makeErrorDef(
  code: ErrorCode,
  format: (params: ErrorParams) => string
): ErrorDefinition {
  return { code, format };
}

export const ERROR_CATALOG: Record<ErrorCode, ErrorDefinition> = {
  [ErrorCode.UNEXPECTED_END_OF_INPUT]: makeErrorDef(
    ErrorCode.UNEXPECTED_END_OF_INPUT,
    ({ expected }) => `unexpected end of input while reading ${expected}`
  ),
  [ErrorCode.UNRECOGNIZED_GROUP_PREFIX]: makeErrorDef(
    ErrorCode.UNRECOGNIZED_GROUP_PREFIX,
    ({ key }) => `unrecognized instruction group "${key}"`
  ),
  [ErrorCode.UNRECOGNIZED_OPCODE]: makeErrorDef(
    ErrorCode.UNRECOGNIZED_OPCODE,
    ({ group, key }) => `unrecognized ${group} instruction "${key}"`
  ),
  [ErrorCode.STACK_UNDERFLOW]: makeErrorDef(
    ErrorCode.STACK_UNDERFLOW,
    ({ depth, size }) => `stack underflow: depth ${depth} with ${size} element(s)`
  ),
  [ErrorCode.HEAP_INDEX_OUT_OF_RANGE]: makeErrorDef(
    ErrorCode.HEAP_INDEX_OUT_OF_RANGE,
    ({ address, limit }) => `heap address ${address} out of range (limit ${limit})`
  ),
  [ErrorCode.ARITHMETIC_FAULT]: makeErrorDef(
    ErrorCode.ARITHMETIC_FAULT,
    ({ operation }) => `${operation} by zero`
  ),
  [ErrorCode.UNDEFINED_LABEL]: makeErrorDef(
    ErrorCode.UNDEFINED_LABEL,
    ({ label }) => `undefined label ${label}`
  ),
  [ErrorCode.RETURN_WITHOUT_CALL]: makeErrorDef(
    ErrorCode.RETURN_WITHOUT_CALL,
    () => `return without call`
  ),
  [ErrorCode.IO_ERROR]: makeErrorDef(
    ErrorCode.IO_ERROR,
    ({ reason }) => `i/o error: ${reason}`
  ),
  [ErrorCode.INVALID_OPTION]: makeErrorDef(
    ErrorCode.INVALID_OPTION,
    ({ name, value }) => `invalid option ${name}: ${value}`
  ),
};

export const formatError = (code: ErrorCode, params: ErrorParams = {}): string =>
  ERROR_CATALOG[code].format(params);

export class WhitespaceError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// Raised by the assembler; offset is the byte where the failing instruction began.
export class ParseError extends WhitespaceError {
  constructor(
    code: ErrorCode,
    params: ErrorParams,
    public readonly offset: number
  ) {
    super(code, `${formatError(code, params)} (at byte ${offset})`);
  }
}

// Raised by the machine. pc and op are filled in by the interpreter once it
// knows which instruction was executing.
export class RuntimeError extends WhitespaceError {
  constructor(
    code: ErrorCode,
    public readonly detail: string,
    public readonly pc: number | null = null,
    public readonly op: string | null = null
  ) {
    super(code, pc === null ? detail : `${detail} (at pc=${pc}, op=${op})`);
  }

  static of(code: ErrorCode, params: ErrorParams = {}): RuntimeError {
    return new RuntimeError(code, formatError(code, params));
  }

  locate(pc: number, op: string): RuntimeError {
    return new RuntimeError(this.code, this.detail, pc, op);
  }
}

export class ConfigError extends WhitespaceError {
  constructor(name: string, value: unknown) {
    super(ErrorCode.INVALID_OPTION, formatError(ErrorCode.INVALID_OPTION, { name, value: String(value) }));
  }
}
