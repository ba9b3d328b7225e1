import { CharCode, Sym } from './types.js';

const symMap: Record<number, Sym> = {
    [CharCode.SPACE]: Sym.SPACE,
    [CharCode.TAB]: Sym.TAB,
    [CharCode.LF]: Sym.LF,
};

/**
 * Cursor over program bytes that yields only the three significant symbols.
 * Every other byte is skipped.
 */
export class SymbolDecoder {
    private pos = 0;
    private last = -1;

    constructor(private readonly bytes: Buffer | Uint8Array) { }

    /** Next significant symbol, or null at end of input. */
    next(): Sym | null {
        while (this.pos < this.bytes.length) {
            const c = this.bytes[this.pos++] & 0xFF;
            const sym = symMap[c];
            if (sym !== undefined) {
                this.last = this.pos - 1;
                return sym;
            }
        }
        this.last = this.bytes.length;
        return null;
    }

    /** Byte offset of the symbol most recently returned by next(). */
    get offset(): number {
        return this.last;
    }
}
