import fs from 'fs';
import { ErrorCode, RuntimeError } from './errors.js';

export interface Output {
    write(text: string): void;
}

export interface Input {
    /** Code point of the next character, or null at end of input. */
    readChar(): number | null;
    /** Next whitespace-delimited decimal integer. */
    readNumber(): bigint;
}

export class StdoutOutput implements Output {
    write(text: string): void {
        process.stdout.write(text);
    }
}

export class BufferedOutput implements Output {
    private readonly chunks: string[] = [];

    write(text: string): void {
        this.chunks.push(text);
    }

    text(): string {
        return this.chunks.join('');
    }
}

const isSpace = (c: number): boolean => c === 32 || (c >= 9 && c <= 13);
const isDigit = (c: number): boolean => c >= 48 && c <= 57;

// UTF-8 sequence length from its lead byte
const utf8Length = (lead: number): number => {
    if (lead >= 0xF0) return 4;
    if (lead >= 0xE0) return 3;
    return 2;
};

/** Byte-at-a-time reader with one byte of push-back. */
export abstract class ByteInput implements Input {
    private pending: number | null = null;

    protected abstract pull(): number | null;

    private nextByte(): number | null {
        if (this.pending !== null) {
            const b = this.pending;
            this.pending = null;
            return b;
        }
        return this.pull();
    }

    readChar(): number | null {
        const lead = this.nextByte();
        if (lead === null) return null;
        if (lead < 0x80) return lead;
        // stray continuation byte
        if (lead < 0xC0) return 0xFFFD;
        const len = utf8Length(lead);

        const bytes = [lead];
        while (bytes.length < len) {
            const b = this.nextByte();
            if (b === null) break;
            if ((b & 0xC0) !== 0x80) {
                this.pending = b;
                break;
            }
            bytes.push(b);
        }
        const ch = Buffer.from(bytes).toString('utf8').codePointAt(0);
        return ch === undefined ? 0xFFFD : ch;
    }

    readNumber(): bigint {
        let c = this.nextByte();
        while (c !== null && isSpace(c)) c = this.nextByte();
        if (c === null) {
            throw RuntimeError.of(ErrorCode.IO_ERROR, { reason: 'end of input while reading a number' });
        }

        let text = '';
        if (c === 43 || c === 45) { // '+' '-'
            text = c === 45 ? '-' : '';
            c = this.nextByte();
        }
        while (c !== null && isDigit(c)) {
            text += String.fromCharCode(c);
            c = this.nextByte();
        }
        this.pending = c;

        if (text === '' || text === '-') {
            throw RuntimeError.of(ErrorCode.IO_ERROR, { reason: 'expected a decimal integer' });
        }
        return BigInt(text);
    }
}

export class StringInput extends ByteInput {
    private readonly bytes: Uint8Array;
    private pos = 0;

    constructor(source: string | Uint8Array) {
        super();
        this.bytes = typeof source === 'string' ? Buffer.from(source, 'utf8') : source;
    }

    protected pull(): number | null {
        return this.pos < this.bytes.length ? this.bytes[this.pos++] : null;
    }
}

export class StdinInput extends ByteInput {
    private readonly buf = Buffer.alloc(1);

    constructor(private readonly fd: number = 0) {
        super();
    }

    protected pull(): number | null {
        for (;;) {
            try {
                const n = fs.readSync(this.fd, this.buf, 0, 1, null);
                return n === 0 ? null : this.buf[0];
            } catch (e) {
                const code = e instanceof Error && 'code' in e ? e.code : undefined;
                // blocking reads are assumed; a non-blocking stdin retries until data arrives
                if (code === 'EAGAIN') continue;
                if (code === 'EOF') return null;
                throw RuntimeError.of(ErrorCode.IO_ERROR, {
                    reason: e instanceof Error ? e.message : 'Unknown error',
                });
            }
        }
    }
}
