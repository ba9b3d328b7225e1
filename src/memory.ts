import { ErrorCode, RuntimeError } from './errors.js';

const underflow = (depth: number | bigint, size: number): RuntimeError =>
    RuntimeError.of(ErrorCode.STACK_UNDERFLOW, { depth, size });

/** Value stack; depth 0 is the top. */
export class Stack<T> {
    private readonly items: T[] = [];

    get length(): number {
        return this.items.length;
    }

    push(value: T): void {
        this.items.push(value);
    }

    pop(): T {
        const value = this.get(0);
        this.items.length--;
        return value;
    }

    get(depth: number): T {
        if (depth < 0 || depth >= this.items.length) {
            throw underflow(depth, this.items.length);
        }
        return this.items[this.items.length - 1 - depth];
    }

    swap(): void {
        const below = this.get(1);
        const n = this.items.length;
        this.items[n - 2] = this.items[n - 1];
        this.items[n - 1] = below;
    }

    copy(depth: bigint): void {
        this.push(this.get(this.checkDepth(depth)));
    }

    /** Drops `count` elements beneath the top, keeping the top. */
    slide(count: bigint): void {
        const n = this.checkDepth(count);
        const top = this.items.length - 1;
        this.items.splice(top - n, n);
    }

    toString(): string {
        return `[${this.items.join(' ')}]`;
    }

    toArray(): T[] {
        return [...this.items];
    }

    // n + 1 elements must be present
    private checkDepth(depth: bigint): number {
        if (depth < 0n || depth >= BigInt(this.items.length)) {
            throw underflow(depth, this.items.length);
        }
        return Number(depth);
    }
}

/** Zero-filled cells; grows on writes, never on reads. */
export class Heap {
    private cells: bigint[];

    constructor(size: number, private readonly maxSize: number) {
        this.cells = new Array<bigint>(size).fill(0n);
    }

    get length(): number {
        return this.cells.length;
    }

    get(address: bigint): bigint {
        return this.cells[this.index(address, this.cells.length)];
    }

    put(address: bigint, value: bigint): void {
        const idx = this.index(address, this.maxSize);
        if (idx >= this.cells.length) {
            this.grow(idx + 1);
        }
        this.cells[idx] = value;
    }

    private grow(min: number): void {
        const size = Math.min(this.maxSize, Math.max(min, this.cells.length * 2));
        const prev = this.cells.length;
        this.cells.length = size;
        this.cells.fill(0n, prev);
    }

    private index(address: bigint, limit: number): number {
        if (address < 0n || address >= BigInt(limit)) {
            throw RuntimeError.of(ErrorCode.HEAP_INDEX_OUT_OF_RANGE, { address, limit });
        }
        return Number(address);
    }
}
