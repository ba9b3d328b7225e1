import { run } from "../src/index.js";
import type { RunOptions } from "../src/index.js";
import { BufferedOutput, StringInput } from "../src/io.js";

// Programs are written with S (space), T (tab) and L (line feed); any other
// character in the notation is dropped.
export const ws = (notation: string): Buffer =>
  Buffer.from(
    notation
      .replace(/[^STL]/g, "")
      .replace(/S/g, " ")
      .replace(/T/g, "\t")
      .replace(/L/g, "\n")
  );

export const num = (n: number | bigint): string => {
  const v = BigInt(n);
  const abs = v < 0n ? -v : v;
  const bits = abs === 0n ? "" : abs.toString(2).replace(/0/g, "S").replace(/1/g, "T");
  return `${v < 0n ? "T" : "S"}${bits}L`;
};

export const I = {
  push: (n: number | bigint) => `SS${num(n)}`,
  dup: "SLS",
  copy: (n: number) => `STS${num(n)}`,
  swap: "SLT",
  discard: "SLL",
  slide: (n: number) => `STL${num(n)}`,
  add: "TSSS",
  sub: "TSST",
  mul: "TSSL",
  div: "TSTS",
  mod: "TSTT",
  store: "TTS",
  retrieve: "TTT",
  mark: (n: number) => `LSS${num(n)}`,
  call: (n: number) => `LST${num(n)}`,
  jmp: (n: number) => `LSL${num(n)}`,
  jz: (n: number) => `LTS${num(n)}`,
  jn: (n: number) => `LTT${num(n)}`,
  ret: "LTL",
  end: "LLL",
  putchar: "TLSS",
  putnum: "TLST",
  readchar: "TLTS",
  readnum: "TLTT",
};

export const program = (...parts: string[]): Buffer => ws(parts.join(""));

export const exec = (parts: string[], input = "", options: RunOptions = {}) => {
  const output = new BufferedOutput();
  const result = run(program(...parts), { input: new StringInput(input), output, ...options });
  return { ...result, out: output.text() };
};

export const catchError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected an error to be thrown");
};
