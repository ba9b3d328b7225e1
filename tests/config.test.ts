import { describe, expect, it } from "vitest";
import { DEFAULT_OPTIONS, resolveOptions } from "../src/config.js";
import { ConfigError, ErrorCode } from "../src/errors.js";
import { BufferedOutput, StringInput, StdinInput, StdoutOutput } from "../src/io.js";
import { catchError } from "./helpers.js";

describe("resolveOptions", () => {
  it("fills in defaults", () => {
    const opts = resolveOptions();
    expect(opts.verbose).toBe(false);
    expect(opts.dryRun).toBe(false);
    expect(opts.heapSize).toBe(DEFAULT_OPTIONS.HEAP_SIZE);
    expect(opts.heapSize).toBe(128);
    expect(opts.maxHeapSize).toBe(DEFAULT_OPTIONS.MAX_HEAP_SIZE);
    expect(opts.input).toBeInstanceOf(StdinInput);
    expect(opts.output).toBeInstanceOf(StdoutOutput);
  });

  it("keeps supplied streams", () => {
    const input = new StringInput("");
    const output = new BufferedOutput();
    const opts = resolveOptions({ input, output, verbose: true, dryRun: true });
    expect(opts.input).toBe(input);
    expect(opts.output).toBe(output);
    expect(opts.verbose).toBe(true);
    expect(opts.dryRun).toBe(true);
  });

  it.each([
    [{ heapSize: -1 }, "invalid option heapSize: -1"],
    [{ heapSize: 1.5 }, "invalid option heapSize: 1.5"],
    [{ maxHeapSize: 0 }, "invalid option maxHeapSize: 0"],
    [{ heapSize: 64, maxHeapSize: 32 }, "invalid option heapSize: 64 exceeds maxHeapSize 32"],
  ])("rejects %o", (options, message) => {
    const err = catchError(() => resolveOptions(options));
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({ code: ErrorCode.INVALID_OPTION, message });
  });
});
