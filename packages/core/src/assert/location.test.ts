import { describe, expect, it } from "vitest";
import { locateCaller, parseStackFrame } from "./location.js";

describe("parseStackFrame", () => {
  it("reads named and anonymous frames", () => {
    expect(parseStackFrame("    at total (/work/cart.ts:10:5)")).toEqual({ file: "/work/cart.ts", line: 10, column: 5 });
    expect(parseStackFrame("    at /work/cart.ts:3:1")).toEqual({ file: "/work/cart.ts", line: 3, column: 1 });
  });

  it("converts file URLs to paths", () => {
    expect(parseStackFrame("    at async run (file:///work/cart.ts:2:4)")).toEqual({
      file: "/work/cart.ts",
      line: 2,
      column: 4,
    });
  });

  it("ignores lines that are not frames", () => {
    expect(parseStackFrame("Error: boom")).toBeUndefined();
  });
});

describe("locateCaller", () => {
  it("skips runtime and dependency frames", () => {
    const stack = [
      "Error",
      "    at check (node:internal/process/task_queues:95:5)",
      "    at run (/work/node_modules/vitest/dist/index.js:1:1)",
      "    at test (/work/cart.test.ts:7:9)",
    ].join("\n");

    expect(locateCaller(stack)).toEqual({ file: "/work/cart.test.ts", line: 7, column: 9 });
  });

  it("returns undefined without a stack", () => {
    expect(locateCaller("")).toBeUndefined();
  });
});
