import { describe, expect, test } from "vitest";
import { checkFile, runFile } from "../src/runner.js";
import { RuntimeError } from "../src/error.js";

describe("runFile", () => {
  test("returns types, values and the final result", () => {
    const result = runFile("let m = [[1.0, 0.0], [0.0, 2.0]]\nlet v = m * m\nv[1]");
    expect(result.types).toEqual([
      { name: "m", type: "Matrix<Float>" },
      { name: "v", type: "Matrix<Float>" },
    ]);
    expect(result.values[1]).toEqual({ name: "v", value: "[[1.0, 0.0], [0.0, 4.0]]" });
    expect(result.result).toBe("[0.0, 4.0]");
    expect(result.resultType).toBe("[Float]");
  });

  test("forwards print output while collecting it", () => {
    const forwarded: string[] = [];
    const result = runFile('println("a")', { onPrint: (text) => forwarded.push(text) });
    expect(result.runtimeLogs).toEqual(["a"]);
    expect(forwarded).toEqual(["a"]);
  });

  test("language errors pass through unchanged", () => {
    expect(() => runFile("1 / 0")).toThrow(RuntimeError);
  });

  test("other failures are wrapped", () => {
    const failingSink = (): void => {
      throw new Error("sink closed");
    };
    expect(() => runFile('print("x")', { onPrint: failingSink })).toThrow(
      "Unhandled error: sink closed",
    );
  });

  test("trace capture can be turned off", () => {
    const result = runFile("@gpu let f = (x) => x\nf(1)", {
      trace: { print: false, capture: false },
    });
    expect(result.traceLogs).toEqual([]);
  });
});

describe("checkFile", () => {
  test("lists top-level types without evaluating", () => {
    expect(checkFile("let a = 1\nlet f = (x) => x\nlet boom = 1 / 0")).toEqual([
      { name: "a", type: "Int" },
      { name: "f", type: "T -> T" },
      { name: "boom", type: "Int" },
    ]);
  });

  test("reports type errors", () => {
    expect(() => checkFile('let a = 1 + "b"')).toThrow(
      "Type mismatch: expected Int, found String",
    );
  });
});
