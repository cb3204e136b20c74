import { describe, expect, test } from "vitest";
import { runFile } from "../src/runner.js";
import { RuntimeError } from "../src/error.js";

function run(source: string): string {
  return runFile(source).result;
}

function runtimeError(source: string): RuntimeError {
  try {
    runFile(source);
  } catch (error) {
    if (error instanceof RuntimeError) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected a runtime error for ${source}`);
}

describe("evaluation", () => {
  test("calls user functions", () => {
    const source = [
      "let add = (a, b) => a + b",
      "let multiply = (a, b) => a * b",
      "let power_func = (base, exponent) => base ^ exponent",
      "add(5, 10) + multiply(3, 4) + power_func(2, 3)",
    ].join("\n");
    expect(run(source)).toBe("35");
  });

  test("evaluates let-bound arithmetic", () => {
    expect(runFile("let x = 5 + 3").values).toEqual([{ name: "x", value: "8" }]);
  });

  test("recursive functions see their own binding", () => {
    const source = "let factorial = (n) => if n <= 1 then 1 else n * factorial(n - 1)\nfactorial(5)";
    expect(run(source)).toBe("120");
  });

  test("integer arithmetic truncates", () => {
    expect(run("-7 / 2")).toBe("-3");
    expect(run("7 % 3")).toBe("1");
    expect(run("2 ^ 10")).toBe("1024");
    expect(run("-2 ^ 2")).toBe("-4");
  });

  test("float arithmetic keeps a decimal point", () => {
    expect(run("1.0 / 4.0")).toBe("0.25");
    expect(run("3.0 * 2.0")).toBe("6.0");
  });

  test("Int results outside the exact range overflow", () => {
    const error = runtimeError("let factorial = (n) => if n <= 1 then 1 else n * factorial(n - 1)\nfactorial(25)");
    expect(error.kind).toBe("InvalidOperation");
    expect(error.message).toBe("integer overflow");
    expect(error.subject).toBe("factorial");
    expect(run("9007199254740990 + 1")).toBe("9007199254740991");
    expect(runtimeError("9007199254740993").format()).toBe(
      "RuntimeError: integer overflow at line 1, column 1",
    );
    expect(() => run("[[9007199254740991]] + [[1]]")).toThrow("integer overflow");
  });

  test("rejects negative Int exponents", () => {
    expect(() => run("2 ^ -1")).toThrow("negative exponent -1 for Int power");
  });

  test("multiplies matrices", () => {
    const source = "let a = [[1, 2], [3, 4]]\nlet b = [[5, 6], [7, 8]]\na * b";
    expect(run(source)).toBe("[[19, 22], [43, 50]]");
  });

  test("adds matrices elementwise", () => {
    expect(run("[[1.0, 2.0]] + [[0.5, 0.5]]")).toBe("[[1.5, 2.5]]");
  });

  test("rejects incompatible matrix shapes", () => {
    expect(() => run("[[1, 2, 3]] * [[1, 2]]")).toThrow("cannot multiply 1x3 by 1x2 matrix");
  });

  test("float equality tolerates rounding", () => {
    expect(run("0.1 + 0.2 == 0.3")).toBe("true");
    expect(run("0.1 + 0.2 != 0.3")).toBe("false");
  });

  test("closures keep the binding they captured", () => {
    expect(run("let x = 1\nlet f = () => x\nlet x = 2\nf() + x")).toBe("3");
  });

  test("mutable bindings can be reassigned", () => {
    expect(run("let mut count = 1\ncount = count + 4\ncount")).toBe("5");
  });

  test("logical operators short-circuit", () => {
    expect(run("let f = (x) => x / 0 == 1\nfalse && f(1)")).toBe("false");
    expect(run("let f = (x) => x / 0 == 1\ntrue || f(1)")).toBe("true");
  });

  test("parallel blocks bind into the enclosing scope", () => {
    expect(run("parallel { let a = 2; let b = 4 }\na + b")).toBe("6");
  });

  test("parallel rebinding leaves captured bindings alone", () => {
    const source = 'let x = 1\nlet f = () => x\nparallel { let x = "s" }';
    expect(run(`${source}\nf() + 1`)).toBe("2");
    expect(run(`${source}\nx`)).toBe("s");
  });

  test("spawn and wait return the task result", () => {
    expect(run("let h = spawn { 2 * 21 }\nwait h")).toBe("42");
    expect(run("wait [spawn 1, spawn 2]")).toBe("[1, 2]");
    expect(run("spawn 1")).toBe("<handle task>");
  });

  test("dispatches typeclass methods on the argument's type", () => {
    const source = [
      "struct Dog { name: String }",
      "typeclass Speak T { speak: (T) -> String }",
      'instance Speak Dog { speak(d) = "woof from " + d.name }',
      'instance Speak Int { speak(n) = "number " + str(n) }',
      '[speak(Dog { name: "rex" }), speak(3)]',
    ].join("\n");
    expect(run(source)).toBe('["woof from rex", "number 3"]');
  });

  test("picks the instance from the checked type when no argument carries it", () => {
    const zero = [
      "typeclass Default T { zero: () -> T }",
      "instance Default Int { zero() = 0 }",
      'instance Default String { zero() = "" }',
      "let z: Int = zero()",
      "z + 1",
    ].join("\n");
    expect(run(zero)).toBe("1");

    const conv = [
      "typeclass FromInt T { conv: (Int) -> T }",
      "instance FromInt Float { conv(n) = float(n) }",
      "let y: Float = conv(3)",
      "y",
    ].join("\n");
    expect(run(conv)).toBe("3.0");
  });

  test("struct literals fill defaults", () => {
    const source = "struct Point { x: Float, y: Float = 0.0 }\nlet p = Point { x: 2.5 }";
    expect(run(`${source}\np`)).toBe("Point { x: 2.5, y: 0.0 }");
    expect(run(`${source}\np.x`)).toBe("2.5");
  });

  test("modules are reachable qualified and imported", () => {
    const source = [
      "module Geometry { let area = (w, h) => w * h }",
      "import Geometry { area }",
      "[Geometry.area(2, 3), area(4, 5)]",
    ].join("\n");
    expect(run(source)).toBe("[6, 20]");
  });

  test("match takes the first arm whose guard holds", () => {
    const source = [
      "let classify = (n) => match n {",
      '  0 => "zero",',
      '  x if x < 0 => "negative",',
      '  _ => "positive"',
      "}",
      "[classify(0), classify(-4), classify(9)]",
    ].join("\n");
    expect(run(source)).toBe('["zero", "negative", "positive"]');
  });

  test("array patterns bind the rest", () => {
    const source = [
      "let head_or = (xs, d) => match xs {",
      "  [] => d,",
      "  [first, ..rest] => first",
      "}",
      "[head_or([4, 5], 0), head_or([], 7)]",
    ].join("\n");
    expect(run(source)).toBe("[4, 7]");
  });

  test("a match without a matching arm fails", () => {
    const source = 'let describe = (n) => match n { 1 => "one", 2 => "two" }\ndescribe(3)';
    expect(() => run(source)).toThrow("no match arm for 3");
  });

  test("comprehensions map, filter and nest", () => {
    expect(run("[x * x | x in [2, 4]]")).toBe("[4, 16]");
    expect(run("[x | x in 1..=8, x % 4 == 3]")).toBe("[3, 7]");
    expect(run("[a + b | b in [1, 2], a in [10, 20]]")).toBe("[11, 21, 12, 22]");
    expect(run("[sum(row) | row in [[1, 2], [3, 4]]]")).toBe("[3, 7]");
  });

  test("ranges exclude or include the end", () => {
    expect(run("0..3")).toBe("[0, 1, 2]");
    expect(run("0..=3")).toBe("[0, 1, 2, 3]");
  });

  test("higher-order builtins call back into closures", () => {
    expect(run("map([1, 2, 3], (x) => x * 10)")).toBe("[10, 20, 30]");
    expect(run("filter([1, 2, 3, 4], (x) => x % 2 == 0)")).toBe("[2, 4]");
    expect(run("reduce([1, 2, 3], 0, (acc, x) => acc + x)")).toBe("6");
  });

  test("strings concatenate and print without quotes", () => {
    expect(run('"ab" + "cd"')).toBe("abcd");
    expect(run('"hello"[1]')).toBe("e");
  });

  test("string length and indexing count code points", () => {
    expect(run('let s = "a😀"\ns[len(s) - 1]')).toBe("😀");
    expect(run('[c | c in "a😀"]')).toBe('["a", "😀"]');
  });

  test("indexing checks bounds", () => {
    expect(() => run("let xs = [1, 2, 3]\nxs[5]")).toThrow("Index 5 out of bounds for length 3");
  });

  test("errors raised inside a function name it", () => {
    const error = runtimeError("let f = (x) => x / 0\nf(1)");
    expect(error.kind).toBe("DivisionByZero");
    expect(error.format()).toBe("RuntimeError: Division by zero in 'f' at line 1, column 16");
  });

  test("top-level errors carry no subject", () => {
    expect(runtimeError("1 / 0").format()).toBe("RuntimeError: Division by zero at line 1, column 1");
  });

  test("print output is collected", () => {
    const result = runFile('print("hi")\nprintln(1 + 2)');
    expect(result.runtimeLogs).toEqual(["hi", "3"]);
    expect(result.result).toBe("()");
    expect(result.resultType).toBe("Unit");
  });

  test("reports bindings in definition order", () => {
    const result = runFile("let a = 2\nlet b = a * 3");
    expect(result.values).toEqual([
      { name: "a", value: "2" },
      { name: "b", value: "6" },
    ]);
    expect(result.types).toEqual([
      { name: "a", type: "Int" },
      { name: "b", type: "Int" },
    ]);
  });

  test("attributes are accepted and traced", () => {
    const result = runFile("@gpu let double = (x) => x * 2\ndouble(4)");
    expect(result.result).toBe("8");
    expect(result.traceLogs).toEqual(["[eval] ignoring @gpu on 'double'"]);
  });
});
