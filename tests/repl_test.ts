import { describe, expect, test } from "vitest";
import { hasUnclosedBrackets, Repl, type ReplIO } from "../tools/repl.js";

interface FakeIO extends ReplIO {
  output: string[];
  errors: string[];
}

function fakeIO(files: Record<string, string> = {}): FakeIO {
  const output: string[] = [];
  const errors: string[] = [];
  return {
    output,
    errors,
    print: (line) => output.push(line),
    error: (line) => errors.push(line),
    readFile: (path) => {
      const content = files[path];
      if (content === undefined) {
        throw new Error(`missing ${path}`);
      }
      return content;
    },
  };
}

describe("Repl", () => {
  test("echoes bindings and expression results", () => {
    const io = fakeIO();
    const repl = new Repl(io);
    repl.handleInput("let x = 42");
    repl.handleInput("x + 1");
    repl.handleInput('print("hi")');
    expect(io.output).toEqual(["let x: Int = 42", "- : Int = 43", "hi"]);
  });

  test("reports errors and keeps going", () => {
    const io = fakeIO();
    const repl = new Repl(io);
    repl.handleInput("let x = 1");
    repl.handleInput("1 / 0");
    repl.handleInput("y");
    repl.handleInput("x");
    expect(io.errors).toEqual([
      "RuntimeError: Division by zero at line 1, column 1",
      "TypeError: Unknown identifier 'y' at line 1, column 1",
    ]);
    expect(io.output).toEqual(["let x: Int = 1", "- : Int = 1"]);
  });

  test("collects lines until brackets close", () => {
    const io = fakeIO();
    const repl = new Repl(io);
    expect(repl.prompt).toBe("mx> ");
    repl.handleInput("let f = (x) => {");
    expect(repl.prompt).toBe(".. ");
    repl.handleInput("  x * 2");
    repl.handleInput("}");
    expect(repl.prompt).toBe("mx> ");
    expect(io.output).toEqual(["let f: Arithmetic T => T -> T = <closure f>"]);
  });

  test(":type and :env describe bindings", () => {
    const io = fakeIO();
    const repl = new Repl(io);
    repl.handleInput(":env");
    repl.handleInput("let n = 2.5");
    repl.handleInput(":type n");
    repl.handleInput(":type missing");
    repl.handleInput(":env");
    expect(io.output).toEqual([
      "(no bindings)",
      "let n: Float = 2.5",
      "n : Float",
      "Identifier 'missing' not found",
      "Defined bindings:",
      "n : Float = 2.5",
    ]);
  });

  test(":clear starts over", () => {
    const io = fakeIO();
    const repl = new Repl(io);
    repl.handleInput("let n = 1");
    repl.handleInput(":clear");
    repl.handleInput(":type n");
    expect(io.output).toEqual(["let n: Int = 1", "Context cleared", "Identifier 'n' not found"]);
  });

  test(":load evaluates a file", () => {
    const io = fakeIO({ "prog.mx": "let n = 3" });
    const repl = new Repl(io);
    repl.handleInput(":load prog.mx");
    repl.handleInput(":load nope.mx");
    expect(io.output).toEqual(["let n: Int = 3", "Loaded prog.mx"]);
    expect(io.errors).toEqual(["Failed to load nope.mx: Error: missing nope.mx"]);
  });

  test("unknown commands and quitting", () => {
    const io = fakeIO();
    const repl = new Repl(io);
    expect(repl.handleInput(":bogus")).toBe(true);
    expect(repl.handleInput(":end")).toBe(true);
    expect(io.output).toEqual([
      "Unknown command: :bogus. Type :help for available commands.",
      "Not in multiline mode",
    ]);
    expect(repl.handleInput(":quit")).toBe(false);
  });
});

describe("hasUnclosedBrackets", () => {
  test("counts brackets outside strings", () => {
    expect(hasUnclosedBrackets("[1, (2")).toBe(true);
    expect(hasUnclosedBrackets("f(1)")).toBe(false);
    expect(hasUnclosedBrackets('"{"')).toBe(false);
    expect(hasUnclosedBrackets('"\\"" + {')).toBe(true);
  });
});
