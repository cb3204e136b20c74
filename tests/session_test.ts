import { describe, expect, test } from "vitest";
import { Session } from "../src/session.js";
import { formatRuntimeValue } from "../src/value_printer.js";

function show(session: Session, source: string): string {
  return formatRuntimeValue(session.run(source).value);
}

describe("Session", () => {
  test("later entries see earlier bindings", () => {
    const session = new Session();
    session.run("let x = 5");
    const entry = session.run("let y = x * 2");
    expect(entry.values).toEqual([{ name: "y", value: "10" }]);
    expect(entry.types).toEqual([{ name: "y", type: "Int" }]);
    expect(session.typeOf("y")).toBe("Int");
  });

  test("reports the type of a bare expression", () => {
    const session = new Session();
    const entry = session.run("1 + 2");
    expect(entry.resultType).toBe("Int");
    expect(formatRuntimeValue(entry.value)).toBe("3");
  });

  test("a runtime error leaves earlier bindings intact", () => {
    const session = new Session();
    session.run("let x = 1");
    expect(() => session.run("let x = 2\nlet boom = 1 / 0")).toThrow("Division by zero");
    expect(show(session, "x")).toBe("1");
    expect(session.typeOf("boom")).toBeUndefined();
  });

  test("a type error leaves the checker state intact", () => {
    const session = new Session();
    session.run("let x = 1");
    expect(() => session.run('let x = "s"\nlet bad = x + true')).toThrow("Type mismatch");
    expect(session.typeOf("x")).toBe("Int");
  });

  test("matrix literals from different entries keep their own shapes", () => {
    const session = new Session();
    session.run("let a = [[1, 2], [3, 4]]");
    session.run('let b = [["x", "y"]]');
    expect(show(session, "a * a")).toBe("[[7, 10], [15, 22]]");
    expect(show(session, "b")).toBe('[["x", "y"]]');
  });

  test("functions defined earlier stay callable", () => {
    const session = new Session();
    session.run("let square = (x) => x * x");
    expect(show(session, "square(7)")).toBe("49");
    expect(show(session, "square(1.5)")).toBe("2.25");
  });

  test("userBindings lists only session names", () => {
    const session = new Session();
    session.run("let a = 1\nlet f = (x) => x");
    expect(session.userBindings()).toEqual([
      { name: "a", type: "Int" },
      { name: "f", type: "T -> T" },
    ]);
  });

  test("check does not commit anything", () => {
    const session = new Session();
    const { inference } = session.check("let z = 1");
    expect(inference.summaries.map(({ name }) => name)).toEqual(["z"]);
    expect(session.typeOf("z")).toBeUndefined();
  });

  test("reset forgets every binding", () => {
    const session = new Session();
    session.run("let a = 1");
    session.reset();
    expect(session.typeOf("a")).toBeUndefined();
    expect(session.userBindings()).toEqual([]);
    expect(() => session.run("a")).toThrow("Unknown identifier 'a'");
  });

  test("sessions do not share state", () => {
    const first = new Session();
    const second = new Session();
    first.run("let q = 1");
    expect(second.typeOf("q")).toBeUndefined();
  });

  test("print goes to onPrint", () => {
    const lines: string[] = [];
    const session = new Session({ onPrint: (text) => lines.push(text) });
    session.run('print("hey")\nprint([1.0, 2.5])');
    expect(lines).toEqual(["hey", "[1.0, 2.5]"]);
  });
});
