import { describe, expect, test } from "vitest";
import { analyzeSource } from "../src/pipeline.js";
import { createStandardLibrary } from "../src/stdlib/mod.js";
import { formatScheme } from "../src/type_printer.js";
import { arrayType, FLOAT, funcType, INT, type Type, TypeVarSupply } from "../src/types.js";
import { InferError, typeKey, unifyStandalone } from "../src/infer.js";

function analyze(source: string) {
  const { registry } = createStandardLibrary();
  return analyzeSource(source, { registry, supply: new TypeVarSupply() });
}

function inferTypes(source: string): Map<string, string> {
  const { inference } = analyze(source);
  return new Map(inference.summaries.map(({ name, scheme }) => [name, formatScheme(scheme)]));
}

function inferError(source: string): InferError {
  try {
    analyze(source);
  } catch (error) {
    if (error instanceof InferError) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected a type error for ${source}`);
}

describe("type inference", () => {
  test("infers arithmetic on literals", () => {
    expect(inferTypes("let x = 5 + 3").get("x")).toBe("Int");
    expect(inferTypes("let y = 1.5 * 2.0").get("y")).toBe("Float");
    expect(inferTypes('let s = "a" + "b"').get("s")).toBe("String");
    expect(inferTypes("let b = 1 < 2 && true").get("b")).toBe("Bool");
  });

  test("generalizes let-bound lambdas", () => {
    const types = inferTypes('let id = (x) => x\nlet a = id(5)\nlet b = id("a")');
    expect(types.get("id")).toBe("T -> T");
    expect(types.get("a")).toBe("Int");
    expect(types.get("b")).toBe("String");
  });

  test("builtins are instantiated per use", () => {
    const { inference } = analyze('println(1)\nprintln("a")');
    expect(inference.resultType).toEqual({ kind: "unit" });
  });

  test("carries class constraints into schemes", () => {
    const types = inferTypes(
      "let add = (a, b) => a + b\nlet power = (base, exponent) => base ^ exponent\nlet r = add(10, 5)\nlet s = add(\"x\", \"y\")",
    );
    expect(types.get("add")).toBe("Addable T => (T, T) -> T");
    expect(types.get("power")).toBe("Numeric T => (T, T) -> T");
    expect(types.get("r")).toBe("Int");
    expect(types.get("s")).toBe("String");
  });

  test("rejects a type outside the constraint's class", () => {
    const error = inferError("let add = (a, b) => a + b\nadd(true, false)");
    expect(error.detail).toEqual({ kind: "Mismatch", expected: "Addable", found: "Bool" });
  });

  test("types matrix literals by their elements", () => {
    const types = inferTypes(
      'let m = [[1, 2], [3, 4]]\nlet f = [[1.0, 2.0], [3.0, 4.0]]\nlet ragged = [[1, 2], [3]]\nlet words = [["a"], ["b"]]',
    );
    expect(types.get("m")).toBe("Matrix<Int>");
    expect(types.get("f")).toBe("Matrix<Float>");
    expect(types.get("ragged")).toBe("[[Int]]");
    expect(types.get("words")).toBe("[[String]]");
  });

  test("records literal shapes for the evaluator", () => {
    const { inference } = analyze('let m = [[1, 2]]\nlet w = [["a", "b"]]');
    expect([...inference.annotations.literalShapes.values()]).toEqual(["matrix", "array"]);
  });

  test("types matrix operations and indexing", () => {
    const types = inferTypes(
      "let m = [[1.0, 2.0], [3.0, 4.0]]\nlet p = m * m\nlet row = m[1]\nlet xs = [1, 2, 3]\nlet y = xs[0]",
    );
    expect(types.get("p")).toBe("Matrix<Float>");
    expect(types.get("row")).toBe("[Float]");
    expect(types.get("y")).toBe("Int");
  });

  test("types comprehensions and ranges", () => {
    const types = inferTypes(
      "let evens = [x * 2 | x in 1..10, x % 2 == 0]\nlet sums = [sum(row) | row in [[1, 2], [3, 4]]]",
    );
    expect(types.get("evens")).toBe("[Int]");
    expect(types.get("sums")).toBe("[Int]");
  });

  test("if branches must agree", () => {
    expect(inferTypes("let v = if true then 1 else 2").get("v")).toBe("Int");
    const error = inferError('let v = if true then 1 else "a"');
    expect(error.detail).toEqual({ kind: "Mismatch", expected: "Int", found: "String" });
  });

  test("reports unknown identifiers before evaluation", () => {
    const error = inferError("foo");
    expect(error.detail).toEqual({ kind: "UnknownIdentifier", name: "foo" });
    expect(error.format()).toBe("TypeError: Unknown identifier 'foo' at line 1, column 1");
  });

  test("the occurs check rejects self application", () => {
    const error = inferError("let f = (x) => x(x)");
    expect(error.kind).toBe("InfiniteType");
  });

  test("unifyStandalone performs the occurs check", () => {
    const variable: Type = { kind: "var", id: 0 };
    expect(() => unifyStandalone(variable, funcType([variable], INT))).toThrow(
      "Occurs check failed: T occurs in T -> Int",
    );
    expect(unifyStandalone(variable, INT).get(0)).toEqual(INT);
  });

  test("checks call arity", () => {
    const error = inferError("let f = (a, b) => a\nf(1)");
    expect(error.detail).toEqual({ kind: "ArityMismatch", expected: 2, found: 1 });
  });

  test("only mutable bindings can be assigned", () => {
    expect(inferError("let x = 1\nx = 2").detail).toEqual({ kind: "ImmutableAssignment", name: "x" });
    expect(inferTypes("let mut x = 1\nx = 2").get("x")).toBe("Int");
    expect(inferError('let mut x = 1\nx = "s"').detail).toEqual({
      kind: "Mismatch",
      expected: "Int",
      found: "String",
    });
  });

  test("mutable bindings stay monomorphic", () => {
    const error = inferError('let mut f = (x) => x\nlet a = f(1)\nlet b = f("s")');
    expect(error.detail).toEqual({ kind: "Mismatch", expected: "Int", found: "String" });
  });

  test("checks annotations", () => {
    expect(inferTypes("let n: Int = 5").get("n")).toBe("Int");
    expect(inferTypes("let f = (x: Float) -> Float => x * 2.0").get("f")).toBe("Float -> Float");
    expect(inferError('let n: Int = "a"').detail).toEqual({
      kind: "Mismatch",
      expected: "Int",
      found: "String",
    });
    expect(inferError("let n: Vector = 1").detail).toEqual({ kind: "UnknownIdentifier", name: "Vector" });
  });

  test("types struct literals and field access", () => {
    const types = inferTypes(
      "struct Point { x: Float, y: Float }\nlet p = Point { x: 1.0, y: 2.0 }\nlet px = p.x\nlet getx = (q) => q.x",
    );
    expect(types.get("p")).toBe("Point");
    expect(types.get("px")).toBe("Float");
    expect(types.get("getx")).toBe("Point -> Float");
  });

  test("struct literals need every field without a default", () => {
    const missing = inferError("struct Point { x: Float, y: Float }\nlet p = Point { x: 1.0 }");
    expect(missing.detail).toEqual({ kind: "ArityMismatch", expected: 2, found: 1 });
    expect(inferTypes("struct Point { x: Float, y: Float = 0.0 }\nlet p = Point { x: 1.0 }").get("p"))
      .toBe("Point");
    const unknown = inferError("struct Point { x: Float }\nlet p = Point { x: 1.0, z: 2.0 }");
    expect(unknown.detail).toEqual({ kind: "UnknownIdentifier", name: "z" });
  });

  test("typeclass methods require an instance", () => {
    const source = 'typeclass Show T { show: (T) -> String }\ninstance Show Int { show(x) = "int" }';
    const types = inferTypes(`${source}\nlet a = show(42)`);
    expect(types.get("a")).toBe("String");
    expect(inferError(`${source}\nshow(true)`).detail).toEqual({
      kind: "Mismatch",
      expected: "Show",
      found: "Bool",
    });
  });

  test("instance methods must match the class signature", () => {
    const error = inferError("typeclass Show T { show: (T) -> String }\ninstance Show Int { show(x) = x }");
    expect(error.detail).toEqual({ kind: "Mismatch", expected: "String", found: "Int" });
  });

  test("modules expose members qualified or imported", () => {
    const types = inferTypes(
      "module Geometry { let area = (w, h) => w * h }\nlet a = Geometry.area(2, 3)\nimport Geometry { area }\nlet b = area(2.0, 3.0)",
    );
    expect(types.get("a")).toBe("Int");
    expect(types.get("b")).toBe("Float");
  });

  test("imports of builtin modules check member names", () => {
    expect(inferTypes("import math { sqrt }\nlet r = sqrt(4.0)").get("r")).toBe("Float");
    expect(inferError("import nope").detail).toEqual({ kind: "UnknownIdentifier", name: "nope" });
    expect(inferError("import math { nope }").detail).toEqual({ kind: "UnknownIdentifier", name: "nope" });
  });

  test("types spawn, wait and parallel blocks", () => {
    const types = inferTypes(
      "let h = spawn { 1 + 2 }\nlet r = wait h\nlet rs = wait [spawn 1, spawn 2]\nparallel { let a = 1; let b = 2 }\nlet c = a + b",
    );
    expect(types.get("h")).toBe("Handle<Int>");
    expect(types.get("r")).toBe("Int");
    expect(types.get("rs")).toBe("[Int]");
    expect(types.get("c")).toBe("Int");
  });

  test("parallel inside an expression keeps its bindings local", () => {
    expect(inferTypes("let v = parallel { let a = 1; a + 1 }").get("v")).toBe("Int");
    expect(inferError("let v = parallel { let a = 1; a + 1 }\nlet w = a").detail).toEqual({
      kind: "UnknownIdentifier",
      name: "a",
    });
  });

  test("records the types chosen at builtin and method references", () => {
    const { inference } = analyze(
      "typeclass Default T { zero: () -> T }\ninstance Default Int { zero() = 0 }\nlet z: Int = zero()\nlet s = sum([1.5])",
    );
    expect([...inference.annotations.methodInstances.values()]).toEqual([
      { className: "Default", type: INT },
    ]);
    expect([...inference.annotations.builtinTypes.values()]).toEqual([
      funcType([arrayType(FLOAT)], FLOAT),
    ]);
  });

  test("physics worlds are opaque", () => {
    const types = inferTypes('let w = create_physics_world()\nlet id = add_rigid_body(w, "sphere", 1.0, [0.0, 5.0, 0.0])');
    expect(types.get("w")).toBe("PhysicsWorld");
    expect(types.get("id")).toBe("Int");
    expect(inferError("physics_step(1)").detail).toEqual({
      kind: "Mismatch",
      expected: "PhysicsWorld",
      found: "Int",
    });
  });

  test("typeKey names the head of a type", () => {
    expect(typeKey(INT)).toBe("Int");
    expect(typeKey(funcType([INT], INT))).toBe("Function");
  });
});
