import { describe, expect, test } from "vitest";
import { parseSource } from "../src/pipeline.js";
import { ParseError } from "../src/error.js";
import type { Declaration, Expr } from "../src/ast.js";

function declarations(source: string): Declaration[] {
  return parseSource(source).declarations;
}

function expression(source: string): Expr {
  const [decl] = declarations(source);
  if (decl.kind !== "expr_statement") {
    throw new Error(`expected an expression statement, got ${decl.kind}`);
  }
  return decl.expression;
}

function parseError(source: string): ParseError {
  try {
    parseSource(source);
  } catch (error) {
    if (error instanceof ParseError) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected a parse error for ${source}`);
}

// Compact s-expression view of an expression tree
function shape(expr: Expr): string {
  switch (expr.kind) {
    case "literal":
      return expr.literal.kind === "unit" ? "()" : String(expr.literal.value);
    case "identifier":
      return expr.name;
    case "binary":
      return `(${expr.operator} ${shape(expr.left)} ${shape(expr.right)})`;
    case "unary":
      return `(${expr.operator} ${shape(expr.operand)})`;
    case "call":
      return `(call ${shape(expr.callee)}${expr.arguments.map((arg) => ` ${shape(arg)}`).join("")})`;
    case "index":
      return `(index ${shape(expr.target)} ${shape(expr.index)})`;
    case "range":
      return `(${expr.inclusive ? "..=" : ".."} ${shape(expr.start)} ${shape(expr.end)})`;
    default:
      return expr.kind;
  }
}

describe("parser", () => {
  test("parses a let declaration", () => {
    const [decl] = declarations("let x = 5 + 3");
    expect(decl.kind).toBe("let");
    if (decl.kind !== "let") return;
    expect(decl.name).toBe("x");
    expect(decl.mutable).toBe(false);
    expect(decl.isRecursive).toBe(false);
    expect(shape(decl.value)).toBe("(+ 5 3)");
  });

  test("applies operator precedence and associativity", () => {
    expect(shape(expression("1 + 2 * 3"))).toBe("(+ 1 (* 2 3))");
    expect(shape(expression("10 - 4 - 3"))).toBe("(- (- 10 4) 3)");
    expect(shape(expression("2 ^ 3 ^ 2"))).toBe("(^ 2 (^ 3 2))");
    expect(shape(expression("-2 ^ 2"))).toBe("(- (^ 2 2))");
    expect(shape(expression("a < b && b < c || d"))).toBe("(|| (&& (< a b) (< b c)) d)");
    expect(shape(expression("(1 + 2) * 3"))).toBe("(* (+ 1 2) 3)");
  });

  test("parses calls, indexing and ranges", () => {
    expect(shape(expression("f(1, g(2))[0]"))).toBe("(index (call f 1 (call g 2)) 0)");
    expect(shape(expression("0..n + 1"))).toBe("(.. 0 (+ n 1))");
    expect(shape(expression("1..=5"))).toBe("(..= 1 5)");
  });

  test("a parenthesis on the next line starts a new statement", () => {
    const decls = declarations("let a = f\n(1)");
    expect(decls.map((decl) => decl.kind)).toEqual(["let", "expr_statement"]);
  });

  test("recognizes matrix literals by their rows", () => {
    const matrix = expression("[[1, 2], [3, 4]]");
    expect(matrix.kind).toBe("matrix");
    if (matrix.kind === "matrix") {
      expect(matrix.rows.map((row) => row.map(shape))).toEqual([["1", "2"], ["3", "4"]]);
    }
    expect(expression("[[1], [2, 3]]").kind).toBe("array");
    expect(expression("[1, 2]").kind).toBe("array");
    expect(expression("[]").kind).toBe("array");
  });

  test("parses comprehensions with generators and filters", () => {
    const expr = expression("[x * 2 | x in 1..5, x > 2]");
    expect(expr.kind).toBe("comprehension");
    if (expr.kind !== "comprehension") return;
    expect(shape(expr.body)).toBe("(* x 2)");
    expect(expr.generators.map((g) => [g.variable, shape(g.iterable)])).toEqual([["x", "(.. 1 5)"]]);
    expect(expr.filters.map(shape)).toEqual(["(> x 2)"]);
  });

  test("parses lambda forms", () => {
    const pair = expression("(a, b) => a + b");
    expect(pair.kind).toBe("lambda");
    if (pair.kind === "lambda") {
      expect(pair.parameters.map((p) => p.name)).toEqual(["a", "b"]);
      expect(shape(pair.body)).toBe("(+ a b)");
    }

    const single = expression("x => x");
    expect(single.kind).toBe("lambda");

    const annotated = expression("(x: Int) -> Int => x");
    expect(annotated.kind).toBe("lambda");
    if (annotated.kind === "lambda") {
      expect(annotated.parameters[0].annotation).toMatchObject({ kind: "type_ref", name: "Int" });
      expect(annotated.returnAnnotation).toMatchObject({ kind: "type_ref", name: "Int" });
    }

    expect(expression("() => 1").kind).toBe("lambda");
  });

  test("parses if, match and blocks", () => {
    const conditional = expression("if x > 0 then 1 else 2");
    expect(conditional.kind).toBe("if");

    const match = expression(`match xs {
  [] => 0,
  [first, ..rest] if first > 0 => first,
  _ => -1
}`);
    expect(match.kind).toBe("match");
    if (match.kind !== "match") return;
    expect(match.arms.map((arm) => arm.pattern.kind)).toEqual(["array", "array", "wildcard"]);
    const second = match.arms[1].pattern;
    if (second.kind === "array") {
      expect(second.elements).toHaveLength(1);
      expect(second.rest).toMatchObject({ kind: "variable", name: "rest" });
    }
    expect(match.arms[1].guard && shape(match.arms[1].guard)).toBe("(> first 0)");

    const block = expression("{ let a = 1; let b = 2; a + b }");
    expect(block.kind).toBe("block");
    if (block.kind === "block") {
      expect(block.statements.map((s) => s.kind)).toEqual(["let_statement", "let_statement"]);
      expect(block.result && shape(block.result)).toBe("(+ a b)");
    }
  });

  test("parses structs with defaults and struct literals", () => {
    const [struct, binding] = declarations(
      "struct Point { x: Float, y: Float = 0.0 }\nlet p = Point { x: 1.0 }",
    );
    expect(struct.kind).toBe("struct");
    if (struct.kind === "struct") {
      expect(struct.fields.map((f) => [f.name, f.defaultValue !== undefined])).toEqual([
        ["x", false],
        ["y", true],
      ]);
    }
    if (binding.kind === "let") {
      expect(binding.value).toMatchObject({ kind: "struct_literal", name: "Point" });
    }
  });

  test("parses typeclasses and instances", () => {
    const [typeclass, instance] = declarations(
      "typeclass Show T { show: (T) -> String }\ninstance Show Int { show(x) = str(x) }",
    );
    expect(typeclass).toMatchObject({ kind: "typeclass", name: "Show", typeParam: "T" });
    if (typeclass.kind === "typeclass") {
      expect(typeclass.methods[0].type).toMatchObject({
        kind: "type_fn",
        parameters: [{ kind: "type_var", name: "T" }],
        result: { kind: "type_ref", name: "String" },
      });
    }
    expect(instance).toMatchObject({ kind: "instance", className: "Show" });
    if (instance.kind === "instance") {
      expect(instance.methods[0].parameters.map((p) => p.name)).toEqual(["x"]);
    }
  });

  test("parses modules, imports and attributes", () => {
    const decls = declarations(
      "module Geometry { let area = (w, h) => w * h }\nimport Geometry { area }\nimport math\n@gpu let f = (x) => x",
    );
    expect(decls.map((decl) => decl.kind)).toEqual(["module", "import", "import", "let"]);
    expect(decls[1]).toMatchObject({ module: "Geometry", names: ["area"] });
    expect(decls[2]).toMatchObject({ module: "math", names: undefined });
    expect(decls[3]).toMatchObject({ name: "f", attributes: ["gpu"], isRecursive: true });
  });

  test("parses parallel blocks, spawn and wait", () => {
    const parallel = expression("parallel { let a = 1; let b = 2 }");
    expect(parallel.kind).toBe("parallel");
    if (parallel.kind === "parallel") {
      expect(parallel.statements).toHaveLength(2);
    }
    const [spawn, wait] = declarations("let h = spawn { 1 + 2 }\nwait h");
    if (spawn.kind === "let") {
      expect(spawn.value).toMatchObject({ kind: "spawn", body: { kind: "block" } });
    }
    if (wait.kind === "expr_statement") {
      expect(wait.expression).toMatchObject({ kind: "wait", target: { kind: "identifier", name: "h" } });
    }
  });

  test("numbers nodes from the requested first id", () => {
    const program = parseSource("let x = 1", 100);
    expect(program.declarations[0].id).toBe(102);
    expect(program.nextNodeId).toBe(103);
  });

  test("reports the unexpected token", () => {
    const error = parseError("let = 5");
    expect(error.detail).toEqual({ kind: "UnexpectedToken", expected: "identifier", found: "=" });
    expect(error.format()).toBe(
      "ParseError: Expected identifier, but got symbol '=' at line 1, column 5",
    );
  });

  test("reports unterminated constructs at their opening bracket", () => {
    const paren = parseError("(1 + 2");
    expect(paren.detail).toEqual({ kind: "UnterminatedConstruct", construct: "parenthesized expression" });
    expect(paren.message).toBe("Unterminated parenthesized expression opened at line 1");

    const block = parseError("let f = {\n  let x = 1");
    expect(block.detail).toEqual({ kind: "UnterminatedConstruct", construct: "block" });
    expect(block.column).toBe(9);
  });
});
