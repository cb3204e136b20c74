import { describe, expect, test } from "vitest";
import { BuiltinRegistry, forall, typeVar } from "../src/builtins.js";
import { analyzeSource } from "../src/pipeline.js";
import { createEvaluatorState, evaluateProgram } from "../src/eval.js";
import { createStandardLibrary } from "../src/stdlib/mod.js";
import { expectInt } from "../src/stdlib/args.js";
import { formatScheme } from "../src/type_printer.js";
import { funcType, INT, TypeVarSupply } from "../src/types.js";
import { formatRuntimeValue } from "../src/value_printer.js";
import { intValue } from "../src/value.js";

const T = typeVar(0);

describe("builtin registry", () => {
  test("register stores scheme and implementation together", () => {
    const registry = new BuiltinRegistry();
    const value = registry.register(
      "double",
      forall(funcType([INT], INT)),
      ([n], call) => intValue(expectInt(call, n) * 2),
    );
    expect(value).toMatchObject({ kind: "native", name: "double", arity: 1 });
    expect(registry.has("double")).toBe(true);
    expect(registry.lookupValue("double")).toBe(value);
    expect(registry.moduleOf("double")).toBe("core");
    expect(registry.typeEnv().get("double")).toBe(registry.lookupScheme("double"));
  });

  test("a second registration of a name fails and keeps the first", () => {
    const registry = new BuiltinRegistry();
    const first = registry.register("double", forall(funcType([INT], INT)), ([n]) => n);
    expect(() => registry.register("double", forall(funcType([INT, INT], INT)), ([n]) => n))
      .toThrow("Builtin 'double' is already registered");
    expect(registry.lookupValue("double")).toBe(first);
  });

  test("builtins must have function types", () => {
    const registry = new BuiltinRegistry();
    expect(() => registry.register("x", forall(INT), () => intValue(1)))
      .toThrow("Builtin 'x' must have a function type");
    expect(registry.has("x")).toBe(false);
  });

  test("constants must have closed types", () => {
    const registry = new BuiltinRegistry();
    expect(() => registry.registerConstant("bad", T, intValue(1)))
      .toThrow("Builtin constant 'bad' must have a closed type");
    registry.registerConstant("answer", INT, intValue(42), { module: "math" });
    expect(registry.moduleMembers("math")).toEqual(["answer"]);
  });

  test("forall quantifies free variables and records constraints", () => {
    const scheme = forall(funcType([T], T), ["Numeric", T]);
    expect(scheme.quantifiers).toEqual([0]);
    expect(scheme.constraints).toEqual([{ className: "Numeric", typeVar: 0 }]);
    expect(formatScheme(scheme)).toBe("Numeric T => T -> T");
    expect(() => forall(funcType([T], T), ["Numeric", INT]))
      .toThrow("Constraint Numeric must name a type variable");
  });

  test("the standard library groups builtins by module", () => {
    const { registry } = createStandardLibrary();
    expect(registry.moduleNames()).toEqual(["core", "math", "physics"]);
    expect(registry.moduleOf("sqrt")).toBe("math");
    expect(registry.moduleOf("physics_step")).toBe("physics");
    expect(registry.entries()).toHaveLength(registry.typeEnv().size);
  });

  test("a builtin registered once is visible to the checker and the evaluator", () => {
    const { registry } = createStandardLibrary();
    registry.register(
      "double",
      forall(funcType([INT], INT)),
      ([n], call) => intValue(expectInt(call, n) * 2),
      { module: "math" },
    );
    const { program, inference } = analyzeSource("let r = double(21)", {
      registry,
      supply: new TypeVarSupply(),
    });
    expect(formatScheme(inference.summaries[0].scheme)).toBe("Int");
    const result = evaluateProgram(program, createEvaluatorState(registry), {
      annotations: inference.annotations,
    });
    expect(formatRuntimeValue(result.value)).toBe("42");
  });
});
