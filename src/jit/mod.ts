import type { LambdaExpr } from "../ast.js";
import type { Type } from "../types.js";
import { argumentMismatchError, formatLanguageError } from "../error.js";
import {
  boolValue,
  type CompiledFunction,
  describeValueKind,
  floatValue,
  intValue,
  type RuntimeValue,
} from "../value.js";
import { analyzeEligibility, type EligibleFunction, type ScalarKind } from "./eligibility.js";
import { generateSource, jitRuntime } from "./codegen.js";

export { analyzeEligibility } from "./eligibility.js";
export type { Eligibility } from "./eligibility.js";
export { generateSource } from "./codegen.js";

export interface JitOptions {
  trace?: (line: string) => void;
}

/**
 * Compiles an eligible lambda to a JavaScript function. Returns undefined
 * when the lambda is not eligible or compilation fails; the caller keeps
 * tree-walking in that case.
 */
export function compileLambda(
  name: string,
  lambda: LambdaExpr,
  type: Type | undefined,
  options: JitOptions = {},
): CompiledFunction | undefined {
  const eligibility = analyzeEligibility(name, lambda, type);
  if (!eligibility.eligible) {
    options.trace?.(`[jit] ${name}: not eligible (${eligibility.reason})`);
    return undefined;
  }
  try {
    const compiled = buildFunction(name, lambda, eligibility);
    options.trace?.(`[jit] ${name}: compiled`);
    return compiled;
  } catch (error) {
    options.trace?.(`[jit] ${name}: compilation failed, using interpreter (${formatLanguageError(error)})`);
    return undefined;
  }
}

function buildFunction(name: string, lambda: LambdaExpr, signature: EligibleFunction): CompiledFunction {
  const factory = new Function("rt", generateSource(name, lambda, signature));
  const native: unknown = Reflect.apply(factory, undefined, [jitRuntime]);
  if (typeof native !== "function") {
    throw new Error(`generated code for '${name}' did not produce a function`);
  }

  return (args: RuntimeValue[]): RuntimeValue => {
    const raw = args.map((arg, index) => toScalar(name, arg, signature.params[index]));
    const result: unknown = Reflect.apply(native, undefined, raw);
    return fromScalar(name, result, signature.result);
  };
}

function toScalar(name: string, value: RuntimeValue, kind: ScalarKind): number | boolean {
  if (value.kind === kind && (value.kind === "int" || value.kind === "float" || value.kind === "bool")) {
    return value.value;
  }
  throw argumentMismatchError(name, kindName(kind), describeValueKind(value));
}

function fromScalar(name: string, value: unknown, kind: ScalarKind): RuntimeValue {
  if (kind === "bool" && typeof value === "boolean") {
    return boolValue(value);
  }
  if (kind === "int" && typeof value === "number") {
    return intValue(value);
  }
  if (kind === "float" && typeof value === "number") {
    return floatValue(value);
  }
  throw argumentMismatchError(name, kindName(kind), typeof value);
}

function kindName(kind: ScalarKind): string {
  return kind === "int" ? "Int" : kind === "float" ? "Float" : "Bool";
}
