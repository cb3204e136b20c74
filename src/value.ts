import type { Expr, SourceSpan } from "./ast.js";
import type { Type } from "./types.js";
import { invalidOperationError, undefinedVariableError } from "./error.js";

export type RuntimeValue =
  | IntValue
  | FloatValue
  | BoolValue
  | StringValue
  | UnitValue
  | ArrayValue
  | MatrixValue
  | StructValue
  | ClosureValue
  | NativeFunctionValue
  | HandleValue
  | TaskValue;

export interface IntValue {
  kind: "int";
  value: number;
}

export interface FloatValue {
  kind: "float";
  value: number;
}

export interface BoolValue {
  kind: "bool";
  value: boolean;
}

export interface StringValue {
  kind: "string";
  value: string;
}

export interface UnitValue {
  kind: "unit";
}

export interface ArrayValue {
  kind: "array";
  elements: RuntimeValue[];
}

/** Dense numeric matrix; `element` records whether entries are Int or Float. */
export interface MatrixValue {
  kind: "matrix";
  element: "int" | "float";
  rows: number[][];
}

export interface StructValue {
  kind: "struct";
  name: string;
  fields: Map<string, RuntimeValue>;
}

/** A JIT-compiled body taking and returning runtime values. */
export type CompiledFunction = (args: RuntimeValue[]) => RuntimeValue;

export interface ClosureValue {
  kind: "closure";
  name?: string;
  parameters: string[];
  body: Expr;
  env: Environment;
  compiled?: CompiledFunction;
}

/** What a builtin implementation can reach back into while it runs. */
export interface CallContext {
  name: string;
  span?: SourceSpan;
  /** Result type checked for this call, when the reference was annotated. */
  resultType?: Type;
  apply(fn: RuntimeValue, args: RuntimeValue[]): RuntimeValue;
  print(text: string): void;
}

export type NativeImpl = (args: RuntimeValue[], call: CallContext) => RuntimeValue;

export interface NativeFunctionValue {
  kind: "native";
  name: string;
  arity: number;
  impl: NativeImpl;
  // Set on the copy handed out for one annotated reference
  type?: Type;
}

/** Opaque reference to state owned outside the evaluator (physics worlds). */
export interface HandleValue {
  kind: "handle";
  owner: string;
  id: number;
}

/** What `spawn` returns: the already computed result, typed `Handle<T>`. */
export interface TaskValue {
  kind: "task";
  result: RuntimeValue;
}

// An absent value marks a slot reserved for a recursive binding
export interface Slot {
  value?: RuntimeValue;
}

export interface Environment {
  readonly parent: Environment | null;
  readonly bindings: Map<string, Slot>;
}

export function createEnvironment(
  parent: Environment | null = null,
): Environment {
  return {
    parent,
    bindings: new Map(),
  };
}

export function bindValue(
  env: Environment,
  name: string,
  value: RuntimeValue,
): void {
  env.bindings.set(name, { value });
}

/** Reserve `name` in `env` before its value exists. */
export function declareSlot(env: Environment, name: string): void {
  env.bindings.set(name, {});
}

export function updateValue(
  env: Environment,
  name: string,
  value: RuntimeValue,
): boolean {
  const slot = env.bindings.get(name);
  if (slot) {
    slot.value = value;
    return true;
  }
  if (env.parent) {
    return updateValue(env.parent, name, value);
  }
  return false;
}

export function lookupValue(env: Environment, name: string, span?: SourceSpan): RuntimeValue {
  let current: Environment | null = env;
  while (current) {
    const slot = current.bindings.get(name);
    if (slot) {
      if (!slot.value) {
        break;
      }
      return slot.value;
    }
    current = current.parent;
  }
  throw undefinedVariableError(name, span);
}

/** Copies the slots of one frame so a failed REPL entry can be undone. */
export function snapshotBindings(env: Environment): Map<string, Slot> {
  const copy = new Map<string, Slot>();
  for (const [name, slot] of env.bindings) {
    copy.set(name, { value: slot.value });
  }
  return copy;
}

export function restoreBindings(env: Environment, snapshot: Map<string, Slot>): void {
  env.bindings.clear();
  for (const [name, slot] of snapshot) {
    env.bindings.set(name, slot);
  }
}

export const UNIT_VALUE: UnitValue = Object.freeze({ kind: "unit" });

/** Int values stay within the range a double holds exactly. */
export function intValue(value: number, span?: SourceSpan): IntValue {
  if (!Number.isSafeInteger(value)) {
    throw invalidOperationError("integer overflow", span);
  }
  return { kind: "int", value };
}

export function floatValue(value: number): FloatValue {
  return { kind: "float", value };
}

export function boolValue(value: boolean): BoolValue {
  return { kind: "bool", value };
}

export function stringValue(value: string): StringValue {
  return { kind: "string", value };
}

export function arrayValue(elements: RuntimeValue[]): ArrayValue {
  return { kind: "array", elements };
}

/** Human readable kind used in argument mismatch diagnostics. */
export function describeValueKind(value: RuntimeValue): string {
  switch (value.kind) {
    case "int":
      return "Int";
    case "float":
      return "Float";
    case "bool":
      return "Bool";
    case "string":
      return "String";
    case "unit":
      return "Unit";
    case "array":
      return "Array";
    case "matrix":
      return "Matrix";
    case "struct":
      return value.name;
    case "closure":
    case "native":
      return "Function";
    case "handle":
    case "task":
      return "Handle";
  }
}
