import { argumentMismatchError } from "../error.js";
import {
  type ArrayValue,
  type CallContext,
  describeValueKind,
  floatValue,
  intValue,
  type MatrixValue,
  type RuntimeValue,
} from "../value.js";

// Shared argument guards for builtin implementations. The checker already
// rejects most of these; they protect calls made through `apply`.

export function expectNumber(call: CallContext, value: RuntimeValue): number {
  if (value.kind === "int" || value.kind === "float") {
    return value.value;
  }
  throw argumentMismatchError(call.name, "Int or Float", describeValueKind(value), call.span);
}

export function expectInt(call: CallContext, value: RuntimeValue): number {
  if (value.kind === "int") {
    return value.value;
  }
  throw argumentMismatchError(call.name, "Int", describeValueKind(value), call.span);
}

export function expectString(call: CallContext, value: RuntimeValue): string {
  if (value.kind === "string") {
    return value.value;
  }
  throw argumentMismatchError(call.name, "String", describeValueKind(value), call.span);
}

export function expectBool(call: CallContext, value: RuntimeValue): boolean {
  if (value.kind === "bool") {
    return value.value;
  }
  throw argumentMismatchError(call.name, "Bool", describeValueKind(value), call.span);
}

export function expectArray(call: CallContext, value: RuntimeValue): ArrayValue {
  if (value.kind === "array") {
    return value;
  }
  throw argumentMismatchError(call.name, "Array", describeValueKind(value), call.span);
}

export function expectMatrix(call: CallContext, value: RuntimeValue): MatrixValue {
  if (value.kind === "matrix") {
    return value;
  }
  throw argumentMismatchError(call.name, "Matrix", describeValueKind(value), call.span);
}

/**
 * Wraps a numeric result in the kind checked for this call. Falls back to
 * the kind of `sample` when the call was not annotated.
 */
export function numericResult(call: CallContext, total: number, sample?: RuntimeValue): RuntimeValue {
  const checked = call.resultType?.kind;
  const kind = checked === "int" || checked === "float" ? checked : sample?.kind;
  return kind === "float" ? floatValue(total) : intValue(total, call.span);
}

/** Reads `[x, y, z]` of Int or Float into plain numbers. */
export function expectVector(call: CallContext, value: RuntimeValue, size: number): number[] {
  const array = expectArray(call, value);
  if (array.elements.length !== size) {
    throw argumentMismatchError(
      call.name,
      `an array of ${size} numbers`,
      `an array of ${array.elements.length}`,
      call.span,
    );
  }
  return array.elements.map((element) => expectNumber(call, element));
}
