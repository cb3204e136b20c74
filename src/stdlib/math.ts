import { type BuiltinRegistry, forall, typeVar } from "../builtins.js";
import { arrayType, FLOAT, funcType, INT, matrixType } from "../types.js";
import {
  arrayValue,
  type CallContext,
  floatValue,
  intValue,
  type MatrixValue,
  type RuntimeValue,
} from "../value.js";
import { invalidOperationError } from "../error.js";
import { expectArray, expectInt, expectMatrix, expectNumber, numericResult } from "./args.js";

const T = typeVar(0);

export function registerMath(registry: BuiltinRegistry): void {
  const module = { module: "math" };

  registry.registerConstant("pi", FLOAT, floatValue(Math.PI), module);
  registry.registerConstant("e", FLOAT, floatValue(Math.E), module);
  registry.registerConstant("tau", FLOAT, floatValue(2 * Math.PI), module);

  // Shape-preserving: Int in, Int out
  const preserving: [string, (n: number) => number][] = [
    ["abs", Math.abs],
    ["floor", Math.floor],
    ["ceil", Math.ceil],
    ["round", Math.round],
  ];
  for (const [name, fn] of preserving) {
    registry.register(
      name,
      forall(funcType([T], T), ["Numeric", T]),
      ([value], call) => sameKind(value, fn(expectNumber(call, value))),
      module,
    );
  }

  const toFloat: [string, (n: number, call: CallContext) => number][] = [
    ["sqrt", (n, call) => {
      if (n < 0) {
        throw invalidOperationError(`sqrt of negative number ${n}`, call.span);
      }
      return Math.sqrt(n);
    }],
    ["sin", Math.sin],
    ["cos", Math.cos],
    ["tan", Math.tan],
    ["exp", Math.exp],
    ["log", (n, call) => {
      if (n <= 0) {
        throw invalidOperationError(`log of non-positive number ${n}`, call.span);
      }
      return Math.log(n);
    }],
  ];
  for (const [name, fn] of toFloat) {
    registry.register(
      name,
      forall(funcType([T], FLOAT), ["Numeric", T]),
      ([value], call) => floatValue(fn(expectNumber(call, value), call)),
      module,
    );
  }

  registry.register(
    "pow",
    forall(funcType([T, T], FLOAT), ["Numeric", T]),
    ([base, exponent], call) =>
      floatValue(Math.pow(expectNumber(call, base), expectNumber(call, exponent))),
    module,
  );

  registry.register(
    "max",
    forall(funcType([T, T], T), ["Numeric", T]),
    ([a, b], call) => (expectNumber(call, a) >= expectNumber(call, b) ? a : b),
    module,
  );

  registry.register(
    "min",
    forall(funcType([T, T], T), ["Numeric", T]),
    ([a, b], call) => (expectNumber(call, a) <= expectNumber(call, b) ? a : b),
    module,
  );

  registry.register(
    "clamp",
    forall(funcType([T, T, T], T), ["Numeric", T]),
    ([value, low, high], call) => {
      const n = expectNumber(call, value);
      const lo = expectNumber(call, low);
      const hi = expectNumber(call, high);
      if (lo > hi) {
        throw invalidOperationError(`clamp bounds out of order: ${lo} > ${hi}`, call.span);
      }
      return sameKind(value, Math.min(Math.max(n, lo), hi));
    },
    module,
  );

  registerVectorHelpers(registry, module);
  registerMatrixHelpers(registry, module);
}

function registerVectorHelpers(registry: BuiltinRegistry, module: { module: string }): void {
  registry.register(
    "dot",
    forall(funcType([arrayType(T), arrayType(T)], T), ["Numeric", T]),
    ([a, b], call) => {
      const [left, right] = pairedVectors(call, a, b);
      const total = left.reduce((acc, n, i) => acc + n * right[i], 0);
      return numericResult(call, total, a.kind === "array" ? a.elements[0] : undefined);
    },
    module,
  );

  registry.register(
    "cross",
    forall(funcType([arrayType(T), arrayType(T)], arrayType(T)), ["Numeric", T]),
    ([a, b], call) => {
      const [u, v] = pairedVectors(call, a, b);
      if (u.length !== 3) {
        throw invalidOperationError("cross product needs 3-component vectors", call.span);
      }
      const components = [
        u[1] * v[2] - u[2] * v[1],
        u[2] * v[0] - u[0] * v[2],
        u[0] * v[1] - u[1] * v[0],
      ];
      const isFloat = firstKind(a) === "float";
      return arrayValue(components.map((n) => (isFloat ? floatValue(n) : intValue(n))));
    },
    module,
  );

  registry.register(
    "magnitude",
    forall(funcType([arrayType(T)], FLOAT), ["Numeric", T]),
    ([vector], call) => floatValue(magnitude(numbers(call, vector))),
    module,
  );

  registry.register(
    "normalize",
    forall(funcType([arrayType(T)], arrayType(FLOAT)), ["Numeric", T]),
    ([vector], call) => {
      const components = numbers(call, vector);
      const length = magnitude(components);
      if (length === 0) {
        throw invalidOperationError("cannot normalize a zero-length vector", call.span);
      }
      return arrayValue(components.map((n) => floatValue(n / length)));
    },
    module,
  );

  registry.register(
    "distance",
    forall(funcType([arrayType(T), arrayType(T)], FLOAT), ["Numeric", T]),
    ([a, b], call) => {
      const [left, right] = pairedVectors(call, a, b);
      return floatValue(magnitude(left.map((n, i) => n - right[i])));
    },
    module,
  );

  registry.register(
    "lerp",
    forall(funcType([FLOAT, FLOAT, FLOAT], FLOAT)),
    ([a, b, t], call) => {
      const from = expectNumber(call, a);
      return floatValue(from + (expectNumber(call, b) - from) * expectNumber(call, t));
    },
    module,
  );
}

function registerMatrixHelpers(registry: BuiltinRegistry, module: { module: string }): void {
  registry.register(
    "transpose",
    forall(funcType([matrixType(T)], matrixType(T))),
    ([value], call) => {
      const matrix = expectMatrix(call, value);
      const width = matrix.rows[0]?.length ?? 0;
      const rows: number[][] = [];
      for (let col = 0; col < width; col++) {
        rows.push(matrix.rows.map((row) => row[col]));
      }
      return { kind: "matrix", element: matrix.element, rows };
    },
    module,
  );

  registry.register(
    "scale",
    forall(funcType([matrixType(T), T], matrixType(T)), ["Numeric", T]),
    ([value, factor], call) => {
      const matrix = expectMatrix(call, value);
      const k = expectNumber(call, factor);
      return mapMatrix(matrix, (n) => n * k);
    },
    module,
  );

  registry.register(
    "rows",
    forall(funcType([matrixType(T)], INT)),
    ([value], call) => intValue(expectMatrix(call, value).rows.length),
    module,
  );

  registry.register(
    "cols",
    forall(funcType([matrixType(T)], INT)),
    ([value], call) => intValue(expectMatrix(call, value).rows[0]?.length ?? 0),
    module,
  );

  registry.register(
    "identity",
    forall(funcType([INT], matrixType(FLOAT))),
    ([size], call) => {
      const n = expectInt(call, size);
      if (n <= 0) {
        throw invalidOperationError(`identity size must be positive, got ${n}`, call.span);
      }
      const rows = Array.from({ length: n }, (_, i) =>
        Array.from({ length: n }, (_, j) => (i === j ? 1 : 0))
      );
      return { kind: "matrix", element: "float", rows };
    },
    module,
  );
}

function sameKind(template: RuntimeValue, n: number): RuntimeValue {
  return template.kind === "float" ? floatValue(n) : intValue(n);
}

function mapMatrix(matrix: MatrixValue, fn: (n: number) => number): MatrixValue {
  return {
    kind: "matrix",
    element: matrix.element,
    rows: matrix.rows.map((row) => row.map(fn)),
  };
}

function numbers(call: CallContext, value: RuntimeValue): number[] {
  return expectArray(call, value).elements.map((item) => expectNumber(call, item));
}

function pairedVectors(call: CallContext, a: RuntimeValue, b: RuntimeValue): [number[], number[]] {
  const left = numbers(call, a);
  const right = numbers(call, b);
  if (left.length !== right.length) {
    throw invalidOperationError(
      `vector length mismatch: ${left.length} and ${right.length}`,
      call.span,
    );
  }
  return [left, right];
}

function firstKind(value: RuntimeValue): string | undefined {
  return value.kind === "array" ? value.elements[0]?.kind : undefined;
}

function magnitude(components: number[]): number {
  return Math.sqrt(components.reduce((acc, n) => acc + n * n, 0));
}
