import type { Expr, LambdaExpr } from "../ast.js";
import { divisionByZeroError, invalidOperationError } from "../error.js";
import type { EligibleFunction, ScalarKind } from "./eligibility.js";

/** Runtime helpers the generated code calls through its `rt` parameter. */
export interface JitRuntime {
  divInt(a: number, b: number): number;
  divFloat(a: number, b: number): number;
  mod(a: number, b: number): number;
  powInt(a: number, b: number): number;
  checkInt(value: number): number;
  floatEq(a: number, b: number): boolean;
}

export const jitRuntime: JitRuntime = {
  divInt(a, b) {
    if (b === 0) {
      throw divisionByZeroError();
    }
    return Math.trunc(a / b);
  },
  divFloat(a, b) {
    if (b === 0) {
      throw divisionByZeroError();
    }
    return a / b;
  },
  mod(a, b) {
    if (b === 0) {
      throw divisionByZeroError();
    }
    return a % b;
  },
  powInt(a, b) {
    if (b < 0) {
      throw invalidOperationError(`negative exponent ${b} for Int power`);
    }
    return jitRuntime.checkInt(Math.pow(a, b));
  },
  checkInt(value) {
    if (!Number.isSafeInteger(value)) {
      throw invalidOperationError("integer overflow");
    }
    return value;
  },
  floatEq(a, b) {
    return Math.abs(a - b) <= Number.EPSILON * Math.max(1, Math.abs(a), Math.abs(b));
  },
};

interface EmitContext {
  self: string;
  params: Map<string, { slot: string; kind: ScalarKind }>;
  result: ScalarKind;
}

interface Emitted {
  code: string;
  kind: ScalarKind;
}

/**
 * Emits the source of a factory `(rt) => function`, for an eligible lambda.
 *
 * ```js
 * "use strict";
 * return function jit_factorial(p0) { return ((p0 <= 1) ? 1 : rt.checkInt((p0 * jit_factorial(rt.checkInt((p0 - 1)))))); };
 * ```
 */
export function generateSource(name: string, lambda: LambdaExpr, signature: EligibleFunction): string {
  const self = `jit_${name.replace(/[^A-Za-z0-9_]/g, "_")}`;
  const params = new Map<string, { slot: string; kind: ScalarKind }>();
  lambda.parameters.forEach((param, index) => {
    params.set(param.name, { slot: `p${index}`, kind: signature.params[index] });
  });
  const body = emitExpr(lambda.body, { self, params, result: signature.result });
  const slots = lambda.parameters.map((_, index) => `p${index}`).join(", ");
  return `"use strict";\nreturn function ${self}(${slots}) { return ${body.code}; };`;
}

function emitExpr(expr: Expr, ctx: EmitContext): Emitted {
  switch (expr.kind) {
    case "literal": {
      const literal = expr.literal;
      if (literal.kind === "bool") {
        return { code: literal.value ? "true" : "false", kind: "bool" };
      }
      if (literal.kind === "int" || literal.kind === "float") {
        return { code: numberLiteral(literal.value, literal.kind), kind: literal.kind };
      }
      break;
    }
    case "identifier": {
      const param = ctx.params.get(expr.name);
      if (param) {
        return { code: param.slot, kind: param.kind };
      }
      break;
    }
    case "unary": {
      const operand = emitExpr(expr.operand, ctx);
      return { code: `(${expr.operator}${operand.code})`, kind: operand.kind };
    }
    case "binary":
      return emitBinary(expr.operator, emitExpr(expr.left, ctx), emitExpr(expr.right, ctx));
    case "if": {
      if (!expr.elseBranch) {
        break;
      }
      const condition = emitExpr(expr.condition, ctx);
      const thenBranch = emitExpr(expr.thenBranch, ctx);
      const elseBranch = emitExpr(expr.elseBranch, ctx);
      return {
        code: `(${condition.code} ? ${thenBranch.code} : ${elseBranch.code})`,
        kind: thenBranch.kind,
      };
    }
    case "block":
      if (expr.result && expr.statements.length === 0) {
        return emitExpr(expr.result, ctx);
      }
      break;
    case "call": {
      const args = expr.arguments.map((arg) => emitExpr(arg, ctx).code);
      return { code: `${ctx.self}(${args.join(", ")})`, kind: ctx.result };
    }
    default:
      break;
  }
  throw new Error(`cannot compile ${expr.kind} expression`);
}

function emitBinary(operator: string, left: Emitted, right: Emitted): Emitted {
  const isFloat = left.kind === "float";
  switch (operator) {
    case "+":
    case "-":
    case "*": {
      const code = `(${left.code} ${operator} ${right.code})`;
      return { code: isFloat ? code : `rt.checkInt(${code})`, kind: left.kind };
    }
    case "/":
      return {
        code: `rt.${isFloat ? "divFloat" : "divInt"}(${left.code}, ${right.code})`,
        kind: left.kind,
      };
    case "%":
      return { code: `rt.mod(${left.code}, ${right.code})`, kind: left.kind };
    case "^":
      return {
        code: isFloat
          ? `Math.pow(${left.code}, ${right.code})`
          : `rt.powInt(${left.code}, ${right.code})`,
        kind: left.kind,
      };
    case "==":
    case "!=": {
      const equal = isFloat
        ? `rt.floatEq(${left.code}, ${right.code})`
        : `(${left.code} === ${right.code})`;
      return { code: operator === "==" ? equal : `(!${equal})`, kind: "bool" };
    }
    case "<":
    case "<=":
    case ">":
    case ">=":
    case "&&":
    case "||":
      return { code: `(${left.code} ${operator} ${right.code})`, kind: "bool" };
    default:
      throw new Error(`cannot compile operator '${operator}'`);
  }
}

function numberLiteral(value: number, kind: "int" | "float"): string {
  if (!Number.isFinite(value)) {
    throw new Error(`cannot compile non-finite literal ${value}`);
  }
  if (kind === "int" && !Number.isSafeInteger(value)) {
    throw new Error(`cannot compile out-of-range Int literal ${value}`);
  }
  return value < 0 ? `(${value})` : String(value);
}
