import type { Expr, LambdaExpr } from "../ast.js";
import type { Type } from "../types.js";

export type ScalarKind = "int" | "float" | "bool";

export interface EligibleFunction {
  eligible: true;
  params: ScalarKind[];
  result: ScalarKind;
}

export interface IneligibleFunction {
  eligible: false;
  reason: string;
}

export type Eligibility = EligibleFunction | IneligibleFunction;

const ARITHMETIC = new Set(["+", "-", "*", "/", "%", "^"]);
const COMPARISON = new Set(["==", "!=", "<", "<=", ">", ">="]);
const LOGICAL = new Set(["&&", "||"]);

export function scalarKind(type: Type): ScalarKind | undefined {
  return type.kind === "int" || type.kind === "float" || type.kind === "bool" ? type.kind : undefined;
}

/**
 * Decides whether a let-bound lambda only uses arithmetic, comparisons,
 * conditionals and calls to itself over scalar parameters.
 */
export function analyzeEligibility(
  name: string,
  lambda: LambdaExpr,
  type: Type | undefined,
): Eligibility {
  if (!type || type.kind !== "func") {
    return { eligible: false, reason: "no checked function type" };
  }
  const params: ScalarKind[] = [];
  for (const param of type.params) {
    const kind = scalarKind(param);
    if (!kind) {
      return { eligible: false, reason: "parameters must be Int, Float or Bool" };
    }
    params.push(kind);
  }
  const result = scalarKind(type.result);
  if (!result) {
    return { eligible: false, reason: "result must be Int, Float or Bool" };
  }

  const paramNames = new Set(lambda.parameters.map((param) => param.name));
  const reason = findUnsupported(lambda.body, name, paramNames, lambda.parameters.length);
  if (reason) {
    return { eligible: false, reason };
  }
  return { eligible: true, params, result };
}

function findUnsupported(
  expr: Expr,
  self: string,
  params: Set<string>,
  arity: number,
): string | undefined {
  const visit = (node: Expr): string | undefined => findUnsupported(node, self, params, arity);
  switch (expr.kind) {
    case "literal":
      return expr.literal.kind === "int" || expr.literal.kind === "float" || expr.literal.kind === "bool"
        ? undefined
        : `${expr.literal.kind} literal`;
    case "identifier":
      return params.has(expr.name) ? undefined : `free variable '${expr.name}'`;
    case "binary":
      if (!ARITHMETIC.has(expr.operator) && !COMPARISON.has(expr.operator) && !LOGICAL.has(expr.operator)) {
        return `operator '${expr.operator}'`;
      }
      return visit(expr.left) ?? visit(expr.right);
    case "unary":
      return visit(expr.operand);
    case "if":
      if (!expr.elseBranch) {
        return "if without else";
      }
      return visit(expr.condition) ?? visit(expr.thenBranch) ?? visit(expr.elseBranch);
    case "block":
      if (expr.statements.length > 0 || !expr.result) {
        return "block with statements";
      }
      return visit(expr.result);
    case "call":
      if (expr.callee.kind !== "identifier" || expr.callee.name !== self || params.has(self)) {
        return "call to another function";
      }
      if (expr.arguments.length !== arity) {
        return "self call with wrong argument count";
      }
      for (const arg of expr.arguments) {
        const reason = visit(arg);
        if (reason) {
          return reason;
        }
      }
      return undefined;
    default:
      return `${expr.kind} expression`;
  }
}
