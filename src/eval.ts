import type {
  BlockStatement,
  Declaration,
  Expr,
  IdentifierExpr,
  InstanceDeclaration,
  LambdaExpr,
  LetDeclaration,
  Literal,
  MatchArm,
  ModuleDeclaration,
  Pattern,
  Program,
  SourceSpan,
  StructDeclaration,
  TypeclassDeclaration,
  TypeExpr,
} from "./ast.js";
import type { BuiltinRegistry } from "./builtins.js";
import { type TypeAnnotations, typeKey } from "./infer.js";
import {
  arrayValue,
  bindValue,
  boolValue,
  type CallContext,
  type ClosureValue,
  createEnvironment,
  declareSlot,
  describeValueKind,
  type Environment,
  floatValue,
  intValue,
  lookupValue,
  type MatrixValue,
  type NativeFunctionValue,
  type RuntimeValue,
  stringValue,
  UNIT_VALUE,
  updateValue,
} from "./value.js";
import {
  argumentMismatchError,
  divisionByZeroError,
  indexOutOfBoundsError,
  invalidOperationError,
  RuntimeError,
  undefinedVariableError,
} from "./error.js";
import { formatRuntimeValue } from "./value_printer.js";
import { compileLambda } from "./jit/mod.js";

export interface EvalOptions {
  annotations?: TypeAnnotations;
  jit?: boolean;
  onPrint?: (text: string) => void;
  trace?: (line: string) => void;
}

/** Evaluator state that outlives one program, so REPL entries can build on it. */
export interface EvaluatorState {
  globals: Environment;
  structs: Map<string, StructDeclaration>;
  modules: Map<string, Map<string, RuntimeValue>>;
  // className -> instance type key -> method -> implementation
  instances: Map<string, Map<string, Map<string, RuntimeValue>>>;
}

export interface EvalSummary {
  name: string;
  value: RuntimeValue;
}

export interface EvalResult {
  value: RuntimeValue;
  summaries: EvalSummary[];
}

interface EvalContext {
  state: EvaluatorState;
  annotations?: TypeAnnotations;
  jit: boolean;
  print: (text: string) => void;
  trace?: (line: string) => void;
}

export function createEvaluatorState(registry: BuiltinRegistry): EvaluatorState {
  const globals = createEnvironment(null);
  for (const [name, value] of registry.runtimeBindings()) {
    bindValue(globals, name, value);
  }
  return {
    globals: createEnvironment(globals),
    structs: new Map(),
    modules: new Map(),
    instances: new Map(),
  };
}

export function evaluateProgram(
  program: Program,
  state: EvaluatorState,
  options: EvalOptions = {},
): EvalResult {
  const ctx: EvalContext = {
    state,
    annotations: options.annotations,
    jit: options.jit ?? false,
    print: options.onPrint ?? ((text) => console.log(text)),
    trace: options.trace,
  };

  registerStructs(ctx, program.declarations);

  const summaries: EvalSummary[] = [];
  let value: RuntimeValue = UNIT_VALUE;
  for (const decl of program.declarations) {
    const outcome = evaluateDeclaration(ctx, state.globals, decl);
    state.globals = outcome.env;
    value = outcome.value;
    if (decl.kind === "let") {
      summaries.push({ name: decl.name, value });
    }
  }
  return { value, summaries };
}

interface Outcome {
  env: Environment;
  value: RuntimeValue;
}

function registerStructs(ctx: EvalContext, declarations: Declaration[]): void {
  for (const decl of declarations) {
    if (decl.kind === "struct") {
      ctx.state.structs.set(decl.name, decl);
    } else if (decl.kind === "module") {
      registerStructs(ctx, decl.declarations);
    }
  }
}

function evaluateDeclaration(ctx: EvalContext, env: Environment, decl: Declaration): Outcome {
  switch (decl.kind) {
    case "let":
      return evaluateLetDeclaration(ctx, env, decl);
    case "struct":
      return { env, value: UNIT_VALUE };
    case "typeclass":
      return { env: bindTypeclass(ctx, env, decl), value: UNIT_VALUE };
    case "instance":
      registerInstance(ctx, env, decl);
      return { env, value: UNIT_VALUE };
    case "module":
      evaluateModule(ctx, env, decl);
      return { env, value: UNIT_VALUE };
    case "import":
      return { env: importModule(ctx, env, decl.module, decl.names), value: UNIT_VALUE };
    case "expr_statement":
      return evaluateStatementExpr(ctx, env, decl.expression);
  }
}

// A name already bound in this frame gets a fresh frame, so closures that
// captured the earlier binding keep seeing it.
function frameFor(env: Environment, name: string): Environment {
  return env.bindings.has(name) ? createEnvironment(env) : env;
}

function evaluateLetDeclaration(ctx: EvalContext, env: Environment, decl: LetDeclaration): Outcome {
  if (decl.attributes.length > 0) {
    ctx.trace?.(`[eval] ignoring ${decl.attributes.map((a) => `@${a}`).join(" ")} on '${decl.name}'`);
  }
  if (decl.isRecursive && !decl.mutable && decl.value.kind === "lambda") {
    const frame = frameFor(env, decl.name);
    // The slot exists before the closure so the body can refer to it
    declareSlot(frame, decl.name);
    const closure = createClosure(ctx, frame, decl.value, decl.name);
    bindValue(frame, decl.name, closure);
    return { env: frame, value: closure };
  }
  const value = decl.value.kind === "lambda"
    ? createClosure(ctx, env, decl.value, decl.name)
    : evaluateExpr(ctx, env, decl.value);
  const frame = frameFor(env, decl.name);
  bindValue(frame, decl.name, value);
  return { env: frame, value };
}

function createClosure(
  ctx: EvalContext,
  env: Environment,
  lambda: LambdaExpr,
  name?: string,
): ClosureValue {
  const closure: ClosureValue = {
    kind: "closure",
    name,
    parameters: lambda.parameters.map((param) => param.name),
    body: lambda.body,
    env,
  };
  if (ctx.jit && name) {
    closure.compiled = compileLambda(name, lambda, ctx.annotations?.functionTypes.get(lambda.id), {
      trace: ctx.trace,
    });
  }
  return closure;
}

function evaluateModule(ctx: EvalContext, env: Environment, decl: ModuleDeclaration): void {
  const members = new Map<string, RuntimeValue>();
  let scope = createEnvironment(env);
  for (const inner of decl.declarations) {
    const outcome = evaluateDeclaration(ctx, scope, inner);
    scope = outcome.env;
    if (inner.kind === "let") {
      members.set(inner.name, outcome.value);
    }
  }
  ctx.state.modules.set(decl.name, members);
}

function importModule(
  ctx: EvalContext,
  env: Environment,
  moduleName: string,
  names: string[] | undefined,
): Environment {
  const members = ctx.state.modules.get(moduleName);
  if (!members) {
    // Registry modules are already bound globally
    return env;
  }
  let frame = env;
  for (const name of names ?? members.keys()) {
    const value = members.get(name);
    if (!value) {
      throw undefinedVariableError(`${moduleName}.${name}`);
    }
    frame = frameFor(frame, name);
    bindValue(frame, name, value);
  }
  return frame;
}

// ============================================================================
// Typeclasses
// ============================================================================

function bindTypeclass(ctx: EvalContext, env: Environment, decl: TypeclassDeclaration): Environment {
  let frame = env;
  for (const method of decl.methods) {
    const params = method.type.kind === "type_fn" ? method.type.parameters : [];
    const dispatchIndex = params.findIndex((param) => mentionsTypeVar(param, decl.typeParam));
    // Used when the call site left the instance type open
    const dispatcher: NativeFunctionValue = {
      kind: "native",
      name: method.name,
      arity: params.length,
      impl: (args, call) => {
        if (dispatchIndex < 0) {
          throw invalidOperationError(
            `cannot choose an instance of ${decl.name} for '${method.name}' from its arguments`,
            call.span,
          );
        }
        const key = runtimeTypeKey(args[dispatchIndex]);
        const impl = ctx.state.instances.get(decl.name)?.get(key)?.get(method.name);
        if (!impl) {
          throw invalidOperationError(`no instance of ${decl.name} for ${key}`, call.span);
        }
        return call.apply(impl, args);
      },
    };
    frame = frameFor(frame, method.name);
    bindValue(frame, method.name, dispatcher);
  }
  return frame;
}

function registerInstance(ctx: EvalContext, env: Environment, decl: InstanceDeclaration): void {
  const byType = ctx.state.instances.get(decl.className) ?? new Map<string, Map<string, RuntimeValue>>();
  const methods = new Map<string, RuntimeValue>();
  for (const method of decl.methods) {
    methods.set(method.name, {
      kind: "closure",
      name: method.name,
      parameters: method.parameters.map((param) => param.name),
      body: method.body,
      env,
    });
  }
  byType.set(typeExprKey(decl.type), methods);
  ctx.state.instances.set(decl.className, byType);
}

function mentionsTypeVar(typeExpr: TypeExpr, name: string): boolean {
  switch (typeExpr.kind) {
    case "type_var":
      return typeExpr.name === name;
    case "type_ref":
      return typeExpr.name === name || typeExpr.typeArgs.some((arg) => mentionsTypeVar(arg, name));
    case "type_array":
      return mentionsTypeVar(typeExpr.element, name);
    case "type_fn":
      return typeExpr.parameters.some((param) => mentionsTypeVar(param, name)) ||
        mentionsTypeVar(typeExpr.result, name);
  }
}

function typeExprKey(typeExpr: TypeExpr): string {
  switch (typeExpr.kind) {
    case "type_ref":
      return typeExpr.name;
    case "type_array":
      return "Array";
    case "type_fn":
      return "Function";
    case "type_var":
      return typeExpr.name;
  }
}

function runtimeTypeKey(value: RuntimeValue): string {
  return value.kind === "struct" ? value.name : describeValueKind(value);
}

function evaluateIdentifier(ctx: EvalContext, env: Environment, expr: IdentifierExpr): RuntimeValue {
  const value = lookupValue(env, expr.name, expr.span);
  const method = ctx.annotations?.methodInstances.get(expr.id);
  if (method && method.type.kind !== "var") {
    const impl = ctx.state.instances.get(method.className)?.get(typeKey(method.type))?.get(expr.name);
    if (impl) {
      return impl;
    }
  }
  const type = ctx.annotations?.builtinTypes.get(expr.id);
  if (type && value.kind === "native") {
    return { ...value, type };
  }
  return value;
}

// ============================================================================
// Expressions
// ============================================================================

function evaluateExpr(ctx: EvalContext, env: Environment, expr: Expr): RuntimeValue {
  switch (expr.kind) {
    case "literal":
      return literalToRuntime(expr.literal, expr.span);
    case "identifier":
      return evaluateIdentifier(ctx, env, expr);
    case "binary":
      return evaluateBinary(ctx, env, expr.operator, expr.left, expr.right, expr.span);
    case "unary": {
      const operand = evaluateExpr(ctx, env, expr.operand);
      if (expr.operator === "!") {
        return boolValue(!expectBool(operand, "!", expr.span));
      }
      if (operand.kind === "int") {
        return intValue(-operand.value);
      }
      if (operand.kind === "float") {
        return floatValue(-operand.value);
      }
      throw argumentMismatchError("-", "Int or Float", describeValueKind(operand), expr.span);
    }
    case "call": {
      const callee = evaluateExpr(ctx, env, expr.callee);
      const args = expr.arguments.map((arg) => evaluateExpr(ctx, env, arg));
      return applyFunction(ctx, callee, args, expr.span);
    }
    case "index":
      return evaluateIndex(
        evaluateExpr(ctx, env, expr.target),
        evaluateExpr(ctx, env, expr.index),
        expr.span,
      );
    case "field_access":
      return evaluateFieldAccess(ctx, env, expr.target, expr.field, expr.span);
    case "lambda":
      return createClosure(ctx, env, expr);
    case "let_in": {
      const { env: scope } = evaluateLetDeclaration(ctx, createEnvironment(env), expr.declaration);
      return evaluateExpr(ctx, scope, expr.body);
    }
    case "block": {
      let scope = createEnvironment(env);
      for (const statement of expr.statements) {
        scope = evaluateBlockStatement(ctx, scope, statement).env;
      }
      return expr.result ? evaluateExpr(ctx, scope, expr.result) : UNIT_VALUE;
    }
    case "if": {
      const condition = expectBool(evaluateExpr(ctx, env, expr.condition), "if", expr.condition.span);
      if (condition) {
        const value = evaluateExpr(ctx, env, expr.thenBranch);
        return expr.elseBranch ? value : UNIT_VALUE;
      }
      return expr.elseBranch ? evaluateExpr(ctx, env, expr.elseBranch) : UNIT_VALUE;
    }
    case "match":
      return evaluateMatch(ctx, env, evaluateExpr(ctx, env, expr.scrutinee), expr.arms, expr.span);
    case "struct_literal":
      return evaluateStructLiteral(ctx, env, expr.name, expr.fields, expr.span);
    case "array":
      return arrayValue(expr.elements.map((element) => evaluateExpr(ctx, env, element)));
    case "matrix":
      return evaluateMatrixLiteral(
        expr.rows.map((row) => row.map((element) => evaluateExpr(ctx, env, element))),
        ctx.annotations?.literalShapes.get(expr.id),
      );
    case "comprehension": {
      const results: RuntimeValue[] = [];
      runGenerators(ctx, createEnvironment(env), expr.generators, 0, (scope) => {
        for (const filter of expr.filters) {
          if (!expectBool(evaluateExpr(ctx, scope, filter), "comprehension filter", filter.span)) {
            return;
          }
        }
        results.push(evaluateExpr(ctx, scope, expr.body));
      });
      return arrayValue(results);
    }
    case "range": {
      const start = expectInt(evaluateExpr(ctx, env, expr.start), "range", expr.start.span);
      const end = expectInt(evaluateExpr(ctx, env, expr.end), "range", expr.end.span);
      const last = expr.inclusive ? end : end - 1;
      const elements: RuntimeValue[] = [];
      for (let i = start; i <= last; i++) {
        elements.push(intValue(i));
      }
      return arrayValue(elements);
    }
    case "assign": {
      const value = evaluateExpr(ctx, env, expr.value);
      if (!updateValue(env, expr.name, value)) {
        throw undefinedVariableError(expr.name, expr.span);
      }
      return UNIT_VALUE;
    }
    case "parallel":
      return evaluateParallel(ctx, createEnvironment(env), expr.statements).value;
    case "spawn":
      return { kind: "task", result: evaluateExpr(ctx, env, expr.body) };
    case "wait": {
      const target = evaluateExpr(ctx, env, expr.target);
      if (target.kind === "array") {
        return arrayValue(target.elements.map((element) => awaitHandle(element, expr.span)));
      }
      return awaitHandle(target, expr.span);
    }
  }
}

function evaluateBlockStatement(ctx: EvalContext, env: Environment, statement: BlockStatement): Outcome {
  if (statement.kind === "let_statement") {
    return evaluateLetDeclaration(ctx, env, statement.declaration);
  }
  return evaluateStatementExpr(ctx, env, statement.expression);
}

// A statement-level parallel extends the enclosing scope
function evaluateStatementExpr(ctx: EvalContext, env: Environment, expr: Expr): Outcome {
  if (expr.kind === "parallel") {
    return evaluateParallel(ctx, env, expr.statements);
  }
  return { env, value: evaluateExpr(ctx, env, expr) };
}

// Sequential: statements run in order, like a block without its own frame
function evaluateParallel(ctx: EvalContext, env: Environment, statements: BlockStatement[]): Outcome {
  let outcome: Outcome = { env, value: UNIT_VALUE };
  for (const statement of statements) {
    outcome = evaluateBlockStatement(ctx, outcome.env, statement);
    if (statement.kind === "let_statement") {
      outcome = { env: outcome.env, value: UNIT_VALUE };
    }
  }
  return outcome;
}

function awaitHandle(value: RuntimeValue, span: SourceSpan): RuntimeValue {
  if (value.kind !== "task") {
    throw argumentMismatchError("wait", "Handle", describeValueKind(value), span);
  }
  return value.result;
}

function runGenerators(
  ctx: EvalContext,
  env: Environment,
  generators: { variable: string; iterable: Expr }[],
  index: number,
  emit: (scope: Environment) => void,
): void {
  if (index === generators.length) {
    emit(env);
    return;
  }
  const generator = generators[index];
  const iterable = evaluateExpr(ctx, env, generator.iterable);
  for (const item of iterationItems(iterable, generator.iterable.span)) {
    const scope = createEnvironment(env);
    bindValue(scope, generator.variable, item);
    runGenerators(ctx, scope, generators, index + 1, emit);
  }
}

function iterationItems(value: RuntimeValue, span: SourceSpan): RuntimeValue[] {
  switch (value.kind) {
    case "array":
      return value.elements;
    case "matrix":
      return value.rows.map((row) => matrixRow(value, row));
    case "string":
      return [...value.value].map(stringValue);
    default:
      throw argumentMismatchError("in", "Array, Matrix or String", describeValueKind(value), span);
  }
}

function evaluateIndex(target: RuntimeValue, indexValue: RuntimeValue, span: SourceSpan): RuntimeValue {
  const index = expectInt(indexValue, "index", span);
  const check = (length: number) => {
    if (index < 0 || index >= length) {
      throw indexOutOfBoundsError(index, length, span);
    }
  };
  switch (target.kind) {
    case "array":
      check(target.elements.length);
      return target.elements[index];
    case "matrix":
      check(target.rows.length);
      return matrixRow(target, target.rows[index]);
    case "string": {
      const chars = [...target.value];
      check(chars.length);
      return stringValue(chars[index]);
    }
    default:
      throw argumentMismatchError("index", "Array, Matrix or String", describeValueKind(target), span);
  }
}

function evaluateFieldAccess(
  ctx: EvalContext,
  env: Environment,
  target: Expr,
  field: string,
  span: SourceSpan,
): RuntimeValue {
  if (target.kind === "identifier" && ctx.state.modules.has(target.name)) {
    const member = ctx.state.modules.get(target.name)?.get(field);
    if (member) {
      return member;
    }
    throw undefinedVariableError(`${target.name}.${field}`, span);
  }
  const value = evaluateExpr(ctx, env, target);
  if (value.kind !== "struct") {
    throw argumentMismatchError(`.${field}`, "a struct", describeValueKind(value), span);
  }
  const fieldValue = value.fields.get(field);
  if (!fieldValue) {
    throw invalidOperationError(`${value.name} has no field '${field}'`, span);
  }
  return fieldValue;
}

function evaluateStructLiteral(
  ctx: EvalContext,
  env: Environment,
  name: string,
  fields: { name: string; value: Expr }[],
  span: SourceSpan,
): RuntimeValue {
  const decl = ctx.state.structs.get(name);
  if (!decl) {
    throw undefinedVariableError(name, span);
  }
  const provided = new Map<string, RuntimeValue>();
  for (const field of fields) {
    provided.set(field.name, evaluateExpr(ctx, env, field.value));
  }
  // Declaration order, defaults evaluated per literal
  const values = new Map<string, RuntimeValue>();
  for (const field of decl.fields) {
    const value = provided.get(field.name) ??
      (field.defaultValue ? evaluateExpr(ctx, ctx.state.globals, field.defaultValue) : undefined);
    if (!value) {
      throw invalidOperationError(`missing field '${field.name}' in ${name}`, span);
    }
    values.set(field.name, value);
  }
  return { kind: "struct", name, fields: values };
}

function evaluateMatrixLiteral(
  rows: RuntimeValue[][],
  shape: "matrix" | "array" | undefined,
): RuntimeValue {
  const numericKind = sharedNumericKind(rows);
  const asMatrix = shape === undefined ? numericKind !== undefined : shape === "matrix";
  if (asMatrix && numericKind) {
    return {
      kind: "matrix",
      element: numericKind,
      rows: rows.map((row) => row.flatMap((value) => (value.kind === "int" || value.kind === "float" ? [value.value] : []))),
    };
  }
  return arrayValue(rows.map(arrayValue));
}

function sharedNumericKind(rows: RuntimeValue[][]): "int" | "float" | undefined {
  const first = rows[0]?.[0];
  if (!first || (first.kind !== "int" && first.kind !== "float")) {
    return undefined;
  }
  const kind = first.kind;
  const width = rows[0].length;
  const uniform = rows.every((row) =>
    row.length === width && row.every((value) => value.kind === kind)
  );
  return uniform ? kind : undefined;
}

function matrixRow(matrix: MatrixValue, row: number[]): RuntimeValue {
  return arrayValue(row.map((n) => (matrix.element === "float" ? floatValue(n) : intValue(n))));
}

// ============================================================================
// Match
// ============================================================================

function evaluateMatch(
  ctx: EvalContext,
  env: Environment,
  scrutinee: RuntimeValue,
  arms: MatchArm[],
  span: SourceSpan,
): RuntimeValue {
  for (const arm of arms) {
    const bindings = new Map<string, RuntimeValue>();
    if (!matchPattern(arm.pattern, scrutinee, bindings)) {
      continue;
    }
    const scope = createEnvironment(env);
    for (const [name, value] of bindings) {
      bindValue(scope, name, value);
    }
    if (arm.guard && !expectBool(evaluateExpr(ctx, scope, arm.guard), "match guard", arm.guard.span)) {
      continue;
    }
    return evaluateExpr(ctx, scope, arm.body);
  }
  throw invalidOperationError(`no match arm for ${formatRuntimeValue(scrutinee)}`, span);
}

function matchPattern(pattern: Pattern, value: RuntimeValue, bindings: Map<string, RuntimeValue>): boolean {
  switch (pattern.kind) {
    case "wildcard":
      return true;
    case "variable":
      bindings.set(pattern.name, value);
      return true;
    case "literal":
      return valuesEqual(literalToRuntime(pattern.literal), value);
    case "struct":
      if (value.kind !== "struct" || value.name !== pattern.name) {
        return false;
      }
      return pattern.fields.every((field) => {
        const fieldValue = value.fields.get(field.name);
        return fieldValue !== undefined && matchPattern(field.pattern, fieldValue, bindings);
      });
    case "array": {
      if (value.kind !== "array") {
        return false;
      }
      const { elements } = value;
      if (pattern.rest ? elements.length < pattern.elements.length : elements.length !== pattern.elements.length) {
        return false;
      }
      const matched = pattern.elements.every((item, i) => matchPattern(item, elements[i], bindings));
      if (!matched) {
        return false;
      }
      return pattern.rest
        ? matchPattern(pattern.rest, arrayValue(elements.slice(pattern.elements.length)), bindings)
        : true;
    }
  }
}

// ============================================================================
// Calls
// ============================================================================

function applyFunction(
  ctx: EvalContext,
  callee: RuntimeValue,
  args: RuntimeValue[],
  span?: SourceSpan,
): RuntimeValue {
  switch (callee.kind) {
    case "closure":
      return callClosure(ctx, callee, args, span);
    case "native":
      return callNative(ctx, callee, args, span);
    default:
      throw invalidOperationError(`cannot call a value of type ${describeValueKind(callee)}`, span);
  }
}

function callClosure(
  ctx: EvalContext,
  closure: ClosureValue,
  args: RuntimeValue[],
  span?: SourceSpan,
): RuntimeValue {
  const name = closure.name ?? "<lambda>";
  if (args.length !== closure.parameters.length) {
    throw argumentMismatchError(
      name,
      `${closure.parameters.length} argument(s)`,
      `${args.length}`,
      span,
    );
  }
  try {
    if (closure.compiled) {
      return closure.compiled(args);
    }
    const frame = createEnvironment(closure.env);
    closure.parameters.forEach((param, i) => bindValue(frame, param, args[i]));
    return evaluateExpr(ctx, frame, closure.body);
  } catch (error) {
    if (error instanceof RuntimeError && closure.name) {
      throw error.withSubject(closure.name, span);
    }
    throw error;
  }
}

function callNative(
  ctx: EvalContext,
  fn: NativeFunctionValue,
  args: RuntimeValue[],
  span?: SourceSpan,
): RuntimeValue {
  if (args.length !== fn.arity) {
    throw argumentMismatchError(fn.name, `${fn.arity} argument(s)`, `${args.length}`, span);
  }
  const call: CallContext = {
    name: fn.name,
    span,
    resultType: fn.type?.kind === "func" ? fn.type.result : undefined,
    apply: (target, targetArgs) => applyFunction(ctx, target, targetArgs, span),
    print: ctx.print,
  };
  try {
    return fn.impl(args, call);
  } catch (error) {
    if (error instanceof RuntimeError) {
      throw error.withSubject(fn.name, span);
    }
    throw error;
  }
}

// ============================================================================
// Operators
// ============================================================================

function evaluateBinary(
  ctx: EvalContext,
  env: Environment,
  operator: string,
  leftExpr: Expr,
  rightExpr: Expr,
  span: SourceSpan,
): RuntimeValue {
  const left = evaluateExpr(ctx, env, leftExpr);
  if (operator === "&&" || operator === "||") {
    const lhs = expectBool(left, operator, leftExpr.span);
    if (operator === "&&" ? !lhs : lhs) {
      return boolValue(lhs);
    }
    return boolValue(expectBool(evaluateExpr(ctx, env, rightExpr), operator, rightExpr.span));
  }
  return applyBinaryOperator(operator, left, evaluateExpr(ctx, env, rightExpr), span);
}

function applyBinaryOperator(
  operator: string,
  left: RuntimeValue,
  right: RuntimeValue,
  span?: SourceSpan,
): RuntimeValue {
  switch (operator) {
    case "==":
      return boolValue(valuesEqual(left, right));
    case "!=":
      return boolValue(!valuesEqual(left, right));
    case "<":
    case "<=":
    case ">":
    case ">=":
      return boolValue(compareValues(operator, left, right, span));
  }

  if (left.kind === "matrix" && right.kind === "matrix") {
    return matrixOperator(operator, left, right, span);
  }
  if (operator === "+" && left.kind === "string" && right.kind === "string") {
    return stringValue(left.value + right.value);
  }
  if (left.kind === "int" && right.kind === "int") {
    return intValue(intOperator(operator, left.value, right.value, span), span);
  }
  if (left.kind === "float" && right.kind === "float") {
    return floatValue(floatOperator(operator, left.value, right.value, span));
  }
  throw argumentMismatchError(
    operator,
    "two operands of the same numeric type",
    `${describeValueKind(left)} and ${describeValueKind(right)}`,
    span,
  );
}

function intOperator(operator: string, a: number, b: number, span?: SourceSpan): number {
  switch (operator) {
    case "+":
      return a + b;
    case "-":
      return a - b;
    case "*":
      return a * b;
    case "/":
      if (b === 0) {
        throw divisionByZeroError(span);
      }
      return Math.trunc(a / b);
    case "%":
      if (b === 0) {
        throw divisionByZeroError(span);
      }
      return a % b;
    case "^":
      if (b < 0) {
        throw invalidOperationError(`negative exponent ${b} for Int power`, span);
      }
      return Math.pow(a, b);
    default:
      throw invalidOperationError(`unknown operator '${operator}'`, span);
  }
}

function floatOperator(operator: string, a: number, b: number, span?: SourceSpan): number {
  switch (operator) {
    case "+":
      return a + b;
    case "-":
      return a - b;
    case "*":
      return a * b;
    case "/":
      if (b === 0) {
        throw divisionByZeroError(span);
      }
      return a / b;
    case "%":
      if (b === 0) {
        throw divisionByZeroError(span);
      }
      return a % b;
    case "^":
      return Math.pow(a, b);
    default:
      throw invalidOperationError(`unknown operator '${operator}'`, span);
  }
}

function matrixOperator(
  operator: string,
  left: MatrixValue,
  right: MatrixValue,
  span?: SourceSpan,
): MatrixValue {
  const shape = (m: MatrixValue) => `${m.rows.length}x${m.rows[0]?.length ?? 0}`;
  if (operator === "*") {
    const inner = left.rows[0]?.length ?? 0;
    if (inner !== right.rows.length) {
      throw invalidOperationError(
        `cannot multiply ${shape(left)} by ${shape(right)} matrix`,
        span,
      );
    }
    const width = right.rows[0]?.length ?? 0;
    const rows = left.rows.map((row) =>
      Array.from({ length: width }, (_, j) =>
        row.reduce((acc, value, k) => acc + value * right.rows[k][j], 0)
      )
    );
    return checkedMatrix({ kind: "matrix", element: left.element, rows }, span);
  }
  if (operator !== "+" && operator !== "-") {
    throw invalidOperationError(`operator '${operator}' is not defined on matrices`, span);
  }
  if (shape(left) !== shape(right)) {
    throw invalidOperationError(`matrix shapes differ: ${shape(left)} and ${shape(right)}`, span);
  }
  const sign = operator === "+" ? 1 : -1;
  return checkedMatrix({
    kind: "matrix",
    element: left.element,
    rows: left.rows.map((row, i) => row.map((value, j) => value + sign * right.rows[i][j])),
  }, span);
}

function checkedMatrix(matrix: MatrixValue, span?: SourceSpan): MatrixValue {
  if (matrix.element === "int" && !matrix.rows.every((row) => row.every(Number.isSafeInteger))) {
    throw invalidOperationError("integer overflow", span);
  }
  return matrix;
}

function compareValues(operator: string, left: RuntimeValue, right: RuntimeValue, span?: SourceSpan): boolean {
  let order: number;
  if ((left.kind === "int" || left.kind === "float") && (right.kind === "int" || right.kind === "float")) {
    order = left.value - right.value;
  } else if (left.kind === "string" && right.kind === "string") {
    order = left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
  } else {
    throw argumentMismatchError(
      operator,
      "two numbers or two strings",
      `${describeValueKind(left)} and ${describeValueKind(right)}`,
      span,
    );
  }
  switch (operator) {
    case "<":
      return order < 0;
    case "<=":
      return order <= 0;
    case ">":
      return order > 0;
    default:
      return order >= 0;
  }
}

/** Structural equality; floats compare within a relative `Number.EPSILON`. */
export function valuesEqual(left: RuntimeValue, right: RuntimeValue): boolean {
  switch (left.kind) {
    case "int":
      return right.kind === "int" && left.value === right.value;
    case "float":
      return right.kind === "float" && floatsEqual(left.value, right.value);
    case "bool":
      return right.kind === "bool" && left.value === right.value;
    case "string":
      return right.kind === "string" && left.value === right.value;
    case "unit":
      return right.kind === "unit";
    case "array":
      return right.kind === "array" && left.elements.length === right.elements.length &&
        left.elements.every((element, i) => valuesEqual(element, right.elements[i]));
    case "matrix":
      return right.kind === "matrix" && left.rows.length === right.rows.length &&
        left.rows.every((row, i) =>
          row.length === right.rows[i].length &&
          row.every((value, j) => floatsEqual(value, right.rows[i][j]))
        );
    case "struct":
      return right.kind === "struct" && left.name === right.name &&
        [...left.fields].every(([name, value]) => {
          const other = right.fields.get(name);
          return other !== undefined && valuesEqual(value, other);
        });
    case "handle":
      return right.kind === "handle" && left.owner === right.owner && left.id === right.id;
    case "task":
    case "closure":
    case "native":
      return left === right;
  }
}

function floatsEqual(a: number, b: number): boolean {
  return Math.abs(a - b) <= Number.EPSILON * Math.max(1, Math.abs(a), Math.abs(b));
}

function literalToRuntime(literal: Literal, span?: SourceSpan): RuntimeValue {
  switch (literal.kind) {
    case "int":
      return intValue(literal.value, span);
    case "float":
      return floatValue(literal.value);
    case "bool":
      return boolValue(literal.value);
    case "string":
      return stringValue(literal.value);
    case "unit":
      return UNIT_VALUE;
  }
}

function expectBool(value: RuntimeValue, name: string, span?: SourceSpan): boolean {
  if (value.kind === "bool") {
    return value.value;
  }
  throw argumentMismatchError(name, "Bool", describeValueKind(value), span);
}

function expectInt(value: RuntimeValue, name: string, span?: SourceSpan): number {
  if (value.kind === "int") {
    return value.value;
  }
  throw argumentMismatchError(name, "Int", describeValueKind(value), span);
}
