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
  NodeId,
  Parameter,
  Pattern,
  Program,
  SourceSpan,
  StructDeclaration,
  TypeclassDeclaration,
  TypeExpr,
} from "./ast.js";
import {
  applySubstitution,
  arrayType,
  BOOL,
  type ClassConstraint,
  FLOAT,
  freeTypeVars,
  freeTypeVarsEnv,
  funcType,
  generalize,
  handleType,
  instantiate,
  INT,
  matrixType,
  monomorphic,
  occursInType,
  STRING,
  type Substitution,
  type Type,
  type TypeEnv,
  type TypeScheme,
  type TypeVarSupply,
  UNIT,
} from "./types.js";
import { typeToString } from "./type_printer.js";
import {
  arityMismatchError,
  immutableAssignmentError,
  infiniteTypeError,
  mismatchError,
  unknownIdentifierError,
} from "./error.js";
import { type BuiltinRegistry, forall, typeVar } from "./builtins.js";

export { InferError } from "./error.js";

export interface StructInfo {
  name: string;
  type: Type;
  fields: Map<string, Type>;
  defaults: Set<string>;
}

export interface ClassInfo {
  name: string;
  typeParam: number;
  methods: Map<string, Type>;
}

export interface ModuleInfo {
  name: string;
  members: Map<string, TypeScheme>;
}

interface PendingConstraint {
  className: string;
  type: Type;
  span?: SourceSpan;
}

/** Everything a later check (the next REPL entry) needs to continue from. */
export interface CheckerState {
  env: TypeEnv;
  mutable: Set<string>;
  structs: Map<string, StructInfo>;
  classes: Map<string, ClassInfo>;
  instances: Map<string, Set<string>>;
  modules: Map<string, ModuleInfo>;
  subst: Substitution;
  pending: PendingConstraint[];
}

/** Facts the evaluator and the JIT read back, keyed by AST node id. */
export interface TypeAnnotations {
  literalShapes: Map<NodeId, "matrix" | "array">;
  functionTypes: Map<NodeId, Type>;
  // Instantiated type of each reference to a polymorphic builtin
  builtinTypes: Map<NodeId, Type>;
  // Class and instance type chosen for each reference to a typeclass method
  methodInstances: Map<NodeId, MethodInstance>;
}

export interface MethodInstance {
  className: string;
  type: Type;
}

export interface InferOptions {
  registry: BuiltinRegistry;
  supply: TypeVarSupply;
  state?: CheckerState;
}

export interface InferResult {
  state: CheckerState;
  summaries: { name: string; scheme: TypeScheme }[];
  resultType: Type;
  annotations: TypeAnnotations;
}

interface Context {
  env: TypeEnv;
  mutable: Set<string>;
  state: CheckerState;
  subst: Substitution;
  supply: TypeVarSupply;
  pending: PendingConstraint[];
  annotations: TypeAnnotations;
  opaqueTypes: Set<string>;
  registry: BuiltinRegistry;
}

const BUILTIN_CLASSES: Record<string, (type: Type) => boolean> = {
  Numeric: (type) => type.kind === "int" || type.kind === "float",
  Addable: (type) =>
    type.kind === "int" || type.kind === "float" || type.kind === "string" ||
    type.kind === "matrix",
  Arithmetic: (type) => type.kind === "int" || type.kind === "float" || type.kind === "matrix",
  Ordered: (type) => type.kind === "int" || type.kind === "float" || type.kind === "string",
  Equatable: (type) => type.kind !== "func",
  Sized: (type) => type.kind === "array" || type.kind === "matrix" || type.kind === "string",
};

export function createCheckerState(registry: BuiltinRegistry): CheckerState {
  return {
    env: registry.typeEnv(),
    mutable: new Set(),
    structs: new Map(),
    classes: new Map(),
    instances: new Map(),
    modules: new Map(),
    subst: new Map(),
    pending: [],
  };
}

export function cloneCheckerState(state: CheckerState): CheckerState {
  const instances = new Map<string, Set<string>>();
  for (const [name, keys] of state.instances) {
    instances.set(name, new Set(keys));
  }
  return {
    env: new Map(state.env),
    mutable: new Set(state.mutable),
    structs: new Map(state.structs),
    classes: new Map(state.classes),
    instances,
    modules: new Map(state.modules),
    subst: new Map(state.subst),
    pending: [...state.pending],
  };
}

function withScopedEnv<T>(ctx: Context, fn: () => T): T {
  const previous = ctx.env;
  const previousMutable = ctx.mutable;
  ctx.env = new Map(ctx.env);
  ctx.mutable = new Set(ctx.mutable);
  try {
    return fn();
  } finally {
    ctx.env = previous;
    ctx.mutable = previousMutable;
  }
}

export function inferProgram(program: Program, options: InferOptions): InferResult {
  const state = options.state ? cloneCheckerState(options.state) : createCheckerState(options.registry);
  const ctx: Context = {
    env: state.env,
    mutable: state.mutable,
    state,
    subst: state.subst,
    supply: options.supply,
    pending: state.pending,
    annotations: {
      literalShapes: new Map(),
      functionTypes: new Map(),
      builtinTypes: new Map(),
      methodInstances: new Map(),
    },
    opaqueTypes: collectOpaqueTypes(options.registry),
    registry: options.registry,
  };
  const summaries: { name: string; scheme: TypeScheme }[] = [];

  registerDeclarations(ctx, program.declarations);

  let resultType: Type = UNIT;
  for (const decl of program.declarations) {
    resultType = inferDeclaration(ctx, decl, summaries);
    solveConstraints(ctx);
  }

  for (const types of [ctx.annotations.functionTypes, ctx.annotations.builtinTypes]) {
    for (const [id, type] of types) {
      types.set(id, applyCurrentSubst(ctx, type));
    }
  }
  for (const [id, method] of ctx.annotations.methodInstances) {
    ctx.annotations.methodInstances.set(id, { ...method, type: applyCurrentSubst(ctx, method.type) });
  }

  return {
    state: {
      ...state,
      env: ctx.env,
      mutable: ctx.mutable,
      subst: ctx.subst,
      pending: ctx.pending,
    },
    summaries: summaries.map(({ name, scheme }) => ({
      name,
      scheme: { ...scheme, type: applyCurrentSubst(ctx, scheme.type) },
    })),
    resultType: applyCurrentSubst(ctx, resultType),
    annotations: ctx.annotations,
  };
}

// ============================================================================
// Declarations
// ============================================================================

// Struct, typeclass and instance headers are visible to every declaration,
// whatever their order in the source.
function registerDeclarations(ctx: Context, declarations: Declaration[]): void {
  const structs = declarations.filter((decl): decl is StructDeclaration => decl.kind === "struct");
  for (const decl of structs) {
    const fields = new Map<string, Type>();
    ctx.state.structs.set(decl.name, {
      name: decl.name,
      type: { kind: "struct", name: decl.name, fields },
      fields,
      defaults: new Set(),
    });
  }
  for (const decl of structs) {
    const info = ctx.state.structs.get(decl.name);
    if (!info) {
      continue;
    }
    for (const field of decl.fields) {
      info.fields.set(field.name, convertTypeExpr(ctx, field.type, new Map()));
      if (field.defaultValue) {
        info.defaults.add(field.name);
      }
    }
  }

  for (const decl of declarations) {
    if (decl.kind === "typeclass") {
      registerTypeclass(ctx, decl);
    } else if (decl.kind === "module") {
      registerDeclarations(ctx, decl.declarations);
    }
  }

  for (const decl of declarations) {
    if (decl.kind === "instance") {
      if (!ctx.state.classes.has(decl.className)) {
        throw unknownIdentifierError(decl.className, decl.span);
      }
      const key = typeKey(convertTypeExpr(ctx, decl.type, new Map()));
      const keys = ctx.state.instances.get(decl.className) ?? new Set<string>();
      keys.add(key);
      ctx.state.instances.set(decl.className, keys);
    }
  }
}

function registerTypeclass(ctx: Context, decl: TypeclassDeclaration): void {
  const classVarId = ctx.supply.freshId();
  const classVar = typeVar(classVarId);
  const methods = new Map<string, Type>();
  for (const method of decl.methods) {
    const vars = new Map<string, Type>([[decl.typeParam, classVar]]);
    const type = convertTypeExpr(ctx, method.type, vars);
    methods.set(method.name, type);
    const scheme: TypeScheme = {
      quantifiers: [...freeTypeVars(type)],
      constraints: [{ className: decl.name, typeVar: classVarId }],
      type,
    };
    ctx.env.set(method.name, scheme);
    ctx.mutable.delete(method.name);
  }
  ctx.state.classes.set(decl.name, { name: decl.name, typeParam: classVarId, methods });
}

function inferDeclaration(
  ctx: Context,
  decl: Declaration,
  summaries: { name: string; scheme: TypeScheme }[],
): Type {
  switch (decl.kind) {
    case "let": {
      const scheme = inferLetDeclaration(ctx, decl);
      summaries.push({ name: decl.name, scheme });
      return scheme.type;
    }
    case "struct":
      checkStructDefaults(ctx, decl);
      return UNIT;
    case "typeclass":
      return UNIT;
    case "instance":
      checkInstance(ctx, decl);
      return UNIT;
    case "module":
      inferModule(ctx, decl);
      return UNIT;
    case "import":
      importModule(ctx, decl.module, decl.names, decl.span);
      return UNIT;
    case "expr_statement":
      return inferStatementExpr(ctx, decl.expression);
  }
}

function inferLetDeclaration(ctx: Context, decl: LetDeclaration): TypeScheme {
  const previous = ctx.env.get(decl.name);
  const wasMutable = ctx.mutable.has(decl.name);
  let inferred: Type;

  if (decl.isRecursive && !decl.mutable) {
    // The body may call the function being defined
    const placeholder = ctx.supply.fresh();
    ctx.env.set(decl.name, monomorphic(placeholder));
    ctx.mutable.delete(decl.name);
    try {
      inferred = inferExpr(ctx, decl.value);
      unify(ctx, placeholder, inferred, decl.value.span);
    } finally {
      if (previous) {
        ctx.env.set(decl.name, previous);
      } else {
        ctx.env.delete(decl.name);
      }
      if (wasMutable) {
        ctx.mutable.add(decl.name);
      }
    }
  } else {
    inferred = inferExpr(ctx, decl.value);
  }

  if (decl.annotation) {
    const annotated = convertTypeExpr(ctx, decl.annotation, new Map());
    unify(ctx, annotated, inferred, decl.value.span);
  }

  solveConstraints(ctx);
  const scheme = decl.mutable
    ? monomorphic(applyCurrentSubst(ctx, inferred))
    : generalizeInContext(ctx, inferred);

  ctx.env.set(decl.name, scheme);
  if (decl.mutable) {
    ctx.mutable.add(decl.name);
  } else {
    ctx.mutable.delete(decl.name);
  }
  return scheme;
}

function checkStructDefaults(ctx: Context, decl: StructDeclaration): void {
  const info = ctx.state.structs.get(decl.name);
  if (!info) {
    return;
  }
  for (const field of decl.fields) {
    const expected = info.fields.get(field.name);
    if (field.defaultValue && expected) {
      unify(ctx, expected, inferExpr(ctx, field.defaultValue), field.defaultValue.span);
    }
  }
}

function checkInstance(ctx: Context, decl: InstanceDeclaration): void {
  const info = ctx.state.classes.get(decl.className);
  if (!info) {
    throw unknownIdentifierError(decl.className, decl.span);
  }
  const instanceType = convertTypeExpr(ctx, decl.type, new Map());
  for (const method of decl.methods) {
    const signature = info.methods.get(method.name);
    if (!signature) {
      throw unknownIdentifierError(method.name, method.span);
    }
    const { type: expected } = instantiate(
      {
        quantifiers: [...freeTypeVars(signature)].filter((id) => id !== info.typeParam),
        type: replaceVar(signature, info.typeParam, instanceType),
      },
      ctx.supply,
    );
    if (expected.kind === "func" && expected.params.length !== method.parameters.length) {
      throw arityMismatchError(expected.params.length, method.parameters.length, method.span);
    }
    const actual = inferLambda(ctx, method.parameters, method.body, undefined);
    unify(ctx, expected, actual, method.span);
  }
}

function inferModule(ctx: Context, decl: ModuleDeclaration): void {
  const members = new Map<string, TypeScheme>();
  withScopedEnv(ctx, () => {
    for (const inner of decl.declarations) {
      inferDeclaration(ctx, inner, []);
      solveConstraints(ctx);
      if (inner.kind === "let") {
        const scheme = ctx.env.get(inner.name);
        if (scheme) {
          members.set(inner.name, scheme);
        }
      }
    }
  });
  ctx.state.modules.set(decl.name, { name: decl.name, members });
}

function importModule(
  ctx: Context,
  moduleName: string,
  names: string[] | undefined,
  span: SourceSpan,
): void {
  const module = ctx.state.modules.get(moduleName);
  if (module) {
    for (const name of names ?? module.members.keys()) {
      const scheme = module.members.get(name);
      if (!scheme) {
        throw unknownIdentifierError(name, span);
      }
      ctx.env.set(name, scheme);
      ctx.mutable.delete(name);
    }
    return;
  }
  // Builtin modules are already in scope; importing them only checks names
  const builtinMembers = ctx.registry.moduleMembers(moduleName);
  if (builtinMembers.length === 0) {
    throw unknownIdentifierError(moduleName, span);
  }
  for (const name of names ?? []) {
    if (!builtinMembers.includes(name)) {
      throw unknownIdentifierError(name, span);
    }
  }
}

// ============================================================================
// Expressions
// ============================================================================

function inferExpr(ctx: Context, expr: Expr): Type {
  switch (expr.kind) {
    case "literal":
      return literalType(expr.literal);
    case "identifier":
      return inferIdentifier(ctx, expr);
    case "binary": {
      const operatorType = instantiateAndApply(ctx, operatorScheme(expr.operator), expr.span);
      if (operatorType.kind !== "func") {
        throw mismatchError("function", typeToString(operatorType), expr.span);
      }
      const left = inferExpr(ctx, expr.left);
      unify(ctx, operatorType.params[0], left, expr.left.span);
      const right = inferExpr(ctx, expr.right);
      unify(ctx, operatorType.params[1], right, expr.right.span);
      solveConstraints(ctx);
      return applyCurrentSubst(ctx, operatorType.result);
    }
    case "unary": {
      const operand = inferExpr(ctx, expr.operand);
      if (expr.operator === "!") {
        unify(ctx, BOOL, operand, expr.operand.span);
        return BOOL;
      }
      addConstraint(ctx, "Numeric", operand, expr.span);
      solveConstraints(ctx);
      return applyCurrentSubst(ctx, operand);
    }
    case "call":
      return inferCall(ctx, expr.callee, expr.arguments, expr.span);
    case "index":
      return inferIndex(ctx, expr.target, expr.index, expr.span);
    case "field_access":
      return inferFieldAccess(ctx, expr.target, expr.field, expr.span);
    case "lambda":
      return inferLambdaExpr(ctx, expr);
    case "let_in":
      return withScopedEnv(ctx, () => {
        inferLetDeclaration(ctx, expr.declaration);
        return inferExpr(ctx, expr.body);
      });
    case "block":
      return withScopedEnv(ctx, () => {
        for (const statement of expr.statements) {
          inferBlockStatement(ctx, statement);
        }
        return expr.result ? inferExpr(ctx, expr.result) : UNIT;
      });
    case "if": {
      unify(ctx, BOOL, inferExpr(ctx, expr.condition), expr.condition.span);
      const thenType = inferExpr(ctx, expr.thenBranch);
      if (!expr.elseBranch) {
        return UNIT;
      }
      const elseType = inferExpr(ctx, expr.elseBranch);
      unify(ctx, thenType, elseType, expr.elseBranch.span);
      return applyCurrentSubst(ctx, thenType);
    }
    case "match":
      return inferMatch(ctx, inferExpr(ctx, expr.scrutinee), expr.arms);
    case "struct_literal":
      return inferStructLiteral(ctx, expr.name, expr.fields, expr.span);
    case "array": {
      const element = ctx.supply.fresh();
      for (const item of expr.elements) {
        unify(ctx, element, inferExpr(ctx, item), item.span);
      }
      return arrayType(applyCurrentSubst(ctx, element));
    }
    case "matrix": {
      const element = ctx.supply.fresh();
      for (const row of expr.rows) {
        for (const item of row) {
          unify(ctx, element, inferExpr(ctx, item), item.span);
        }
      }
      const resolved = applyCurrentSubst(ctx, element);
      // Equal-length rows of Int or Float form a matrix, anything else nests
      if (resolved.kind === "int" || resolved.kind === "float") {
        ctx.annotations.literalShapes.set(expr.id, "matrix");
        return matrixType(resolved);
      }
      ctx.annotations.literalShapes.set(expr.id, "array");
      return arrayType(arrayType(resolved));
    }
    case "comprehension":
      return withScopedEnv(ctx, () => {
        for (const generator of expr.generators) {
          const element = iterationElement(ctx, inferExpr(ctx, generator.iterable), generator.iterable.span);
          bindLocal(ctx, generator.variable, element);
        }
        for (const filter of expr.filters) {
          unify(ctx, BOOL, inferExpr(ctx, filter), filter.span);
        }
        return arrayType(applyCurrentSubst(ctx, inferExpr(ctx, expr.body)));
      });
    case "range":
      unify(ctx, INT, inferExpr(ctx, expr.start), expr.start.span);
      unify(ctx, INT, inferExpr(ctx, expr.end), expr.end.span);
      return arrayType(INT);
    case "assign": {
      const scheme = lookupEnv(ctx, expr.name, expr.span);
      if (!ctx.mutable.has(expr.name)) {
        throw immutableAssignmentError(expr.name, expr.span);
      }
      unify(ctx, scheme.type, inferExpr(ctx, expr.value), expr.value.span);
      return UNIT;
    }
    case "parallel":
      // Only a statement-level parallel shares its bindings with the scope
      return withScopedEnv(ctx, () => inferParallel(ctx, expr.statements));
    case "spawn":
      return handleType(applyCurrentSubst(ctx, inferExpr(ctx, expr.body)));
    case "wait":
      return inferWait(ctx, inferExpr(ctx, expr.target), expr.target.span);
  }
}

function inferBlockStatement(ctx: Context, statement: BlockStatement): Type {
  if (statement.kind === "let_statement") {
    inferLetDeclaration(ctx, statement.declaration);
    return UNIT;
  }
  return inferStatementExpr(ctx, statement.expression);
}

function inferStatementExpr(ctx: Context, expr: Expr): Type {
  return expr.kind === "parallel" ? inferParallel(ctx, expr.statements) : inferExpr(ctx, expr);
}

function inferParallel(ctx: Context, statements: BlockStatement[]): Type {
  let last: Type = UNIT;
  for (const statement of statements) {
    last = inferBlockStatement(ctx, statement);
  }
  return last;
}

function inferIdentifier(ctx: Context, expr: IdentifierExpr): Type {
  const scheme = lookupEnv(ctx, expr.name, expr.span);
  const { type, constraints } = instantiate(scheme, ctx.supply);
  for (const constraint of constraints) {
    ctx.pending.push({ className: constraint.className, type: typeVar(constraint.typeVar), span: expr.span });
  }
  if (scheme.quantifiers.length > 0 && scheme === ctx.registry.lookupScheme(expr.name)) {
    ctx.annotations.builtinTypes.set(expr.id, type);
  }
  for (const constraint of constraints) {
    // The method's own scheme, not a user binding that shadows its name
    if (ctx.state.classes.get(constraint.className)?.methods.get(expr.name) === scheme.type) {
      ctx.annotations.methodInstances.set(expr.id, {
        className: constraint.className,
        type: typeVar(constraint.typeVar),
      });
    }
  }
  return applyCurrentSubst(ctx, type);
}

function inferLambdaExpr(ctx: Context, expr: LambdaExpr): Type {
  const type = inferLambda(ctx, expr.parameters, expr.body, expr.returnAnnotation);
  ctx.annotations.functionTypes.set(expr.id, type);
  return type;
}

function inferLambda(
  ctx: Context,
  parameters: Parameter[],
  body: Expr,
  returnAnnotation: TypeExpr | undefined,
): Type {
  return withScopedEnv(ctx, () => {
    const annotationVars = new Map<string, Type>();
    const paramTypes = parameters.map((param) => {
      const type = param.annotation
        ? convertTypeExpr(ctx, param.annotation, annotationVars)
        : ctx.supply.fresh();
      bindLocal(ctx, param.name, type);
      return type;
    });
    const bodyType = inferExpr(ctx, body);
    if (returnAnnotation) {
      unify(ctx, convertTypeExpr(ctx, returnAnnotation, annotationVars), bodyType, body.span);
    }
    return applyCurrentSubst(ctx, funcType(paramTypes, bodyType));
  });
}

function inferCall(ctx: Context, callee: Expr, args: Expr[], span: SourceSpan): Type {
  const calleeType = applyCurrentSubst(ctx, inferExpr(ctx, callee));
  if (calleeType.kind === "func") {
    if (calleeType.params.length !== args.length) {
      throw arityMismatchError(calleeType.params.length, args.length, span);
    }
    args.forEach((arg, index) => {
      unify(ctx, calleeType.params[index], inferExpr(ctx, arg), arg.span);
    });
    solveConstraints(ctx);
    return applyCurrentSubst(ctx, calleeType.result);
  }
  if (calleeType.kind === "var") {
    const argTypes = args.map((arg) => inferExpr(ctx, arg));
    const result = ctx.supply.fresh();
    unify(ctx, calleeType, funcType(argTypes, result), span);
    return applyCurrentSubst(ctx, result);
  }
  throw mismatchError("function", typeToString(calleeType), callee.span);
}

function inferIndex(ctx: Context, target: Expr, index: Expr, span: SourceSpan): Type {
  const targetType = applyCurrentSubst(ctx, inferExpr(ctx, target));
  unify(ctx, INT, inferExpr(ctx, index), index.span);
  switch (targetType.kind) {
    case "array":
      return targetType.element;
    case "matrix":
      return arrayType(targetType.element);
    case "string":
      return STRING;
    case "var": {
      const element = ctx.supply.fresh();
      unify(ctx, arrayType(element), targetType, target.span);
      return applyCurrentSubst(ctx, element);
    }
    default:
      throw mismatchError("an array, matrix or string", typeToString(targetType), span);
  }
}

function inferFieldAccess(ctx: Context, target: Expr, field: string, span: SourceSpan): Type {
  // `Geometry.area` reads a module member without importing it
  if (target.kind === "identifier" && !ctx.env.has(target.name)) {
    const module = ctx.state.modules.get(target.name);
    if (module) {
      const scheme = module.members.get(field);
      if (!scheme) {
        throw unknownIdentifierError(`${target.name}.${field}`, span);
      }
      return instantiateAndApply(ctx, scheme, span);
    }
  }

  const targetType = applyCurrentSubst(ctx, inferExpr(ctx, target));
  if (targetType.kind === "struct") {
    const fieldType = targetType.fields.get(field);
    if (!fieldType) {
      throw unknownIdentifierError(field, span);
    }
    return fieldType;
  }
  if (targetType.kind === "var") {
    const owners = [...ctx.state.structs.values()].filter((info) => info.fields.has(field));
    if (owners.length === 1) {
      unify(ctx, owners[0].type, targetType, target.span);
      return owners[0].fields.get(field) ?? ctx.supply.fresh();
    }
    if (owners.length === 0) {
      throw unknownIdentifierError(field, span);
    }
  }
  throw mismatchError(`a struct with field '${field}'`, typeToString(targetType), span);
}

function inferStructLiteral(
  ctx: Context,
  name: string,
  fields: { name: string; value: Expr; span: SourceSpan }[],
  span: SourceSpan,
): Type {
  const info = ctx.state.structs.get(name);
  if (!info) {
    throw unknownIdentifierError(name, span);
  }
  const provided = new Set<string>();
  for (const field of fields) {
    const expected = info.fields.get(field.name);
    if (!expected) {
      throw unknownIdentifierError(field.name, field.span);
    }
    provided.add(field.name);
    unify(ctx, expected, inferExpr(ctx, field.value), field.value.span);
  }
  for (const fieldName of info.fields.keys()) {
    if (!provided.has(fieldName) && !info.defaults.has(fieldName)) {
      throw arityMismatchError(info.fields.size, provided.size, span, "field");
    }
  }
  return info.type;
}

function inferMatch(ctx: Context, scrutinee: Type, arms: MatchArm[]): Type {
  const result = ctx.supply.fresh();
  for (const arm of arms) {
    withScopedEnv(ctx, () => {
      const bindings = new Map<string, Type>();
      inferPattern(ctx, arm.pattern, scrutinee, bindings);
      for (const [name, type] of bindings) {
        bindLocal(ctx, name, applyCurrentSubst(ctx, type));
      }
      if (arm.guard) {
        unify(ctx, BOOL, inferExpr(ctx, arm.guard), arm.guard.span);
      }
      unify(ctx, result, inferExpr(ctx, arm.body), arm.body.span);
    });
  }
  return applyCurrentSubst(ctx, result);
}

function inferPattern(
  ctx: Context,
  pattern: Pattern,
  expected: Type,
  bindings: Map<string, Type>,
): void {
  switch (pattern.kind) {
    case "wildcard":
      return;
    case "variable":
      bindings.set(pattern.name, expected);
      return;
    case "literal":
      unify(ctx, literalType(pattern.literal), expected, pattern.span);
      return;
    case "struct": {
      const info = ctx.state.structs.get(pattern.name);
      if (!info) {
        throw unknownIdentifierError(pattern.name, pattern.span);
      }
      unify(ctx, info.type, expected, pattern.span);
      for (const field of pattern.fields) {
        const fieldType = info.fields.get(field.name);
        if (!fieldType) {
          throw unknownIdentifierError(field.name, field.span);
        }
        inferPattern(ctx, field.pattern, fieldType, bindings);
      }
      return;
    }
    case "array": {
      const element = ctx.supply.fresh();
      unify(ctx, arrayType(element), expected, pattern.span);
      for (const item of pattern.elements) {
        inferPattern(ctx, item, element, bindings);
      }
      if (pattern.rest) {
        inferPattern(ctx, pattern.rest, arrayType(element), bindings);
      }
      return;
    }
  }
}

function inferWait(ctx: Context, target: Type, span: SourceSpan): Type {
  const resolved = applyCurrentSubst(ctx, target);
  if (resolved.kind === "array") {
    const payload = ctx.supply.fresh();
    unify(ctx, handleType(payload), resolved.element, span);
    return arrayType(applyCurrentSubst(ctx, payload));
  }
  const payload = ctx.supply.fresh();
  unify(ctx, handleType(payload), resolved, span);
  return applyCurrentSubst(ctx, payload);
}

function iterationElement(ctx: Context, iterable: Type, span: SourceSpan): Type {
  const resolved = applyCurrentSubst(ctx, iterable);
  if (resolved.kind === "matrix") {
    return arrayType(resolved.element);
  }
  if (resolved.kind === "string") {
    return STRING;
  }
  const element = ctx.supply.fresh();
  unify(ctx, arrayType(element), resolved, span);
  return applyCurrentSubst(ctx, element);
}

function operatorScheme(operator: string): TypeScheme {
  const T = typeVar(0);
  switch (operator) {
    case "+":
      return forall(funcType([T, T], T), ["Addable", T]);
    case "-":
    case "*":
      return forall(funcType([T, T], T), ["Arithmetic", T]);
    case "/":
    case "%":
    case "^":
      return forall(funcType([T, T], T), ["Numeric", T]);
    case "<":
    case "<=":
    case ">":
    case ">=":
      return forall(funcType([T, T], BOOL), ["Ordered", T]);
    case "==":
    case "!=":
      return forall(funcType([T, T], BOOL), ["Equatable", T]);
    case "&&":
    case "||":
      return monomorphic(funcType([BOOL, BOOL], BOOL));
    default:
      throw unknownIdentifierError(operator);
  }
}

// ============================================================================
// Type expressions
// ============================================================================

function convertTypeExpr(ctx: Context, typeExpr: TypeExpr, vars: Map<string, Type>): Type {
  switch (typeExpr.kind) {
    case "type_var": {
      const existing = vars.get(typeExpr.name);
      if (existing) {
        return existing;
      }
      const fresh = ctx.supply.fresh();
      vars.set(typeExpr.name, fresh);
      return fresh;
    }
    case "type_array":
      return arrayType(convertTypeExpr(ctx, typeExpr.element, vars));
    case "type_fn":
      return funcType(
        typeExpr.parameters.map((param) => convertTypeExpr(ctx, param, vars)),
        convertTypeExpr(ctx, typeExpr.result, vars),
      );
    case "type_ref": {
      const args = typeExpr.typeArgs.map((arg) => convertTypeExpr(ctx, arg, vars));
      const expectArgs = (count: number) => {
        if (args.length !== count) {
          throw arityMismatchError(count, args.length, typeExpr.span, "type argument");
        }
      };
      switch (typeExpr.name) {
        case "Int":
          expectArgs(0);
          return INT;
        case "Float":
          expectArgs(0);
          return FLOAT;
        case "Bool":
          expectArgs(0);
          return BOOL;
        case "String":
          expectArgs(0);
          return STRING;
        case "Unit":
          expectArgs(0);
          return UNIT;
        case "Array":
          expectArgs(1);
          return arrayType(args[0]);
        case "Matrix":
          expectArgs(1);
          return matrixType(args[0]);
        case "Handle":
          expectArgs(1);
          return handleType(args[0]);
      }
      const struct = ctx.state.structs.get(typeExpr.name);
      if (struct) {
        expectArgs(0);
        return struct.type;
      }
      if (ctx.opaqueTypes.has(typeExpr.name)) {
        expectArgs(0);
        return { kind: "opaque", name: typeExpr.name };
      }
      throw unknownIdentifierError(typeExpr.name, typeExpr.span);
    }
  }
}

function collectOpaqueTypes(registry: BuiltinRegistry): Set<string> {
  const names = new Set<string>();
  const visit = (type: Type): void => {
    switch (type.kind) {
      case "opaque":
        names.add(type.name);
        return;
      case "array":
      case "matrix":
        visit(type.element);
        return;
      case "handle":
        visit(type.payload);
        return;
      case "func":
        type.params.forEach(visit);
        visit(type.result);
        return;
      default:
        return;
    }
  };
  for (const entry of registry.entries()) {
    visit(entry.scheme.type);
  }
  return names;
}

// ============================================================================
// Unification and constraints
// ============================================================================

function unify(ctx: Context, expected: Type, actual: Type, span?: SourceSpan): void {
  ctx.subst = unifyTypes(expected, actual, ctx.subst, span);
  ctx.state.subst = ctx.subst;
}

function applyCurrentSubst(ctx: Context, type: Type): Type {
  return applySubstitution(type, ctx.subst);
}

function lookupEnv(ctx: Context, name: string, span: SourceSpan): TypeScheme {
  const scheme = ctx.env.get(name);
  if (!scheme) {
    throw unknownIdentifierError(name, span);
  }
  return scheme;
}

function instantiateAndApply(ctx: Context, scheme: TypeScheme, span?: SourceSpan): Type {
  const { type, constraints } = instantiate(scheme, ctx.supply);
  for (const constraint of constraints) {
    ctx.pending.push({ className: constraint.className, type: typeVar(constraint.typeVar), span });
  }
  return applyCurrentSubst(ctx, type);
}

function bindLocal(ctx: Context, name: string, type: Type): void {
  ctx.env.set(name, monomorphic(type));
  ctx.mutable.delete(name);
}

function addConstraint(ctx: Context, className: string, type: Type, span?: SourceSpan): void {
  ctx.pending.push({ className, type, span });
}

// Drops satisfied constraints, keeps those on unresolved variables
function solveConstraints(ctx: Context): void {
  const remaining: PendingConstraint[] = [];
  for (const constraint of ctx.pending) {
    const resolved = applyCurrentSubst(ctx, constraint.type);
    if (resolved.kind === "var") {
      remaining.push({ ...constraint, type: resolved });
      continue;
    }
    if (!satisfiesClass(ctx, constraint.className, resolved)) {
      throw mismatchError(constraint.className, typeToString(resolved), constraint.span);
    }
  }
  ctx.pending.length = 0;
  ctx.pending.push(...remaining);
}

function satisfiesClass(ctx: Context, className: string, type: Type): boolean {
  const builtin = BUILTIN_CLASSES[className];
  if (builtin) {
    return builtin(type);
  }
  return ctx.state.instances.get(className)?.has(typeKey(type)) ?? false;
}

/** Names the head of a type, the key instances are registered under. */
export function typeKey(type: Type): string {
  switch (type.kind) {
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
    case "handle":
      return "Handle";
    case "func":
      return "Function";
    case "struct":
    case "opaque":
      return type.name;
    case "var":
      return `?${type.id}`;
  }
}

function generalizeInContext(ctx: Context, type: Type): TypeScheme {
  const applied = applyCurrentSubst(ctx, type);
  const envVars = freeTypeVarsEnv(ctx.env, ctx.subst);
  const candidates = [...freeTypeVars(applied)].filter((id) => !envVars.has(id));
  const quantified = new Set(candidates);

  // Constraints on quantified variables travel with the scheme
  const moved: ClassConstraint[] = [];
  const remaining: PendingConstraint[] = [];
  for (const constraint of ctx.pending) {
    const resolved = applyCurrentSubst(ctx, constraint.type);
    if (resolved.kind === "var" && quantified.has(resolved.id)) {
      moved.push({ className: constraint.className, typeVar: resolved.id });
    } else {
      remaining.push(constraint);
    }
  }
  ctx.pending.length = 0;
  ctx.pending.push(...remaining);

  const unique = new Map<string, ClassConstraint>();
  for (const constraint of moved) {
    unique.set(`${constraint.className}:${constraint.typeVar}`, constraint);
  }
  return generalize(applied, envVars, [...unique.values()]);
}

function unifyTypes(a: Type, b: Type, subst: Substitution, span?: SourceSpan): Substitution {
  const left = applySubstitution(a, subst);
  const right = applySubstitution(b, subst);

  if (left.kind === "var") {
    return bindVar(left.id, right, subst, span);
  }
  if (right.kind === "var") {
    return bindVar(right.id, left, subst, span);
  }

  if (left.kind === "func" && right.kind === "func") {
    if (left.params.length !== right.params.length) {
      throw arityMismatchError(left.params.length, right.params.length, span);
    }
    let current = subst;
    for (let i = 0; i < left.params.length; i++) {
      current = unifyTypes(left.params[i], right.params[i], current, span);
    }
    return unifyTypes(left.result, right.result, current, span);
  }

  if (left.kind === "array" && right.kind === "array") {
    return unifyTypes(left.element, right.element, subst, span);
  }
  if (left.kind === "matrix" && right.kind === "matrix") {
    return unifyTypes(left.element, right.element, subst, span);
  }
  if (left.kind === "handle" && right.kind === "handle") {
    return unifyTypes(left.payload, right.payload, subst, span);
  }
  if (left.kind === "struct" && right.kind === "struct" && left.name === right.name) {
    return subst;
  }
  if (left.kind === "opaque" && right.kind === "opaque" && left.name === right.name) {
    return subst;
  }
  if (
    left.kind === right.kind &&
    (left.kind === "int" || left.kind === "float" || left.kind === "bool" ||
      left.kind === "string" || left.kind === "unit")
  ) {
    return subst;
  }

  throw mismatchError(typeToString(left), typeToString(right), span);
}

function bindVar(id: number, type: Type, subst: Substitution, span?: SourceSpan): Substitution {
  const resolved = applySubstitution(type, subst);
  if (resolved.kind === "var" && resolved.id === id) {
    return subst;
  }
  if (occursInType(id, resolved)) {
    const variable: Type = { kind: "var", id };
    throw infiniteTypeError(typeToString(variable), typeToString(resolved), span);
  }
  const next = new Map(subst);
  next.set(id, resolved);
  return next;
}

function literalType(literal: Literal): Type {
  switch (literal.kind) {
    case "int":
      return INT;
    case "float":
      return FLOAT;
    case "bool":
      return BOOL;
    case "string":
      return STRING;
    case "unit":
      return UNIT;
  }
}

function replaceVar(type: Type, id: number, replacement: Type): Type {
  return applySubstitution(type, new Map([[id, replacement]]));
}

/** Standalone occurs-check unification, for tests and tools. */
export function unifyStandalone(a: Type, b: Type): Substitution {
  return unifyTypes(a, b, new Map());
}
