export type Type =
  | { kind: "var"; id: number }
  | { kind: "int" }
  | { kind: "float" }
  | { kind: "bool" }
  | { kind: "string" }
  | { kind: "unit" }
  | { kind: "array"; element: Type }
  | { kind: "matrix"; element: Type }
  | { kind: "func"; params: Type[]; result: Type }
  | { kind: "struct"; name: string; fields: Map<string, Type> }
  | { kind: "handle"; payload: Type }
  // Collaborator objects the language only sees through handles
  | { kind: "opaque"; name: string };

/** `Numeric T`: the variable must resolve to a member of the class. */
export interface ClassConstraint {
  className: string;
  typeVar: number;
}

export interface TypeScheme {
  quantifiers: number[];
  constraints?: ClassConstraint[];
  type: Type;
}

export type Substitution = Map<number, Type>;

export type TypeEnv = Map<string, TypeScheme>;

/**
 * Source of fresh type variables. One supply belongs to one session, so
 * independent sessions never share or reset each other's counters.
 */
export class TypeVarSupply {
  private next = 0;

  fresh(): Type {
    return { kind: "var", id: this.next++ };
  }

  freshId(): number {
    return this.next++;
  }
}

export const INT: Type = { kind: "int" };
export const FLOAT: Type = { kind: "float" };
export const BOOL: Type = { kind: "bool" };
export const STRING: Type = { kind: "string" };
export const UNIT: Type = { kind: "unit" };

export function arrayType(element: Type): Type {
  return { kind: "array", element };
}

export function matrixType(element: Type): Type {
  return { kind: "matrix", element };
}

export function funcType(params: Type[], result: Type): Type {
  return { kind: "func", params, result };
}

export function handleType(payload: Type): Type {
  return { kind: "handle", payload };
}

export function applySubstitution(type: Type, subst: Substitution): Type {
  switch (type.kind) {
    case "var": {
      // Chase var-to-var links iteratively; a repeated id ends the chase
      let current: Type = type;
      const seen = new Set<number>();
      while (current.kind === "var") {
        const mapped = subst.get(current.id);
        if (!mapped) {
          return current;
        }
        if (mapped.kind === "var") {
          if (mapped.id === current.id || seen.has(current.id)) {
            return current;
          }
          seen.add(current.id);
          current = mapped;
          continue;
        }
        return applySubstitution(mapped, subst);
      }
      return current;
    }
    case "array":
      return { kind: "array", element: applySubstitution(type.element, subst) };
    case "matrix":
      return { kind: "matrix", element: applySubstitution(type.element, subst) };
    case "handle":
      return { kind: "handle", payload: applySubstitution(type.payload, subst) };
    case "func":
      return {
        kind: "func",
        params: type.params.map((param) => applySubstitution(param, subst)),
        result: applySubstitution(type.result, subst),
      };
    default:
      // Struct fields are declared concretely and never hold variables
      return type;
  }
}

/**
 * Replaces each variable in `mapping` exactly once. Unlike
 * applySubstitution, a replacement is never looked up again, so a fresh id
 * that happens to equal a quantifier id cannot chain.
 */
export function substituteVars(type: Type, mapping: Map<number, Type>): Type {
  switch (type.kind) {
    case "var":
      return mapping.get(type.id) ?? type;
    case "array":
      return { kind: "array", element: substituteVars(type.element, mapping) };
    case "matrix":
      return { kind: "matrix", element: substituteVars(type.element, mapping) };
    case "handle":
      return { kind: "handle", payload: substituteVars(type.payload, mapping) };
    case "func":
      return {
        kind: "func",
        params: type.params.map((param) => substituteVars(param, mapping)),
        result: substituteVars(type.result, mapping),
      };
    default:
      return type;
  }
}

export function occursInType(id: number, type: Type): boolean {
  switch (type.kind) {
    case "var":
      return type.id === id;
    case "array":
    case "matrix":
      return occursInType(id, type.element);
    case "handle":
      return occursInType(id, type.payload);
    case "func":
      return type.params.some((param) => occursInType(id, param)) ||
        occursInType(id, type.result);
    default:
      return false;
  }
}

export function freeTypeVars(type: Type): Set<number> {
  switch (type.kind) {
    case "var":
      return new Set([type.id]);
    case "array":
    case "matrix":
      return freeTypeVars(type.element);
    case "handle":
      return freeTypeVars(type.payload);
    case "func":
      return unionMany([...type.params.map(freeTypeVars), freeTypeVars(type.result)]);
    default:
      return new Set();
  }
}

export function freeTypeVarsScheme(scheme: TypeScheme): Set<number> {
  const vars = freeTypeVars(scheme.type);
  for (const q of scheme.quantifiers) {
    vars.delete(q);
  }
  return vars;
}

export function freeTypeVarsEnv(env: TypeEnv, subst: Substitution): Set<number> {
  const vars = new Set<number>();
  for (const scheme of env.values()) {
    const applied: TypeScheme = {
      quantifiers: scheme.quantifiers,
      type: applySubstitution(scheme.type, withoutKeys(subst, scheme.quantifiers)),
    };
    for (const id of freeTypeVarsScheme(applied)) {
      vars.add(id);
    }
  }
  return vars;
}

export function generalize(
  type: Type,
  envVars: Set<number>,
  constraints: ClassConstraint[] = [],
): TypeScheme {
  const quantifiers = [...freeTypeVars(type)].filter((id) => !envVars.has(id));
  const bound = new Set(quantifiers);
  return {
    quantifiers,
    constraints: constraints.filter((constraint) => bound.has(constraint.typeVar)),
    type,
  };
}

export interface Instantiation {
  type: Type;
  constraints: ClassConstraint[];
}

/**
 * Gives one use site its own copy of the scheme: every quantified variable
 * maps to a fresh variable from `supply`, and the scheme's constraints move
 * onto those fresh variables.
 */
export function instantiate(scheme: TypeScheme, supply: TypeVarSupply): Instantiation {
  const mapping = new Map<number, Type>();
  for (const id of scheme.quantifiers) {
    mapping.set(id, supply.fresh());
  }
  const constraints: ClassConstraint[] = [];
  for (const constraint of scheme.constraints ?? []) {
    const replacement = mapping.get(constraint.typeVar);
    if (replacement && replacement.kind === "var") {
      constraints.push({ className: constraint.className, typeVar: replacement.id });
    }
  }
  return { type: substituteVars(scheme.type, mapping), constraints };
}

export function monomorphic(type: Type): TypeScheme {
  return { quantifiers: [], type };
}

function withoutKeys(subst: Substitution, keys: number[]): Substitution {
  if (keys.length === 0) {
    return subst;
  }
  const filtered = new Map(subst);
  for (const key of keys) {
    filtered.delete(key);
  }
  return filtered;
}

function unionMany(sets: Set<number>[]): Set<number> {
  const result = new Set<number>();
  for (const set of sets) {
    for (const id of set) {
      result.add(id);
    }
  }
  return result;
}
