import {
  type ClassConstraint,
  freeTypeVars,
  type Type,
  type TypeEnv,
  type TypeScheme,
} from "./types.js";
import type { NativeFunctionValue, NativeImpl, RuntimeValue } from "./value.js";

export interface RegisterOptions {
  module?: string;
}

export interface BuiltinEntry {
  name: string;
  module: string;
  scheme: TypeScheme;
  value: RuntimeValue;
}

/**
 * The one table shared by the checker and the evaluator. Every callable
 * name enters through `register`, which writes its scheme and its
 * implementation in the same step, so neither side can know a builtin the
 * other does not.
 */
export class BuiltinRegistry {
  private readonly schemes = new Map<string, TypeScheme>();
  private readonly implementations = new Map<string, RuntimeValue>();
  private readonly modules = new Map<string, string>();

  register(
    name: string,
    scheme: TypeScheme,
    impl: NativeImpl,
    options: RegisterOptions = {},
  ): NativeFunctionValue {
    if (scheme.type.kind !== "func") {
      throw new Error(`Builtin '${name}' must have a function type`);
    }
    const value: NativeFunctionValue = {
      kind: "native",
      name,
      arity: scheme.type.params.length,
      impl,
    };
    this.insert(name, scheme, value, options.module ?? "core");
    return value;
  }

  registerConstant(
    name: string,
    type: Type,
    value: RuntimeValue,
    options: RegisterOptions = {},
  ): void {
    if (freeTypeVars(type).size > 0) {
      throw new Error(`Builtin constant '${name}' must have a closed type`);
    }
    this.insert(name, { quantifiers: [], type }, value, options.module ?? "core");
  }

  has(name: string): boolean {
    return this.schemes.has(name);
  }

  lookupScheme(name: string): TypeScheme | undefined {
    return this.schemes.get(name);
  }

  lookupValue(name: string): RuntimeValue | undefined {
    return this.implementations.get(name);
  }

  moduleOf(name: string): string | undefined {
    return this.modules.get(name);
  }

  moduleNames(): string[] {
    return [...new Set(this.modules.values())].sort();
  }

  moduleMembers(module: string): string[] {
    const members: string[] = [];
    for (const [name, owner] of this.modules) {
      if (owner === module) {
        members.push(name);
      }
    }
    return members;
  }

  entries(): BuiltinEntry[] {
    const result: BuiltinEntry[] = [];
    for (const [name, scheme] of this.schemes) {
      const value = this.implementations.get(name);
      const module = this.modules.get(name);
      if (value && module) {
        result.push({ name, module, scheme, value });
      }
    }
    return result;
  }

  /** Initial type environment for a checker run. */
  typeEnv(): TypeEnv {
    return new Map(this.schemes);
  }

  /** Initial global bindings for an evaluator run. */
  runtimeBindings(): Map<string, RuntimeValue> {
    return new Map(this.implementations);
  }

  private insert(name: string, scheme: TypeScheme, value: RuntimeValue, module: string): void {
    if (this.schemes.has(name) || this.implementations.has(name)) {
      throw new Error(`Builtin '${name}' is already registered`);
    }
    this.schemes.set(name, scheme);
    this.implementations.set(name, value);
    this.modules.set(name, module);
  }
}

/**
 * Builds a scheme quantified over every variable in `type`.
 *
 * ```ts
 * const T = typeVar(0);
 * forall(funcType([T], T), ["Numeric", T]); // Numeric T => (T) -> T
 * ```
 */
export function forall(type: Type, ...constraints: [string, Type][]): TypeScheme {
  const quantifiers = [...freeTypeVars(type)].sort((a, b) => a - b);
  const classConstraints: ClassConstraint[] = [];
  for (const [className, variable] of constraints) {
    if (variable.kind !== "var") {
      throw new Error(`Constraint ${className} must name a type variable`);
    }
    classConstraints.push({ className, typeVar: variable.id });
  }
  return { quantifiers, constraints: classConstraints, type };
}

export function typeVar(id: number): Type {
  return { kind: "var", id };
}
