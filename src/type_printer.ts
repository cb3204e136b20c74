import type { ClassConstraint, Type, TypeScheme } from "./types.js";

interface PrintContext {
  names: Map<number, string>;
  next: number;
}

const GENERIC_NAMES = ["T", "U", "V", "W", "X", "Y", "Z"];

export function createPrintContext(): PrintContext {
  return { names: new Map(), next: 0 };
}

/** Prints `(Numeric T, Show U) => (T, U) -> T` style signatures. */
export function formatScheme(scheme: TypeScheme): string {
  const context = createPrintContext();
  const quantifiers = [...new Set(scheme.quantifiers)].sort((a, b) => a - b);
  for (const id of quantifiers) {
    ensureName(context, id);
  }
  const body = formatType(scheme.type, context, 0);
  const constraints = formatConstraints(scheme.constraints ?? [], context);
  return constraints ? `${constraints} => ${body}` : body;
}

export function typeToString(type: Type): string {
  return formatType(type, createPrintContext(), 0);
}

export function formatType(type: Type, context: PrintContext, prec: number): string {
  switch (type.kind) {
    case "var":
      return ensureName(context, type.id);
    case "func": {
      const params = type.params.length === 1 && type.params[0].kind !== "func"
        ? formatType(type.params[0], context, 1)
        : `(${type.params.map((param) => formatType(param, context, 0)).join(", ")})`;
      const result = `${params} -> ${formatType(type.result, context, 0)}`;
      return prec > 0 ? `(${result})` : result;
    }
    case "array":
      return `[${formatType(type.element, context, 0)}]`;
    case "matrix":
      return `Matrix<${formatType(type.element, context, 0)}>`;
    case "handle":
      return `Handle<${formatType(type.payload, context, 0)}>`;
    case "struct":
    case "opaque":
      return type.name;
    case "unit":
      return "Unit";
    case "int":
      return "Int";
    case "float":
      return "Float";
    case "bool":
      return "Bool";
    case "string":
      return "String";
  }
}

function formatConstraints(constraints: ClassConstraint[], context: PrintContext): string {
  const rendered = [
    ...new Set(constraints.map((c) => `${c.className} ${ensureName(context, c.typeVar)}`)),
  ];
  if (rendered.length === 0) {
    return "";
  }
  return rendered.length === 1 ? rendered[0] : `(${rendered.join(", ")})`;
}

function ensureName(context: PrintContext, id: number): string {
  const existing = context.names.get(id);
  if (existing) {
    return existing;
  }
  const name = nextName(context.next);
  context.names.set(id, name);
  context.next += 1;
  return name;
}

function nextName(index: number): string {
  const base = GENERIC_NAMES[index % GENERIC_NAMES.length];
  const suffix = Math.floor(index / GENERIC_NAMES.length);
  return suffix === 0 ? base : `${base}${suffix + 1}`;
}
