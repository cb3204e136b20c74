import type { RuntimeValue } from "./value.js";

export function formatRuntimeValue(value: RuntimeValue): string {
  switch (value.kind) {
    case "unit":
      return "()";
    case "int":
      return value.value.toString(10);
    case "float":
      return formatFloat(value.value);
    case "bool":
      return value.value ? "true" : "false";
    case "string":
      return value.value;
    case "array":
      return `[${value.elements.map(formatNested).join(", ")}]`;
    case "matrix": {
      const show = value.element === "float" ? formatFloat : (n: number) => n.toString(10);
      const rows = value.rows.map((row) => `[${row.map(show).join(", ")}]`);
      return `[${rows.join(", ")}]`;
    }
    case "struct":
      return formatStruct(value);
    case "closure":
      return value.name ? `<closure ${value.name}>` : "<closure>";
    case "native":
      return `<native ${value.name}>`;
    case "handle":
      return `<handle ${value.owner}#${value.id}>`;
    case "task":
      return "<handle task>";
  }
}

export function formatFloat(value: number): string {
  if (Number.isInteger(value)) {
    return value.toFixed(1);
  }
  return value.toString(10);
}

// Strings inside collections keep their quotes
function formatNested(value: RuntimeValue): string {
  return value.kind === "string" ? JSON.stringify(value.value) : formatRuntimeValue(value);
}

function formatStruct(value: Extract<RuntimeValue, { kind: "struct" }>): string {
  if (value.fields.size === 0) {
    return `${value.name} {}`;
  }
  const pieces = Array.from(value.fields.entries()).map(([name, field]) =>
    `${name}: ${formatNested(field)}`
  );
  return `${value.name} { ${pieces.join(", ")} }`;
}
