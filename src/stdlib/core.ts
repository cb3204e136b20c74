import { type BuiltinRegistry, forall, typeVar } from "../builtins.js";
import { arrayType, BOOL, FLOAT, funcType, INT, STRING, UNIT } from "../types.js";
import {
  arrayValue,
  describeValueKind,
  floatValue,
  intValue,
  type NativeImpl,
  type RuntimeValue,
  stringValue,
  UNIT_VALUE,
} from "../value.js";
import { formatRuntimeValue } from "../value_printer.js";
import { argumentMismatchError } from "../error.js";
import { expectArray, expectBool, expectNumber, numericResult } from "./args.js";

const T = typeVar(0);
const U = typeVar(1);

export function registerCore(registry: BuiltinRegistry): void {
  const module = { module: "core" };

  // print and println both emit one output line
  const printLine: NativeImpl = ([value], call) => {
    call.print(formatRuntimeValue(value));
    return UNIT_VALUE;
  };
  registry.register("print", forall(funcType([T], UNIT)), printLine, module);
  registry.register("println", forall(funcType([T], UNIT)), printLine, module);

  registry.register(
    "str",
    forall(funcType([T], STRING)),
    ([value]) => stringValue(formatRuntimeValue(value)),
    module,
  );

  registry.register(
    "len",
    forall(funcType([T], INT), ["Sized", T]),
    ([value], call) => {
      switch (value.kind) {
        case "array":
          return intValue(value.elements.length);
        case "matrix":
          return intValue(value.rows.length);
        case "string":
          // Code points, the unit indexing and iteration use
          return intValue([...value.value].length);
        default:
          throw argumentMismatchError(
            call.name,
            "Array, Matrix or String",
            describeValueKind(value),
            call.span,
          );
      }
    },
    module,
  );

  registry.register(
    "push",
    forall(funcType([arrayType(T), T], arrayType(T))),
    ([list, item], call) => arrayValue([...expectArray(call, list).elements, item]),
    module,
  );

  registry.register(
    "map",
    forall(funcType([arrayType(T), funcType([T], U)], arrayType(U))),
    ([list, fn], call) =>
      arrayValue(expectArray(call, list).elements.map((item) => call.apply(fn, [item]))),
    module,
  );

  registry.register(
    "filter",
    forall(funcType([arrayType(T), funcType([T], BOOL)], arrayType(T))),
    ([list, predicate], call) =>
      arrayValue(
        expectArray(call, list).elements.filter((item) =>
          expectBool(call, call.apply(predicate, [item]))
        ),
      ),
    module,
  );

  registry.register(
    "reduce",
    forall(funcType([arrayType(T), U, funcType([U, T], U)], U)),
    ([list, initial, fn], call) =>
      expectArray(call, list).elements.reduce(
        (acc: RuntimeValue, item) => call.apply(fn, [acc, item]),
        initial,
      ),
    module,
  );

  registry.register(
    "sum",
    forall(funcType([arrayType(T)], T), ["Numeric", T]),
    ([list], call) => {
      const elements = expectArray(call, list).elements;
      const total = elements.reduce((acc, item) => acc + expectNumber(call, item), 0);
      return numericResult(call, total, elements[0]);
    },
    module,
  );

  registry.register(
    "float",
    forall(funcType([T], FLOAT), ["Numeric", T]),
    ([value], call) => floatValue(expectNumber(call, value)),
    module,
  );

  registry.register(
    "int",
    forall(funcType([T], INT), ["Numeric", T]),
    ([value], call) => intValue(Math.trunc(expectNumber(call, value))),
    module,
  );
}
