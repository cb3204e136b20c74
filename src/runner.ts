import { Session, type SessionOptions, type TypeSummary, type ValueSummary } from "./session.js";
import { LanguageError } from "./error.js";
import { formatRuntimeValue } from "./value_printer.js";
import { formatScheme } from "./type_printer.js";

export type { TypeSummary, ValueSummary } from "./session.js";

export type RunOptions = SessionOptions;

export interface RunResult {
  types: TypeSummary[];
  values: ValueSummary[];
  result: string;
  resultType: string;
  runtimeLogs: string[];
  traceLogs: string[];
}

export function runFile(source: string, options: RunOptions = {}): RunResult {
  const runtimeLogs: string[] = [];
  const session = new Session({
    ...options,
    onPrint: (text) => {
      runtimeLogs.push(text);
      options.onPrint?.(text);
    },
  });
  try {
    const entry = session.run(source);
    return {
      types: entry.types,
      values: entry.values,
      result: formatRuntimeValue(entry.value),
      resultType: entry.resultType,
      runtimeLogs,
      traceLogs: session.tracer.lines,
    };
  } catch (error) {
    throw normalizeError(error);
  }
}

/** Types of the top-level bindings, without evaluating anything. */
export function checkFile(source: string, options: RunOptions = {}): TypeSummary[] {
  const session = new Session(options);
  try {
    const { inference } = session.check(source);
    return inference.summaries.map(({ name, scheme }) => ({ name, type: formatScheme(scheme) }));
  } catch (error) {
    throw normalizeError(error);
  }
}

function normalizeError(error: unknown): Error {
  if (error instanceof LanguageError) {
    return error;
  }
  if (error instanceof Error) {
    return new Error(`Unhandled error: ${error.message}`, { cause: error });
  }
  return new Error(`Unknown error: ${String(error)}`);
}
