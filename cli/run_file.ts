import { readFileSync } from "node:fs";
import { checkFile, runFile } from "../src/runner.js";
import { formatLanguageError, LanguageError } from "../src/error.js";
import type { TraceOptions } from "../src/trace_options.js";

export interface CliRunOptions {
  debug: boolean;
  jit: boolean;
  trace: TraceOptions;
}

/** Runs a file, printing as it goes. Returns the process exit code. */
export function runFileCommand(path: string, options: CliRunOptions): number {
  const source = readSource(path);
  if (source === undefined) {
    return 1;
  }
  try {
    const result = runFile(source, {
      jit: options.jit,
      trace: options.trace,
      onPrint: (text) => console.log(text),
    });

    if (options.debug) {
      printTypes(result.types);
      if (result.values.length > 0) {
        console.log("");
        for (const { name, value } of result.values) {
          console.log(`${name} = ${value}`);
        }
      }
      return 0;
    }
    if (result.resultType !== "Unit") {
      console.log(result.result);
    }
    return 0;
  } catch (error) {
    reportError(error, source, path);
    return 1;
  }
}

export function checkFileCommand(path: string): number {
  const source = readSource(path);
  if (source === undefined) {
    return 1;
  }
  try {
    printTypes(checkFile(source));
    return 0;
  } catch (error) {
    reportError(error, source, path);
    return 1;
  }
}

function printTypes(types: { name: string; type: string }[]): void {
  if (types.length === 0) {
    console.log("(no top-level let bindings)");
    return;
  }
  for (const { name, type } of types) {
    console.log(`${name} : ${type}`);
  }
}

function readSource(path: string): string | undefined {
  try {
    return readFileSync(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`Failed to read ${path}: ${reason}`);
    return undefined;
  }
}

function reportError(error: unknown, source: string, path: string): void {
  if (error instanceof LanguageError) {
    console.error(error.render(source, path));
  } else {
    console.error(formatLanguageError(error));
  }
}
