export interface TraceOptions {
  print: boolean;
  capture: boolean;
}

export const DEFAULT_TRACE_OPTIONS: TraceOptions = {
  print: false,
  capture: true,
};

export interface TraceFlags {
  trace?: boolean;
  perf?: boolean;
}

/** `--trace` prints and captures, `--perf` turns both off. */
export function applyTraceFlags(
  flags: TraceFlags,
  options: TraceOptions = { ...DEFAULT_TRACE_OPTIONS },
): TraceOptions {
  if (flags.trace) {
    options.print = true;
    options.capture = true;
  }
  if (flags.perf) {
    options.print = false;
    options.capture = false;
  }
  return options;
}

export interface Tracer {
  readonly lines: string[];
  trace(line: string): void;
}

export function createTracer(
  options: TraceOptions,
  print: (line: string) => void = (line) => console.error(line),
): Tracer {
  const lines: string[] = [];
  return {
    lines,
    trace(line: string) {
      if (options.capture) {
        lines.push(line);
      }
      if (options.print) {
        print(line);
      }
    },
  };
}
