#!/usr/bin/env node
import minimist from "minimist";
import { HELP_TEXT } from "./cli/help.js";
import { checkFileCommand, runFileCommand } from "./cli/run_file.js";
import { startRepl } from "./tools/repl.js";
import { applyTraceFlags } from "./src/trace_options.js";

const USAGE = "Usage: mx [check] <file.mx> | mx repl | mx (REPL mode)";

async function main(argv: string[]): Promise<number> {
  const flags = minimist(argv, {
    boolean: ["debug", "jit", "trace", "perf", "help"],
    alias: { h: "help" },
    stopEarly: false,
  });
  const args = flags._.map(String);
  const trace = applyTraceFlags({ trace: Boolean(flags.trace), perf: Boolean(flags.perf) });
  const jit = Boolean(flags.jit);

  if (flags.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  if (args.length === 0 || args[0] === "repl") {
    await startRepl({ jit, trace });
    return 0;
  }

  if (args[0] === "check") {
    if (args.length !== 2) {
      console.error(USAGE);
      return 1;
    }
    return checkFileCommand(args[1]);
  }

  if (args.length !== 1) {
    console.error(USAGE);
    return 1;
  }
  if (!args[0].endsWith(".mx")) {
    console.error("Expected a .mx file");
    return 1;
  }
  return runFileCommand(args[0], { debug: Boolean(flags.debug), jit, trace });
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  },
);
