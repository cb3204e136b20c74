import type { Program } from "./ast.js";
import { lex } from "./lexer.js";
import { parseProgram } from "./parser.js";
import { type CheckerState, inferProgram, type InferResult } from "./infer.js";
import type { BuiltinRegistry } from "./builtins.js";
import type { TypeVarSupply } from "./types.js";

export interface AnalysisOptions {
  registry: BuiltinRegistry;
  supply: TypeVarSupply;
  state?: CheckerState;
  firstNodeId?: number;
}

export interface AnalysisResult {
  program: Program;
  inference: InferResult;
}

export function parseSource(source: string, firstNodeId = 0): Program {
  return parseProgram(lex(source), { firstNodeId });
}

/** Lexes, parses and checks; any stage's error is thrown before evaluation. */
export function analyzeSource(source: string, options: AnalysisOptions): AnalysisResult {
  const program = parseSource(source, options.firstNodeId);
  const inference = inferProgram(program, {
    registry: options.registry,
    supply: options.supply,
    state: options.state,
  });
  return { program, inference };
}
