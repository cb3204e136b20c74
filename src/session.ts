import type { BuiltinRegistry } from "./builtins.js";
import type { Program } from "./ast.js";
import { type CheckerState, createCheckerState, type TypeAnnotations } from "./infer.js";
import { analyzeSource, type AnalysisResult } from "./pipeline.js";
import {
  createEvaluatorState,
  type EvalResult,
  evaluateProgram,
  type EvaluatorState,
} from "./eval.js";
import { TypeVarSupply } from "./types.js";
import { formatScheme, typeToString } from "./type_printer.js";
import {
  type Environment,
  type RuntimeValue,
  restoreBindings,
  type Slot,
  snapshotBindings,
} from "./value.js";
import { formatRuntimeValue } from "./value_printer.js";
import { createStandardLibrary, type PhysicsCollaborator } from "./stdlib/mod.js";
import { createTracer, DEFAULT_TRACE_OPTIONS, type TraceOptions, type Tracer } from "./trace_options.js";

export interface SessionOptions {
  /** Compile eligible let-bound lambdas. Default false. */
  jit?: boolean;
  /** Default: capture trace lines without printing them. */
  trace?: TraceOptions;
  /** Receives each line written by print/println. Default console.log. */
  onPrint?: (text: string) => void;
}

export interface TypeSummary {
  name: string;
  type: string;
}

export interface ValueSummary {
  name: string;
  value: string;
}

export interface EntryResult {
  types: TypeSummary[];
  values: ValueSummary[];
  value: RuntimeValue;
  resultType: string;
}

interface EvaluatorCheckpoint {
  globals: Environment;
  frames: [Environment, Map<string, Slot>][];
  structs: EvaluatorState["structs"];
  modules: EvaluatorState["modules"];
  instances: EvaluatorState["instances"];
}

function mergeInto<K, V>(target: Map<K, V>, source: Map<K, V>): void {
  for (const [key, value] of source) {
    target.set(key, value);
  }
}

/**
 * One compile and execute context: its own type variable supply, builtin
 * registry, checker state and evaluator state. Sessions never share state.
 */
export class Session {
  readonly supply = new TypeVarSupply();
  readonly registry: BuiltinRegistry;
  readonly physics: PhysicsCollaborator;
  readonly tracer: Tracer;
  private checker: CheckerState;
  private evaluator: EvaluatorState;
  private nextNodeId = 0;
  private readonly annotations: TypeAnnotations = {
    literalShapes: new Map(),
    functionTypes: new Map(),
    builtinTypes: new Map(),
    methodInstances: new Map(),
  };

  constructor(private readonly options: SessionOptions = {}) {
    const { registry, physics } = createStandardLibrary();
    this.registry = registry;
    this.physics = physics;
    this.tracer = createTracer(options.trace ?? { ...DEFAULT_TRACE_OPTIONS });
    this.checker = createCheckerState(registry);
    this.evaluator = createEvaluatorState(registry);
  }

  /** Lexes, parses and checks without evaluating or keeping anything. */
  check(source: string): AnalysisResult {
    return analyzeSource(source, {
      registry: this.registry,
      supply: this.supply,
      state: this.checker,
      firstNodeId: this.nextNodeId,
    });
  }

  /**
   * Checks and evaluates one entry. Nothing is kept when any stage fails:
   * the checker state is committed only after evaluation succeeds, and a
   * runtime error restores the evaluator's bindings.
   */
  run(source: string): EntryResult {
    const { program, inference } = this.check(source);
    this.nextNodeId = program.nextNodeId;
    mergeInto(this.annotations.literalShapes, inference.annotations.literalShapes);
    mergeInto(this.annotations.functionTypes, inference.annotations.functionTypes);
    mergeInto(this.annotations.builtinTypes, inference.annotations.builtinTypes);
    mergeInto(this.annotations.methodInstances, inference.annotations.methodInstances);

    const evaluation = this.evaluate(program);
    this.checker = inference.state;

    return {
      types: inference.summaries.map(({ name, scheme }) => ({ name, type: formatScheme(scheme) })),
      values: evaluation.summaries.map(({ name, value }) => ({
        name,
        value: formatRuntimeValue(value),
      })),
      value: evaluation.value,
      resultType: typeToString(inference.resultType),
    };
  }

  typeOf(name: string): string | undefined {
    const scheme = this.checker.env.get(name);
    return scheme ? formatScheme(scheme) : undefined;
  }

  /** Bindings made in this session, in definition order. */
  userBindings(): TypeSummary[] {
    const result: TypeSummary[] = [];
    for (const [name, scheme] of this.checker.env) {
      if (this.registry.lookupScheme(name) !== scheme) {
        result.push({ name, type: formatScheme(scheme) });
      }
    }
    return result;
  }

  reset(): void {
    this.checker = createCheckerState(this.registry);
    this.evaluator = createEvaluatorState(this.registry);
  }

  private evaluate(program: Program): EvalResult {
    const checkpoint = this.checkpoint();
    try {
      return evaluateProgram(program, this.evaluator, {
        annotations: this.annotations,
        jit: this.options.jit ?? false,
        onPrint: this.options.onPrint,
        trace: (line) => this.tracer.trace(line),
      });
    } catch (error) {
      this.restore(checkpoint);
      throw error;
    }
  }

  private checkpoint(): EvaluatorCheckpoint {
    const frames: [Environment, Map<string, Slot>][] = [];
    for (let env: Environment | null = this.evaluator.globals; env; env = env.parent) {
      frames.push([env, snapshotBindings(env)]);
    }
    return {
      globals: this.evaluator.globals,
      frames,
      structs: new Map(this.evaluator.structs),
      modules: new Map(this.evaluator.modules),
      instances: new Map(
        [...this.evaluator.instances].map((
          [name, byType],
        ): [string, Map<string, Map<string, RuntimeValue>>] => [name, new Map(byType)]),
      ),
    };
  }

  private restore(checkpoint: EvaluatorCheckpoint): void {
    for (const [env, snapshot] of checkpoint.frames) {
      restoreBindings(env, snapshot);
    }
    this.evaluator.globals = checkpoint.globals;
    this.evaluator.structs = checkpoint.structs;
    this.evaluator.modules = checkpoint.modules;
    this.evaluator.instances = checkpoint.instances;
  }
}
