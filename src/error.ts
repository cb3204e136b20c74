import type { Token } from "./token.js";
import type { SourceSpan } from "./ast.js";

export type LexErrorDetail =
  | { kind: "UnterminatedString" }
  | { kind: "InvalidCharacter"; character: string };

export type ParseErrorDetail =
  | { kind: "UnexpectedToken"; expected: string; found: string }
  | { kind: "UnterminatedConstruct"; construct: string };

export type InferErrorDetail =
  | { kind: "Mismatch"; expected: string; found: string }
  | { kind: "InfiniteType"; variable: string }
  | { kind: "UnknownIdentifier"; name: string }
  | { kind: "ArityMismatch"; expected: number; found: number }
  | { kind: "ImmutableAssignment"; name: string };

export type RuntimeErrorDetail =
  | { kind: "DivisionByZero" }
  | { kind: "UndefinedVariable"; name: string }
  | { kind: "ArgumentMismatch"; name: string; expected: string; got: string }
  | { kind: "IndexOutOfBounds"; index: number; length: number }
  | { kind: "InvalidOperation"; operation: string };

/**
 * Base class for every error the language pipeline raises.
 *
 * `format()` gives the one-line diagnostic used by tests and the REPL,
 * `render(source)` the multi-line form with source context used by the CLI.
 */
export abstract class LanguageError<
  Detail extends { kind: string } = { kind: string },
> extends Error {
  abstract readonly errorType: string;

  constructor(
    message: string,
    readonly detail: Detail,
    readonly span?: SourceSpan,
  ) {
    super(message);
  }

  get kind(): Detail["kind"] {
    return this.detail.kind;
  }

  get line(): number | undefined {
    return this.span?.line;
  }

  get column(): number | undefined {
    return this.span?.column;
  }

  protected subjectSuffix(): string {
    return "";
  }

  format(): string {
    const head = `${this.errorType}: ${this.message}${this.subjectSuffix()}`;
    if (!this.span) {
      return head;
    }
    return `${head} at line ${this.span.line}, column ${this.span.column}`;
  }

  render(source?: string, filename?: string): string {
    if (!source || !this.span) {
      return this.format();
    }
    return formatError({
      errorType: this.errorType,
      message: `${this.message}${this.subjectSuffix()}`,
      location: { line: this.span.line, column: this.span.column },
      context: getSourceContext(source, this.span),
      hint: this.hint(),
      filename,
    });
  }

  protected hint(): string | undefined {
    return undefined;
  }
}

export class LexError extends LanguageError<LexErrorDetail> {
  readonly errorType = "LexError";

  protected override hint(): string | undefined {
    if (this.detail.kind === "UnterminatedString") {
      return "Strings cannot span lines; close the quote on the same line";
    }
    return "This character is not part of the language";
  }
}

export class ParseError extends LanguageError<ParseErrorDetail> {
  readonly errorType = "ParseError";

  protected override hint(): string | undefined {
    return getParseErrorHint(this.detail);
  }
}

// Reported as `TypeError` in diagnostics
export class InferError extends LanguageError<InferErrorDetail> {
  readonly errorType = "TypeError";

  protected override hint(): string | undefined {
    return getTypeErrorHint(this.detail);
  }
}

export class RuntimeError extends LanguageError<RuntimeErrorDetail> {
  readonly errorType = "RuntimeError";

  constructor(
    message: string,
    detail: RuntimeErrorDetail,
    span?: SourceSpan,
    readonly subject?: string,
  ) {
    super(message, detail, span);
  }

  /** Attach the failing call or identifier, keeping the innermost one. */
  withSubject(subject: string, span?: SourceSpan): RuntimeError {
    if (this.subject !== undefined) {
      return this;
    }
    return new RuntimeError(this.message, this.detail, this.span ?? span, subject);
  }

  protected override subjectSuffix(): string {
    return this.subject === undefined ? "" : ` in '${this.subject}'`;
  }
}

// ============================================================================
// Error Formatting Utilities
// ============================================================================

interface Location {
  line: number;
  column: number;
}

interface SourceContext {
  beforeLines: string[];
  errorLine: string;
  afterLines: string[];
  startColumn: number;
  length: number;
}

interface ErrorFormatOptions {
  errorType: string;
  message: string;
  location: Location;
  context?: SourceContext;
  hint?: string;
  filename?: string;
}

function formatError(options: ErrorFormatOptions): string {
  const { errorType, message, location, context, hint, filename } = options;

  const locationStr = filename
    ? `${filename}:${location.line}:${location.column}`
    : `line ${location.line}, column ${location.column}`;

  let output = `${errorType} at ${locationStr}:\n`;
  output += `  ${message}\n`;

  if (context) {
    output += "\n";
    for (const line of context.beforeLines) {
      output += `  ${line}\n`;
    }
    output += `  ${context.errorLine}\n`;
    const padding = " ".repeat(context.startColumn + 2);
    const underline = "^".repeat(Math.max(1, context.length));
    output += `${padding}${underline}\n`;
    for (const line of context.afterLines) {
      output += `  ${line}\n`;
    }
  }

  if (hint) {
    output += `\nHint: ${hint}`;
  }

  return output;
}

function getSourceContext(source: string, span: SourceSpan): SourceContext {
  const lines = source.split("\n");
  const lineIndex = span.line - 1;

  const beforeLines: string[] = [];
  const afterLines: string[] = [];

  if (lineIndex > 0) {
    beforeLines.push(lines[lineIndex - 1]);
  }

  const errorLine = lines[lineIndex] ?? "";

  if (lineIndex + 1 < lines.length) {
    afterLines.push(lines[lineIndex + 1]);
  }

  return {
    beforeLines,
    errorLine,
    afterLines,
    startColumn: span.column - 1,
    length: Math.min(span.end - span.start, errorLine.length - (span.column - 1)),
  };
}

export function formatLanguageError(error: unknown, source?: string): string {
  if (error instanceof LanguageError) {
    return source === undefined ? error.format() : error.render(source);
  }

  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  if (typeof error === "string") {
    return error;
  }

  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

// ============================================================================
// Error Hints
// ============================================================================

function getParseErrorHint(detail: ParseErrorDetail): string | undefined {
  if (detail.kind === "UnterminatedConstruct") {
    return `This ${detail.construct} is never closed`;
  }
  switch (detail.expected) {
    case "identifier":
      return "An identifier (variable name) is required here";
    case "'}'":
    case "'{'":
      return "Block expressions must be enclosed in curly braces";
    case "')'":
    case "'('":
      return "Check for matching parentheses";
    case "'=>'":
      return "Lambdas and match arms use '=>' before their body";
    default:
      return undefined;
  }
}

function getTypeErrorHint(detail: InferErrorDetail): string | undefined {
  switch (detail.kind) {
    case "Mismatch":
      return "The types of these expressions are incompatible";
    case "UnknownIdentifier":
      return "This name is not defined in the current scope";
    case "InfiniteType":
      return "This would create an infinite type";
    case "ArityMismatch":
      return "Check the number of arguments or fields";
    case "ImmutableAssignment":
      return "Declare the binding with 'let mut' to allow reassignment";
  }
}

// ============================================================================
// Error Creation Helpers
// ============================================================================

export function unexpectedCharError(char: string, span: SourceSpan): LexError {
  const displayChar = char === "\t" ? "\\t" : char;
  return new LexError(
    `Unexpected character '${displayChar}'`,
    { kind: "InvalidCharacter", character: char },
    span,
  );
}

export function unterminatedStringError(span: SourceSpan): LexError {
  return new LexError(
    "Unterminated string literal - missing closing quote",
    { kind: "UnterminatedString" },
    span,
  );
}

export function describeToken(token: Token): string {
  return token.kind === "eof" ? "end of file" : `${token.kind} '${token.value}'`;
}

export function expectedTokenError(expected: string, token: Token): ParseError {
  const found = token.kind === "eof" ? "end of file" : token.value;
  return new ParseError(
    `Expected ${expected}, but got ${describeToken(token)}`,
    { kind: "UnexpectedToken", expected, found },
    tokenSpan(token),
  );
}

export function unterminatedConstructError(construct: string, opener: Token): ParseError {
  return new ParseError(
    `Unterminated ${construct} opened at line ${opener.line}`,
    { kind: "UnterminatedConstruct", construct },
    tokenSpan(opener),
  );
}

export function mismatchError(expected: string, found: string, span?: SourceSpan): InferError {
  return new InferError(
    `Type mismatch: expected ${expected}, found ${found}`,
    { kind: "Mismatch", expected, found },
    span,
  );
}

export function infiniteTypeError(variable: string, type: string, span?: SourceSpan): InferError {
  return new InferError(
    `Occurs check failed: ${variable} occurs in ${type}`,
    { kind: "InfiniteType", variable },
    span,
  );
}

export function unknownIdentifierError(name: string, span?: SourceSpan): InferError {
  return new InferError(
    `Unknown identifier '${name}'`,
    { kind: "UnknownIdentifier", name },
    span,
  );
}

export function arityMismatchError(
  expected: number,
  found: number,
  span?: SourceSpan,
  what = "argument",
): InferError {
  return new InferError(
    `Arity mismatch: expected ${expected} ${what}(s), found ${found}`,
    { kind: "ArityMismatch", expected, found },
    span,
  );
}

export function immutableAssignmentError(name: string, span?: SourceSpan): InferError {
  return new InferError(
    `Cannot assign to immutable binding '${name}'`,
    { kind: "ImmutableAssignment", name },
    span,
  );
}

export function divisionByZeroError(span?: SourceSpan): RuntimeError {
  return new RuntimeError("Division by zero", { kind: "DivisionByZero" }, span);
}

export function undefinedVariableError(name: string, span?: SourceSpan): RuntimeError {
  return new RuntimeError(
    `Undefined variable '${name}'`,
    { kind: "UndefinedVariable", name },
    span,
    name,
  );
}

export function argumentMismatchError(
  name: string,
  expected: string,
  got: string,
  span?: SourceSpan,
): RuntimeError {
  return new RuntimeError(
    `Argument mismatch: expected ${expected}, got ${got}`,
    { kind: "ArgumentMismatch", name, expected, got },
    span,
    name,
  );
}

export function indexOutOfBoundsError(index: number, length: number, span?: SourceSpan): RuntimeError {
  return new RuntimeError(
    `Index ${index} out of bounds for length ${length}`,
    { kind: "IndexOutOfBounds", index, length },
    span,
  );
}

export function invalidOperationError(operation: string, span?: SourceSpan): RuntimeError {
  return new RuntimeError(operation, { kind: "InvalidOperation", operation }, span);
}

function tokenSpan(token: Token): SourceSpan {
  return { start: token.start, end: token.end, line: token.line, column: token.column };
}
