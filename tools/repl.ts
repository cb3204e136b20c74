import { createInterface } from "node:readline";
import { readFileSync } from "node:fs";
import { Session, type SessionOptions } from "../src/session.js";
import { formatLanguageError, LanguageError } from "../src/error.js";
import { formatRuntimeValue } from "../src/value_printer.js";

export interface ReplIO {
  print(line: string): void;
  error(line: string): void;
  readFile(path: string): string;
}

const NODE_IO: ReplIO = {
  print: (line) => console.log(line),
  error: (line) => console.error(line),
  readFile: (path) => readFileSync(path, "utf8"),
};

/**
 * Line-oriented REPL over a single Session. `handleInput` is the whole
 * behaviour; `startRepl` only wires it to stdin.
 */
export class Repl {
  private session: Session;
  private readonly values = new Map<string, string>();
  private multilineBuffer: string[] = [];
  private isMultiline = false;

  constructor(
    private readonly io: ReplIO = NODE_IO,
    private readonly options: SessionOptions = {},
  ) {
    this.session = this.createSession();
  }

  get prompt(): string {
    return this.isMultiline ? ".. " : "mx> ";
  }

  /** Returns false once the user asked to quit. */
  handleInput(input: string): boolean {
    const trimmed = input.trim();
    if (trimmed.startsWith(":")) {
      return this.handleCommand(trimmed);
    }

    if (this.isMultiline) {
      this.handleMultiline(input);
      return true;
    }

    if (!trimmed) {
      return true;
    }

    if (hasUnclosedBrackets(input)) {
      this.isMultiline = true;
      this.multilineBuffer = [input];
      return true;
    }

    this.evaluateInput(input);
    return true;
  }

  private handleCommand(input: string): boolean {
    const [cmd, ...args] = input.slice(1).split(/\s+/);

    switch (cmd.toLowerCase()) {
      case "quit":
      case "exit":
        return false;

      case "help":
        this.showHelp();
        break;

      case "load":
        if (args.length > 0) {
          this.loadFile(args.join(" "));
        } else {
          this.io.print("Usage: :load <file.mx>");
        }
        break;

      case "clear":
        this.clearContext();
        break;

      case "env":
        this.showEnvironment();
        break;

      case "type":
        if (args.length > 0) {
          this.showType(args[0]);
        } else {
          this.io.print("Usage: :type <identifier>");
        }
        break;

      case "multiline":
        this.isMultiline = true;
        this.multilineBuffer = [];
        this.io.print("Entering multiline mode. Type :end to finish.");
        break;

      case "end":
        if (this.isMultiline) {
          this.flushMultiline();
        } else {
          this.io.print("Not in multiline mode");
        }
        break;

      default:
        this.io.print(`Unknown command: :${cmd}. Type :help for available commands.`);
    }

    return true;
  }

  private handleMultiline(input: string): void {
    this.multilineBuffer.push(input);
    if (!hasUnclosedBrackets(this.multilineBuffer.join("\n"))) {
      this.flushMultiline();
    }
  }

  private flushMultiline(): void {
    const code = this.multilineBuffer.join("\n");
    this.isMultiline = false;
    this.multilineBuffer = [];
    this.evaluateInput(code);
  }

  private evaluateInput(input: string): void {
    if (!input.trim()) return;

    try {
      const entry = this.session.run(input);
      const values = new Map(entry.values.map(({ name, value }) => [name, value]));

      for (const { name, type } of entry.types) {
        const value = values.get(name);
        if (value !== undefined) {
          this.values.set(name, value);
          this.io.print(`let ${name}: ${type} = ${value}`);
        } else {
          this.io.print(`let ${name}: ${type}`);
        }
      }

      if (entry.types.length === 0 && entry.resultType !== "Unit") {
        this.io.print(`- : ${entry.resultType} = ${formatRuntimeValue(entry.value)}`);
      }
    } catch (error) {
      if (error instanceof LanguageError) {
        this.io.error(error.format());
      } else {
        this.io.error(`Unhandled error: ${formatLanguageError(error)}`);
      }
    }
  }

  private showHelp(): void {
    this.io.print(`
REPL Commands:
  :help       - Show this help message
  :quit       - Exit the REPL
  :load <f>   - Load and evaluate a .mx file
  :clear      - Clear the accumulated context
  :env        - Show all defined bindings
  :type <id>  - Show the type of an identifier
  :multiline  - Enter multiline mode (or just use unclosed braces)
  :end        - Finish multiline input

Examples:
  mx> let x = 42
  mx> let m = [[1, 2], [3, 4]]
  mx> m * m
  mx> let f = (x) => {
  ..    x * 2
  .. }
`);
  }

  private clearContext(): void {
    this.session = this.createSession();
    this.values.clear();
    this.io.print("Context cleared");
  }

  private showEnvironment(): void {
    const bindings = this.session.userBindings();
    if (bindings.length === 0) {
      this.io.print("(no bindings)");
      return;
    }

    this.io.print("Defined bindings:");
    for (const { name, type } of bindings) {
      const value = this.values.get(name);
      this.io.print(value === undefined ? `${name} : ${type}` : `${name} : ${type} = ${value}`);
    }
  }

  private showType(identifier: string): void {
    const type = this.session.typeOf(identifier);
    if (type === undefined) {
      this.io.print(`Identifier '${identifier}' not found`);
      return;
    }
    this.io.print(`${identifier} : ${type}`);
  }

  private loadFile(filePath: string): void {
    let source: string;
    try {
      source = this.io.readFile(filePath);
    } catch (error) {
      this.io.error(`Failed to load ${filePath}: ${formatLanguageError(error)}`);
      return;
    }
    this.evaluateInput(source);
    this.io.print(`Loaded ${filePath}`);
  }

  private createSession(): Session {
    return new Session({
      ...this.options,
      onPrint: (text) => this.io.print(text),
    });
  }
}

export function hasUnclosedBrackets(input: string): boolean {
  let depth = 0;
  let inString = false;
  let escapeNext = false;

  for (const char of input) {
    if (escapeNext) {
      escapeNext = false;
      continue;
    }
    if (char === "\\" && inString) {
      escapeNext = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    switch (char) {
      case "{":
      case "(":
      case "[":
        depth++;
        break;
      case "}":
      case ")":
      case "]":
        depth--;
        break;
    }
  }

  return depth > 0;
}

export async function startRepl(options: SessionOptions = {}): Promise<void> {
  console.log("matrica REPL");
  console.log("Run 'mx --help' to see CLI usage (mx <file.mx>, mx check, etc.)\n");
  console.log("Type :help for REPL commands, :quit to exit");

  const repl = new Repl(NODE_IO, options);
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt(repl.prompt);
  rl.prompt();
  try {
    for await (const line of rl) {
      if (!repl.handleInput(line)) {
        break;
      }
      rl.setPrompt(repl.prompt);
      rl.prompt();
    }
  } finally {
    rl.close();
  }
  console.log("\nGoodbye!");
}
