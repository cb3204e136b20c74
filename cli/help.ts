export const HELP_TEXT = `
matrica - a statically typed, matrix-oriented scripting language

Usage:
  mx                      Start interactive REPL
  mx repl                 Start interactive REPL
  mx <file.mx>            Run a file and print its final value
  mx check <file.mx>      Type-check a file (skip evaluation)
  mx --help               Show this help message

Flags:
  --debug                 Print types and values of top-level bindings
  --jit                   Compile eligible functions to JavaScript
  --trace                 Print [jit] and [eval] trace lines to stderr
  --perf                  Turn tracing off entirely

Examples:
  mx                      # Start REPL for interactive development
  mx main.mx              # Run main.mx
  mx --debug main.mx      # Run main.mx and show types + values
  mx check main.mx        # Only type-check main.mx
  mx --jit --trace fib.mx # See which functions were compiled

REPL Commands:
  :help                   Show REPL-specific commands
  :quit                   Exit the REPL
  :load <file>            Load and evaluate a file
  :clear                  Clear accumulated context
  :env                    Show all defined bindings
  :type <id>              Show type of an identifier
  :multiline / :end       Enter and finish multiline input
`;
