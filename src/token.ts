export type TokenKind =
  | "identifier"
  | "constructor"
  | "number"
  | "float"
  | "bool"
  | "string"
  | "keyword"
  | "symbol"
  | "operator"
  | "comment"
  | "eof";

export interface Token {
  kind: TokenKind;
  value: string;
  start: number;
  end: number;
  line: number;
  column: number;
}

export const keywords = new Set([
  "let",
  "mut",
  "struct",
  "if",
  "then",
  "else",
  "match",
  "typeclass",
  "instance",
  "module",
  "import",
  "parallel",
  "spawn",
  "wait",
  "in",
]);

// Longest first so that `..=` wins over `..` and `.`
export const symbols = [
  "..=",
  "=>",
  "->",
  "..",
  ".",
  "=",
  "|",
  ":",
  ",",
  ";",
  "(",
  ")",
  "{",
  "}",
  "[",
  "]",
  "@",
  "_",
];

// Checked before symbols: `==` must not lex as two `=`
export const multiCharOperators = [
  "<=",
  ">=",
  "==",
  "!=",
  "&&",
  "||",
];

export const singleCharOperators = new Set([
  "+",
  "-",
  "*",
  "/",
  "%",
  "^",
  "<",
  ">",
  "!",
]);
