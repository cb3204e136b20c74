import { describe, expect, test } from "vitest";
import { lex, tokenize } from "../src/lexer.js";
import { LexError } from "../src/error.js";

function kinds(source: string): string[] {
  return lex(source).map((token) => `${token.kind}:${token.value}`);
}

function lexError(source: string): LexError {
  try {
    lex(source);
  } catch (error) {
    if (error instanceof LexError) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected a lex error for ${source}`);
}

describe("lexer", () => {
  test("tokenizes a let binding", () => {
    expect(kinds("let x = 5 + 3")).toEqual([
      "keyword:let",
      "identifier:x",
      "symbol:=",
      "number:5",
      "operator:+",
      "number:3",
      "eof:",
    ]);
  });

  test("distinguishes ranges from floats", () => {
    expect(kinds("1..5")).toEqual(["number:1", "symbol:..", "number:5", "eof:"]);
    expect(kinds("1..=5")).toEqual(["number:1", "symbol:..=", "number:5", "eof:"]);
    expect(kinds("3.14 2e3 1.5e-2")).toEqual([
      "float:3.14",
      "float:2e3",
      "float:1.5e-2",
      "eof:",
    ]);
  });

  test("prefers two-character operators", () => {
    expect(kinds("a == b = c")).toEqual([
      "identifier:a",
      "operator:==",
      "identifier:b",
      "symbol:=",
      "identifier:c",
      "eof:",
    ]);
    expect(kinds("(x) -> Int")).toEqual([
      "symbol:(",
      "identifier:x",
      "symbol:)",
      "symbol:->",
      "constructor:Int",
      "eof:",
    ]);
  });

  test("keeps comments as tokens", () => {
    expect(kinds("x -- note\ny")).toEqual([
      "identifier:x",
      "comment:note",
      "identifier:y",
      "eof:",
    ]);
  });

  test("classifies keywords, booleans and wildcards", () => {
    expect(kinds("let mut flag = true")).toEqual([
      "keyword:let",
      "keyword:mut",
      "identifier:flag",
      "symbol:=",
      "bool:true",
      "eof:",
    ]);
    expect(kinds("_ _x")).toEqual(["symbol:_", "identifier:_x", "eof:"]);
  });

  test("decodes string escapes", () => {
    const [token] = lex('"a\\"b\\n"');
    expect(token.kind).toBe("string");
    expect(token.value).toBe('a"b\n');
  });

  test("tracks lines and columns", () => {
    const tokens = lex("let x\n  = 1");
    expect(tokens[1]).toMatchObject({ value: "x", line: 1, column: 5 });
    expect(tokens[2]).toMatchObject({ value: "=", line: 2, column: 3 });
  });

  test("reports an unterminated string at its opening quote", () => {
    const error = lexError('let s = "abc');
    expect(error.kind).toBe("UnterminatedString");
    expect(error.line).toBe(1);
    expect(error.column).toBe(9);
  });

  test("rejects a string broken by a newline", () => {
    expect(lexError('"abc\ndef"').kind).toBe("UnterminatedString");
  });

  test("reports unexpected characters", () => {
    const error = lexError("1 # 2");
    expect(error.detail).toEqual({ kind: "InvalidCharacter", character: "#" });
    expect(error.format()).toBe("LexError: Unexpected character '#' at line 1, column 3");
  });

  test("tokenize yields lazily until the first bad lexeme", () => {
    const tokens = tokenize("a #");
    expect(tokens.next().value).toMatchObject({ kind: "identifier", value: "a" });
    expect(() => tokens.next()).toThrow(LexError);
  });
});
