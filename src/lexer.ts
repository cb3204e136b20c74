import {
  keywords,
  multiCharOperators,
  singleCharOperators,
  symbols,
  type Token,
  type TokenKind,
} from "./token.js";
import { unexpectedCharError, unterminatedStringError } from "./error.js";

export function lex(source: string): Token[] {
  return [...tokenize(source)];
}

/**
 * Lazily produces the tokens of `source`, ending with a single `eof` token.
 * Every call starts over from the beginning. The first malformed lexeme
 * throws a LexError and ends the sequence.
 */
export function* tokenize(source: string): Generator<Token, void, undefined> {
  const length = source.length;
  let index = 0;
  let line = 1;
  let lineStart = 0;

  const make = (kind: TokenKind, value: string, start: number, end: number): Token => ({
    kind,
    value,
    start,
    end,
    line,
    column: start - lineStart + 1,
  });

  while (index < length) {
    const start = index;
    const char = source[index];

    if (char === "\n") {
      index++;
      line++;
      lineStart = index;
      continue;
    }

    if (isWhitespace(char)) {
      index++;
      continue;
    }

    if (char === "-" && source[index + 1] === "-") {
      index += 2;
      let value = "";
      while (index < length && source[index] !== "\n") {
        value += source[index];
        index++;
      }
      yield make("comment", value.trim(), start, index);
      continue;
    }

    if (isDigit(char)) {
      const { value, end, isFloat } = readNumber(source, index);
      yield make(isFloat ? "float" : "number", value, start, end);
      index = end;
      continue;
    }

    if (char === '"') {
      const { value, nextIndex } = readStringLiteral(source, index, line, start - lineStart + 1);
      yield make("string", value, start, nextIndex);
      index = nextIndex;
      continue;
    }

    if (char === "_" && !isIdentifierChar(source[index + 1] ?? "")) {
      yield make("symbol", "_", start, start + 1);
      index++;
      continue;
    }

    if (isAlpha(char) || char === "_") {
      let value = char;
      index++;
      while (index < length && isIdentifierChar(source[index])) {
        value += source[index++];
      }
      if (value === "true" || value === "false") {
        yield make("bool", value, start, index);
        continue;
      }
      if (keywords.has(value)) {
        yield make("keyword", value, start, index);
        continue;
      }
      const kind = isUppercase(value[0]) ? "constructor" : "identifier";
      yield make(kind, value, start, index);
      continue;
    }

    // `->` is a symbol even though `-` is an operator
    if (char === "-" && source[index + 1] === ">") {
      yield make("symbol", "->", start, index + 2);
      index += 2;
      continue;
    }

    const operatorMatch = matchOperator(source, index);
    if (operatorMatch) {
      yield make("operator", operatorMatch.value, start, operatorMatch.end);
      index = operatorMatch.end;
      continue;
    }

    const match = matchSymbol(source, index);
    if (match) {
      yield make("symbol", match.value, start, match.end);
      index = match.end;
      continue;
    }

    throw unexpectedCharError(char, {
      start,
      end: start + 1,
      line,
      column: start - lineStart + 1,
    });
  }

  yield make("eof", "", length, length);
}

function matchSymbol(
  source: string,
  index: number,
): { value: string; end: number } | null {
  for (const symbol of symbols) {
    const end = index + symbol.length;
    if (source.slice(index, end) === symbol) {
      return { value: symbol, end };
    }
  }
  return null;
}

function matchOperator(
  source: string,
  index: number,
): { value: string; end: number } | null {
  for (const op of multiCharOperators) {
    const end = index + op.length;
    if (source.slice(index, end) === op) {
      return { value: op, end };
    }
  }
  const char = source[index];
  if (singleCharOperators.has(char)) {
    return { value: char, end: index + 1 };
  }
  return null;
}

function readNumber(
  source: string,
  start: number,
): { value: string; end: number; isFloat: boolean } {
  let index = start;
  let isFloat = false;
  while (index < source.length && isDigit(source[index])) {
    index++;
  }
  // `1..5` is a range, not the float `1.`
  if (source[index] === "." && isDigit(source[index + 1] ?? "")) {
    isFloat = true;
    index++;
    while (index < source.length && isDigit(source[index])) {
      index++;
    }
  }
  if (source[index] === "e" || source[index] === "E") {
    let cursor = index + 1;
    if (source[cursor] === "+" || source[cursor] === "-") {
      cursor++;
    }
    if (isDigit(source[cursor] ?? "")) {
      isFloat = true;
      index = cursor;
      while (index < source.length && isDigit(source[index])) {
        index++;
      }
    }
  }
  return { value: source.slice(start, index), end: index, isFloat };
}

function isWhitespace(char: string): boolean {
  return char === " " || char === "\t" || char === "\r";
}

function isDigit(char: string): boolean {
  return char >= "0" && char <= "9";
}

function isAlpha(char: string): boolean {
  return (char >= "a" && char <= "z") || (char >= "A" && char <= "Z");
}

function isIdentifierChar(char: string): boolean {
  return isAlpha(char) || isDigit(char) || char === "_";
}

function isUppercase(char: string): boolean {
  return char >= "A" && char <= "Z";
}

function readStringLiteral(
  source: string,
  start: number,
  line: number,
  column: number,
): { value: string; nextIndex: number } {
  let index = start + 1;
  let value = "";
  const length = source.length;
  const opening = { start, end: start + 1, line, column };

  while (index < length) {
    const char = source[index];
    if (char === '"') {
      return { value, nextIndex: index + 1 };
    }
    if (char === "\\") {
      if (index + 1 >= length) {
        throw unterminatedStringError(opening);
      }
      const escape = source[index + 1];
      switch (escape) {
        case '"':
          value += '"';
          break;
        case "\\":
          value += "\\";
          break;
        case "n":
          value += "\n";
          break;
        case "r":
          value += "\r";
          break;
        case "t":
          value += "\t";
          break;
        case "0":
          value += "\0";
          break;
        default:
          value += escape;
          break;
      }
      index += 2;
      continue;
    }
    if (char === "\n") {
      throw unterminatedStringError(opening);
    }
    value += char;
    index++;
  }

  throw unterminatedStringError(opening);
}
