import { DiceError } from "./errors";
import { MAX_INTEGER_LITERAL } from "./limits";
import type { Token, TokenType } from "./types";

const SINGLE_CHAR_TOKENS: Readonly<Record<string, Exclude<TokenType, "number" | "eof">>> = {
  d: "d",
  D: "d",
  "%": "percent",
  f: "fudge",
  F: "fudge",
  "+": "plus",
  "-": "minus",
  "*": "star",
  "/": "slash",
  "(": "lparen",
  ")": "rparen",
  k: "k",
  K: "k",
  h: "h",
  H: "h",
  l: "l",
  L: "l",
  "!": "bang",
  r: "r",
  R: "r",
  o: "o",
  O: "o",
  p: "p",
  P: "p",
  "=": "eq",
  "<": "lt",
  ">": "gt",
};

function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

function utf8Length(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

/**
 * Splits dice notation into tokens on demand.
 *
 * `next()` consumes a token; `peek()` looks one token ahead by saving and restoring the cursor.
 * After the input is exhausted every call yields an `eof` token.
 */
export class Lexer {
  private readonly chars: string[];
  private index = 0;
  private byteOffset = 0;

  constructor(input: string) {
    this.chars = [...input];
  }

  /** Byte offset of the cursor. */
  get offset(): number {
    return this.byteOffset;
  }

  peek(): Token {
    const savedIndex = this.index;
    const savedOffset = this.byteOffset;
    try {
      return this.next();
    } finally {
      this.index = savedIndex;
      this.byteOffset = savedOffset;
    }
  }

  next(): Token {
    this.skipWhitespace();

    const offset = this.byteOffset;
    const c = this.chars[this.index];
    if (c === undefined) return { type: "eof", offset };

    if (isDigit(c)) return this.number();

    const type = SINGLE_CHAR_TOKENS[c];
    if (type === undefined) throw DiceError.unexpectedCharacter(c, offset);

    this.advance();
    return { type, offset };
  }

  /** Drains the remaining input, including the trailing `eof`. */
  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const token = this.next();
      tokens.push(token);
      if (token.type === "eof") return tokens;
    }
  }

  private number(): Token {
    const offset = this.byteOffset;
    let value = 0;

    for (;;) {
      const c = this.chars[this.index];
      if (c === undefined || !isDigit(c)) break;
      this.advance();
      value = Math.min(value * 10 + Number(c), MAX_INTEGER_LITERAL);
    }

    return { type: "number", value, offset };
  }

  private skipWhitespace(): void {
    for (;;) {
      const c = this.chars[this.index];
      if (c === undefined || !/^\s$/u.test(c)) return;
      this.advance();
    }
  }

  private advance(): void {
    const c = this.chars[this.index];
    if (c === undefined) return;
    this.byteOffset += utf8Length(c.codePointAt(0) ?? 0);
    this.index++;
  }
}

export function tokenize(input: string): Token[] {
  return new Lexer(input).tokenize();
}
