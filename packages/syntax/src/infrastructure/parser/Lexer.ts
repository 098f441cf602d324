import { Err, Ok, type Result } from "@syslens/core";

import type { Location, ParseError, Span } from "../../core/model.js";

export type TokenKind = "name" | "number" | "string" | "symbol" | "comment" | "eof";

export interface Token {
  kind: TokenKind;
  /** Raw source text of the token */
  text: string;
  /** Names: unquoted name text; comments: body without delimiters */
  value: string;
  /** True for `'unrestricted names'` */
  quoted: boolean;
  span: Span;
}

// Longest first so that `:>>` wins over `:>` and `::` over `:`.
const SYMBOLS = [
  "::>",
  ":>>",
  "::",
  ":>",
  ":=",
  "==",
  "!=",
  "<=",
  ">=",
  "->",
  "=>",
  "..",
  "**",
  ";", ":", "{", "}", "[", "]", "(", ")", ",", "=", ".", "*", "+", "-", "/",
  "<", ">", "#", "@", "~", "?", "!", "&", "|", "^", "%", "$",
];

const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;

/**
 * Splits source text into tokens. Comments are kept as tokens so that
 * `doc` and `comment` elements can pick up their bodies; the parser skips
 * them everywhere else.
 */
export class Lexer {
  private offset = 0;
  private line = 1;
  private column = 1;

  constructor(private readonly source: string) {}

  tokenize(): Result<Token[], ParseError> {
    const tokens: Token[] = [];

    while (true) {
      this.skipWhitespace();
      if (this.offset >= this.source.length) {
        const here = this.location();
        tokens.push({ kind: "eof", text: "", value: "", quoted: false, span: { start: here, end: here } });
        return Ok(tokens);
      }

      const token = this.next();
      if (!token.ok) {
        return token;
      }
      tokens.push(token.value);
    }
  }

  private next(): Result<Token, ParseError> {
    const start = this.location();
    const ch = this.source[this.offset];

    if (this.source.startsWith("//", this.offset)) {
      return Ok(this.lineComment(start));
    }
    if (this.source.startsWith("/*", this.offset)) {
      return this.blockComment(start);
    }
    if (ch === "'") {
      return this.quotedName(start);
    }
    if (ch === '"') {
      return this.string(start);
    }
    if (NAME_START.test(ch)) {
      this.advanceWhile(NAME_PART);
      const text = this.source.slice(start.offset, this.offset);
      return Ok(this.token("name", start, text));
    }
    if (DIGIT.test(ch)) {
      return Ok(this.number(start));
    }

    const symbol = SYMBOLS.find((s) => this.source.startsWith(s, this.offset));
    if (symbol) {
      this.advance(symbol.length);
      return Ok(this.token("symbol", start, symbol));
    }

    this.advance(1);
    return Err({ message: `Unexpected character '${ch}'`, span: { start, end: this.location() } });
  }

  private lineComment(start: Location): Token {
    while (this.offset < this.source.length && this.source[this.offset] !== "\n") {
      this.advance(1);
    }
    const text = this.source.slice(start.offset, this.offset);
    return this.token("comment", start, text.slice(2).trim());
  }

  private blockComment(start: Location): Result<Token, ParseError> {
    const close = this.source.indexOf("*/", this.offset + 2);
    if (close === -1) {
      this.advance(this.source.length - this.offset);
      return Err({ message: "Unterminated block comment", span: { start, end: this.location() } });
    }
    this.advance(close + 2 - this.offset);
    const text = this.source.slice(start.offset, this.offset);
    return Ok(this.token("comment", start, text.slice(2, -2).trim()));
  }

  private quotedName(start: Location): Result<Token, ParseError> {
    this.advance(1);
    let value = "";
    while (this.offset < this.source.length) {
      const ch = this.source[this.offset];
      if (ch === "\\" && this.offset + 1 < this.source.length) {
        value += this.source[this.offset + 1];
        this.advance(2);
        continue;
      }
      if (ch === "'") {
        this.advance(1);
        const text = this.source.slice(start.offset, this.offset);
        return Ok({ ...this.token("name", start, text), value, quoted: true });
      }
      if (ch === "\n") break;
      value += ch;
      this.advance(1);
    }
    return Err({ message: "Unterminated quoted name", span: { start, end: this.location() } });
  }

  private string(start: Location): Result<Token, ParseError> {
    this.advance(1);
    while (this.offset < this.source.length) {
      const ch = this.source[this.offset];
      if (ch === "\\") {
        this.advance(2);
        continue;
      }
      this.advance(1);
      if (ch === '"') {
        const text = this.source.slice(start.offset, this.offset);
        return Ok({ ...this.token("string", start, text), value: text.slice(1, -1) });
      }
    }
    return Err({ message: "Unterminated string literal", span: { start, end: this.location() } });
  }

  private number(start: Location): Token {
    this.advanceWhile(DIGIT);
    if (this.source[this.offset] === "." && DIGIT.test(this.source[this.offset + 1] ?? "")) {
      this.advance(1);
      this.advanceWhile(DIGIT);
    }
    const exp = this.source[this.offset];
    if ((exp === "e" || exp === "E") && /[0-9+-]/.test(this.source[this.offset + 1] ?? "")) {
      this.advance(2);
      this.advanceWhile(DIGIT);
    }
    return this.token("number", start, this.source.slice(start.offset, this.offset));
  }

  private token(kind: TokenKind, start: Location, text: string): Token {
    return { kind, text, value: text, quoted: false, span: { start, end: this.location() } };
  }

  private skipWhitespace(): void {
    this.advanceWhile(/\s/);
  }

  private advanceWhile(pattern: RegExp): void {
    while (this.offset < this.source.length && pattern.test(this.source[this.offset])) {
      this.advance(1);
    }
  }

  private advance(count: number): void {
    for (let i = 0; i < count && this.offset < this.source.length; i++) {
      if (this.source[this.offset] === "\n") {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
      this.offset++;
    }
  }

  private location(): Location {
    return { line: this.line, column: this.column, offset: this.offset };
  }
}

/**
 * Tokenize a source string.
 */
export function tokenize(source: string): Result<Token[], ParseError> {
  return new Lexer(source).tokenize();
}
