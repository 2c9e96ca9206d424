/**
 * Lexer — splits definition-language source into tokens with 1-based
 * line/column positions. Comments never reach the parser; `///` doc
 * comments ride along on the token that follows them.
 */

import type { Token, TokenKind } from "../types/syntax.ts";
import { DefinitionSyntaxError } from "./errors.ts";

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;
const NUMBER_PATTERN = /^-?[0-9]+(\.[0-9]+)?([eE][+-]?[0-9]+)?/;
const SINGLE_PUNCT = new Set(["{", "}", ":", ";", ",", ".", "<", ">", "[", "]", "=", "+"]);

/** Tokenize a source file. The last token is always `eof`. */
export function tokenize(source: string, file: string): Token[] {
  const text = source.replace(/\r\n?/g, "\n");
  const tokens: Token[] = [];
  let docs: string[] = [];
  let i = 0;
  let line = 1;
  let column = 1;

  const advance = (count: number): void => {
    for (let n = 0; n < count && i < text.length; n++) {
      if (text[i] === "\n") {
        line++;
        column = 1;
      } else {
        column++;
      }
      i++;
    }
  };

  const push = (kind: TokenKind, value: string, startLine: number, startColumn: number): void => {
    tokens.push({ kind, text: value, line: startLine, column: startColumn, docs });
    docs = [];
  };

  const fail = (message: string, token: string, atLine = line, atColumn = column): never => {
    throw new DefinitionSyntaxError(message, { file, line: atLine, column: atColumn }, token);
  };

  while (i < text.length) {
    const ch = text[i] ?? "";
    const startLine = line;
    const startColumn = column;

    if (/\s/.test(ch)) {
      advance(1);
      continue;
    }

    // Comments
    if (text.startsWith("///", i)) {
      const end = lineEnd(text, i);
      docs.push(text.slice(i + 3, end).trim());
      advance(end - i);
      continue;
    }
    if (text.startsWith("//", i)) {
      advance(lineEnd(text, i) - i);
      continue;
    }
    if (text.startsWith("/*", i)) {
      const end = text.indexOf("*/", i + 2);
      if (end === -1) fail("Unterminated block comment", "/*");
      advance(end + 2 - i);
      continue;
    }

    if (IDENT_START.test(ch)) {
      let end = i + 1;
      while (end < text.length && IDENT_PART.test(text[end] ?? "")) end++;
      push("identifier", text.slice(i, end), startLine, startColumn);
      advance(end - i);
      continue;
    }

    if (DIGIT.test(ch) || (ch === "-" && DIGIT.test(text[i + 1] ?? ""))) {
      const match = text.slice(i).match(NUMBER_PATTERN);
      const value = match?.[0] ?? ch;
      const isFloat = match?.[1] !== undefined || match?.[2] !== undefined;
      push(isFloat ? "float" : "integer", value, startLine, startColumn);
      advance(value.length);
      continue;
    }

    if (ch === '"') {
      const end = stringEnd(text, i);
      if (end === -1) fail("Unterminated string literal", text.slice(i, lineEnd(text, i)));
      const literal = text.slice(i, end + 1);
      if (!isValidStringLiteral(literal)) fail("Invalid string literal", literal);
      push("string", literal, startLine, startColumn);
      advance(literal.length);
      continue;
    }

    if (text.startsWith("::", i)) {
      push("punct", "::", startLine, startColumn);
      advance(2);
      continue;
    }

    if (SINGLE_PUNCT.has(ch)) {
      push("punct", ch, startLine, startColumn);
      advance(1);
      continue;
    }

    fail(`Unexpected character '${ch}'`, ch);
  }

  push("eof", "", line, column);
  return tokens;
}

/** Decode the value of a string literal token (quotes included) */
export function decodeStringLiteral(literal: string): string {
  const value: unknown = JSON.parse(literal);
  return typeof value === "string" ? value : literal.slice(1, -1);
}

function lineEnd(text: string, from: number): number {
  const end = text.indexOf("\n", from);
  return end === -1 ? text.length : end;
}

/** Index of the closing quote of the string starting at `from`, or -1 */
function stringEnd(text: string, from: number): number {
  let i = from + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "\n") return -1;
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === '"') return i;
    i++;
  }
  return -1;
}

function isValidStringLiteral(literal: string): boolean {
  try {
    return typeof JSON.parse(literal) === "string";
  } catch {
    return false;
  }
}
