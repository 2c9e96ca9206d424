import { describe, expect, test } from "vitest";
import { decodeStringLiteral, tokenize } from "../lexer.ts";
import { DefinitionSyntaxError } from "../errors.ts";

function kinds(source: string): string[] {
  return tokenize(source, "test.def").map((t) => `${t.kind}:${t.text}`);
}

describe("tokenize", () => {
  test("splits identifiers, punctuation and numbers", () => {
    expect(kinds("message A : B::C { x: int[]; }")).toEqual([
      "identifier:message",
      "identifier:A",
      "punct::",
      "identifier:B",
      "punct:::",
      "identifier:C",
      "punct:{",
      "identifier:x",
      "punct::",
      "identifier:int",
      "punct:[",
      "punct:]",
      "punct:;",
      "punct:}",
      "eof:",
    ]);
  });

  test("tells integers from floats", () => {
    expect(kinds("12 -3 1.5 2e3 -0.25")).toEqual([
      "integer:12",
      "integer:-3",
      "float:1.5",
      "float:2e3",
      "float:-0.25",
      "eof:",
    ]);
  });

  test("tracks 1-based line and column", () => {
    const tokens = tokenize("enum E {\n  A,\n  B\n}", "test.def");
    const b = tokens.find((t) => t.text === "B");
    expect(b?.line).toBe(3);
    expect(b?.column).toBe(3);
  });

  test("normalizes CRLF line endings", () => {
    const tokens = tokenize("A\r\nB", "test.def");
    expect(tokens[1]?.line).toBe(2);
    expect(tokens[1]?.column).toBe(1);
  });

  test("drops line and block comments", () => {
    expect(kinds("A // trailing\n/* block\n comment */ B")).toEqual([
      "identifier:A",
      "identifier:B",
      "eof:",
    ]);
  });

  test("attaches doc comments to the next token", () => {
    const tokens = tokenize("/// First line\n///   Second line\nmessage M {}", "test.def");
    expect(tokens[0]?.text).toBe("message");
    expect(tokens[0]?.docs).toEqual(["First line", "Second line"]);
    expect(tokens[1]?.docs).toEqual([]);
  });

  test("keeps string literals with their quotes", () => {
    const tokens = tokenize('import "./a \\"b\\".def"', "test.def");
    expect(tokens[1]?.kind).toBe("string");
    expect(decodeStringLiteral(tokens[1]?.text ?? "")).toBe('./a "b".def');
  });

  test("rejects an unterminated string", () => {
    expect(() => tokenize('x = "open\n', "test.def")).toThrow("Unterminated string literal");
  });

  test("rejects an unterminated block comment", () => {
    expect(() => tokenize("/* never closed", "test.def")).toThrow(DefinitionSyntaxError);
  });

  test("reports an unexpected character with its position", () => {
    try {
      tokenize("message M {\n  x: int @\n}", "test.def");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DefinitionSyntaxError);
      if (!(err instanceof DefinitionSyntaxError)) return;
      expect(err.message).toBe("Unexpected character '@'");
      expect(err.token).toBe("@");
      expect(err.location).toEqual({ file: "test.def", line: 2, column: 10 });
    }
  });
});
