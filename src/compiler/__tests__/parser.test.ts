import { describe, expect, test } from "vitest";
import { parseDefinitionSource } from "../parser.ts";
import { DefinitionSyntaxError } from "../errors.ts";
import type { FieldNode, ItemNode, MessageNode } from "../../types/syntax.ts";

function parse(source: string) {
  return parseDefinitionSource(source, "test.def");
}

function withoutLocations(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(withoutLocations);
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([key]) => key !== "location" && key !== "aliasLocation")
        .map(([key, entry]) => [key, withoutLocations(entry)]),
    );
  }
  return value;
}

function firstMessage(source: string): MessageNode {
  const item = parse(source).items[0];
  if (item?.kind !== "message") throw new Error("expected a message");
  return item;
}

function firstField(source: string): FieldNode {
  const field = firstMessage(source).fields[0];
  if (!field) throw new Error("expected a field");
  return field;
}

describe("parseDefinitionSource", () => {
  test("parses imports with and without aliases", () => {
    const file = parse('import "./base.def" as Base;\nimport "./common.def"');
    expect(file.imports.map((i) => [i.path, i.alias])).toEqual([
      ["./base.def", "Base"],
      ["./common.def", undefined],
    ]);
    expect(file.imports[0]?.aliasLocation).toEqual({ file: "test.def", line: 1, column: 24 });
  });

  test("parses a message with parent, modifiers and defaults", () => {
    const message = firstMessage(`
      /// A command
      message Move : Base::Command {
        optional speed: float = 1.5;
        field repeated count: int
        required name: string = "x"
      }
    `);
    expect(message.name).toBe("Move");
    expect(message.doc).toBe("A command");
    expect(message.parent?.segments).toEqual(["Base", "Command"]);
    expect(message.fields.map((f) => [f.name, f.modifiers])).toEqual([
      ["speed", ["optional"]],
      ["count", ["repeated"]],
      ["name", ["required"]],
    ]);
    expect(message.fields[0]?.default).toMatchObject({ kind: "float", value: 1.5, text: "1.5" });
    expect(message.fields[2]?.default).toMatchObject({ kind: "string", value: "x" });
  });

  test("lets a modifier keyword name a field", () => {
    const field = firstField("message M { optional: bool }");
    expect(field.name).toBe("optional");
    expect(field.modifiers).toEqual([]);
  });

  test("parses enums, open enums and options with explicit values", () => {
    const items = parse(`
      enum Color { Red, Green = 5; Blue }
      open_enum Code : Color { Extra = -1 }
      options Access { Read, Write = 8 }
    `).items;
    const [color, code, access] = items;
    expect(color).toMatchObject({ kind: "enum", name: "Color", open: false });
    expect(color?.kind === "enum" && color.members.map((m) => [m.name, m.value])).toEqual([
      ["Red", undefined],
      ["Green", 5n],
      ["Blue", undefined],
    ]);
    expect(code).toMatchObject({ kind: "enum", open: true, parent: { segments: ["Color"] } });
    expect(code?.kind === "enum" && code.members[0]?.value).toBe(-1n);
    expect(access).toMatchObject({ kind: "options", name: "Access" });
  });

  test("parses compounds and nested namespaces", () => {
    const [ns] = parse("namespace Geo { float Vec2 { x, y, } namespace Inner { message M {} } }").items;
    expect(ns?.kind).toBe("namespace");
    if (ns?.kind !== "namespace") return;
    const kinds = ns.items.map((i: ItemNode) => `${i.kind}:${i.name}`);
    expect(kinds).toEqual(["compound:Vec2", "namespace:Inner"]);
    expect(ns.items[0]).toMatchObject({ base: "float", components: ["x", "y"] });
  });

  test("rejects a compound with no components", () => {
    expect(() => parse("float V {}")).toThrow("A compound needs at least one component, found '}'");
    expect(() => parse("message M { v: float { , } }")).toThrow(DefinitionSyntaxError);
  });

  test("ignores whitespace and comment placement", () => {
    const compact = parse(
      'import "./base.def" as Base;\n/// Position\nmessage P : Base::Point { x: float = 1.5; tags: Map<string, int>; mode: enum { A = 2, B } }\nfloat V { u, v }',
    );
    const spread = parse(`
      import   "./base.def"   as   Base ;   // the base file

      /* block */ /// Position
      message P
        : Base :: Point   // parent
      {
        x :   float = 1.5 ;
        tags: Map < string , int > ; /* map */
        mode: enum {
          A = 2 ,   // first
          B
        }
      }

      float V {
        u ,   v
      }
    `);
    expect(withoutLocations(spread)).toEqual(withoutLocations(compact));
  });

  test("parses every field type form", () => {
    const message = firstMessage(`
      message M {
        a: int[];
        b: Map<string, Other>;
        c: enum { X, Y };
        d: open_enum Base::Kind;
        e: Other.kind + { Z };
        f: options { P, Q };
        g: float { u, v };
        h: enum Other.kind + { W };
      }
    `);
    const types = message.fields.map((f) => f.type.kind);
    expect(types).toEqual([
      "array",
      "map",
      "inlineEnum",
      "enumRef",
      "inlineEnum",
      "inlineOptions",
      "inlineCompound",
      "inlineEnum",
    ]);
    const e = message.fields[4]?.type;
    expect(e?.kind === "inlineEnum" && e.extends).toMatchObject({ segments: ["Other"], member: "kind" });
  });

  test("rejects arrays of arrays", () => {
    expect(() => parse("message M { a: string[][] }")).toThrow("Arrays of arrays are not allowed");
  });

  test("rejects arrays of arrays inside a map", () => {
    expect(() => parse("message M { a: Map<string, int[][]> }")).toThrow(DefinitionSyntaxError);
  });

  test("rejects arrays of maps", () => {
    expect(() => parse("message M { a: Map<string, int>[] }")).toThrow("Arrays of maps are not allowed");
  });

  test("rejects imports inside a namespace", () => {
    expect(() => parse('namespace N { import "./x.def" }')).toThrow(
      "Imports are only allowed at file scope",
    );
  });

  test("reports the offending token and location", () => {
    try {
      parse("message M {\n  x int\n}");
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof DefinitionSyntaxError)) throw err;
      expect(err.message).toBe("Expected ':', found 'int'");
      expect(err.location).toEqual({ file: "test.def", line: 2, column: 5 });
    }
  });

  test("reports end of input", () => {
    expect(() => parse("message M {")).toThrow("Unterminated message body, found end of input");
  });
});
