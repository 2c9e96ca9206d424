import { describe, expect, test } from "vitest";
import { compileDefinitions, compileSource } from "../compile.ts";
import { findFile, printDefinitionFile } from "../printer.ts";
import { createMemoryHost } from "../../project/memory-host.ts";
import type { ResolvedModel } from "../../types/model.ts";

const FILES: Record<string, string> = {
  "/defs/common.def": `
    float Vec3 { x, y, z }
    enum Severity { Low, High }
    namespace Deep { namespace Deep { message Inner { v: Vec3 } } }
  `,
  "/defs/base.def": `
    import "./common.def";

    namespace Commands {
      /// Base of every command
      message Command {
        id: int = 0;
        kind: enum {
          /// Begin
          Start,
          Stop,
        };
        level: Severity = High;
      }
    }

    /// Flags
    options Access { Read, Write = 10, Execute }
    open_enum Code { Neg = -3, Zero = 0 }
  `,
  "/defs/main.def": `
    import "./base.def" as Base;
    import "./common.def";

    /// Telemetry
    /// sent every tick
    message Telemetry {
      pos: Vec3;
      vel: float { dx, dy };
      tags: Map<string, Severity>;
      optional label: string = "a \\"quoted\\" label";
      ratio: float = 0.25;
      on: bool = false;
      small: byte = 7;
      access: Base::Access;
      codes: Base::Code[];
      inner: common::Deep::Deep::Inner;
    }

    message Move : Base::Commands::Command {
      mode: Base::Commands::Command.kind + { Jump };
      flags: options { Fast, Slow = 8 };
    }

    enum Level : Severity { Max = 10 }
  `,
};

/** Model contents with source locations dropped and maps turned into objects */
function comparable(value: unknown): unknown {
  if (value instanceof Map) {
    return Object.fromEntries(Array.from(value, ([key, entry]) => [key, comparable(entry)]));
  }
  if (Array.isArray(value)) return value.map(comparable);
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([key]) => key !== "location")
        .map(([key, entry]) => [key, comparable(entry)]),
    );
  }
  return value;
}

function printAll(model: ResolvedModel): Record<string, string> {
  return Object.fromEntries(model.files.map((file) => [file.path, printDefinitionFile(model, file.path)]));
}

describe("printDefinitionFile", () => {
  test("prints explicit values and alias-qualified references", async () => {
    const model = await compileSource(
      'import "./base.def" as Base;\n\n/// A command\nmessage Cmd : Base::Command {\n  optional speed: float = 1.5;\n  mode: enum { Go = 2, Stop };\n}',
      "/defs/main.def",
      { files: { "/defs/base.def": "message Command { id: int }" } },
    );
    expect(printDefinitionFile(model, "/defs/main.def")).toBe(
      'import "./base.def" as Base;\n' +
        "\n" +
        "/// A command\n" +
        "message Cmd : Base::Command {\n" +
        "  optional speed: float = 1.5;\n" +
        "  mode: enum { Go = 2, Stop = 3 };\n" +
        "}\n",
    );
  });

  test("prints namespaces, compounds and enums", async () => {
    const model = await compileSource(
      "namespace Geo {\n  /// Flat point\n  float Vec2 { x, y }\n}\nopen_enum Code : Base { C }\nenum Base { A, B }",
      "/defs/shapes.def",
    );
    expect(printDefinitionFile(model, "shapes")).toBe(
      "open_enum Code : shapes::Base {\n" +
        "  C = 2,\n" +
        "}\n" +
        "\n" +
        "enum Base {\n" +
        "  A = 0,\n" +
        "  B = 1,\n" +
        "}\n" +
        "\n" +
        "namespace Geo {\n" +
        "  /// Flat point\n" +
        "  float Vec2 { x, y }\n" +
        "}\n",
    );
  });

  test("recompiles to the same model", async () => {
    const original = await compileDefinitions("/defs/main.def", { host: createMemoryHost(FILES) });
    const printed = printAll(original);
    const reprinted = await compileDefinitions("/defs/main.def", { host: createMemoryHost(printed) });

    expect(comparable(reprinted)).toEqual(comparable(original));
    expect(printAll(reprinted)).toEqual(printed);
  });

  test("spells unaliased imports by their file namespace", async () => {
    const model = await compileDefinitions("/defs/main.def", { host: createMemoryHost(FILES) });
    const source = printDefinitionFile(model, "main");
    expect(source).toContain("  pos: common::Vec3;\n");
    expect(source).toContain("  mode: enum Base::Commands::Command.kind + { Jump = 2 };\n");
    expect(source).toContain("  codes: open_enum Base::Code[];\n");
    expect(source).toContain('  optional label: string = "a \\"quoted\\" label";\n');
  });

  test("falls back to a shorter spelling when a child namespace shadows the file namespace", async () => {
    const source = "namespace geo { message P {} }\nmessage Q { q: geo::P; r: R }\nmessage R {}";
    const model = await compileSource(source, "/defs/geo.def");
    const printed = printDefinitionFile(model, "geo");
    expect(printed).toBe(
      "message Q {\n" +
        "  q: geo::P;\n" +
        "  r: R;\n" +
        "}\n" +
        "\n" +
        "message R {\n" +
        "}\n" +
        "\n" +
        "namespace geo {\n" +
        "  message P {\n" +
        "  }\n" +
        "}\n",
    );

    const reprinted = await compileSource(printed, "/defs/geo.def");
    expect(reprinted.messages.get("geo::Q")?.fields.map((f) => f.type)).toEqual([
      { kind: "message", message: "geo::geo::P" },
      { kind: "message", message: "geo::R" },
    ]);
    expect(comparable(reprinted)).toEqual(comparable(model));
  });

  test("rejects an unknown file", async () => {
    const model = await compileSource("message M {}", "/defs/main.def");
    expect(() => printDefinitionFile(model, "other")).toThrow("No file 'other' in the compiled model");
    expect(findFile(model, "main")?.path).toBe("/defs/main.def");
  });
});
