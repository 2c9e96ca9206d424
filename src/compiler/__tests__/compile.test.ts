import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";
import { fileURLToPath } from "node:url";
import { compileDefinitions, compileProject, compileSource } from "../compile.ts";
import { createMemoryHost } from "../../project/memory-host.ts";
import {
  DefinitionSyntaxError,
  formatDiagnostic,
  ImportError,
  TypeConstraintError,
  UnresolvedReferenceError,
} from "../errors.ts";

const EXAMPLE_ENTRY = fileURLToPath(new URL("../../../example-schemas/main.def", import.meta.url));

describe("compileSource", () => {
  test("flattens a parent reached through an import alias", async () => {
    const model = await compileSource('import "./base.def" as Base\nmessage Cmd : Base::Command { extra: bool }', "/defs/main.def", {
      files: { "/defs/base.def": "message Command { id: int; name: string }" },
    });
    const cmd = model.messages.get("main::Cmd");
    expect(cmd?.parent).toBe("base::Command");
    expect(cmd?.fields.map((f) => [f.name, f.declaredIn])).toEqual([
      ["id", "base::Command"],
      ["name", "base::Command"],
      ["extra", "main::Cmd"],
    ]);
  });

  test("does not expose an aliased import unqualified", async () => {
    await expect(
      compileSource('import "./base.def" as Base\nmessage Cmd : Command {}', "/defs/main.def", {
        files: { "/defs/base.def": "message Command {}" },
      }),
    ).rejects.toThrow(UnresolvedReferenceError);
  });

  test("exposes a diamond-imported file through both paths", async () => {
    const model = await compileSource(
      'import "./left.def"\nimport "./right.def"\nmessage Both { l: Left; r: Right }',
      "/defs/main.def",
      {
        files: {
          "/defs/left.def": 'import "./common.def"\nmessage Left { s: Shared }',
          "/defs/right.def": 'import "./common.def"\nmessage Right { s: common::Shared }',
          "/defs/common.def": "message Shared {}",
        },
      },
    );
    const shared = { kind: "message", message: "common::Shared" };
    expect(model.messages.get("main::Left")).toBeUndefined();
    expect(model.messages.get("left::Left")?.fields[0]?.type).toEqual(shared);
    expect(model.messages.get("right::Right")?.fields[0]?.type).toEqual(shared);
    expect(model.files.map((f) => f.namespace.name)).toEqual(["common", "left", "right", "main"]);
  });

  test("fails on a circular import", async () => {
    await expect(
      compileSource('import "./y.def"', "/defs/x.def", { files: { "/defs/y.def": 'import "./x.def"' } }),
    ).rejects.toThrow("Circular import: x.def -> y.def -> x.def");
  });

  test("fails at parse time on an array of arrays", async () => {
    await expect(compileSource("message M { s: string[][] }", "/defs/main.def")).rejects.toThrow(
      DefinitionSyntaxError,
    );
  });

  test("fails on a non-string map key", async () => {
    await expect(compileSource("message M { m: Map<int, string> }", "/defs/main.def")).rejects.toThrow(
      TypeConstraintError,
    );
  });

  test("formats diagnostics with their location", async () => {
    try {
      await compileSource("message M {\n  m: Map<int, string>\n}", "/defs/main.def");
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof TypeConstraintError)) throw err;
      expect(formatDiagnostic(err)).toBe(
        "/defs/main.def:2:10: TypeConstraintError: Field 'm': map keys must be 'string'",
      );
    }
  });
});

describe("compileProject", () => {
  test("returns every stage and reports parsed files", async () => {
    const parsed: number[] = [];
    const compilation = await compileProject("/defs/main.def", {
      host: createMemoryHost({
        "/defs/main.def": 'import "./a.def"\nmessage M { a: A }',
        "/defs/a.def": "message A {}",
      }),
      config: { openEnumWidth: 16 },
      onFileParsed: (_path, index) => parsed.push(index),
    });
    expect(parsed).toEqual([0, 1]);
    expect(compilation.graph.files).toHaveLength(2);
    expect(compilation.references.size).toBe(1);
    expect(compilation.config).toEqual({
      extraReservedWords: [],
      allowNestedMapValues: false,
      openEnumWidth: 16,
      verbose: false,
    });
  });
});

describe("compileDefinitions", () => {
  test("compiles the example definitions", async () => {
    const model = await compileDefinitions(EXAMPLE_ENTRY);

    expect(model.files.map((f) => f.namespace.name)).toEqual(["common", "base", "main"]);
    expect(model.messages.get("main::Move")?.fields.map((f) => f.name)).toEqual([
      "id",
      "kind",
      "severity",
      "target",
      "mode",
      "samples",
    ]);
    expect(model.enums.get("main::Move.mode")?.members.map((m) => [m.name, m.value])).toEqual([
      ["Start", 0n],
      ["Stop", 1n],
      ["Reset", 2n],
      ["Teleport", 3n],
    ]);
    expect(model.enums.get("common::Severity")?.members.map((m) => m.value)).toEqual([0n, 1n, 10n, 11n]);
    expect(model.options.get("base::Access")?.members.map((m) => m.value)).toEqual([1n, 2n, 4n]);
    expect(model.messages.get("base::Commands::Command")?.fields[2]?.default).toEqual({
      kind: "enum",
      member: "Info",
      value: 1n,
    });
    expect(model.messages.get("main::Telemetry")?.doc).toBe("Position report sent once per tick");
  });

  describe("from disk", () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = join(tmpdir(), `msgdef-test-${randomUUID()}`);
      await mkdir(join(testDir, "shared"), { recursive: true });
    });

    afterEach(async () => {
      await rm(testDir, { recursive: true, force: true });
    });

    test("resolves imports relative to the importing file", async () => {
      await writeFile(join(testDir, "main.def"), 'import "./shared/types.def" as T\nmessage M { p: T::Point }');
      await writeFile(join(testDir, "shared", "types.def"), 'import "../leaf.def"\nmessage Point { l: Leaf }');
      await writeFile(join(testDir, "leaf.def"), "message Leaf {}");

      const model = await compileDefinitions(join(testDir, "main.def"));
      expect(model.messages.get("main::M")?.fields[0]?.type).toEqual({ kind: "message", message: "types::Point" });
      expect(model.files.map((f) => f.namespace.name)).toEqual(["leaf", "types", "main"]);
    });

    test("reports a missing import", async () => {
      await writeFile(join(testDir, "main.def"), 'import "./nowhere.def"');
      await expect(compileDefinitions(join(testDir, "main.def"))).rejects.toThrow(ImportError);
    });
  });
});
