import { describe, expect, test } from "vitest";
import { loadDefinitionGraph, type DefinitionGraph } from "../../project/loader.ts";
import { createMemoryHost } from "../../project/memory-host.ts";
import { NameResolver, parseReferenceText, resolveReferences } from "../name-resolver.ts";
import { AmbiguousReferenceError, UnresolvedReferenceError } from "../errors.ts";

async function load(files: Record<string, string>, entry = "/defs/main.def"): Promise<DefinitionGraph> {
  return loadDefinitionGraph(entry, { host: createMemoryHost(files) });
}

/** Qualified name each field of `message` in the entry file binds to */
async function fieldTargets(files: Record<string, string>, message: string): Promise<string[]> {
  const graph = await load(files);
  const bindings = resolveReferences(graph);
  const decl = findMessage(graph, message);
  return decl.fields.map((f) => {
    const type = f.type.kind === "array" ? f.type.element : f.type;
    if (type.kind !== "named" && type.kind !== "enumRef") return "-";
    return bindings.get(type.reference)?.qualifiedName ?? "?";
  });
}

function findMessage(graph: DefinitionGraph, qualifiedName: string) {
  const resolver = new NameResolver(graph);
  const cut = qualifiedName.lastIndexOf("::");
  const ns = resolver.findNamespace(qualifiedName.slice(0, cut));
  const found = ns?.messages.find((m) => m.qualifiedName === qualifiedName);
  if (!found) throw new Error(`no message ${qualifiedName}`);
  return found;
}

describe("resolveReferences", () => {
  test("prefers the innermost enclosing namespace", async () => {
    const targets = await fieldTargets(
      {
        "/defs/main.def": `
          message Item {}
          namespace Outer {
            message Item {}
            namespace Inner {
              message Item {}
              message User { a: Item; }
            }
            message Other { b: Item; }
          }
        `,
      },
      "main::Outer::Inner::User",
    );
    expect(targets).toEqual(["main::Outer::Inner::Item"]);
  });

  test("walks outward through ancestor namespaces to the file level", async () => {
    const files = {
      "/defs/main.def": `
        message Top {}
        namespace Outer {
          message Mid {}
          namespace Inner { message User { a: Mid; b: Top; } }
        }
      `,
    };
    expect(await fieldTargets(files, "main::Outer::Inner::User")).toEqual(["main::Outer::Mid", "main::Top"]);
  });

  test("finds top-level declarations of unaliased imports", async () => {
    const files = {
      "/defs/main.def": 'import "./common.def"\nmessage User { a: Shared; b: common::Shared; }',
      "/defs/common.def": "message Shared {}",
    };
    expect(await fieldTargets(files, "main::User")).toEqual(["common::Shared", "common::Shared"]);
  });

  test("prefers the local file over an unaliased import", async () => {
    const files = {
      "/defs/main.def": 'import "./common.def"\nmessage Shared {}\nmessage User { a: Shared; }',
      "/defs/common.def": "message Shared {}",
    };
    expect(await fieldTargets(files, "main::User")).toEqual(["main::Shared"]);
  });

  test("does not expose sub-namespaces of an unaliased import unqualified", async () => {
    const files = {
      "/defs/main.def": 'import "./common.def"\nmessage User { a: Deep; }',
      "/defs/common.def": "namespace Inner { message Deep {} }",
    };
    await expect(fieldTargets(files, "main::User")).rejects.toThrow(UnresolvedReferenceError);
  });

  test("reaches an aliased import only through its alias", async () => {
    const files = {
      "/defs/main.def": 'import "./base.def" as Base\nmessage Cmd : Base::Command {}\nmessage Bad : Command {}',
      "/defs/base.def": "message Command {}",
    };
    const graph = await load(files);
    const resolver = new NameResolver(graph);
    const main = graph.entry.namespace;
    const [cmd, bad] = main.messages;
    const cmdParent = cmd?.parent;
    const badParent = bad?.parent;
    if (!cmdParent || !badParent) throw new Error("expected parents");

    expect(resolver.resolve(cmdParent, main).qualifiedName).toBe("base::Command");
    expect(() => resolver.resolve(badParent, main)).toThrow(UnresolvedReferenceError);
  });

  test("names the searched scopes when nothing matches", async () => {
    const files = {
      "/defs/main.def": 'import "./common.def"\nnamespace N { message User { a: Missing; } }',
      "/defs/common.def": "",
    };
    try {
      await fieldTargets(files, "main::N::User");
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof UnresolvedReferenceError)) throw err;
      expect(err.reference).toBe("Missing");
      expect(err.searched).toEqual(["main::N", "main", "import common"]);
      expect(err.message).toBe("Cannot resolve 'Missing'; searched main::N, main, import common");
    }
  });

  test("descends qualified names through child namespaces", async () => {
    const files = {
      "/defs/main.def": `
        namespace A { namespace B { message C {} } }
        namespace X { message User { c: A::B::C; } }
      `,
    };
    expect(await fieldTargets(files, "main::X::User")).toEqual(["main::A::B::C"]);
  });

  test("reports a missing segment of a qualified name", async () => {
    const files = {
      "/defs/main.def": "namespace A { } message User { c: A::B::C; }",
    };
    await expect(fieldTargets(files, "main::User")).rejects.toThrow(
      "Cannot resolve 'A::B::C': namespace 'main::A' has no namespace 'B'",
    );
  });

  test("rejects a name found in two unaliased imports", async () => {
    const files = {
      "/defs/main.def": 'import "./a.def"\nimport "./b.def"\nmessage User { x: Point; }',
      "/defs/a.def": "message Point {}",
      "/defs/b.def": "message Point {}",
    };
    try {
      await fieldTargets(files, "main::User");
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof AmbiguousReferenceError)) throw err;
      expect(err.candidates).toEqual(["a", "b"]);
    }
  });

  test("checks the kind expected at the reference site", async () => {
    const files = { "/defs/main.def": "enum Kind { A }\nmessage M : Kind {}" };
    await expect(fieldTargets(files, "main::M")).rejects.toThrow(
      "'Kind' resolves to an enum 'main::Kind', expected a message",
    );
  });

  test("resolves Message.field to the field's enum", async () => {
    const files = {
      "/defs/main.def": `
        message Cmd { kind: enum { Go, Stop }; tags: options { A }[]; }
        message Other { k: Cmd.kind; t: Cmd.tags; }
      `,
    };
    expect(await fieldTargets(files, "main::Other")).toEqual(["main::Cmd.kind", "main::Cmd.tags"]);
  });

  test("rejects Message.field for an inherited field, naming the ancestor", async () => {
    const files = {
      "/defs/main.def": `
        message Base { kind: enum { Go } }
        message Child : Base {}
        message User { k: Child.kind }
      `,
    };
    await expect(fieldTargets(files, "main::User")).rejects.toThrow(
      "Field 'kind' of 'main::Child' is inherited from 'main::Base'; reference it as 'Base.kind'",
    );
  });

  test("rejects Message.field for a non-enum field", async () => {
    const files = { "/defs/main.def": "message Cmd { id: int }\nmessage User { k: Cmd.id }" };
    await expect(fieldTargets(files, "main::User")).rejects.toThrow(
      "Field 'Cmd.id' is not an enum or options field",
    );
  });
});

describe("parseReferenceText", () => {
  test("splits segments and member", () => {
    const location = { file: "x.def", line: 1, column: 1 };
    expect(parseReferenceText(" Base::Cmd.kind ", location)).toEqual({
      text: "Base::Cmd.kind",
      segments: ["Base", "Cmd"],
      member: "kind",
      location,
    });
  });
});
