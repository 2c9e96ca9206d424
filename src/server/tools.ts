/**
 * Model tools — MCP tools for browsing and checking the compiled model.
 */

import { z } from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ResolvedModel, ResolvedNamespace } from "../types/model.ts";
import type { Compilation } from "../compiler/compile.ts";
import { NameResolver, parseReferenceText } from "../compiler/name-resolver.ts";
import { printDefinitionFile } from "../compiler/printer.ts";
import { DefinitionError, formatDiagnostic } from "../compiler/errors.ts";
import type { CompilerSession } from "./session.ts";
import { toJsonText } from "./model-json.ts";

/** Register every model tool on the MCP server */
export function registerModelTools(server: McpServer, session: CompilerSession): void {
  registerDescribeModel(server, session);
  registerInspect(server, session);
  registerResolveName(server, session);
  registerRecompile(server, session);
  registerPrintFile(server, session);
}

/** Summary of a compilation: files, namespaces and declaration names */
export function modelOverview(compilation: Compilation): Record<string, unknown> {
  const { model } = compilation;
  return {
    entry: model.entry,
    files: model.files.map((file) => ({
      path: file.path,
      namespace: file.namespace.name,
      imports: file.imports.map((i) => ({ path: i.path, alias: i.alias, file: i.file })),
      namespaces: namespaceNames(file.namespace),
    })),
    counts: {
      messages: model.messages.size,
      enums: model.enums.size,
      options: model.options.size,
      compounds: model.compounds.size,
    },
    messages: Array.from(model.messages.keys()),
    enums: Array.from(model.enums.keys()),
    options: Array.from(model.options.keys()),
    compounds: Array.from(model.compounds.keys()),
    config: compilation.config,
  };
}

/** describe_model — overview of everything compiled */
function registerDescribeModel(server: McpServer, session: CompilerSession): void {
  server.registerTool("describe_model", {
    title: "Describe Model",
    description:
      "Returns the compiled model: files, imports, namespaces, and the qualified names of every message, enum, options set and compound.",
  }, async (): Promise<CallToolResult> => {
    return ok(modelOverview(session.current));
  });
}

/** inspect — full detail of one declaration */
function registerInspect(server: McpServer, session: CompilerSession): void {
  server.registerTool("inspect", {
    title: "Inspect",
    description:
      "View one resolved declaration by qualified name: flattened message fields, enum/options values and widths, or compound components.",
    inputSchema: z.object({
      name: z.string().describe("Qualified name, e.g. 'main::Telemetry' or 'main::Command.kind'"),
    }),
  }, async ({ name }: { name: string }): Promise<CallToolResult> => {
    const found = findDeclaration(session.current.model, name);
    if (!found) return err(`No declaration named "${name}"`);
    return ok(found);
  });
}

/** resolve_name — run the name lookup from a namespace */
function registerResolveName(server: McpServer, session: CompilerSession): void {
  server.registerTool("resolve_name", {
    title: "Resolve Name",
    description:
      "Resolve a type name the way a field in the given namespace would see it. Returns the qualified name it binds to.",
    inputSchema: z.object({
      name: z.string().describe("Name as written in source, e.g. 'Command', 'Base::Command' or 'Command.kind'"),
      scope: z
        .string()
        .optional()
        .describe("Qualified namespace to resolve from (default: the entry file's namespace)"),
    }),
  }, async ({ name, scope }: { name: string; scope?: string }): Promise<CallToolResult> => {
    const { graph } = session.current;
    const resolver = new NameResolver(graph);
    const namespace = resolver.findNamespace(scope ?? graph.entry.namespace.qualifiedName);
    if (!namespace) return err(`Namespace "${scope}" not found`);

    try {
      const reference = parseReferenceText(name, namespace.location);
      const declaration = resolver.resolve(reference, namespace);
      return ok({
        name,
        scope: namespace.qualifiedName,
        kind: declaration.kind,
        qualifiedName: declaration.qualifiedName,
      });
    } catch (e) {
      return failure(e);
    }
  });
}

/** recompile — reload every file from disk */
function registerRecompile(server: McpServer, session: CompilerSession): void {
  server.registerTool("recompile", {
    title: "Recompile",
    description:
      "Reload and recompile the entry file and its imports. On failure the previous model stays active and the diagnostic is returned.",
  }, async (): Promise<CallToolResult> => {
    try {
      const compilation = await session.recompile();
      console.error(`[msgdef] Recompiled ${compilation.model.files.length} file(s)`);
      return ok({ status: "compiled", ...modelOverview(compilation) });
    } catch (e) {
      return failure(e);
    }
  });
}

/** print_file — definition source regenerated from the model */
function registerPrintFile(server: McpServer, session: CompilerSession): void {
  server.registerTool("print_file", {
    title: "Print File",
    description:
      "Print one compiled file back as definition source, with every member value explicit and every reference fully qualified.",
    inputSchema: z.object({
      file: z.string().describe("File path or file-level namespace name (e.g. 'main')"),
    }),
  }, async ({ file }: { file: string }): Promise<CallToolResult> => {
    try {
      const source = printDefinitionFile(session.current.model, file);
      return { content: [{ type: "text", text: source }] };
    } catch (e) {
      return failure(e);
    }
  });
}

function findDeclaration(model: ResolvedModel, name: string): unknown {
  return (
    model.messages.get(name) ??
    model.enums.get(name) ??
    model.options.get(name) ??
    model.compounds.get(name)
  );
}

function namespaceNames(ns: ResolvedNamespace): string[] {
  return ns.namespaces.flatMap((child) => [child.qualifiedName, ...namespaceNames(child)]);
}

function ok(data: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: toJsonText(data) }],
  };
}

function err(message: string, code = "error"): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ error: { code, message } }) }],
    isError: true,
  };
}

function failure(e: unknown): CallToolResult {
  if (e instanceof DefinitionError) return err(formatDiagnostic(e), e.kind);
  return err(e instanceof Error ? e.message : String(e));
}
