/**
 * msgdef — message definition compiler
 *
 * Entry point: compiles an entry definition file and its imports,
 * then serves the resolved model over MCP on stdio.
 *
 * Usage: msgdef <entry.def> [--verbose]
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { resolve } from "node:path";
import { CompilerSession } from "./server/session.ts";
import { registerModelTools } from "./server/tools.ts";
import { registerResources } from "./server/resources.ts";
import { DefinitionError, formatDiagnostic } from "./compiler/errors.ts";

const VERSION = "0.1.0";

async function main(): Promise<void> {
  const { entryPath, verbose } = parseArgs();

  console.error(`[msgdef] Compiling ${entryPath}`);

  // 1. Compile the entry file and everything it imports
  const session = new CompilerSession(entryPath, verbose ? { config: { verbose: true } } : {});
  const { model } = await session.recompile();
  console.error(
    `[msgdef] Compiled ${model.files.length} file(s) — ` +
    `${model.messages.size} message(s), ${model.enums.size} enum(s), ` +
    `${model.options.size} options set(s), ${model.compounds.size} compound(s)`,
  );

  // 2. Create and configure the MCP server
  const server = new McpServer(
    { name: `msgdef:${model.files[model.files.length - 1]?.namespace.name ?? "model"}`, version: VERSION },
    { capabilities: { logging: {} } },
  );
  registerModelTools(server, session);
  registerResources(server, session);

  // 3. Connect via stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[msgdef] MCP server running on stdio`);

  const shutdown = async (): Promise<void> => {
    console.error("[msgdef] Shutting down...");
    await server.close();
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

function parseArgs(): { entryPath: string; verbose: boolean } {
  const args = process.argv.slice(2);
  let entryPath = "";
  let verbose = false;

  for (const arg of args) {
    if (arg === "--verbose") {
      verbose = true;
    } else if (!arg.startsWith("-")) {
      entryPath = arg;
    }
  }

  if (!entryPath) {
    console.error("Usage: msgdef <entry.def> [--verbose]");
    console.error("  --verbose  Log every parsed file");
    process.exit(1);
  }

  return { entryPath: resolve(entryPath), verbose };
}

main().catch((err: unknown) => {
  if (err instanceof DefinitionError) {
    console.error(`[msgdef] ${formatDiagnostic(err)}`);
  } else {
    console.error("[msgdef] Fatal error:", err);
  }
  process.exit(1);
});
