/**
 * MCP Resources — expose the compiled model as read-only resources
 * so a client gets immediate context when it connects.
 */

import { ResourceTemplate, type McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ReadResourceResult } from "@modelcontextprotocol/sdk/types.js";
import { findFile, printDefinitionFile } from "../compiler/printer.ts";
import type { CompilerSession } from "./session.ts";
import { modelOverview } from "./tools.ts";
import { toJsonText } from "./model-json.ts";

/** Register the model overview and one printed-source resource per file */
export function registerResources(server: McpServer, session: CompilerSession): void {
  // 1. Model overview — the first thing a client reads
  server.registerResource(
    "model",
    "msgdef://model",
    {
      title: "Compiled Model Overview",
      description:
        "Entry file, loaded files, namespaces and every declaration's qualified name. Read this first.",
      mimeType: "application/json",
    },
    async (uri): Promise<ReadResourceResult> => ({
      contents: [
        {
          uri: uri.href,
          mimeType: "application/json",
          text: toJsonText({
            ...modelOverview(session.current),
            gettingStarted: [
              "Call 'inspect' with a qualified name to see a declaration in full.",
              "Call 'resolve_name' to check what a name binds to from a namespace.",
              "Call 'recompile' after editing definition files.",
            ],
          }),
        },
      ],
    }),
  );

  // 2. Printed source — one per loaded file, keyed by file-level namespace
  server.registerResource(
    "file",
    new ResourceTemplate("msgdef://file/{namespace}", {
      list: async () => ({
        resources: session.current.model.files.map((file) => ({
          uri: `msgdef://file/${file.namespace.name}`,
          name: file.namespace.name,
          description: `Definition source of ${file.path}, regenerated from the model`,
          mimeType: "text/plain",
        })),
      }),
    }),
    {
      title: "Definition File",
      description: "A compiled file printed back as definition source.",
      mimeType: "text/plain",
    },
    async (uri, variables): Promise<ReadResourceResult> => {
      const requested = variables.namespace;
      const namespace = Array.isArray(requested) ? requested[0] : requested;
      const model = session.current.model;
      const file = namespace !== undefined ? findFile(model, namespace) : undefined;
      if (!file) throw new Error(`No compiled file with namespace '${namespace ?? ""}'`);

      return {
        contents: [
          {
            uri: uri.href,
            mimeType: "text/plain",
            text: printDefinitionFile(model, file.path),
          },
        ],
      };
    },
  );
}
