/**
 * Config loader — parses config/compiler.md beside the entry file.
 */

import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod/v4";
import type { CompilerConfig } from "../types/config.ts";
import { DEFAULT_COMPILER_CONFIG } from "../types/config.ts";

const identifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be an identifier");

const configSchema = z.object({
  extraReservedWords: z.array(identifier),
  allowNestedMapValues: z.boolean(),
  openEnumWidth: z.union([z.literal(8), z.literal(16), z.literal(32), z.literal(64)]),
  verbose: z.boolean(),
});

/** Load compiler settings for an entry file; defaults when there is no config file */
export async function loadCompilerConfig(entryPath: string): Promise<CompilerConfig> {
  const configPath = join(dirname(entryPath), "config", "compiler.md");
  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return { ...DEFAULT_COMPILER_CONFIG };
    throw err;
  }
  return parseCompilerConfig(content, configPath);
}

/** Extract compiler settings from markdown content */
export function parseCompilerConfig(content: string, source = "compiler.md"): CompilerConfig {
  const raw: Record<string, unknown> = { ...DEFAULT_COMPILER_CONFIG };

  const reservedMatch = content.match(/\*\*Reserved words:\*\*\s*(.+)/i);
  if (reservedMatch?.[1]) {
    raw.extraReservedWords = reservedMatch[1]
      .split(",")
      .map((word) => word.trim().replace(/^`|`$/g, ""))
      .filter((word) => word !== "");
  }

  const nestedMatch = content.match(/\*\*Nested map values:\*\*\s*(.+)/i);
  if (nestedMatch?.[1]) {
    const value = nestedMatch[1].trim().toLowerCase();
    raw.allowNestedMapValues = value === "allow" ? true : value === "reject" ? false : value;
  }

  const widthMatch = content.match(/\*\*Open enum width:\*\*\s*(.+)/i);
  if (widthMatch?.[1]) {
    const value = widthMatch[1].trim().replace(/\s*bits?$/i, "");
    raw.openEnumWidth = /^\d+$/.test(value) ? parseInt(value, 10) : value;
  }

  const verboseMatch = content.match(/\*\*Verbose:\*\*\s*(.+)/i);
  if (verboseMatch?.[1]) {
    const value = verboseMatch[1].trim().toLowerCase();
    raw.verbose = value === "yes" ? true : value === "no" ? false : value;
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid compiler config in ${source}: ${problems.join("; ")}`);
  }
  return result.data;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
