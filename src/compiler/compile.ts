/**
 * Compilation pipeline — load → resolve → build.
 */

import type { ResolvedModel } from "../types/model.ts";
import { DEFAULT_COMPILER_CONFIG, type CompilerConfig } from "../types/config.ts";
import {
  loadDefinitionGraph,
  type DefinitionGraph,
  type SourceHost,
} from "../project/loader.ts";
import { createMemoryHost } from "../project/memory-host.ts";
import { resolveReferences, type ResolvedReferences } from "./name-resolver.ts";
import { buildModel } from "./model-builder.ts";

export interface CompileOptions {
  host?: SourceHost;
  config?: Partial<CompilerConfig>;
  /** Progress callback, called once per parsed file */
  onFileParsed?: (path: string, index: number) => void;
}

/** Every stage's output of one compilation */
export interface Compilation {
  graph: DefinitionGraph;
  references: ResolvedReferences;
  model: ResolvedModel;
  config: CompilerConfig;
}

/** Compile an entry file and its imports, keeping the intermediate stages */
export async function compileProject(
  entryPath: string,
  options: CompileOptions = {},
): Promise<Compilation> {
  const config: CompilerConfig = { ...DEFAULT_COMPILER_CONFIG, ...options.config };

  const graph = await loadDefinitionGraph(entryPath, {
    host: options.host,
    extraReservedWords: config.extraReservedWords,
    onFileParsed: options.onFileParsed,
  });
  const references = resolveReferences(graph);
  const model = buildModel(graph, references, config);

  return { graph, references, model, config };
}

/** Compile an entry file and its imports into a resolved model */
export async function compileDefinitions(
  entryPath: string,
  options: CompileOptions = {},
): Promise<ResolvedModel> {
  const { model } = await compileProject(entryPath, options);
  return model;
}

/** Compile a single in-memory source; imports can only name other in-memory files */
export async function compileSource(
  text: string,
  path = "input.def",
  options: Omit<CompileOptions, "host"> & { files?: Record<string, string> } = {},
): Promise<ResolvedModel> {
  const { files, ...rest } = options;
  const host = createMemoryHost({ ...files, [path]: text });
  return compileDefinitions(path, { ...rest, host });
}
