/**
 * Import graph loader — reads an entry definition file and everything it
 * imports, transitively. Each canonical path is parsed once per request;
 * meeting a file that is still being loaded is a circular import.
 */

import { readFile, realpath } from "node:fs/promises";
import { basename, dirname, isAbsolute, resolve } from "node:path";
import type { DefinitionFile, Import } from "../types/declarations.ts";
import type { SourceLocation } from "../types/syntax.ts";
import { parseDefinitionSource } from "../compiler/parser.ts";
import { buildDefinitionFile } from "../compiler/declaration-builder.ts";
import { ImportError, RedeclarationError } from "../compiler/errors.ts";

/** File access used by the loader; swapped for an in-memory host in tests */
export interface SourceHost {
  readFile(path: string): Promise<string>;
  /** Canonical form of an existing path; rejects when the file is missing */
  realpath(path: string): Promise<string>;
}

export const nodeSourceHost: SourceHost = {
  readFile: (path) => readFile(path, "utf-8"),
  realpath: (path) => realpath(path),
};

export interface LoadOptions {
  host?: SourceHost;
  extraReservedWords?: readonly string[];
  /** Called after each file is parsed, in parse order */
  onFileParsed?: (path: string, index: number) => void;
}

/** Every file reachable from an entry file */
export interface DefinitionGraph {
  entry: DefinitionFile;
  /** Imports before importers; each file once */
  files: DefinitionFile[];
  /** The file each import statement refers to */
  importTargets: Map<Import, DefinitionFile>;
}

/** Per-request loading state */
interface LoadSession {
  host: SourceHost;
  options: LoadOptions;
  /** canonical path → parsed file */
  loaded: Map<string, DefinitionFile>;
  /** canonical paths currently being loaded, outermost first */
  inProgress: string[];
  files: DefinitionFile[];
  importTargets: Map<Import, DefinitionFile>;
  /** file-level namespace name → file that claimed it */
  namespaceOwners: Map<string, DefinitionFile>;
  parsedCount: number;
}

/** Load an entry file and all of its transitive imports */
export async function loadDefinitionGraph(
  entryPath: string,
  options: LoadOptions = {},
): Promise<DefinitionGraph> {
  const session: LoadSession = {
    host: options.host ?? nodeSourceHost,
    options,
    loaded: new Map(),
    inProgress: [],
    files: [],
    importTargets: new Map(),
    namespaceOwners: new Map(),
    parsedCount: 0,
  };

  const entry = await loadFile(session, resolve(entryPath));
  return { entry, files: session.files, importTargets: session.importTargets };
}

async function loadFile(
  session: LoadSession,
  requestedPath: string,
  importedFrom?: { file: string; statement: Import },
): Promise<DefinitionFile> {
  const canonical = await canonicalize(session.host, requestedPath, importedFrom);

  const cached = session.loaded.get(canonical);
  if (cached) return cached;

  const cycleStart = session.inProgress.indexOf(canonical);
  if (cycleStart !== -1) {
    const cycle = [...session.inProgress.slice(cycleStart), canonical];
    throw new ImportError(
      `Circular import: ${cycle.map((p) => basename(p)).join(" -> ")}`,
      importedFrom?.statement.location,
      cycle,
    );
  }

  session.inProgress.push(canonical);

  const source = await readSource(session.host, canonical, importedFrom);
  const file = buildDefinitionFile(parseDefinitionSource(source, canonical), {
    extraReservedWords: session.options.extraReservedWords,
  });
  session.options.onFileParsed?.(canonical, session.parsedCount++);

  for (const statement of file.imports) {
    const target = await loadFile(session, resolveImportPath(canonical, statement.path), {
      file: canonical,
      statement,
    });
    session.importTargets.set(statement, target);
  }

  session.inProgress.pop();
  claimNamespace(session, file);
  session.loaded.set(canonical, file);
  session.files.push(file);
  return file;
}

/** Resolve an import path against the importing file's directory */
export function resolveImportPath(importingFile: string, importPath: string): string {
  return isAbsolute(importPath) ? importPath : resolve(dirname(importingFile), importPath);
}

async function canonicalize(
  host: SourceHost,
  path: string,
  importedFrom?: { file: string; statement: Import },
): Promise<string> {
  try {
    return await host.realpath(path);
  } catch (err) {
    const location: SourceLocation | undefined = importedFrom?.statement.location;
    const reason = err instanceof Error ? `: ${err.message}` : "";
    const message = importedFrom
      ? `Imported file '${importedFrom.statement.path}' not found (resolved to ${path})${reason}`
      : `Definition file '${path}' not found${reason}`;
    throw new ImportError(message, location);
  }
}

async function readSource(
  host: SourceHost,
  canonical: string,
  importedFrom?: { file: string; statement: Import },
): Promise<string> {
  try {
    return await host.readFile(canonical);
  } catch (err) {
    const reason = err instanceof Error ? `: ${err.message}` : "";
    const message = importedFrom
      ? `Imported file '${importedFrom.statement.path}' cannot be read (resolved to ${canonical})${reason}`
      : `Definition file '${canonical}' cannot be read${reason}`;
    throw new ImportError(message, importedFrom?.statement.location);
  }
}

/** File-level namespace names must be unique across one compilation */
function claimNamespace(session: LoadSession, file: DefinitionFile): void {
  const name = file.namespace.name;
  const owner = session.namespaceOwners.get(name);
  if (owner && owner !== file) {
    throw new RedeclarationError(
      `File-level namespace '${name}' of ${file.path} is already taken by ${owner.path}`,
      file.namespace.location,
      owner.namespace.location,
    );
  }
  session.namespaceOwners.set(name, file);
}
