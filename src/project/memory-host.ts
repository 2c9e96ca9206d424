/**
 * In-memory source host — serves definition files from a path → source map.
 * Used for single-buffer compilation and by tests.
 */

import { resolve } from "node:path";
import type { SourceHost } from "./loader.ts";

export function createMemoryHost(files: Record<string, string>): SourceHost {
  const sources = new Map<string, string>();
  for (const [path, source] of Object.entries(files)) {
    sources.set(resolve(path), source);
  }

  return {
    async readFile(path) {
      const source = sources.get(resolve(path));
      if (source === undefined) throw new Error(`ENOENT: no such file '${path}'`);
      return source;
    },
    async realpath(path) {
      const canonical = resolve(path);
      if (!sources.has(canonical)) throw new Error(`ENOENT: no such file '${path}'`);
      return canonical;
    },
  };
}
