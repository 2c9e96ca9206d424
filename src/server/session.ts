/**
 * Compiler session — the model currently being served, recompiled on demand.
 * A failed recompile leaves the previous model in place.
 */

import type { CompilerConfig } from "../types/config.ts";
import { loadCompilerConfig } from "../config/loader.ts";
import { compileProject, type Compilation, type CompileOptions } from "../compiler/compile.ts";

export interface SessionOptions {
  host?: CompileOptions["host"];
  /** Overrides applied on top of config/compiler.md */
  config?: CompileOptions["config"];
  /** Skip reading config/compiler.md */
  skipConfigFile?: boolean;
}

export class CompilerSession {
  private compilation: Compilation | undefined;

  constructor(
    readonly entryPath: string,
    private readonly options: SessionOptions = {},
  ) {}

  /** The last successful compilation */
  get current(): Compilation {
    if (!this.compilation) throw new Error("Nothing compiled yet; call recompile() first");
    return this.compilation;
  }

  async recompile(): Promise<Compilation> {
    const fileConfig: Partial<CompilerConfig> = this.options.skipConfigFile
      ? {}
      : await loadCompilerConfig(this.entryPath);
    const config: Partial<CompilerConfig> = { ...fileConfig, ...this.options.config };
    const verbose = config.verbose ?? false;

    const compilation = await compileProject(this.entryPath, {
      host: this.options.host,
      config,
      onFileParsed: verbose
        ? (path, index) => console.error(`  [loader] File ${index + 1}: ${path}`)
        : undefined,
    });

    this.compilation = compilation;
    return compilation;
  }
}
