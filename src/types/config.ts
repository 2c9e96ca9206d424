/** Configuration types parsed from config/compiler.md */

import type { WidthBits } from "./model.ts";

export interface CompilerConfig {
  /** Identifiers reserved on top of the language keywords */
  extraReservedWords: string[];
  /** Accept arrays and maps as map value types */
  allowNestedMapValues: boolean;
  /** Minimum storage width of open enums */
  openEnumWidth: WidthBits;
  /** Log every parsed file */
  verbose: boolean;
}

/** Default config when no compiler.md is found */
export const DEFAULT_COMPILER_CONFIG: CompilerConfig = {
  extraReservedWords: [],
  allowNestedMapValues: false,
  openEnumWidth: 32,
  verbose: false,
};
