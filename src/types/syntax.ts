/** Tokens and syntax tree nodes produced by the lexer and parser */

/** Basic scalar types of the definition language */
export const BASIC_TYPES = ["string", "int", "float", "bool", "byte"] as const;
export type BasicTypeName = (typeof BASIC_TYPES)[number];

/** Identifiers that may not name a declaration */
export const RESERVED_WORDS = [
  "message",
  "field",
  "enum",
  "open_enum",
  "namespace",
  "options",
  "string",
  "int",
  "float",
  "bool",
  "byte",
  "optional",
  "required",
  "repeated",
  "default",
  "import",
  "as",
] as const;

/** Field modifiers; only `optional` changes the model */
export const FIELD_MODIFIERS = ["optional", "required", "repeated"] as const;
export type FieldModifier = (typeof FIELD_MODIFIERS)[number];

export interface SourceLocation {
  file: string;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

export type TokenKind =
  | "identifier"
  | "integer"
  | "float"
  | "string"
  | "punct"
  | "eof";

export interface Token {
  kind: TokenKind;
  /** Source text of the token (string literals keep their quotes) */
  text: string;
  line: number;
  column: number;
  /** `///` doc comments directly preceding this token */
  docs: string[];
}

// --- Syntax tree ---

export interface SyntaxFile {
  path: string;
  imports: ImportNode[];
  items: ItemNode[];
}

export interface ImportNode {
  kind: "import";
  path: string;
  alias?: string;
  aliasLocation?: SourceLocation;
  location: SourceLocation;
}

export type ItemNode =
  | NamespaceNode
  | MessageNode
  | EnumNode
  | OptionsNode
  | CompoundNode;

export interface NamespaceNode {
  kind: "namespace";
  name: string;
  doc: string;
  items: ItemNode[];
  location: SourceLocation;
}

/** A possibly-qualified name, optionally ending in `.member` */
export interface NameNode {
  segments: string[];
  member?: string;
  location: SourceLocation;
}

export interface MessageNode {
  kind: "message";
  name: string;
  doc: string;
  parent?: NameNode;
  fields: FieldNode[];
  location: SourceLocation;
}

export interface FieldNode {
  kind: "field";
  name: string;
  doc: string;
  modifiers: FieldModifier[];
  type: TypeNode;
  default?: LiteralNode;
  location: SourceLocation;
}

export interface MemberNode {
  name: string;
  doc: string;
  value?: bigint;
  location: SourceLocation;
}

export interface EnumNode {
  kind: "enum";
  name: string;
  doc: string;
  open: boolean;
  parent?: NameNode;
  members: MemberNode[];
  location: SourceLocation;
}

export interface OptionsNode {
  kind: "options";
  name: string;
  doc: string;
  parent?: NameNode;
  members: MemberNode[];
  location: SourceLocation;
}

export interface CompoundNode {
  kind: "compound";
  name: string;
  doc: string;
  base: BasicTypeName;
  components: string[];
  location: SourceLocation;
}

export type TypeNode =
  | { kind: "basic"; name: BasicTypeName; location: SourceLocation }
  | {
      kind: "inlineEnum";
      open: boolean;
      members: MemberNode[];
      /** `Base.field + { ... }` */
      extends?: NameNode;
      location: SourceLocation;
    }
  | { kind: "enumRef"; open: boolean; name: NameNode; location: SourceLocation }
  | { kind: "inlineOptions"; members: MemberNode[]; location: SourceLocation }
  | {
      kind: "inlineCompound";
      base: BasicTypeName;
      components: string[];
      location: SourceLocation;
    }
  | { kind: "named"; name: NameNode; location: SourceLocation }
  | { kind: "array"; element: TypeNode; location: SourceLocation }
  | { kind: "map"; key: TypeNode; value: TypeNode; location: SourceLocation };

export type LiteralNode =
  | { kind: "integer"; value: bigint; location: SourceLocation }
  | { kind: "float"; value: number; text: string; location: SourceLocation }
  | { kind: "string"; value: string; location: SourceLocation }
  | { kind: "identifier"; value: string; location: SourceLocation };
