/**
 * Raw declaration tree — one DefinitionFile per source file, with every
 * cross-reference still unresolved.
 */

import type {
  BasicTypeName,
  FieldModifier,
  LiteralNode,
  SourceLocation,
} from "./syntax.ts";

/** A textual reference, bound later by the name resolver */
export interface Reference {
  /** As written, e.g. `Base::Command` or `Status.code` */
  text: string;
  segments: string[];
  /** Trailing `.field` of a `Message.field` reference */
  member?: string;
  location: SourceLocation;
}

export interface Import {
  /** Path as written in the import statement */
  path: string;
  alias?: string;
  location: SourceLocation;
}

export interface DefinitionFile {
  /** Canonical path of the source file */
  path: string;
  /** File-level namespace, named after the sanitized file name */
  namespace: Namespace;
  imports: Import[];
}

export interface Namespace {
  kind: "namespace";
  name: string;
  qualifiedName: string;
  doc: string;
  /** Enclosing scope; lookup path only, undefined for the file-level namespace */
  parent?: Namespace;
  file: string;
  namespaces: Namespace[];
  messages: MessageDecl[];
  enums: EnumDecl[];
  options: OptionsDecl[];
  compounds: CompoundDecl[];
  location: SourceLocation;
}

export interface MessageDecl {
  kind: "message";
  name: string;
  qualifiedName: string;
  doc: string;
  parent?: Reference;
  fields: FieldDecl[];
  namespace: Namespace;
  location: SourceLocation;
}

export interface FieldDecl {
  name: string;
  doc: string;
  modifiers: FieldModifier[];
  type: RawTypeRef;
  default?: LiteralNode;
  location: SourceLocation;
}

export interface MemberDecl {
  name: string;
  doc: string;
  value?: bigint;
  location: SourceLocation;
}

/** Field that owns an inline enum or options declaration */
export interface InlineOwner {
  message: MessageDecl;
  field: string;
}

export interface EnumDecl {
  kind: "enum";
  name: string;
  qualifiedName: string;
  doc: string;
  open: boolean;
  parent?: Reference;
  members: MemberDecl[];
  namespace: Namespace;
  owner?: InlineOwner;
  location: SourceLocation;
}

export interface OptionsDecl {
  kind: "options";
  name: string;
  qualifiedName: string;
  doc: string;
  parent?: Reference;
  members: MemberDecl[];
  namespace: Namespace;
  owner?: InlineOwner;
  location: SourceLocation;
}

export interface CompoundDecl {
  kind: "compound";
  name: string;
  qualifiedName: string;
  doc: string;
  base: BasicTypeName;
  components: string[];
  namespace: Namespace;
  location: SourceLocation;
}

/** Any declaration a reference can bind to */
export type Declaration = MessageDecl | EnumDecl | OptionsDecl | CompoundDecl;
export type DeclarationKind = Declaration["kind"];

export type RawTypeRef =
  | { kind: "basic"; name: BasicTypeName; location: SourceLocation }
  | { kind: "enumInline"; declaration: EnumDecl; location: SourceLocation }
  | { kind: "enumRef"; reference: Reference; location: SourceLocation }
  | { kind: "optionsInline"; declaration: OptionsDecl; location: SourceLocation }
  | {
      kind: "compoundInline";
      base: BasicTypeName;
      components: string[];
      location: SourceLocation;
    }
  /** Bare name: message, enum, options or compound, decided by the resolver */
  | { kind: "named"; reference: Reference; location: SourceLocation }
  | { kind: "array"; element: RawTypeRef; location: SourceLocation }
  | { kind: "map"; key: RawTypeRef; value: RawTypeRef; location: SourceLocation };
