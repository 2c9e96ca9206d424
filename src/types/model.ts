/**
 * Resolved model — the read-only output of the compiler. Generators consume
 * this and nothing else. Cross-references are qualified names that key into
 * the model's declaration maps.
 */

import type { BasicTypeName, FieldModifier, SourceLocation } from "./syntax.ts";

export type TypeRef =
  | { readonly kind: "basic"; readonly type: BasicTypeName }
  | { readonly kind: "enumInline"; readonly enum: string }
  | { readonly kind: "enumRef"; readonly enum: string }
  | { readonly kind: "optionsInline"; readonly options: string }
  | { readonly kind: "optionsRef"; readonly options: string }
  | {
      readonly kind: "compound";
      readonly base: "float";
      readonly components: readonly string[];
      /** Set when the field names a standalone compound */
      readonly compound?: string;
    }
  | { readonly kind: "message"; readonly message: string }
  | { readonly kind: "array"; readonly element: TypeRef }
  | {
      readonly kind: "map";
      readonly key: { readonly kind: "basic"; readonly type: "string" };
      readonly value: TypeRef;
    };

export type DefaultValue =
  /** `int` and `byte` fields */
  | { readonly kind: "int"; readonly value: bigint }
  | { readonly kind: "float"; readonly value: number }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "enum"; readonly member: string; readonly value: bigint };

export interface ResolvedField {
  readonly name: string;
  readonly type: TypeRef;
  readonly modifiers: readonly FieldModifier[];
  readonly optional: boolean;
  readonly default?: DefaultValue;
  readonly doc: string;
  /** Qualified name of the message that declares the field */
  readonly declaredIn: string;
  readonly location: SourceLocation;
}

export interface ResolvedMessage {
  readonly kind: "message";
  readonly name: string;
  readonly qualifiedName: string;
  readonly namespace: string;
  readonly file: string;
  readonly doc: string;
  readonly parent?: string;
  /** Fields declared in this message's own body */
  readonly ownFields: readonly ResolvedField[];
  /** Ancestor fields (oldest first) followed by own fields */
  readonly fields: readonly ResolvedField[];
  readonly location: SourceLocation;
}

export interface EnumMember {
  readonly name: string;
  readonly value: bigint;
  readonly doc: string;
  /** Qualified name of the ancestor that declared an inherited member */
  readonly inheritedFrom?: string;
  readonly location: SourceLocation;
}

export type WidthBits = 8 | 16 | 32 | 64;

/** Advisory storage width for generators */
export interface IntegerWidth {
  readonly bits: WidthBits;
  readonly signed: boolean;
}

export interface InlineOwnerRef {
  readonly message: string;
  readonly field: string;
}

export interface ResolvedEnum {
  readonly kind: "enum";
  readonly name: string;
  readonly qualifiedName: string;
  readonly namespace: string;
  readonly file: string;
  readonly doc: string;
  readonly open: boolean;
  readonly parent?: string;
  readonly members: readonly EnumMember[];
  readonly width: IntegerWidth;
  readonly owner?: InlineOwnerRef;
  readonly location: SourceLocation;
}

export interface ResolvedOptions {
  readonly kind: "options";
  readonly name: string;
  readonly qualifiedName: string;
  readonly namespace: string;
  readonly file: string;
  readonly doc: string;
  readonly parent?: string;
  readonly members: readonly EnumMember[];
  readonly width: IntegerWidth;
  readonly owner?: InlineOwnerRef;
  readonly location: SourceLocation;
}

export interface ResolvedCompound {
  readonly kind: "compound";
  readonly name: string;
  readonly qualifiedName: string;
  readonly namespace: string;
  readonly file: string;
  readonly doc: string;
  readonly base: "float";
  readonly components: readonly string[];
  readonly location: SourceLocation;
}

export interface ResolvedNamespace {
  readonly name: string;
  readonly qualifiedName: string;
  readonly doc: string;
  readonly file: string;
  readonly namespaces: readonly ResolvedNamespace[];
  readonly messages: readonly ResolvedMessage[];
  /** Standalone enums; inline enums live only in the model-wide map */
  readonly enums: readonly ResolvedEnum[];
  readonly options: readonly ResolvedOptions[];
  readonly compounds: readonly ResolvedCompound[];
  readonly location: SourceLocation;
}

export interface ResolvedImport {
  readonly path: string;
  readonly alias?: string;
  /** Canonical path of the imported file */
  readonly file: string;
}

export interface ResolvedFile {
  readonly path: string;
  readonly namespace: ResolvedNamespace;
  readonly imports: readonly ResolvedImport[];
}

export interface ResolvedModel {
  /** Canonical path of the entry file */
  readonly entry: string;
  /** Every loaded file, imports before importers */
  readonly files: readonly ResolvedFile[];
  readonly messages: ReadonlyMap<string, ResolvedMessage>;
  readonly enums: ReadonlyMap<string, ResolvedEnum>;
  readonly options: ReadonlyMap<string, ResolvedOptions>;
  readonly compounds: ReadonlyMap<string, ResolvedCompound>;
}
