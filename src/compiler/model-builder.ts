/**
 * Model builder — turns a loaded, resolved definition graph into the
 * read-only model: flattened message fields, numbered enums and options,
 * validated types and defaults.
 */

import type {
  CompoundDecl,
  Declaration,
  DefinitionFile,
  EnumDecl,
  FieldDecl,
  MessageDecl,
  Namespace,
  OptionsDecl,
  RawTypeRef,
  Reference,
} from "../types/declarations.ts";
import type {
  DefaultValue,
  ResolvedCompound,
  ResolvedEnum,
  ResolvedField,
  ResolvedFile,
  ResolvedMessage,
  ResolvedModel,
  ResolvedNamespace,
  ResolvedOptions,
  TypeRef,
} from "../types/model.ts";
import type { LiteralNode } from "../types/syntax.ts";
import { DEFAULT_COMPILER_CONFIG, type CompilerConfig } from "../types/config.ts";
import type { DefinitionGraph } from "../project/loader.ts";
import type { ResolvedReferences } from "./name-resolver.ts";
import { EnumNumbering, type NumberedDecl } from "./enum-numbering.ts";
import {
  assertNever,
  InheritanceConflictError,
  InheritanceCycleError,
  RedeclarationError,
  TypeConstraintError,
  UnresolvedReferenceError,
} from "./errors.ts";

const INT_MIN = -(1n << 63n);
const INT_MAX = (1n << 63n) - 1n;

/** Build the resolved model of a graph whose references are all bound */
export function buildModel(
  graph: DefinitionGraph,
  references: ResolvedReferences,
  config: CompilerConfig = DEFAULT_COMPILER_CONFIG,
): ResolvedModel {
  return new ModelBuilder(graph, references, config).build();
}

type FlattenState = "inProgress" | ResolvedMessage;

class ModelBuilder {
  private readonly numbering: EnumNumbering;
  private readonly flattened = new Map<MessageDecl, FlattenState>();
  private readonly enums = new Map<string, ResolvedEnum>();
  private readonly options = new Map<string, ResolvedOptions>();
  private readonly compounds = new Map<string, ResolvedCompound>();
  private readonly messages = new Map<string, ResolvedMessage>();

  constructor(
    private readonly graph: DefinitionGraph,
    private readonly references: ResolvedReferences,
    private readonly config: CompilerConfig,
  ) {
    this.numbering = new EnumNumbering((decl) => this.parentSet(decl), config.openEnumWidth);
  }

  build(): ResolvedModel {
    // Enums, options and compounds first: fields refer to them
    for (const file of this.graph.files) {
      this.visitNamespaces(file.namespace, (ns) => {
        for (const message of ns.messages) {
          checkOwnFieldNames(message);
          for (const field of message.fields) this.addInlineSets(field.type);
        }
        for (const decl of ns.enums) this.addEnum(decl);
        for (const decl of ns.options) this.addOptions(decl);
        for (const decl of ns.compounds) this.addCompound(decl);
      });
    }

    for (const file of this.graph.files) {
      this.visitNamespaces(file.namespace, (ns) => {
        for (const message of ns.messages) this.flatten(message, []);
      });
    }

    const files = this.graph.files.map((file) => this.buildFile(file));
    const entry = this.graph.entry.path;

    return deepFreeze({
      entry,
      files,
      messages: new FrozenMap(this.messages),
      enums: new FrozenMap(this.enums),
      options: new FrozenMap(this.options),
      compounds: new FrozenMap(this.compounds),
    });
  }

  // --- Enums, options, compounds ---

  private addInlineSets(type: RawTypeRef): void {
    switch (type.kind) {
      case "enumInline":
        this.addEnum(type.declaration);
        return;
      case "optionsInline":
        this.addOptions(type.declaration);
        return;
      case "array":
        this.addInlineSets(type.element);
        return;
      case "map":
        this.addInlineSets(type.key);
        this.addInlineSets(type.value);
        return;
      default:
        return;
    }
  }

  private addEnum(decl: EnumDecl): void {
    const { members, width } = this.numbering.number(decl);
    const parent = this.parentSet(decl);
    this.enums.set(decl.qualifiedName, {
      kind: "enum",
      name: decl.name,
      qualifiedName: decl.qualifiedName,
      namespace: decl.namespace.qualifiedName,
      file: decl.namespace.file,
      doc: decl.doc,
      open: decl.open,
      parent: parent?.qualifiedName,
      members,
      width,
      owner: decl.owner ? { message: decl.owner.message.qualifiedName, field: decl.owner.field } : undefined,
      location: decl.location,
    });
  }

  private addOptions(decl: OptionsDecl): void {
    const { members, width } = this.numbering.number(decl);
    const parent = this.parentSet(decl);
    this.options.set(decl.qualifiedName, {
      kind: "options",
      name: decl.name,
      qualifiedName: decl.qualifiedName,
      namespace: decl.namespace.qualifiedName,
      file: decl.namespace.file,
      doc: decl.doc,
      parent: parent?.qualifiedName,
      members,
      width,
      owner: decl.owner ? { message: decl.owner.message.qualifiedName, field: decl.owner.field } : undefined,
      location: decl.location,
    });
  }

  private addCompound(decl: CompoundDecl): void {
    if (decl.base !== "float") {
      throw new TypeConstraintError(
        `Compound '${decl.qualifiedName}' must have base type 'float', got '${decl.base}'`,
        decl.location,
      );
    }
    this.compounds.set(decl.qualifiedName, {
      kind: "compound",
      name: decl.name,
      qualifiedName: decl.qualifiedName,
      namespace: decl.namespace.qualifiedName,
      file: decl.namespace.file,
      doc: decl.doc,
      base: "float",
      components: [...decl.components],
      location: decl.location,
    });
  }

  private parentSet(decl: NumberedDecl): NumberedDecl | undefined {
    if (!decl.parent) return undefined;
    const parent = this.bound(decl.parent);
    if (parent.kind !== "enum" && parent.kind !== "options") {
      throw new TypeConstraintError(
        `'${decl.qualifiedName}' extends '${parent.qualifiedName}', which is not an enum or options set`,
        decl.parent.location,
      );
    }
    if (parent.kind !== decl.kind) {
      throw new TypeConstraintError(
        `${decl.kind === "enum" ? "Enum" : "Options"} '${decl.qualifiedName}' cannot extend ` +
          `${parent.kind === "enum" ? "enum" : "options"} '${parent.qualifiedName}'`,
        decl.parent.location,
      );
    }
    return parent;
  }

  // --- Messages ---

  private flatten(message: MessageDecl, chain: MessageDecl[]): ResolvedMessage {
    const state = this.flattened.get(message);
    if (state === "inProgress") {
      const cycle = [...chain.slice(chain.indexOf(message)), message].map((m) => m.qualifiedName);
      throw new InheritanceCycleError(
        `Circular inheritance: ${cycle.join(" -> ")}`,
        message.location,
        cycle,
      );
    }
    if (state) return state;

    this.flattened.set(message, "inProgress");

    let parent: ResolvedMessage | undefined;
    if (message.parent) {
      const decl = this.bound(message.parent);
      if (decl.kind !== "message") {
        throw new TypeConstraintError(
          `Message '${message.qualifiedName}' cannot inherit from '${decl.qualifiedName}'`,
          message.parent.location,
        );
      }
      parent = this.flatten(decl, [...chain, message]);
    }

    const inherited = parent?.fields ?? [];
    const ownFields = message.fields.map((field) => {
      const clash = inherited.find((f) => f.name === field.name);
      if (clash) {
        throw new InheritanceConflictError(
          `Field '${field.name}' of '${message.qualifiedName}' conflicts with the field inherited from '${clash.declaredIn}'`,
          field.location,
          clash.location,
        );
      }
      return this.buildField(message, field);
    });

    const resolved: ResolvedMessage = {
      kind: "message",
      name: message.name,
      qualifiedName: message.qualifiedName,
      namespace: message.namespace.qualifiedName,
      file: message.namespace.file,
      doc: message.doc,
      parent: parent?.qualifiedName,
      ownFields,
      fields: [...inherited, ...ownFields],
      location: message.location,
    };
    this.flattened.set(message, resolved);
    this.messages.set(resolved.qualifiedName, resolved);
    return resolved;
  }

  private buildField(message: MessageDecl, field: FieldDecl): ResolvedField {
    const type = this.toTypeRef(field.type, field);
    return {
      name: field.name,
      type,
      modifiers: [...field.modifiers],
      optional: field.modifiers.includes("optional"),
      default: field.default ? this.defaultValue(type, field.default, field) : undefined,
      doc: field.doc,
      declaredIn: message.qualifiedName,
      location: field.location,
    };
  }

  // --- Types ---

  private toTypeRef(raw: RawTypeRef, field: FieldDecl): TypeRef {
    switch (raw.kind) {
      case "basic":
        return { kind: "basic", type: raw.name };
      case "enumInline":
        return { kind: "enumInline", enum: raw.declaration.qualifiedName };
      case "optionsInline":
        return { kind: "optionsInline", options: raw.declaration.qualifiedName };
      case "enumRef": {
        const decl = this.bound(raw.reference);
        if (decl.kind !== "enum") {
          throw new TypeConstraintError(
            `Field '${field.name}' uses '${raw.reference.text}' as an enum, but it is ${decl.kind} '${decl.qualifiedName}'`,
            raw.location,
          );
        }
        return { kind: "enumRef", enum: decl.qualifiedName };
      }
      case "compoundInline":
        if (raw.base !== "float") {
          throw new TypeConstraintError(
            `Compound field '${field.name}' must have base type 'float', got '${raw.base}'`,
            raw.location,
          );
        }
        return { kind: "compound", base: "float", components: [...raw.components] };
      case "named":
        return this.namedType(this.bound(raw.reference));
      case "array": {
        if (raw.element.kind === "array" || raw.element.kind === "map") {
          throw new TypeConstraintError(
            `Field '${field.name}': arrays of ${raw.element.kind === "array" ? "arrays" : "maps"} are not allowed`,
            raw.location,
          );
        }
        return { kind: "array", element: this.toTypeRef(raw.element, field) };
      }
      case "map": {
        if (raw.key.kind !== "basic" || raw.key.name !== "string") {
          throw new TypeConstraintError(
            `Field '${field.name}': map keys must be 'string'`,
            raw.key.location,
          );
        }
        if ((raw.value.kind === "array" || raw.value.kind === "map") && !this.config.allowNestedMapValues) {
          throw new TypeConstraintError(
            `Field '${field.name}': map values cannot be ${raw.value.kind === "array" ? "arrays" : "maps"}`,
            raw.value.location,
          );
        }
        return {
          kind: "map",
          key: { kind: "basic", type: "string" },
          value: this.toTypeRef(raw.value, field),
        };
      }
      default:
        return assertNever(raw);
    }
  }

  private namedType(decl: Declaration): TypeRef {
    switch (decl.kind) {
      case "message":
        return { kind: "message", message: decl.qualifiedName };
      case "enum":
        return { kind: "enumRef", enum: decl.qualifiedName };
      case "options":
        return { kind: "optionsRef", options: decl.qualifiedName };
      case "compound":
        return {
          kind: "compound",
          base: "float",
          components: [...decl.components],
          compound: decl.qualifiedName,
        };
      default:
        return assertNever(decl);
    }
  }

  // --- Defaults ---

  private defaultValue(type: TypeRef, literal: LiteralNode, field: FieldDecl): DefaultValue {
    const mismatch = (expected: string): TypeConstraintError =>
      new TypeConstraintError(
        `Default of field '${field.name}' must be ${expected}`,
        literal.location,
      );

    switch (type.kind) {
      case "basic":
        switch (type.type) {
          case "int":
            if (literal.kind !== "integer") throw mismatch("an integer");
            if (literal.value < INT_MIN || literal.value > INT_MAX) {
              throw mismatch("a 64-bit signed integer");
            }
            return { kind: "int", value: literal.value };
          case "byte":
            if (literal.kind !== "integer" || literal.value < 0n || literal.value > 255n) {
              throw mismatch("an integer from 0 to 255");
            }
            return { kind: "int", value: literal.value };
          case "float":
            if (literal.kind === "float") return { kind: "float", value: literal.value };
            if (literal.kind === "integer") return { kind: "float", value: Number(literal.value) };
            throw mismatch("a number");
          case "bool":
            if (literal.kind === "identifier" && (literal.value === "true" || literal.value === "false")) {
              return { kind: "bool", value: literal.value === "true" };
            }
            throw mismatch("'true' or 'false'");
          case "string":
            if (literal.kind !== "string") throw mismatch("a quoted string");
            return { kind: "string", value: literal.value };
          default:
            return assertNever(type.type);
        }
      case "enumInline":
      case "enumRef": {
        const resolved = this.enums.get(type.enum);
        if (!resolved) throw new Error(`Enum '${type.enum}' was not numbered`);
        const member = literal.kind === "identifier"
          ? resolved.members.find((m) => m.name === literal.value)
          : undefined;
        if (!member) throw mismatch(`a member of '${resolved.qualifiedName}'`);
        return { kind: "enum", member: member.name, value: member.value };
      }
      case "optionsInline":
      case "optionsRef":
      case "compound":
      case "message":
      case "array":
      case "map":
        throw new TypeConstraintError(
          `Field '${field.name}' cannot have a default: defaults are only allowed on basic and enum fields`,
          literal.location,
        );
      default:
        return assertNever(type);
    }
  }

  // --- Files and namespaces ---

  private buildFile(file: DefinitionFile): ResolvedFile {
    return {
      path: file.path,
      namespace: this.buildNamespace(file.namespace),
      imports: file.imports.map((statement) => {
        const target = this.graph.importTargets.get(statement);
        if (!target) throw new Error(`Import '${statement.path}' of ${file.path} was not loaded`);
        return { path: statement.path, alias: statement.alias, file: target.path };
      }),
    };
  }

  private buildNamespace(ns: Namespace): ResolvedNamespace {
    return {
      name: ns.name,
      qualifiedName: ns.qualifiedName,
      doc: ns.doc,
      file: ns.file,
      namespaces: ns.namespaces.map((child) => this.buildNamespace(child)),
      messages: ns.messages.map((m) => lookup(this.messages, m.qualifiedName)),
      enums: ns.enums.map((e) => lookup(this.enums, e.qualifiedName)),
      options: ns.options.map((o) => lookup(this.options, o.qualifiedName)),
      compounds: ns.compounds.map((c) => lookup(this.compounds, c.qualifiedName)),
      location: ns.location,
    };
  }

  private visitNamespaces(ns: Namespace, visit: (ns: Namespace) => void): void {
    visit(ns);
    for (const child of ns.namespaces) this.visitNamespaces(child, visit);
  }

  private bound(reference: Reference): Declaration {
    const decl = this.references.get(reference);
    if (!decl) {
      throw new UnresolvedReferenceError(
        `Reference '${reference.text}' was never resolved`,
        reference.text,
        [],
        reference.location,
      );
    }
    return decl;
  }
}

/** Field names must be unique within one message body */
function checkOwnFieldNames(message: MessageDecl): void {
  const seen = new Map<string, FieldDecl>();
  for (const field of message.fields) {
    const previous = seen.get(field.name);
    if (previous) {
      throw new RedeclarationError(
        `Field '${field.name}' is declared twice in message '${message.qualifiedName}' (line ${previous.location.line})`,
        field.location,
        previous.location,
      );
    }
    seen.set(field.name, field);
  }
}

function lookup<T>(map: ReadonlyMap<string, T>, key: string): T {
  const value = map.get(key);
  if (value === undefined) throw new Error(`'${key}' missing from the model`);
  return value;
}

/** Map whose writes throw once it is built */
class FrozenMap<K, V> extends Map<K, V> {
  constructor(entries: Iterable<readonly [K, V]>) {
    super();
    for (const [key, value] of entries) super.set(key, value);
    Object.freeze(this);
  }

  set(key: K): this {
    throw new TypeError(`Cannot set '${String(key)}': the compiled model is read-only`);
  }

  delete(key: K): boolean {
    throw new TypeError(`Cannot delete '${String(key)}': the compiled model is read-only`);
  }

  clear(): void {
    throw new TypeError("Cannot clear: the compiled model is read-only");
  }
}

/** Freeze a model graph; maps are FrozenMaps, their entries are frozen here */
function deepFreeze<T>(value: T, seen = new Set<unknown>()): T {
  if (typeof value !== "object" || value === null || seen.has(value)) return value;
  seen.add(value);

  if (value instanceof Map) {
    for (const entry of value.values()) deepFreeze(entry, seen);
    return value;
  }
  for (const child of Object.values(value)) deepFreeze(child, seen);
  Object.freeze(value);
  return value;
}
