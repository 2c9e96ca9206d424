/**
 * Name resolver — binds every textual reference to a declaration.
 *
 * An unqualified name is looked up in this order, stopping at the first
 * scope that has it:
 *   1. the namespace enclosing the reference
 *   2. each ancestor namespace below the file-level namespace
 *   3. the file-level namespace (plus the file's import aliases)
 *   4. the file-level namespace of every import without an alias
 * A qualified name resolves its first segment to a namespace the same way,
 * then descends through child namespaces only.
 */

import type {
  Declaration,
  DeclarationKind,
  DefinitionFile,
  EnumDecl,
  FieldDecl,
  MessageDecl,
  Namespace,
  OptionsDecl,
  RawTypeRef,
  Reference,
} from "../types/declarations.ts";
import type { SourceLocation } from "../types/syntax.ts";
import type { DefinitionGraph } from "../project/loader.ts";
import {
  AmbiguousReferenceError,
  assertNever,
  UnresolvedReferenceError,
} from "./errors.ts";

/** Binding of every reference in a graph to its declaration */
export type ResolvedReferences = ReadonlyMap<Reference, Declaration>;

const ANY_KIND: readonly DeclarationKind[] = ["message", "enum", "options", "compound"];

/** Resolve every reference in a loaded definition graph */
export function resolveReferences(graph: DefinitionGraph): ResolvedReferences {
  const resolver = new NameResolver(graph);
  resolver.resolveAll();
  return resolver.bindings;
}

/** Parse reference text such as `A::B.field` into a Reference */
export function parseReferenceText(text: string, location: SourceLocation): Reference {
  const trimmed = text.trim();
  const dot = trimmed.indexOf(".");
  const path = dot === -1 ? trimmed : trimmed.slice(0, dot);
  const member = dot === -1 ? undefined : trimmed.slice(dot + 1);
  return { text: trimmed, segments: path.split("::"), member, location };
}

interface ScopeMatch<T> {
  value: T;
  step: number;
}

export class NameResolver {
  readonly bindings = new Map<Reference, Declaration>();
  private readonly fileByPath = new Map<string, DefinitionFile>();
  private readonly aliases = new Map<DefinitionFile, Map<string, Namespace>>();
  private readonly unaliasedImports = new Map<DefinitionFile, DefinitionFile[]>();
  private readonly declarationIndex = new Map<Namespace, Map<string, Declaration>>();
  private readonly namespaceByName = new Map<string, Namespace>();
  /** References currently being resolved, to stop `A.f`/`B.g` loops */
  private readonly resolving = new Set<Reference>();

  constructor(graph: DefinitionGraph) {
    for (const file of graph.files) {
      this.fileByPath.set(file.path, file);
      const aliases = new Map<string, Namespace>();
      const unaliased: DefinitionFile[] = [];

      for (const statement of file.imports) {
        const target = graph.importTargets.get(statement);
        if (!target) continue;
        if (statement.alias !== undefined) {
          aliases.set(statement.alias, target.namespace);
        } else if (!unaliased.includes(target)) {
          unaliased.push(target);
        }
      }

      this.aliases.set(file, aliases);
      this.unaliasedImports.set(file, unaliased);
      this.indexNamespace(file.namespace);
    }
  }

  /** Namespace with the given qualified name, in any loaded file */
  findNamespace(qualifiedName: string): Namespace | undefined {
    return this.namespaceByName.get(qualifiedName);
  }

  resolveAll(): void {
    for (const file of this.fileByPath.values()) {
      this.resolveNamespace(file.namespace);
    }
  }

  /** Resolve one reference from a scope, requiring one of the expected kinds */
  resolve(
    reference: Reference,
    scope: Namespace,
    expected: readonly DeclarationKind[] = ANY_KIND,
  ): Declaration {
    const bound = this.bindings.get(reference);
    if (bound) return bound;

    if (this.resolving.has(reference)) {
      throw new UnresolvedReferenceError(
        `Reference '${reference.text}' depends on itself`,
        reference.text,
        [],
        reference.location,
      );
    }

    this.resolving.add(reference);
    try {
      const found = reference.member === undefined
        ? this.resolvePath(reference, scope)
        : this.resolveFieldType(reference, scope);
      checkKind(reference, found, expected);
      this.bindings.set(reference, found);
      return found;
    } finally {
      this.resolving.delete(reference);
    }
  }

  // --- Walking declarations ---

  private resolveNamespace(namespace: Namespace): void {
    for (const message of namespace.messages) {
      if (message.parent) this.resolve(message.parent, namespace, ["message"]);
      for (const field of message.fields) {
        this.resolveType(field.type, namespace);
      }
    }
    for (const decl of namespace.enums) {
      if (decl.parent) this.resolve(decl.parent, namespace, ["enum"]);
    }
    for (const decl of namespace.options) {
      if (decl.parent) this.resolve(decl.parent, namespace, ["options"]);
    }
    for (const child of namespace.namespaces) {
      this.resolveNamespace(child);
    }
  }

  private resolveType(type: RawTypeRef, scope: Namespace): void {
    switch (type.kind) {
      case "basic":
      case "compoundInline":
        return;
      case "enumInline":
        if (type.declaration.parent) this.resolve(type.declaration.parent, scope, ["enum"]);
        return;
      case "optionsInline":
        if (type.declaration.parent) this.resolve(type.declaration.parent, scope, ["options"]);
        return;
      case "enumRef":
        this.resolve(type.reference, scope, ["enum"]);
        return;
      case "named":
        this.resolve(type.reference, scope);
        return;
      case "array":
        this.resolveType(type.element, scope);
        return;
      case "map":
        this.resolveType(type.key, scope);
        this.resolveType(type.value, scope);
        return;
      default:
        assertNever(type);
    }
  }

  // --- Lookup ---

  private resolvePath(reference: Reference, scope: Namespace): Declaration {
    const [first, ...rest] = reference.segments;
    if (first === undefined) {
      throw new UnresolvedReferenceError("Empty reference", reference.text, [], reference.location);
    }
    const file = this.fileOf(scope);

    if (rest.length === 0) {
      const searched: string[] = [];
      const match = this.searchScopes(
        scope,
        file,
        searched,
        (ns) => this.declarationsOf(ns).get(first),
        (imported) => this.declarationsOf(imported.namespace).get(first),
        reference,
      );
      if (!match) {
        throw new UnresolvedReferenceError(
          `Cannot resolve '${reference.text}'; searched ${searched.join(", ")}`,
          reference.text,
          searched,
          reference.location,
        );
      }
      return match.value;
    }

    const searched: string[] = [];
    const aliases = this.aliases.get(file);
    const match = this.searchScopes<Namespace>(
      scope,
      file,
      searched,
      (ns) => {
        const child = ns.namespaces.find((n) => n.name === first);
        if (child) return child;
        if (ns === file.namespace) {
          return aliases?.get(first) ?? (ns.name === first ? ns : undefined);
        }
        return undefined;
      },
      (imported) => (imported.namespace.name === first ? imported.namespace : undefined),
      reference,
    );
    if (!match) {
      throw new UnresolvedReferenceError(
        `Cannot resolve '${reference.text}': no namespace '${first}' is visible; searched ${searched.join(", ")}`,
        reference.text,
        searched,
        reference.location,
      );
    }

    let current = match.value;
    const last = rest[rest.length - 1] ?? first;
    for (const segment of rest.slice(0, -1)) {
      const child = current.namespaces.find((n) => n.name === segment);
      if (!child) {
        throw new UnresolvedReferenceError(
          `Cannot resolve '${reference.text}': namespace '${current.qualifiedName}' has no namespace '${segment}'`,
          reference.text,
          [current.qualifiedName],
          reference.location,
        );
      }
      current = child;
    }

    const found = this.declarationsOf(current).get(last);
    if (!found) {
      throw new UnresolvedReferenceError(
        `Cannot resolve '${reference.text}': namespace '${current.qualifiedName}' declares no '${last}'`,
        reference.text,
        [current.qualifiedName],
        reference.location,
      );
    }
    return found;
  }

  /**
   * Run the ordered scope search. `local` is asked for each enclosing
   * namespace up to the file-level one; `imported` for each unaliased import.
   */
  private searchScopes<T>(
    scope: Namespace,
    file: DefinitionFile,
    searched: string[],
    local: (ns: Namespace) => T | undefined,
    imported: (file: DefinitionFile) => T | undefined,
    reference: Reference,
  ): ScopeMatch<T> | undefined {
    // Steps 1 and 2: enclosing namespaces below the file level
    let step = 1;
    for (let ns: Namespace | undefined = scope; ns && ns !== file.namespace; ns = ns.parent) {
      searched.push(ns.qualifiedName);
      const value = local(ns);
      if (value !== undefined) return { value, step };
      step = 2;
    }

    // Step 3: the file-level namespace
    searched.push(file.namespace.qualifiedName);
    const atFile = local(file.namespace);
    if (atFile !== undefined) return { value: atFile, step: 3 };

    // Step 4: unaliased imports
    const candidates: { value: T; file: DefinitionFile }[] = [];
    for (const target of this.unaliasedImports.get(file) ?? []) {
      searched.push(`import ${target.namespace.name}`);
      const value = imported(target);
      if (value !== undefined && !candidates.some((c) => c.value === value)) {
        candidates.push({ value, file: target });
      }
    }
    if (candidates.length > 1) {
      const names = candidates.map((c) => c.file.namespace.name);
      throw new AmbiguousReferenceError(
        `'${reference.text}' is declared by several imports: ${names.join(", ")}; qualify it`,
        names,
        reference.location,
      );
    }
    const only = candidates[0];
    return only ? { value: only.value, step: 4 } : undefined;
  }

  /** `Message.field` — the enum or options type of one of the message's own fields */
  private resolveFieldType(reference: Reference, scope: Namespace): Declaration {
    const messageRef: Reference = {
      text: reference.segments.join("::"),
      segments: reference.segments,
      location: reference.location,
    };
    const owner = this.resolvePath(messageRef, scope);
    if (owner.kind !== "message") {
      throw new UnresolvedReferenceError(
        `'${messageRef.text}' in '${reference.text}' is ${describeKind(owner.kind)}, not a message`,
        reference.text,
        [],
        reference.location,
      );
    }

    const fieldName = reference.member ?? "";
    const field = owner.fields.find((f) => f.name === fieldName);
    if (!field) {
      const ancestor = this.findInheritedField(owner, fieldName);
      const message = ancestor
        ? `Field '${fieldName}' of '${owner.qualifiedName}' is inherited from '${ancestor.qualifiedName}'; ` +
          `reference it as '${ancestor.name}.${fieldName}'`
        : `Message '${owner.qualifiedName}' has no field '${fieldName}'`;
      throw new UnresolvedReferenceError(message, reference.text, [owner.qualifiedName], reference.location);
    }

    const target = this.fieldEnumType(owner, field);
    if (!target) {
      throw new UnresolvedReferenceError(
        `Field '${owner.name}.${fieldName}' is not an enum or options field`,
        reference.text,
        [owner.qualifiedName],
        reference.location,
      );
    }
    return target;
  }

  private fieldEnumType(owner: MessageDecl, field: FieldDecl): EnumDecl | OptionsDecl | undefined {
    const type = field.type.kind === "array" ? field.type.element : field.type;
    switch (type.kind) {
      case "enumInline":
      case "optionsInline":
        return type.declaration;
      case "enumRef":
      case "named": {
        const found = this.resolve(type.reference, owner.namespace);
        return found.kind === "enum" || found.kind === "options" ? found : undefined;
      }
      default:
        return undefined;
    }
  }

  /** Ancestor of `message` that declares `fieldName`, if any */
  private findInheritedField(message: MessageDecl, fieldName: string): MessageDecl | undefined {
    const seen = new Set<MessageDecl>([message]);
    let current = message;
    while (current.parent) {
      const parent = this.resolve(current.parent, current.namespace, ["message"]);
      if (parent.kind !== "message" || seen.has(parent)) return undefined;
      if (parent.fields.some((f) => f.name === fieldName)) return parent;
      seen.add(parent);
      current = parent;
    }
    return undefined;
  }

  // --- Indexes ---

  private indexNamespace(namespace: Namespace): void {
    this.namespaceByName.set(namespace.qualifiedName, namespace);
    for (const child of namespace.namespaces) {
      this.indexNamespace(child);
    }
  }

  private declarationsOf(namespace: Namespace): Map<string, Declaration> {
    let index = this.declarationIndex.get(namespace);
    if (!index) {
      index = new Map<string, Declaration>();
      for (const decl of [
        ...namespace.messages,
        ...namespace.enums,
        ...namespace.options,
        ...namespace.compounds,
      ]) {
        index.set(decl.name, decl);
      }
      this.declarationIndex.set(namespace, index);
    }
    return index;
  }

  private fileOf(scope: Namespace): DefinitionFile {
    const file = this.fileByPath.get(scope.file);
    if (!file) throw new Error(`Namespace '${scope.qualifiedName}' belongs to no loaded file`);
    return file;
  }
}

function checkKind(
  reference: Reference,
  found: Declaration,
  expected: readonly DeclarationKind[],
): void {
  if (expected.includes(found.kind)) return;
  const wanted = expected.map(describeKind).join(" or ");
  throw new UnresolvedReferenceError(
    `'${reference.text}' resolves to ${describeKind(found.kind)} '${found.qualifiedName}', expected ${wanted}`,
    reference.text,
    [],
    reference.location,
  );
}

function describeKind(kind: DeclarationKind): string {
  switch (kind) {
    case "message":
      return "a message";
    case "enum":
      return "an enum";
    case "options":
      return "an options set";
    case "compound":
      return "a compound";
    default:
      return assertNever(kind);
  }
}
