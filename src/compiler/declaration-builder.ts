/**
 * Declaration builder — turns one file's syntax tree into a DefinitionFile.
 * Wraps everything in the file-level namespace and checks names at their
 * point of declaration. References stay unresolved.
 */

import { basename, extname } from "node:path";
import {
  RESERVED_WORDS,
  type ItemNode,
  type MemberNode,
  type MessageNode,
  type NameNode,
  type SourceLocation,
  type SyntaxFile,
  type TypeNode,
} from "../types/syntax.ts";
import type {
  DefinitionFile,
  EnumDecl,
  FieldDecl,
  Import,
  MemberDecl,
  MessageDecl,
  Namespace,
  OptionsDecl,
  RawTypeRef,
  Reference,
} from "../types/declarations.ts";
import { assertNever, RedeclarationError, ReservedNameError } from "./errors.ts";

export interface BuildOptions {
  /** Identifiers reserved on top of the language keywords */
  extraReservedWords?: readonly string[];
}

/** Build the raw declaration tree of one parsed file */
export function buildDefinitionFile(
  syntax: SyntaxFile,
  options: BuildOptions = {},
): DefinitionFile {
  return new DeclarationBuilder(syntax.path, options).build(syntax);
}

/**
 * Derive the file-level namespace name from a path: extension dropped,
 * invalid characters replaced, never starting with a digit, never reserved.
 */
export function fileNamespaceName(
  path: string,
  extraReservedWords: readonly string[] = [],
): string {
  const stem = basename(path, extname(path));
  let name = stem.replace(/[^A-Za-z0-9_]/g, "_");
  if (name === "") name = "_";
  if (/^[0-9]/.test(name)) name = `_${name}`;
  if (isReserved(name, extraReservedWords)) name = `${name}_`;
  return name;
}

/** Render a reference the way it was written */
export function referenceText(segments: readonly string[], member?: string): string {
  const path = segments.join("::");
  return member ? `${path}.${member}` : path;
}

function isReserved(name: string, extra: readonly string[]): boolean {
  return (RESERVED_WORDS as readonly string[]).includes(name) || extra.includes(name);
}

class DeclarationBuilder {
  private readonly path: string;
  private readonly extraReserved: readonly string[];
  /** First location each name was declared at, per namespace */
  private readonly declared = new Map<Namespace, Map<string, SourceLocation>>();

  constructor(path: string, options: BuildOptions) {
    this.path = path;
    this.extraReserved = options.extraReservedWords ?? [];
  }

  build(syntax: SyntaxFile): DefinitionFile {
    const name = fileNamespaceName(this.path, this.extraReserved);
    const location: SourceLocation = { file: this.path, line: 1, column: 1 };
    const namespace = this.createNamespace(name, name, "", undefined, location);

    const imports: Import[] = syntax.imports.map((node) => {
      if (node.alias !== undefined) {
        const aliasLocation = node.aliasLocation ?? node.location;
        this.checkReserved(node.alias, "Import alias", aliasLocation);
        this.declare(namespace, node.alias, "import alias", aliasLocation);
      }
      return { path: node.path, alias: node.alias, location: node.location };
    });

    for (const item of syntax.items) {
      this.addItem(namespace, item);
    }

    return { path: this.path, namespace, imports };
  }

  private addItem(scope: Namespace, item: ItemNode): void {
    this.checkReserved(item.name, kindLabel(item.kind), item.location);

    switch (item.kind) {
      case "namespace": {
        // Re-opening a namespace continues it
        let child = scope.namespaces.find((ns) => ns.name === item.name);
        if (!child) {
          this.declare(scope, item.name, "namespace", item.location);
          child = this.createNamespace(
            item.name,
            `${scope.qualifiedName}::${item.name}`,
            item.doc,
            scope,
            item.location,
          );
          scope.namespaces.push(child);
        }
        for (const nested of item.items) {
          this.addItem(child, nested);
        }
        return;
      }
      case "message":
        this.declare(scope, item.name, "message", item.location);
        scope.messages.push(this.buildMessage(scope, item));
        return;
      case "enum":
        this.declare(scope, item.name, "enum", item.location);
        scope.enums.push({
          kind: "enum",
          name: item.name,
          qualifiedName: `${scope.qualifiedName}::${item.name}`,
          doc: item.doc,
          open: item.open,
          parent: item.parent ? toReference(item.parent) : undefined,
          members: this.buildMembers(item.members),
          namespace: scope,
          location: item.location,
        });
        return;
      case "options":
        this.declare(scope, item.name, "options", item.location);
        scope.options.push({
          kind: "options",
          name: item.name,
          qualifiedName: `${scope.qualifiedName}::${item.name}`,
          doc: item.doc,
          parent: item.parent ? toReference(item.parent) : undefined,
          members: this.buildMembers(item.members),
          namespace: scope,
          location: item.location,
        });
        return;
      case "compound":
        this.declare(scope, item.name, "compound", item.location);
        scope.compounds.push({
          kind: "compound",
          name: item.name,
          qualifiedName: `${scope.qualifiedName}::${item.name}`,
          doc: item.doc,
          base: item.base,
          components: [...item.components],
          namespace: scope,
          location: item.location,
        });
        return;
      default:
        assertNever(item);
    }
  }

  private buildMessage(scope: Namespace, node: MessageNode): MessageDecl {
    const message: MessageDecl = {
      kind: "message",
      name: node.name,
      qualifiedName: `${scope.qualifiedName}::${node.name}`,
      doc: node.doc,
      parent: node.parent ? toReference(node.parent) : undefined,
      fields: [],
      namespace: scope,
      location: node.location,
    };

    for (const field of node.fields) {
      this.checkReserved(field.name, "Field", field.location);
      const decl: FieldDecl = {
        name: field.name,
        doc: field.doc,
        modifiers: [...field.modifiers],
        type: this.buildType(field.type, message, field.name),
        default: field.default,
        location: field.location,
      };
      message.fields.push(decl);
    }

    return message;
  }

  private buildType(node: TypeNode, message: MessageDecl, fieldName: string): RawTypeRef {
    switch (node.kind) {
      case "basic":
        return { kind: "basic", name: node.name, location: node.location };
      case "inlineEnum": {
        const declaration: EnumDecl = {
          kind: "enum",
          name: fieldName,
          qualifiedName: `${message.qualifiedName}.${fieldName}`,
          doc: "",
          open: node.open,
          parent: node.extends ? toReference(node.extends) : undefined,
          members: this.buildMembers(node.members),
          namespace: message.namespace,
          owner: { message, field: fieldName },
          location: node.location,
        };
        return { kind: "enumInline", declaration, location: node.location };
      }
      case "enumRef":
        return { kind: "enumRef", reference: toReference(node.name), location: node.location };
      case "inlineOptions": {
        const declaration: OptionsDecl = {
          kind: "options",
          name: fieldName,
          qualifiedName: `${message.qualifiedName}.${fieldName}`,
          doc: "",
          members: this.buildMembers(node.members),
          namespace: message.namespace,
          owner: { message, field: fieldName },
          location: node.location,
        };
        return { kind: "optionsInline", declaration, location: node.location };
      }
      case "inlineCompound":
        return {
          kind: "compoundInline",
          base: node.base,
          components: [...node.components],
          location: node.location,
        };
      case "named":
        return { kind: "named", reference: toReference(node.name), location: node.location };
      case "array":
        return {
          kind: "array",
          element: this.buildType(node.element, message, fieldName),
          location: node.location,
        };
      case "map":
        return {
          kind: "map",
          key: this.buildType(node.key, message, fieldName),
          value: this.buildType(node.value, message, fieldName),
          location: node.location,
        };
      default:
        return assertNever(node);
    }
  }

  private buildMembers(members: MemberNode[]): MemberDecl[] {
    return members.map((member) => {
      this.checkReserved(member.name, "Enum member", member.location);
      return {
        name: member.name,
        doc: member.doc,
        value: member.value,
        location: member.location,
      };
    });
  }

  private createNamespace(
    name: string,
    qualifiedName: string,
    doc: string,
    parent: Namespace | undefined,
    location: SourceLocation,
  ): Namespace {
    return {
      kind: "namespace",
      name,
      qualifiedName,
      doc,
      parent,
      file: this.path,
      namespaces: [],
      messages: [],
      enums: [],
      options: [],
      compounds: [],
      location,
    };
  }

  /** Record a name in a namespace, rejecting a second declaration */
  private declare(scope: Namespace, name: string, what: string, location: SourceLocation): void {
    let names = this.declared.get(scope);
    if (!names) {
      names = new Map();
      this.declared.set(scope, names);
    }

    const previous = names.get(name);
    if (previous) {
      throw new RedeclarationError(
        `${capitalize(what)} '${name}' is already declared in namespace '${scope.qualifiedName}' ` +
          `(line ${previous.line})`,
        location,
        previous,
      );
    }
    names.set(name, location);
  }

  private checkReserved(name: string, what: string, location: SourceLocation): void {
    if (isReserved(name, this.extraReserved)) {
      throw new ReservedNameError(
        `${what} name '${name}' is a reserved keyword and cannot be used`,
        name,
        location,
      );
    }
  }
}

function toReference(node: NameNode): Reference {
  return {
    text: referenceText(node.segments, node.member),
    segments: [...node.segments],
    member: node.member,
    location: node.location,
  };
}

function kindLabel(kind: ItemNode["kind"]): string {
  switch (kind) {
    case "namespace":
      return "Namespace";
    case "message":
      return "Message";
    case "enum":
      return "Enum";
    case "options":
      return "Options";
    case "compound":
      return "Compound";
    default:
      return assertNever(kind);
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
