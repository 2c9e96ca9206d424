/**
 * Model printer — renders one file of a resolved model back into
 * definition-language source. Every enum and options member is printed with
 * its assigned value, and every reference fully qualified, so the output
 * compiles to the same model.
 */

import { resolve } from "node:path";
import type {
  DefaultValue,
  EnumMember,
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
import { assertNever } from "./errors.ts";

const INDENT = "  ";

/** Print the file at `filePath` (or the file whose namespace has that name) */
export function printDefinitionFile(model: ResolvedModel, filePath: string): string {
  const file = findFile(model, filePath);
  if (!file) throw new Error(`No file '${filePath}' in the compiled model`);
  return new FilePrinter(model, file).print();
}

/** Lookup by canonical path first, then by file-level namespace name */
export function findFile(model: ResolvedModel, pathOrNamespace: string): ResolvedFile | undefined {
  const canonical = resolve(pathOrNamespace);
  return (
    model.files.find((f) => f.path === pathOrNamespace || f.path === canonical) ??
    model.files.find((f) => f.namespace.name === pathOrNamespace)
  );
}

class FilePrinter {
  private readonly lines: string[] = [];
  /** file-level namespace name → how this file spells it */
  private readonly prefixes = new Map<string, string>();
  private readonly aliases = new Map<string, ResolvedNamespace>();
  private readonly unaliased: ResolvedNamespace[] = [];
  /** Namespaces enclosing the text being printed, file namespace first */
  private readonly scopes: ResolvedNamespace[] = [];

  constructor(
    private readonly model: ResolvedModel,
    private readonly file: ResolvedFile,
  ) {
    const fileByPath = new Map(model.files.map((f) => [f.path, f]));
    for (const statement of file.imports) {
      const target = fileByPath.get(statement.file);
      if (!target) continue;
      if (statement.alias === undefined) {
        if (!this.unaliased.includes(target.namespace)) this.unaliased.push(target.namespace);
        continue;
      }
      this.aliases.set(statement.alias, target.namespace);
      if (!this.prefixes.has(target.namespace.name)) {
        this.prefixes.set(target.namespace.name, statement.alias);
      }
    }
  }

  print(): string {
    for (const statement of this.file.imports) {
      const alias = statement.alias !== undefined ? ` as ${statement.alias}` : "";
      this.lines.push(`import ${JSON.stringify(statement.path)}${alias};`);
    }
    if (this.file.imports.length > 0) this.lines.push("");

    this.printBody(this.file.namespace, 0);
    while (this.lines[this.lines.length - 1] === "") this.lines.pop();
    return `${this.lines.join("\n")}\n`;
  }

  private printBody(ns: ResolvedNamespace, depth: number): void {
    this.scopes.push(ns);
    for (const compound of ns.compounds) this.printCompound(compound, depth);
    for (const decl of ns.enums) this.printEnum(decl, depth);
    for (const decl of ns.options) this.printOptions(decl, depth);
    for (const message of ns.messages) this.printMessage(message, depth);

    for (const child of ns.namespaces) {
      this.printDoc(child.doc, depth);
      this.line(depth, `namespace ${child.name} {`);
      this.printBody(child, depth + 1);
      while (this.lines[this.lines.length - 1] === "") this.lines.pop();
      this.line(depth, "}");
      this.lines.push("");
    }
    this.scopes.pop();
  }

  private printCompound(compound: ResolvedCompound, depth: number): void {
    this.printDoc(compound.doc, depth);
    this.line(depth, `${compound.base} ${compound.name} { ${compound.components.join(", ")} }`);
    this.lines.push("");
  }

  private printEnum(decl: ResolvedEnum, depth: number): void {
    this.printDoc(decl.doc, depth);
    const keyword = decl.open ? "open_enum" : "enum";
    const parent = decl.parent !== undefined ? ` : ${this.reference(decl.parent)}` : "";
    this.printMembers(`${keyword} ${decl.name}${parent}`, decl.members, depth);
  }

  private printOptions(decl: ResolvedOptions, depth: number): void {
    this.printDoc(decl.doc, depth);
    const parent = decl.parent !== undefined ? ` : ${this.reference(decl.parent)}` : "";
    this.printMembers(`options ${decl.name}${parent}`, decl.members, depth);
  }

  private printMembers(header: string, members: readonly EnumMember[], depth: number): void {
    this.line(depth, `${header} {`);
    for (const member of members) {
      if (member.inheritedFrom !== undefined) continue;
      this.printDoc(member.doc, depth + 1);
      this.line(depth + 1, `${member.name} = ${member.value},`);
    }
    this.line(depth, "}");
    this.lines.push("");
  }

  private printMessage(message: ResolvedMessage, depth: number): void {
    this.printDoc(message.doc, depth);
    const parent = message.parent !== undefined ? ` : ${this.reference(message.parent)}` : "";
    this.line(depth, `message ${message.name}${parent} {`);
    for (const field of message.ownFields) {
      this.printField(field, depth + 1);
    }
    this.line(depth, "}");
    this.lines.push("");
  }

  private printField(field: ResolvedField, depth: number): void {
    this.printDoc(field.doc, depth);
    const modifiers = field.modifiers.map((m) => `${m} `).join("");
    const type = this.typeText(field.type, depth);
    const defaultText = field.default ? ` = ${defaultLiteral(field.default)}` : "";
    this.line(depth, `${modifiers}${field.name}: ${type}${defaultText};`);
  }

  private typeText(type: TypeRef, depth: number): string {
    switch (type.kind) {
      case "basic":
        return type.type;
      case "enumInline": {
        const decl = this.lookup(this.model.enums, type.enum);
        const keyword = decl.open ? "open_enum" : "enum";
        const parent = decl.parent !== undefined ? ` ${this.reference(decl.parent)} +` : "";
        return `${keyword}${parent} ${this.inlineMembers(decl.members, depth)}`;
      }
      case "enumRef": {
        const decl = this.lookup(this.model.enums, type.enum);
        return `${decl.open ? "open_enum" : "enum"} ${this.reference(type.enum)}`;
      }
      case "optionsInline": {
        const decl = this.lookup(this.model.options, type.options);
        return `options ${this.inlineMembers(decl.members, depth)}`;
      }
      case "optionsRef":
        return this.reference(type.options);
      case "compound":
        return type.compound !== undefined
          ? this.reference(type.compound)
          : `${type.base} { ${type.components.join(", ")} }`;
      case "message":
        return this.reference(type.message);
      case "array":
        return `${this.typeText(type.element, depth)}[]`;
      case "map":
        return `Map<${type.key.type}, ${this.typeText(type.value, depth)}>`;
      default:
        return assertNever(type);
    }
  }

  private inlineMembers(members: readonly EnumMember[], depth: number): string {
    const own = members.filter((m) => m.inheritedFrom === undefined);
    if (own.every((m) => m.doc === "")) {
      return `{ ${own.map((m) => `${m.name} = ${m.value}`).join(", ")} }`;
    }

    const inner = INDENT.repeat(depth + 1);
    const body = own.flatMap((m) => [
      ...docLines(m.doc).map((line) => `${inner}${line}`),
      `${inner}${m.name} = ${m.value},`,
    ]);
    return `{\n${body.join("\n")}\n${INDENT.repeat(depth)}}`;
  }

  /**
   * Spell a qualified name so that it binds back to the same declaration from
   * the current scope: alias-prefixed or fully qualified when that resolves,
   * otherwise the longest suffix that does.
   */
  private reference(qualifiedName: string): string {
    const dot = qualifiedName.indexOf(".", qualifiedName.lastIndexOf("::"));
    const path = dot === -1 ? qualifiedName : qualifiedName.slice(0, dot);
    const member = dot === -1 ? "" : qualifiedName.slice(dot);
    const segments = path.split("::");

    const [head, ...rest] = segments;
    const alias = head !== undefined ? this.prefixes.get(head) : undefined;
    const candidates = [alias !== undefined ? [alias, ...rest] : segments];
    for (let start = 1; start < segments.length; start++) {
      candidates.push(segments.slice(start));
    }

    for (const candidate of candidates) {
      if (this.lookupPath(candidate) === path) return `${candidate.join("::")}${member}`;
    }
    const scope = this.scopes[this.scopes.length - 1]?.qualifiedName ?? this.file.namespace.name;
    throw new Error(`'${qualifiedName}' cannot be spelled from namespace '${scope}': every spelling is shadowed`);
  }

  /** Qualified name a reference would bind to from the current scope */
  private lookupPath(segments: readonly string[]): string | undefined {
    const [first, ...rest] = segments;
    const last = rest.pop();
    if (first === undefined) return undefined;
    if (last === undefined) {
      return this.searchScopes((ns) => declarationNamed(ns, first));
    }

    const fileNamespace = this.file.namespace;
    let current = this.searchScopes<ResolvedNamespace>((ns) => {
      const child = ns.namespaces.find((n) => n.name === first);
      if (child) return child;
      if (ns !== fileNamespace) return undefined;
      return this.aliases.get(first) ?? (ns.name === first ? ns : undefined);
    }, (imported) => (imported.name === first ? imported : undefined));

    for (const segment of rest) {
      current = current?.namespaces.find((n) => n.name === segment);
    }
    return current ? declarationNamed(current, last) : undefined;
  }

  /** Innermost enclosing namespace first, then the unaliased imports; ambiguity binds nothing */
  private searchScopes<T>(
    local: (ns: ResolvedNamespace) => T | undefined,
    imported: (ns: ResolvedNamespace) => T | undefined = local,
  ): T | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const ns = this.scopes[i];
      const value = ns && local(ns);
      if (value !== undefined) return value;
    }

    const found = new Set<T>();
    for (const ns of this.unaliased) {
      const value = imported(ns);
      if (value !== undefined) found.add(value);
    }
    const [only] = found;
    return found.size === 1 ? only : undefined;
  }

  private lookup<T>(map: ReadonlyMap<string, T>, key: string): T {
    const value = map.get(key);
    if (value === undefined) throw new Error(`'${key}' is missing from the model`);
    return value;
  }

  private printDoc(doc: string, depth: number): void {
    for (const line of docLines(doc)) this.line(depth, line);
  }

  private line(depth: number, text: string): void {
    this.lines.push(`${INDENT.repeat(depth)}${text}`);
  }
}

function declarationNamed(ns: ResolvedNamespace, name: string): string | undefined {
  const found =
    ns.messages.find((d) => d.name === name) ??
    ns.enums.find((d) => d.name === name) ??
    ns.options.find((d) => d.name === name) ??
    ns.compounds.find((d) => d.name === name);
  return found?.qualifiedName;
}

function docLines(doc: string): string[] {
  return doc === "" ? [] : doc.split("\n").map((line) => (line === "" ? "///" : `/// ${line}`));
}

function defaultLiteral(value: DefaultValue): string {
  switch (value.kind) {
    case "int":
      return value.value.toString();
    case "float":
      return String(value.value);
    case "bool":
      return value.value ? "true" : "false";
    case "string":
      return JSON.stringify(value.value);
    case "enum":
      return value.member;
    default:
      return assertNever(value);
  }
}
