/**
 * Parser — recursive-descent parser from tokens to a SyntaxFile.
 * Fails fast on the first malformed construct; there is no recovery.
 */

import {
  BASIC_TYPES,
  FIELD_MODIFIERS,
  type BasicTypeName,
  type CompoundNode,
  type EnumNode,
  type FieldModifier,
  type FieldNode,
  type ImportNode,
  type ItemNode,
  type LiteralNode,
  type MemberNode,
  type MessageNode,
  type NameNode,
  type NamespaceNode,
  type OptionsNode,
  type SourceLocation,
  type SyntaxFile,
  type Token,
  type TypeNode,
} from "../types/syntax.ts";
import { decodeStringLiteral, tokenize } from "./lexer.ts";
import { DefinitionSyntaxError } from "./errors.ts";

/** Parse definition-language source into a syntax tree */
export function parseDefinitionSource(source: string, path: string): SyntaxFile {
  return new Parser(tokenize(source, path), path).parseFile();
}

function isBasicType(name: string): name is BasicTypeName {
  return (BASIC_TYPES as readonly string[]).includes(name);
}

function isFieldModifier(name: string): name is FieldModifier {
  return (FIELD_MODIFIERS as readonly string[]).includes(name);
}

class Parser {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly path: string,
  ) {}

  parseFile(): SyntaxFile {
    const imports: ImportNode[] = [];
    const items: ItemNode[] = [];

    while (!this.atEof()) {
      if (this.skipTerminator()) continue;
      if (this.isKeyword("import")) {
        imports.push(this.parseImport());
      } else {
        items.push(this.parseItem());
      }
    }

    return { path: this.path, imports, items };
  }

  // --- Declarations ---

  private parseImport(): ImportNode {
    const start = this.expectKeyword("import");
    const pathToken = this.peek();
    if (pathToken.kind !== "string") {
      this.fail("Expected a quoted path after 'import'", pathToken);
    }
    this.pos++;

    const node: ImportNode = {
      kind: "import",
      path: decodeStringLiteral(pathToken.text),
      location: this.locationOf(start),
    };

    if (this.isKeyword("as")) {
      this.pos++;
      const alias = this.expectIdentifier("import alias");
      node.alias = alias.text;
      node.aliasLocation = this.locationOf(alias);
    }
    this.skipTerminator();
    return node;
  }

  private parseItem(): ItemNode {
    const token = this.peek();
    if (token.kind === "identifier") {
      switch (token.text) {
        case "namespace":
          return this.parseNamespace();
        case "message":
          return this.parseMessage();
        case "enum":
        case "open_enum":
          return this.parseEnum();
        case "options":
          return this.parseOptions();
        case "import":
          this.fail("Imports are only allowed at file scope", token);
      }
      if (isBasicType(token.text)) return this.parseCompound();
    }
    return this.fail("Expected a namespace, message, enum, options or compound declaration", token);
  }

  private parseNamespace(): NamespaceNode {
    const keyword = this.expectKeyword("namespace");
    const name = this.expectIdentifier("namespace name");
    this.expectPunct("{");

    const items: ItemNode[] = [];
    while (!this.isPunct("}")) {
      if (this.atEof()) this.fail("Unterminated namespace body", this.peek());
      if (this.skipTerminator()) continue;
      items.push(this.parseItem());
    }
    this.expectPunct("}");

    return {
      kind: "namespace",
      name: name.text,
      doc: docOf(keyword),
      items,
      location: this.locationOf(name),
    };
  }

  private parseMessage(): MessageNode {
    const keyword = this.expectKeyword("message");
    const name = this.expectIdentifier("message name");
    const parent = this.acceptPunct(":") ? this.parseName(false) : undefined;
    this.expectPunct("{");

    const fields: FieldNode[] = [];
    while (!this.isPunct("}")) {
      if (this.atEof()) this.fail("Unterminated message body", this.peek());
      if (this.skipTerminator()) continue;
      fields.push(this.parseField());
    }
    this.expectPunct("}");

    return {
      kind: "message",
      name: name.text,
      doc: docOf(keyword),
      parent,
      fields,
      location: this.locationOf(name),
    };
  }

  private parseField(): FieldNode {
    const first = this.peek();
    const modifiers: FieldModifier[] = [];

    // Leading keywords are only modifiers when a name still follows them
    while (this.peek().kind === "identifier" && !this.isPunct(":", 1)) {
      const text = this.peek().text;
      if (text === "field") {
        this.pos++;
      } else if (isFieldModifier(text)) {
        modifiers.push(text);
        this.pos++;
      } else {
        break;
      }
    }

    const name = this.expectIdentifier("field name");
    this.expectPunct(":");
    const type = this.parseType();
    const defaultValue = this.acceptPunct("=") ? this.parseLiteral() : undefined;
    this.skipTerminator();

    return {
      kind: "field",
      name: name.text,
      doc: docOf(first),
      modifiers,
      type,
      default: defaultValue,
      location: this.locationOf(name),
    };
  }

  private parseEnum(): EnumNode {
    const keyword = this.peek();
    this.pos++;
    const name = this.expectIdentifier("enum name");
    const parent = this.acceptPunct(":") ? this.parseName(true) : undefined;
    const members = this.parseMembers();

    return {
      kind: "enum",
      name: name.text,
      doc: docOf(keyword),
      open: keyword.text === "open_enum",
      parent,
      members,
      location: this.locationOf(name),
    };
  }

  private parseOptions(): OptionsNode {
    const keyword = this.expectKeyword("options");
    const name = this.expectIdentifier("options name");
    const parent = this.acceptPunct(":") ? this.parseName(true) : undefined;
    const members = this.parseMembers();

    return {
      kind: "options",
      name: name.text,
      doc: docOf(keyword),
      parent,
      members,
      location: this.locationOf(name),
    };
  }

  private parseCompound(): CompoundNode {
    const baseToken = this.peek();
    this.pos++;
    const name = this.expectIdentifier("compound name");
    const components = this.parseComponents();

    return {
      kind: "compound",
      name: name.text,
      doc: docOf(baseToken),
      base: isBasicType(baseToken.text) ? baseToken.text : "float",
      components,
      location: this.locationOf(name),
    };
  }

  /** `{ A = 1, B; C }` — separators are optional */
  private parseMembers(): MemberNode[] {
    this.expectPunct("{");
    const members: MemberNode[] = [];

    while (!this.isPunct("}")) {
      if (this.atEof()) this.fail("Unterminated member list", this.peek());
      if (this.acceptPunct(",") || this.acceptPunct(";")) continue;

      const name = this.expectIdentifier("member name");
      const member: MemberNode = {
        name: name.text,
        doc: docOf(name),
        location: this.locationOf(name),
      };
      if (this.acceptPunct("=")) {
        const value = this.peek();
        if (value.kind !== "integer") {
          this.fail(`Expected an integer value for '${name.text}'`, value);
        }
        this.pos++;
        member.value = BigInt(value.text);
      }
      members.push(member);
    }

    this.expectPunct("}");
    return members;
  }

  private parseComponents(): string[] {
    this.expectPunct("{");
    const components: string[] = [];

    while (!this.isPunct("}")) {
      if (this.atEof()) this.fail("Unterminated component list", this.peek());
      if (this.acceptPunct(",")) continue;
      components.push(this.expectIdentifier("component name").text);
    }

    if (components.length === 0) this.fail("A compound needs at least one component", this.peek());
    this.expectPunct("}");
    return components;
  }

  // --- Types ---

  private parseType(): TypeNode {
    const base = this.parseBaseType();
    if (!this.isPunct("[")) return base;

    if (base.kind === "map") {
      this.fail("Arrays of maps are not allowed", this.peek());
    }
    this.expectPunct("[");
    this.expectPunct("]");
    if (this.isPunct("[")) {
      this.fail("Arrays of arrays are not allowed", this.peek());
    }
    return { kind: "array", element: base, location: base.location };
  }

  private parseBaseType(): TypeNode {
    const token = this.peek();
    if (token.kind !== "identifier") {
      return this.fail("Expected a type", token);
    }
    const location = this.locationOf(token);

    if (isBasicType(token.text)) {
      this.pos++;
      if (this.isPunct("{")) {
        return {
          kind: "inlineCompound",
          base: token.text,
          components: this.parseComponents(),
          location,
        };
      }
      return { kind: "basic", name: token.text, location };
    }

    if (token.text === "enum" || token.text === "open_enum") {
      this.pos++;
      const open = token.text === "open_enum";
      if (this.isPunct("{")) {
        return { kind: "inlineEnum", open, members: this.parseMembers(), location };
      }
      const name = this.parseName(true);
      if (this.acceptPunct("+")) {
        return { kind: "inlineEnum", open, members: this.parseMembers(), extends: name, location };
      }
      return { kind: "enumRef", open, name, location };
    }

    if (token.text === "options") {
      this.pos++;
      return { kind: "inlineOptions", members: this.parseMembers(), location };
    }

    if (token.text === "Map" && this.isPunct("<", 1)) {
      this.pos += 2;
      const key = this.parseType();
      this.expectPunct(",");
      const value = this.parseType();
      this.expectPunct(">");
      return { kind: "map", key, value, location };
    }

    const name = this.parseName(true);
    if (this.acceptPunct("+")) {
      return { kind: "inlineEnum", open: false, members: this.parseMembers(), extends: name, location };
    }
    return { kind: "named", name, location };
  }

  /** `A::B::C`, optionally followed by `.member` */
  private parseName(allowMember: boolean): NameNode {
    const first = this.expectIdentifier("name");
    const segments = [first.text];
    while (this.acceptPunct("::")) {
      segments.push(this.expectIdentifier("name segment").text);
    }

    const node: NameNode = { segments, location: this.locationOf(first) };
    if (allowMember && this.acceptPunct(".")) {
      node.member = this.expectIdentifier("field name").text;
    }
    return node;
  }

  private parseLiteral(): LiteralNode {
    const token = this.peek();
    const location = this.locationOf(token);
    this.pos++;

    switch (token.kind) {
      case "integer":
        return { kind: "integer", value: BigInt(token.text), location };
      case "float":
        return { kind: "float", value: Number(token.text), text: token.text, location };
      case "string":
        return { kind: "string", value: decodeStringLiteral(token.text), location };
      case "identifier":
        return { kind: "identifier", value: token.text, location };
      default:
        this.pos--;
        return this.fail("Expected a default value", token);
    }
  }

  // --- Token helpers ---

  private peek(offset = 0): Token {
    const index = Math.min(this.pos + offset, this.tokens.length - 1);
    const token = this.tokens[index];
    if (!token) throw new Error("Token stream is empty");
    return token;
  }

  private atEof(): boolean {
    return this.peek().kind === "eof";
  }

  private isKeyword(text: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === "identifier" && token.text === text;
  }

  private isPunct(text: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === "punct" && token.text === text;
  }

  private acceptPunct(text: string): boolean {
    if (!this.isPunct(text)) return false;
    this.pos++;
    return true;
  }

  /** Statement terminators are optional everywhere */
  private skipTerminator(): boolean {
    return this.acceptPunct(";");
  }

  private expectPunct(text: string): Token {
    const token = this.peek();
    if (token.kind !== "punct" || token.text !== text) {
      this.fail(`Expected '${text}'`, token);
    }
    this.pos++;
    return token;
  }

  private expectKeyword(text: string): Token {
    const token = this.peek();
    if (!this.isKeyword(text)) this.fail(`Expected '${text}'`, token);
    this.pos++;
    return token;
  }

  private expectIdentifier(what: string): Token {
    const token = this.peek();
    if (token.kind !== "identifier") this.fail(`Expected ${what}`, token);
    this.pos++;
    return token;
  }

  private locationOf(token: Token): SourceLocation {
    return { file: this.path, line: token.line, column: token.column };
  }

  private fail(message: string, token: Token): never {
    const shown = token.kind === "eof" ? "end of input" : `'${token.text}'`;
    throw new DefinitionSyntaxError(`${message}, found ${shown}`, this.locationOf(token), token.text);
  }
}

function docOf(token: Token): string {
  return token.docs.join("\n");
}
