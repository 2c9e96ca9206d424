/**
 * Compiler diagnostics. Every failure aborts the compilation request with one
 * of these; none of them is recoverable without editing the source.
 */

import type { SourceLocation } from "../types/syntax.ts";

export const ERROR_KINDS = [
  "SyntaxError",
  "ImportError",
  "UnresolvedReferenceError",
  "AmbiguousReferenceError",
  "RedeclarationError",
  "InheritanceConflictError",
  "InheritanceCycleError",
  "TypeConstraintError",
  "ReservedNameError",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/** Base class of all compiler errors */
export class DefinitionError extends Error {
  readonly kind: ErrorKind;
  readonly location?: SourceLocation;
  /** Other declaration sites involved, e.g. the inherited side of a conflict */
  readonly related: SourceLocation[];

  constructor(
    kind: ErrorKind,
    message: string,
    location?: SourceLocation,
    related: SourceLocation[] = [],
  ) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.location = location;
    this.related = related;
  }
}

export class DefinitionSyntaxError extends DefinitionError {
  /** Text of the offending token, empty at end of input */
  readonly token: string;

  constructor(message: string, location: SourceLocation, token: string) {
    super("SyntaxError", message, location);
    this.token = token;
  }
}

export class ImportError extends DefinitionError {
  /** Files forming the cycle, first and last entry equal; empty for a missing file */
  readonly cycle: string[];

  constructor(message: string, location?: SourceLocation, cycle: string[] = []) {
    super("ImportError", message, location);
    this.cycle = cycle;
  }
}

export class UnresolvedReferenceError extends DefinitionError {
  readonly reference: string;
  readonly searched: string[];

  constructor(
    message: string,
    reference: string,
    searched: string[],
    location: SourceLocation,
  ) {
    super("UnresolvedReferenceError", message, location);
    this.reference = reference;
    this.searched = searched;
  }
}

export class AmbiguousReferenceError extends DefinitionError {
  readonly candidates: string[];

  constructor(message: string, candidates: string[], location: SourceLocation) {
    super("AmbiguousReferenceError", message, location);
    this.candidates = candidates;
  }
}

export class RedeclarationError extends DefinitionError {
  constructor(message: string, location: SourceLocation, previous?: SourceLocation) {
    super("RedeclarationError", message, location, previous ? [previous] : []);
  }
}

export class InheritanceConflictError extends DefinitionError {
  constructor(message: string, location: SourceLocation, inherited: SourceLocation) {
    super("InheritanceConflictError", message, location, [inherited]);
  }
}

export class InheritanceCycleError extends DefinitionError {
  readonly cycle: string[];

  constructor(message: string, location: SourceLocation, cycle: string[]) {
    super("InheritanceCycleError", message, location);
    this.cycle = cycle;
  }
}

export class TypeConstraintError extends DefinitionError {
  constructor(message: string, location: SourceLocation) {
    super("TypeConstraintError", message, location);
  }
}

export class ReservedNameError extends DefinitionError {
  readonly identifier: string;

  constructor(message: string, identifier: string, location: SourceLocation) {
    super("ReservedNameError", message, location);
    this.identifier = identifier;
  }
}

/** Render a location as `file:line:column` */
export function formatLocation(location: SourceLocation): string {
  return `${location.file}:${location.line}:${location.column}`;
}

/** Render an error as `file:line:column: Kind: message` */
export function formatDiagnostic(err: DefinitionError): string {
  const prefix = err.location ? `${formatLocation(err.location)}: ` : "";
  return `${prefix}${err.kind}: ${err.message}`;
}

/** Exhaustiveness guard for switches over closed unions */
export function assertNever(value: never): never {
  throw new Error(`Unexpected variant: ${JSON.stringify(value)}`);
}
