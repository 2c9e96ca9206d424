/**
 * Enum numbering — assigns member values to enums and options sets and picks
 * the smallest storage width that holds them. Parents are numbered first;
 * their members come before the child's own, with the parent's values.
 */

import type { EnumDecl, OptionsDecl } from "../types/declarations.ts";
import type { EnumMember, IntegerWidth, WidthBits } from "../types/model.ts";
import {
  InheritanceCycleError,
  RedeclarationError,
  TypeConstraintError,
} from "./errors.ts";

export type NumberedDecl = EnumDecl | OptionsDecl;

export interface NumberedSet {
  members: EnumMember[];
  width: IntegerWidth;
}

const WIDTHS: readonly WidthBits[] = [8, 16, 32, 64];

/** Value of the next implicit options member: the smallest power of two above `previous` */
export function nextFlagValue(previous: bigint | undefined): bigint {
  if (previous === undefined || previous < 1n) return 1n;
  let value = 1n;
  while (value <= previous) value <<= 1n;
  return value;
}

/**
 * Smallest width representing every value, signed when any is negative.
 * Undefined when the values do not fit in 64 bits.
 */
export function integerWidth(values: readonly bigint[], minimumBits: WidthBits = 8): IntegerWidth | undefined {
  let min = 0n;
  let max = 0n;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }

  const signed = min < 0n;
  for (const bits of WIDTHS) {
    if (bits < minimumBits) continue;
    const fits = signed
      ? min >= -(1n << BigInt(bits - 1)) && max < 1n << BigInt(bits - 1)
      : max < 1n << BigInt(bits);
    if (fits) return { bits, signed };
  }
  return undefined;
}

type NumberingState = "inProgress" | NumberedSet;

/** Numbers every enum and options set once, following parent links */
export class EnumNumbering {
  private readonly state = new Map<NumberedDecl, NumberingState>();

  constructor(
    /** Parent declaration of an extended set */
    private readonly parentOf: (decl: NumberedDecl) => NumberedDecl | undefined,
    private readonly openEnumWidth: WidthBits,
  ) {}

  number(decl: NumberedDecl, chain: NumberedDecl[] = []): NumberedSet {
    const current = this.state.get(decl);
    if (current === "inProgress") {
      const cycle = [...chain.slice(chain.indexOf(decl)), decl].map((d) => d.qualifiedName);
      throw new InheritanceCycleError(
        `Circular extension: ${cycle.join(" -> ")}`,
        decl.location,
        cycle,
      );
    }
    if (current) return current;

    this.state.set(decl, "inProgress");
    const parent = this.parentOf(decl);
    const inherited = parent ? this.number(parent, [...chain, decl]).members : [];
    const members = this.assignValues(decl, parent, inherited);

    const minimum = decl.kind === "enum" && decl.open ? this.openEnumWidth : 8;
    const width = integerWidth(members.map((m) => m.value), minimum);
    if (!width) {
      throw new TypeConstraintError(
        `Values of '${decl.qualifiedName}' do not fit in 64 bits`,
        decl.location,
      );
    }

    const numbered: NumberedSet = { members, width };
    this.state.set(decl, numbered);
    return numbered;
  }

  private assignValues(
    decl: NumberedDecl,
    parent: NumberedDecl | undefined,
    inherited: readonly EnumMember[],
  ): EnumMember[] {
    const members: EnumMember[] = inherited.map((member) => ({
      ...member,
      inheritedFrom: member.inheritedFrom ?? parent?.qualifiedName,
    }));
    const byName = new Map(members.map((m) => [m.name, m]));
    const byValue = new Map(members.map((m) => [m.value, m]));
    let previous = members[members.length - 1]?.value;

    for (const member of decl.members) {
      const existing = byName.get(member.name);
      if (existing) {
        const where = existing.inheritedFrom ? ` (inherited from '${existing.inheritedFrom}')` : "";
        throw new RedeclarationError(
          `Member '${member.name}' is already declared in '${decl.qualifiedName}'${where}`,
          member.location,
          existing.location,
        );
      }

      let value: bigint;
      if (decl.kind === "options") {
        if (member.value !== undefined && member.value <= 0n) {
          throw new TypeConstraintError(
            `Options member '${member.name}' must have a positive value, got ${member.value}`,
            member.location,
          );
        }
        value = member.value ?? nextFlagValue(previous);
      } else {
        value = member.value ?? (previous === undefined ? 0n : previous + 1n);
      }

      const clash = byValue.get(value);
      if (clash) {
        throw new TypeConstraintError(
          `Member '${member.name}' of '${decl.qualifiedName}' has value ${value}, already used by '${clash.name}'`,
          member.location,
        );
      }

      const numbered: EnumMember = {
        name: member.name,
        value,
        doc: member.doc,
        location: member.location,
      };
      members.push(numbered);
      byName.set(numbered.name, numbered);
      byValue.set(value, numbered);
      previous = value;
    }

    return members;
  }
}
