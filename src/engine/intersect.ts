/**
 * Intersection of a declared requirement with catalogue bounds.
 *
 * Both sides are directional constraints on one unknown version v. A declared
 * requirement is consistent with a bound when some v satisfies both.
 */

import { BoundedRange, Requirement, VulnerabilityRecord } from "../types";
import { compareVersions } from "../version";
import { normalizeName } from "../parsers/utils";

function isUpward(op: string): boolean {
  return op === ">" || op === ">=";
}

function isDownward(op: string): boolean {
  return op === "<" || op === "<=";
}

/**
 * Decide whether a declared requirement and a single bound can hold for the
 * same version. Pairs involving "!=" other than "==" against "!=" are
 * treated as inconsistent, as are directional requirements against "==" or
 * "!=" bounds.
 */
export function consistent(declared: Requirement, bound: Requirement): boolean {
  const cmp = compareVersions(declared.version, bound.version);
  const d = declared.operator;
  const b = bound.operator;

  if (d === "==") {
    switch (b) {
      case ">=": return cmp >= 0;
      case ">": return cmp > 0;
      case "<=": return cmp <= 0;
      case "<": return cmp < 0;
      case "==": return cmp === 0;
      case "!=": return cmp !== 0;
    }
  }

  if (isUpward(d) && isUpward(b)) return true;
  if (isDownward(d) && isDownward(b)) return true;

  if (d === ">=" && b === "<=") return cmp <= 0;
  if (d === "<=" && b === ">=") return cmp >= 0;

  if (d === ">" && isDownward(b)) return cmp < 0;
  if (d === "<" && isUpward(b)) return cmp > 0;

  if (d === ">=" && b === "<") return cmp < 0;
  if (d === "<=" && b === ">") return cmp > 0;

  return false;
}

export function intersectsRange(declared: Requirement, range: BoundedRange): boolean {
  return consistent(declared, range.lower) && consistent(declared, range.upper);
}

export function matchesRecord(declared: Requirement, record: VulnerabilityRecord): boolean {
  if (normalizeName(declared.name) !== normalizeName(record.name)) return false;
  return record.ranges.some((range) => intersectsRange(declared, range));
}
