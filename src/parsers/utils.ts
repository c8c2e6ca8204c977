/**
 * Common utilities for requirement and spec parsers.
 */

import { Operator, OPERATORS, Requirement, VersionValue } from "../types";
import { compareVersions, EQUAL, formatVersion, ZERO_VERSION } from "../version";

/**
 * Normalize a package name for joining against catalogue keys (PEP 503).
 */
export function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/[_.-]+/g, "-");
}

export function isOperator(value: string): value is Operator {
  return OPERATORS.some((op) => op === value);
}

export function makeRequirement(name: string, operator: Operator, version: VersionValue): Requirement {
  return Object.freeze({ name: normalizeName(name), operator, version });
}

/**
 * The "> 0" bound: used for a missing upper bound in a spec string and as the
 * implicit constraint of a bare package name.
 */
export function neutralBound(name: string): Requirement {
  return makeRequirement(name, ">", ZERO_VERSION);
}

export function isNeutralBound(bound: Requirement): boolean {
  return bound.operator === ">" && compareVersions(bound.version, ZERO_VERSION) === EQUAL;
}

/**
 * Render a requirement's constraint, eg. ">=1.0".
 */
export function formatConstraint(requirement: Requirement): string {
  return `${requirement.operator}${formatVersion(requirement.version)}`;
}
