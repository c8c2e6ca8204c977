/**
 * Parser for requirement file lines (requirements.txt and friends).
 *
 * Each line yields at most one requirement: the package name and its first
 * version constraint. A line without a constraint is a bare package name and
 * gets the implicit "> 0" constraint, so any installed version is checked.
 */

import { Operator, Requirement } from "../types";
import { parseVersion } from "../version";
import { isOperator, makeRequirement, neutralBound } from "./utils";

const CONSTRAINT_PATTERN = /^([A-Za-z0-9_.-]+)\s*(===|==|!=|<=|>=|~=|<|>)\s*(\d+(?:\.\d+)*)/;
const NAME_PATTERN = /^([A-Za-z0-9_.-]+)/;

function toOperator(raw: string): Operator | null {
  // "===" is arbitrary equality, "~=" is compatible release (at least X)
  if (raw === "===") return "==";
  if (raw === "~=") return ">=";
  return isOperator(raw) ? raw : null;
}

/**
 * Strip comments, environment markers and extras; returns "" for lines that
 * carry no package (comments, pip options, URLs).
 */
function cleanLine(line: string): string {
  const trimmed = line.trim();

  if (!trimmed) return "";
  if (trimmed.startsWith("#")) return "";
  if (trimmed.startsWith("-")) return "";
  if (trimmed.includes("://")) return "";

  return trimmed
    .split(/\s+#/)[0]
    .split(";")[0]
    .replace(/\[[^\]]*\]/g, "")
    .trim();
}

export function parseRequirementLine(line: string): Requirement | null {
  const cleaned = cleanLine(line);
  if (!cleaned) return null;

  const match = cleaned.match(CONSTRAINT_PATTERN);
  if (match) {
    const [, name, rawOperator, version] = match;
    const operator = toOperator(rawOperator);
    if (operator) {
      return makeRequirement(name, operator, parseVersion(version));
    }
  }

  const bare = cleaned.match(NAME_PATTERN);
  if (!bare) return null;

  return neutralBound(bare[1]);
}

export function parseRequirementLines(lines: readonly string[]): Requirement[] {
  const requirements: Requirement[] = [];

  for (const line of lines) {
    const requirement = parseRequirementLine(line);
    if (requirement) requirements.push(requirement);
  }

  return requirements;
}
