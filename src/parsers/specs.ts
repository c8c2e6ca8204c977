/**
 * Parser for catalogue spec strings.
 *
 * A spec string is a comma-joined list of up to two "<operator><version>"
 * bounds, eg. ">=1.0,<1.4.2". Together they describe one vulnerable interval.
 */

import { SpecParseError } from "../errors";
import { BoundedRange, Requirement } from "../types";
import { parseVersion } from "../version";
import { isOperator, makeRequirement, neutralBound } from "./utils";

// Only the numeric release prefix is read: "<2.0b1" is "<2.0".
const BOUND_PATTERN = /^(==|!=|<=|>=|<|>)\s*(\d+(?:\.\d+)*)/;

function parseBound(name: string, spec: string, part: string): Requirement {
  const [, operator, version] = part.match(BOUND_PATTERN) ?? [];
  if (!operator || !version || !isOperator(operator)) {
    throw new SpecParseError(spec, `unrecognized bound "${part}"`);
  }
  return makeRequirement(name, operator, parseVersion(version));
}

export function parseSpecString(name: string, spec: string): BoundedRange {
  const parts = spec
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

  if (parts.length === 0) {
    throw new SpecParseError(spec, "no bounds");
  }
  if (parts.length > 2) {
    throw new SpecParseError(spec, `expected at most 2 bounds, found ${parts.length}`);
  }

  const lower = parseBound(name, spec, parts[0]);
  const upper = parts.length === 2 ? parseBound(name, spec, parts[1]) : neutralBound(name);

  return Object.freeze({ lower, upper });
}
