/**
 * Shared types for the requirement advisory scanner.
 */

export type Operator = "==" | "!=" | "<" | "<=" | ">" | ">=";

export const OPERATORS: readonly Operator[] = ["==", "!=", "<=", ">=", "<", ">"];

/** Dotted numeric version, eg. "1.11.0" -> [1n, 11n, 0n]. */
export type VersionValue = readonly bigint[];

export interface Requirement {
  readonly name: string;
  readonly operator: Operator;
  readonly version: VersionValue;
}

/** One contiguous vulnerable interval: both bounds must hold. */
export interface BoundedRange {
  readonly lower: Requirement;
  readonly upper: Requirement;
}

export interface VulnerabilityRecord {
  readonly name: string;
  readonly advisory: string;
  readonly ranges: readonly BoundedRange[];
  readonly id?: string;
  readonly cve?: string;
}

export interface CatalogueEntry {
  advisory: string;
  specs: string[];
  id?: string;
  cve?: string;
}

export type Catalogue = Map<string, CatalogueEntry[]>;

export interface Match {
  requirement: Requirement;
  record: VulnerabilityRecord;
}
