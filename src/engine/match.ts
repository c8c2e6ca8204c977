/**
 * Cross declared requirements with vulnerability records.
 */

import { Match, Requirement, VulnerabilityRecord } from "../types";
import { normalizeName } from "../parsers/utils";
import { matchesRecord } from "./intersect";

/**
 * Emit one match per (requirement, record) pair whose ranges overlap, in
 * requirement order then record order. Nothing is de-duplicated: a record
 * hit by two declared constraints appears twice.
 */
export function findVulnerabilities(
  requirements: readonly Requirement[],
  records: readonly VulnerabilityRecord[],
): Match[] {
  const byName = new Map<string, VulnerabilityRecord[]>();
  for (const record of records) {
    const name = normalizeName(record.name);
    const list = byName.get(name) || [];
    list.push(record);
    byName.set(name, list);
  }

  const matches: Match[] = [];

  for (const requirement of requirements) {
    const candidates = byName.get(normalizeName(requirement.name)) ?? [];
    for (const record of candidates) {
      if (matchesRecord(requirement, record)) {
        matches.push({ requirement, record });
      }
    }
  }

  return matches;
}
