/**
 * Scan pipeline: fetch requirement lines and the catalogue, then match.
 */

import { CatalogueClient } from "./clients/catalogue";
import { findVulnerabilities } from "./engine/match";
import { CatalogueFormatError } from "./errors";
import { buildVulnerabilityRecords } from "./parsers/catalogue";
import { parseRequirementLines } from "./parsers/requirements";
import { RequirementsSource } from "./sources/types";
import { Match, Requirement } from "./types";

export interface ScanResult {
  lines: string[];
  requirements: Requirement[];
  matches: Match[];
  skipped: CatalogueFormatError[];
  invalidEntries: number;
}

export async function scan(source: RequirementsSource, catalogue: CatalogueClient): Promise<ScanResult> {
  const [lines, loaded] = await Promise.all([
    source.fetchRequirementLines(),
    catalogue.load(),
  ]);

  const requirements = parseRequirementLines(lines);
  const { records, skipped } = buildVulnerabilityRecords(
    loaded.catalogue,
    requirements.map((r) => r.name),
  );

  for (const error of skipped) {
    console.warn(`⚠️ Skipping advisory ${error.advisoryId ?? "(no id)"} for ${error.packageName}: ${error.message}`);
  }

  return {
    lines,
    requirements,
    matches: findVulnerabilities(requirements, records),
    skipped,
    invalidEntries: loaded.invalidEntries,
  };
}
