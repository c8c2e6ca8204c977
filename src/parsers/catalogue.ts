/**
 * Build vulnerability records from a decoded advisory catalogue.
 *
 * Catalogue format (safety-db "insecure_full.json" style):
 *   {
 *     "$meta": { ... },
 *     "django": [
 *       { "id": "pyup.io-1", "cve": "CVE-...", "advisory": "...", "specs": [">=1.0,<1.4.2", ">=1.5,<1.5.1"] }
 *     ]
 *   }
 *
 * Each entry becomes one record; its specs are OR-connected ranges.
 */

import { CatalogueFormatError, SpecParseError, VersionParseError } from "../errors";
import { isObject, isStringArray, optionalString } from "../guards";
import { BoundedRange, Catalogue, CatalogueEntry, VulnerabilityRecord } from "../types";
import { parseSpecString } from "./specs";
import { normalizeName } from "./utils";

function toEntry(value: unknown): CatalogueEntry | null {
  if (!isObject(value)) return null;

  const { advisory, specs, id, cve } = value;
  if (typeof advisory !== "string" || !isStringArray(specs)) return null;

  return {
    advisory,
    specs,
    id: optionalString(id),
    cve: optionalString(cve) || undefined,
  };
}

/**
 * Validate decoded catalogue JSON. Keys starting with "$" are metadata.
 * Malformed entries are dropped and counted.
 */
export function parseCatalogue(raw: unknown): { catalogue: Catalogue; invalidEntries: number } {
  if (!isObject(raw)) {
    throw new CatalogueFormatError("Catalogue must be a JSON object keyed by package name");
  }

  const catalogue: Catalogue = new Map();
  let invalidEntries = 0;

  for (const [key, value] of Object.entries(raw)) {
    if (key.startsWith("$")) continue;

    if (!Array.isArray(value)) {
      invalidEntries++;
      continue;
    }

    const name = normalizeName(key);
    const entries = catalogue.get(name) ?? [];

    for (const item of value) {
      const entry = toEntry(item);
      if (entry) {
        entries.push(entry);
      } else {
        invalidEntries++;
      }
    }

    catalogue.set(name, entries);
  }

  return { catalogue, invalidEntries };
}

/**
 * Convert catalogue entries into vulnerability records, optionally limited to
 * the given package names. Entries with an unparseable spec are skipped and
 * reported, the rest of the catalogue stays usable.
 */
export function buildVulnerabilityRecords(
  catalogue: Catalogue,
  names?: Iterable<string>,
): { records: VulnerabilityRecord[]; skipped: CatalogueFormatError[] } {
  const wanted = names ? new Set([...names].map(normalizeName)) : null;
  const records: VulnerabilityRecord[] = [];
  const skipped: CatalogueFormatError[] = [];

  for (const [key, entries] of catalogue) {
    const name = normalizeName(key);
    if (wanted && !wanted.has(name)) continue;

    for (const entry of entries) {
      try {
        const ranges: BoundedRange[] = entry.specs.map((spec) => parseSpecString(name, spec));
        records.push(Object.freeze({
          name,
          advisory: entry.advisory,
          ranges: Object.freeze(ranges),
          id: entry.id,
          cve: entry.cve,
        }));
      } catch (err) {
        if (!(err instanceof SpecParseError || err instanceof VersionParseError)) throw err;
        skipped.push(new CatalogueFormatError(err.message, name, entry.id));
      }
    }
  }

  return { records, skipped };
}
