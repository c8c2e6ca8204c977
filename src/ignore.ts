/**
 * Support for .scanignore files to suppress specific advisories.
 *
 * Format: One advisory ID per line (catalogue ID such as pyup.io-xxxx, or CVE-xxxx)
 *
 * Lines starting with # are considered comments and will be ignored.
 * Blank lines or any text following # on the same line will be ignored.
 *
 * Example .scanignore:
 *   pyup.io-25609
 *   # Not relevant to this project
 *   CVE-2019-12308 # False positive
 */

import fs from "node:fs";
import path from "node:path";
import { Match } from "./types";

const IGNORE_FILENAME = ".scanignore";

/**
 * Load suppressed advisory IDs from .scanignore file.
 * Priority: explicit path (--ignore-file) > scanned directory (local scans) > cwd
 */
export function loadIgnoreList(scannedDir?: string, explicitPath?: string): Set<string> {
  // Priority 1: Explicit path from CLI
  if (explicitPath) {
    if (!fs.existsSync(explicitPath)) {
      throw new Error(`Ignore file not found: ${explicitPath}`);
    }
    return parseIgnoreFile(explicitPath);
  }

  // Priority 2: Scanned directory
  const candidates = scannedDir ? [path.join(scannedDir, IGNORE_FILENAME)] : [];

  // Priority 3: Current working directory
  candidates.push(path.join(process.cwd(), IGNORE_FILENAME));

  const ignorePath = candidates.find((candidate) => fs.existsSync(candidate));
  if (!ignorePath) {
    return new Set<string>();
  }

  return parseIgnoreFile(ignorePath);
}

export function parseIgnoreContent(content: string): Set<string> {
  const ignored = new Set<string>();

  for (const line of content.split("\n")) {
    const withoutComment = line.split("#")[0].trim();

    if (!withoutComment) continue;

    ignored.add(withoutComment);
  }

  return ignored;
}

function parseIgnoreFile(ignorePath: string): Set<string> {
  const ignored = parseIgnoreContent(fs.readFileSync(ignorePath, "utf-8"));

  if (ignored.size > 0) {
    console.log(`📋 Loaded ${ignored.size} ignored advisory ID(s) from ${path.basename(ignorePath)}`);
  }

  return ignored;
}

/**
 * Filter matches, removing any whose advisory ID or CVE is in the ignore list.
 * Also reports which listed IDs actually suppressed something.
 */
export function filterIgnored(
  matches: Match[],
  ignored: Set<string>,
): { filtered: Match[]; ignoredCount: number; ignoredIds: string[] } {
  if (ignored.size === 0) {
    return { filtered: matches, ignoredCount: 0, ignoredIds: [] };
  }

  let ignoredCount = 0;
  const ignoredIds = new Set<string>();

  const filtered = matches.filter(({ record }) => {
    const hit = [record.id, record.cve].find((id) => id !== undefined && ignored.has(id));
    if (hit === undefined) return true;

    ignoredCount++;
    ignoredIds.add(hit);
    return false;
  });

  return { filtered, ignoredCount, ignoredIds: [...ignoredIds] };
}
