/**
 * Requirement file discovery, shared by every source.
 *
 * - Top-level files whose name contains "requirements" are read.
 * - Top-level directories whose name contains "requirements" are listed one
 *   level deep, and the ".txt" files inside them are read.
 */

import { RepositoryTree, TreeEntry } from "./types";

const REQUIREMENTS_MARKER = "requirements";

export function isRequirementsName(name: string): boolean {
  return name.toLowerCase().includes(REQUIREMENTS_MARKER);
}

export async function discoverRequirementFiles(tree: RepositoryTree): Promise<TreeEntry[]> {
  const files: TreeEntry[] = [];

  for (const entry of await tree.listRoot()) {
    if (!isRequirementsName(entry.name)) continue;

    if (entry.type === "file") {
      files.push(entry);
      continue;
    }

    for (const child of await tree.listDir(entry)) {
      if (child.type === "file" && child.name.includes(".txt")) {
        files.push(child);
      }
    }
  }

  return files;
}

/**
 * Split file contents into lines, dropping blank ones.
 */
export function splitLines(content: string): string[] {
  return content.split(/\r?\n/).filter((line) => line.trim() !== "");
}

export async function collectRequirementLines(tree: RepositoryTree): Promise<string[]> {
  const files = await discoverRequirementFiles(tree);
  if (files.length === 0) return [];

  const contents = await tree.readFiles(files);
  return contents.flatMap(splitLines);
}
