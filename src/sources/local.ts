/**
 * Requirement source backed by a local directory.
 */

import fs from "node:fs";
import path from "node:path";
import { SourceError } from "../errors";
import { collectRequirementLines } from "./discovery";
import { RepositoryTree, RequirementsSource, TreeEntry } from "./types";

async function listEntries(dir: string, relative: string): Promise<TreeEntry[]> {
  const dirents = await fs.promises.readdir(dir, { withFileTypes: true });

  return dirents
    .filter((d) => d.isFile() || d.isDirectory())
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map((d): TreeEntry => ({
      name: d.name,
      path: relative ? path.posix.join(relative, d.name) : d.name,
      type: d.isDirectory() ? "dir" : "file",
    }));
}

export class LocalSource implements RequirementsSource {
  readonly label: string;

  constructor(private readonly rootDir: string) {
    this.label = path.resolve(rootDir);
  }

  async fetchRequirementLines(): Promise<string[]> {
    if (!fs.existsSync(this.rootDir) || !fs.statSync(this.rootDir).isDirectory()) {
      throw new SourceError(`Not a directory: ${this.rootDir}`);
    }

    const root = this.rootDir;
    const tree: RepositoryTree = {
      listRoot: () => listEntries(root, ""),
      listDir: (dir) => listEntries(path.join(root, dir.path), dir.path),
      readFiles: (files) =>
        Promise.all(files.map((file) => fs.promises.readFile(path.join(root, file.path), "utf-8"))),
    };

    return collectRequirementLines(tree);
  }
}
