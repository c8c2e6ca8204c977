/**
 * Shared types for requirement sources.
 */

/**
 * Anything that can produce the raw lines of a project's requirement files.
 * The matching engine only ever sees the lines.
 */
export interface RequirementsSource {
  readonly label: string;
  fetchRequirementLines(): Promise<string[]>;
}

export type EntryType = "file" | "dir";

export interface TreeEntry {
  name: string;
  path: string;
  type: EntryType;
}

/**
 * Directory listing and file access for one repository or directory.
 */
export interface RepositoryTree {
  listRoot(): Promise<TreeEntry[]>;
  listDir(dir: TreeEntry): Promise<TreeEntry[]>;
  readFiles(files: TreeEntry[]): Promise<string[]>;
}
