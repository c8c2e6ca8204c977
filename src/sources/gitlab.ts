/**
 * Requirement source for GitLab repositories (REST API v4).
 *
 * Private projects need a personal access token, sent as PRIVATE-TOKEN.
 *
 * Ref: https://docs.gitlab.com/ee/api/repositories.html#list-repository-tree
 */

import { SourceError } from "../errors";
import { isObjectArray, optionalString } from "../guards";
import { httpGet } from "../clients/http";
import { HttpGet } from "../clients/types";
import { collectRequirementLines } from "./discovery";
import { RepositoryTree, RequirementsSource, TreeEntry } from "./types";

const GITLAB_URL_PATTERN = /^(?:https?:\/\/)?(?:www\.)?gitlab\.com\/([^#?]+)/i;
const GITLAB_API_URL = "https://gitlab.com/api/v4";
const TREE_PAGE_SIZE = 100;

export interface GitLabSourceOptions {
  token?: string;
  http?: HttpGet;
}

/**
 * Extract the project path ("group/subgroup/project") from a GitLab URL.
 */
export function parseGitLabUrl(url: string): string {
  const match = url.trim().match(GITLAB_URL_PATTERN);
  const projectPath = match?.[1]
    .split("/-/")[0]
    .replace(/\/+$/, "")
    .replace(/\.git$/, "");

  if (!projectPath || !projectPath.includes("/")) {
    throw new SourceError(`Not a GitLab project URL: ${url}`);
  }
  return projectPath;
}

export function isGitLabUrl(url: string): boolean {
  return GITLAB_URL_PATTERN.test(url.trim());
}

export class GitLabSource implements RequirementsSource {
  readonly label: string;
  private readonly projectUrl: string;
  private readonly http: HttpGet;
  private readonly headers: Record<string, string>;

  constructor(repoUrl: string, options: GitLabSourceOptions = {}) {
    const projectPath = parseGitLabUrl(repoUrl);
    this.label = `gitlab.com/${projectPath}`;
    this.projectUrl = `${GITLAB_API_URL}/projects/${encodeURIComponent(projectPath)}`;
    this.http = options.http ?? httpGet;
    this.headers = options.token ? { "PRIVATE-TOKEN": options.token } : {};
  }

  fetchRequirementLines(): Promise<string[]> {
    const tree: RepositoryTree = {
      listRoot: () => this.listTree(),
      listDir: (dir) => this.listTree(dir.path),
      readFiles: (files) => Promise.all(files.map((file) => this.readFile(file.path))),
    };
    return collectRequirementLines(tree);
  }

  private async get(url: string) {
    const response = await this.http(url, this.headers);
    if (!response.ok) {
      throw new SourceError(`GitLab request failed: ${response.status} ${response.statusText} (${url})`, response.status);
    }
    return response;
  }

  private async listTree(path?: string): Promise<TreeEntry[]> {
    const query = path ? `&path=${encodeURIComponent(path)}` : "";
    const entries: TreeEntry[] = [];

    // Follow pages until one comes back short
    for (let page = 1; ; page++) {
      const url = `${this.projectUrl}/repository/tree?per_page=${TREE_PAGE_SIZE}&page=${page}${query}`;
      const data = await (await this.get(url)).json();

      if (!isObjectArray(data)) {
        throw new SourceError(`Unexpected GitLab tree response for ${url}`);
      }

      for (const item of data) {
        const name = optionalString(item.name);
        const itemPath = optionalString(item.path);
        if (!name || !itemPath) continue;
        if (item.type === "blob") entries.push({ name, path: itemPath, type: "file" });
        else if (item.type === "tree") entries.push({ name, path: itemPath, type: "dir" });
      }

      if (data.length < TREE_PAGE_SIZE) return entries;
    }
  }

  private async readFile(path: string): Promise<string> {
    const url = `${this.projectUrl}/repository/files/${encodeURIComponent(path)}/raw?ref=HEAD`;
    return (await this.get(url)).text();
  }
}
