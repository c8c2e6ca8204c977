/**
 * Requirement sources.
 *
 * Supported targets:
 * - Local directory (default: current working directory)
 * - GitHub repository URL
 * - GitLab project URL
 */

import { HttpGet } from "../clients/types";
import { GitHubSource, isGitHubUrl } from "./github";
import { GitLabSource, isGitLabUrl } from "./gitlab";
import { LocalSource } from "./local";
import { RequirementsSource } from "./types";

export interface SourceOptions {
  githubToken?: string;
  gitlabToken?: string;
  http?: HttpGet;
}

export function resolveSource(target: string, options: SourceOptions = {}): RequirementsSource {
  if (isGitHubUrl(target)) {
    return new GitHubSource(target, { token: options.githubToken, http: options.http });
  }
  if (isGitLabUrl(target)) {
    return new GitLabSource(target, { token: options.gitlabToken, http: options.http });
  }
  return new LocalSource(target);
}

export { GitHubSource, GitLabSource, LocalSource };
export type { RequirementsSource, RepositoryTree, TreeEntry } from "./types";
export { collectRequirementLines, discoverRequirementFiles, isRequirementsName, splitLines } from "./discovery";
