/**
 * Requirement source for GitHub repositories.
 *
 * With a token, the tree listing and file contents come from the GraphQL API:
 * one query lists the root (and one level of subdirectories), then selected
 * files are downloaded in batches of aliased blob lookups.
 *
 * Without a token, falls back to the REST contents API (unauthenticated
 * access is allowed there, but rate limited to 60 requests/hour).
 *
 * Refs:
 * - https://docs.github.com/en/graphql/reference/objects#tree
 * - https://docs.github.com/en/rest/repos/contents
 */

import { graphql } from "@octokit/graphql";
import { SourceError } from "../errors";
import { isObject, isObjectArray, optionalString } from "../guards";
import { httpGet } from "../clients/http";
import { HttpGet } from "../clients/types";
import { collectRequirementLines } from "./discovery";
import { RepositoryTree, RequirementsSource, TreeEntry } from "./types";

const GITHUB_URL_PATTERN = /^(?:https?:\/\/)?(?:www\.)?github\.com\/([^/]+)\/([^/#?]+)/i;
const GITHUB_API_URL = "https://api.github.com/repos/";

// Blob lookups per GraphQL query
const BLOB_BATCH_SIZE = 50;

export type GraphqlQuery = (query: string) => Promise<unknown>;

export interface GitHubSourceOptions {
    token?: string;
    http?: HttpGet;
    graphql?: GraphqlQuery;
}

export function parseGitHubUrl(url: string): { owner: string; repo: string } {
    const match = url.trim().match(GITHUB_URL_PATTERN);
    if (!match) {
        throw new SourceError(`Not a GitHub repository URL: ${url}`);
    }
    return { owner: match[1], repo: match[2].replace(/\.git$/, "") };
}

export function isGitHubUrl(url: string): boolean {
    return GITHUB_URL_PATTERN.test(url.trim());
}

function toEntryType(type: unknown): "file" | "dir" | null {
    if (type === "file" || type === "blob") return "file";
    if (type === "dir" || type === "tree") return "dir";
    return null;
}

function toTreeEntries(items: Record<string, unknown>[]): TreeEntry[] {
    const entries: TreeEntry[] = [];
    for (const item of items) {
        const name = optionalString(item.name);
        const path = optionalString(item.path);
        const type = toEntryType(item.type);
        if (name && path && type) entries.push({ name, path, type });
    }
    return entries;
}

function treeEntriesOf(object: unknown): Record<string, unknown>[] {
    if (!isObject(object)) return [];
    const entries = object.entries;
    return isObjectArray(entries) ? entries : [];
}

export class GitHubSource implements RequirementsSource {
    readonly label: string;
    private readonly owner: string;
    private readonly repo: string;
    private readonly http: HttpGet;
    private readonly gql: GraphqlQuery | null;

    constructor(repoUrl: string, options: GitHubSourceOptions = {}) {
        const { owner, repo } = parseGitHubUrl(repoUrl);
        this.owner = owner;
        this.repo = repo;
        this.label = `github.com/${owner}/${repo}`;
        this.http = options.http ?? httpGet;

        if (options.graphql) {
            this.gql = options.graphql;
        } else if (options.token) {
            const client = graphql.defaults({
                headers: {
                    authorization: `token ${options.token}`,
                },
            });
            this.gql = (query) => client(query);
        } else {
            this.gql = null;
        }
    }

    fetchRequirementLines(): Promise<string[]> {
        const tree = this.gql ? this.graphqlTree(this.gql) : this.restTree();
        return collectRequirementLines(tree);
    }

    // GraphQL

    private repositoryQuery(body: string): string {
        return `query { repository(owner: ${JSON.stringify(this.owner)}, name: ${JSON.stringify(this.repo)}) { ${body} } }`;
    }

    private async queryRepository(gql: GraphqlQuery, body: string): Promise<Record<string, unknown>> {
        let response: unknown;
        try {
            response = await gql(this.repositoryQuery(body));
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            throw new SourceError(`GitHub GraphQL query failed for ${this.label}: ${message}`);
        }

        const repository = isObject(response) ? response.repository : undefined;
        if (!isObject(repository)) {
            throw new SourceError(`Repository not found: ${this.label}`);
        }
        return repository;
    }

    private graphqlTree(gql: GraphqlQuery): RepositoryTree {
        const children = new Map<string, TreeEntry[]>();

        const listRoot = async (): Promise<TreeEntry[]> => {
            const repository = await this.queryRepository(gql, `
                object(expression: "HEAD:") {
                    ... on Tree {
                        entries {
                            name
                            path
                            type
                            object { ... on Tree { entries { name path type } } }
                        }
                    }
                }
            `);

            const items = treeEntriesOf(repository.object);

            for (const item of items) {
                const path = optionalString(item.path);
                if (path) children.set(path, toTreeEntries(treeEntriesOf(item.object)));
            }

            return toTreeEntries(items);
        };

        const readFiles = async (files: TreeEntry[]): Promise<string[]> => {
            const contents: string[] = [];

            for (let i = 0; i < files.length; i += BLOB_BATCH_SIZE) {
                const batch = files.slice(i, i + BLOB_BATCH_SIZE);
                const queryParts = batch.map((file, idx) =>
                    `f${idx}: object(expression: ${JSON.stringify(`HEAD:${file.path}`)}) { ... on Blob { text } }`
                );

                const repository = await this.queryRepository(gql, queryParts.join("\n"));

                batch.forEach((file, idx) => {
                    const blob = repository[`f${idx}`];
                    const text = isObject(blob) ? optionalString(blob.text) : undefined;
                    if (text === undefined) {
                        console.warn(`⚠️ Skipping ${file.path}: no text content`);
                        return;
                    }
                    contents.push(text);
                });
            }

            return contents;
        };

        return {
            listRoot,
            listDir: async (dir) => children.get(dir.path) ?? [],
            readFiles,
        };
    }

    // REST

    private async getJson(url: string): Promise<unknown> {
        const response = await this.http(url, { accept: "application/vnd.github+json" });
        if (!response.ok) {
            throw new SourceError(`GitHub request failed: ${response.status} ${response.statusText} (${url})`, response.status);
        }
        return response.json();
    }

    private async listContents(url: string): Promise<Array<TreeEntry & { downloadUrl?: string }>> {
        const data = await this.getJson(url);
        if (!isObjectArray(data)) {
            throw new SourceError(`Unexpected GitHub contents response for ${url}`);
        }

        const downloads = new Map<string, string | undefined>();
        for (const item of data) {
            const path = optionalString(item.path);
            if (path) downloads.set(path, optionalString(item.download_url));
        }

        return toTreeEntries(data).map((entry) => ({ ...entry, downloadUrl: downloads.get(entry.path) }));
    }

    private restTree(): RepositoryTree {
        const baseUrl = `${GITHUB_API_URL}${this.owner}/${this.repo}/contents/`;
        const downloads = new Map<string, string>();

        const list = async (url: string): Promise<TreeEntry[]> => {
            const entries = await this.listContents(url);
            return entries.map(({ downloadUrl, ...entry }) => {
                if (downloadUrl) downloads.set(entry.path, downloadUrl);
                return entry;
            });
        };

        const readFiles = async (files: TreeEntry[]): Promise<string[]> => {
            const contents: string[] = [];
            for (const file of files) {
                const url = downloads.get(file.path);
                if (!url) {
                    console.warn(`⚠️ Skipping ${file.path}: no download URL`);
                    continue;
                }
                const response = await this.http(url);
                if (!response.ok) {
                    throw new SourceError(`Download failed: ${response.status} ${response.statusText} (${url})`, response.status);
                }
                contents.push(await response.text());
            }
            return contents;
        };

        return {
            listRoot: () => list(baseUrl),
            listDir: (dir) => list(`${baseUrl}${dir.path.split("/").map(encodeURIComponent).join("/")}`),
            readFiles,
        };
    }
}
