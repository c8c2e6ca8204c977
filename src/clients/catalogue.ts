/**
 * Client for the advisory catalogue (safety-db "insecure_full.json").
 *
 * The catalogue is either fetched over HTTP or read from a local file, then
 * cached in memory for the lifetime of the client. Call `refresh()` to drop
 * the cache and fetch again.
 *
 * Ref: https://github.com/pyupio/safety-db
 */

import fs from "node:fs";
import { CatalogueFetchError } from "../errors";
import { parseCatalogue } from "../parsers/catalogue";
import { Catalogue } from "../types";
import { httpGet } from "./http";
import { HttpGet, HttpResponse } from "./types";

export const DEFAULT_CATALOGUE_URL =
  "https://raw.githubusercontent.com/pyupio/safety-db/master/data/insecure_full.json";

export interface LoadedCatalogue {
  catalogue: Catalogue;
  invalidEntries: number;
}

export interface CatalogueClientOptions {
  location?: string;
  http?: HttpGet;
}

function isUrl(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

export class CatalogueClient {
  readonly location: string;
  private readonly http: HttpGet;
  private pending: Promise<LoadedCatalogue> | null = null;

  constructor(options: CatalogueClientOptions = {}) {
    this.location = options.location || DEFAULT_CATALOGUE_URL;
    this.http = options.http ?? httpGet;
  }

  /**
   * Load the catalogue once; concurrent and later calls share the result.
   */
  load(): Promise<LoadedCatalogue> {
    if (!this.pending) {
      this.pending = this.fetchCatalogue().catch((err: unknown) => {
        // Failed loads are not cached
        this.pending = null;
        throw err;
      });
    }
    return this.pending;
  }

  refresh(): Promise<LoadedCatalogue> {
    this.pending = null;
    return this.load();
  }

  private async fetchCatalogue(): Promise<LoadedCatalogue> {
    const body = isUrl(this.location)
      ? await this.fetchRemote()
      : await this.readLocal();

    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new CatalogueFetchError(this.location, `invalid JSON (${message})`);
    }

    return parseCatalogue(raw);
  }

  private async fetchRemote(): Promise<string> {
    let response: HttpResponse;
    try {
      response = await this.http(this.location);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new CatalogueFetchError(this.location, message);
    }

    if (!response.ok) {
      throw new CatalogueFetchError(this.location, `${response.status} ${response.statusText}`);
    }

    return response.text();
  }

  private async readLocal(): Promise<string> {
    try {
      return await fs.promises.readFile(this.location, "utf-8");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new CatalogueFetchError(this.location, message);
    }
  }
}
