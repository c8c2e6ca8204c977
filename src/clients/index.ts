/**
 * Network clients.
 *
 * - Advisory catalogue: https://github.com/pyupio/safety-db
 */

export type { HttpGet, HttpResponse } from "./types";
export { httpGet } from "./http";
export { CatalogueClient, DEFAULT_CATALOGUE_URL } from "./catalogue";
export type { LoadedCatalogue, CatalogueClientOptions } from "./catalogue";
