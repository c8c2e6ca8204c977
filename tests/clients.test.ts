/**
 * Unit tests for the advisory catalogue client.
 *
 * Uses fixtures and a fake HTTP transport, no network calls.
 *
 * Usage: npm run test
 */

import { test, describe, mock } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import path from "node:path";
import { CatalogueClient, DEFAULT_CATALOGUE_URL } from "../src/clients/catalogue";
import { HttpGet, HttpResponse } from "../src/clients/types";
import { CatalogueFetchError } from "../src/errors";

const FIXTURES = path.join(process.cwd(), "tests/fixtures");
const CATALOGUE_FIXTURE = path.join(FIXTURES, "catalogue/insecure.json");

function textResponse(body: string, status = 200): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? "OK" : "Not Found",
    json: async () => JSON.parse(body),
    text: async () => body,
  };
}

describe("CatalogueClient", () => {
  test("defaults to the safety-db catalogue", () => {
    const client = new CatalogueClient();
    assert.strictEqual(client.location, DEFAULT_CATALOGUE_URL);
  });

  test("reads a local catalogue file", async () => {
    const client = new CatalogueClient({ location: CATALOGUE_FIXTURE });
    const { catalogue, invalidEntries } = await client.load();

    assert.strictEqual(catalogue.get("flask")?.[0].id, "pyup.io-0003");
    assert.strictEqual(invalidEntries, 2);
  });

  test("fetches a remote catalogue once and caches it", async () => {
    const body = fs.readFileSync(CATALOGUE_FIXTURE, "utf-8");
    const http = mock.fn<HttpGet>(async () => textResponse(body));
    const client = new CatalogueClient({ location: "https://example.invalid/insecure_full.json", http });

    const [first, second] = await Promise.all([client.load(), client.load()]);
    const third = await client.load();

    assert.strictEqual(http.mock.callCount(), 1);
    assert.strictEqual(http.mock.calls[0].arguments[0], "https://example.invalid/insecure_full.json");
    assert.strictEqual(first, second);
    assert.strictEqual(first, third);
    assert.strictEqual(first.catalogue.get("django")?.length, 2);
  });

  test("refresh fetches again", async () => {
    const http = mock.fn<HttpGet>(async () => textResponse('{"flask": []}'));
    const client = new CatalogueClient({ location: "https://example.invalid/db.json", http });

    const first = await client.load();
    const refreshed = await client.refresh();

    assert.strictEqual(http.mock.callCount(), 2);
    assert.notStrictEqual(first, refreshed);
    assert.deepStrictEqual([...refreshed.catalogue.keys()], ["flask"]);
  });

  test("throws CatalogueFetchError on HTTP failure and does not cache it", async () => {
    let status = 404;
    const http = mock.fn<HttpGet>(async () => textResponse("{}", status));
    const client = new CatalogueClient({ location: "https://example.invalid/db.json", http });

    await assert.rejects(client.load(), (err: unknown) => {
      assert.ok(err instanceof CatalogueFetchError);
      assert.strictEqual(
        err.message,
        "Failed to load catalogue from https://example.invalid/db.json: 404 Not Found",
      );
      return true;
    });

    status = 200;
    const { catalogue } = await client.load();
    assert.strictEqual(catalogue.size, 0);
    assert.strictEqual(http.mock.callCount(), 2);
  });

  test("wraps transport errors", async () => {
    const http = mock.fn<HttpGet>(async () => {
      throw new Error("socket hang up");
    });
    const client = new CatalogueClient({ location: "https://example.invalid/db.json", http });

    await assert.rejects(client.load(), /socket hang up/);
  });

  test("throws CatalogueFetchError on invalid JSON", async () => {
    const client = new CatalogueClient({ location: path.join(FIXTURES, "catalogue/invalid.json") });
    await assert.rejects(client.load(), CatalogueFetchError);
  });

  test("throws CatalogueFetchError on a missing file", async () => {
    const client = new CatalogueClient({ location: path.join(FIXTURES, "catalogue/missing.json") });
    await assert.rejects(client.load(), /ENOENT/);
  });
});
