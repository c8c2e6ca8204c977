/**
 * Unit tests for requirement line, spec string and catalogue parsers.
 *
 * Uses fixtures to test the parsers with known-good and malformed inputs.
 *
 * Usage: npm run test
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import path from "node:path";
import {
  buildVulnerabilityRecords,
  normalizeName,
  parseCatalogue,
  parseRequirementLine,
  parseRequirementLines,
  parseSpecString,
} from "../src/parsers";
import { CatalogueFormatError, SpecParseError } from "../src/errors";
import { findVulnerabilities } from "../src/engine";

const FIXTURES = path.join(process.cwd(), "tests/fixtures");

function loadFixtureCatalogue(): unknown {
  return JSON.parse(fs.readFileSync(path.join(FIXTURES, "catalogue/insecure.json"), "utf-8"));
}

describe("normalizeName", () => {
  test("lowercases and collapses separators (PEP 503)", () => {
    assert.strictEqual(normalizeName("Django"), "django");
    assert.strictEqual(normalizeName("Some_Package.Name"), "some-package-name");
    assert.strictEqual(normalizeName("zope..interface"), "zope-interface");
  });
});

describe("parseRequirementLine", () => {
  test("parses a pinned requirement", () => {
    assert.deepStrictEqual(parseRequirementLine("Flask==2.0.1"), {
      name: "flask",
      operator: "==",
      version: [2n, 0n, 1n],
    });
  });

  test("falls back to > 0 for a bare package name", () => {
    assert.deepStrictEqual(parseRequirementLine("requests"), {
      name: "requests",
      operator: ">",
      version: [0n],
    });
  });

  test("allows whitespace around the operator", () => {
    assert.deepStrictEqual(parseRequirementLine("  Django >= 1.11  "), {
      name: "django",
      operator: ">=",
      version: [1n, 11n],
    });
  });

  test("takes the first constraint of a comma-separated list", () => {
    assert.deepStrictEqual(parseRequirementLine("flask>=0.10,<1.0"), {
      name: "flask",
      operator: ">=",
      version: [0n, 10n],
    });
  });

  test("reads ~= as >= and === as ==", () => {
    assert.deepStrictEqual(parseRequirementLine("numpy~=1.21.0"), {
      name: "numpy",
      operator: ">=",
      version: [1n, 21n, 0n],
    });
    assert.deepStrictEqual(parseRequirementLine("six===1.16.0"), {
      name: "six",
      operator: "==",
      version: [1n, 16n, 0n],
    });
  });

  test("accepts every comparison operator", () => {
    for (const op of ["==", "!=", "<=", ">=", "<", ">"]) {
      assert.strictEqual(parseRequirementLine(`pkg${op}1.0`)?.operator, op);
    }
  });

  test("strips extras, environment markers and inline comments", () => {
    assert.deepStrictEqual(parseRequirementLine("requests[security]==2.20.0"), {
      name: "requests",
      operator: "==",
      version: [2n, 20n, 0n],
    });
    assert.deepStrictEqual(parseRequirementLine("Django<2.0 ; python_version < '3'"), {
      name: "django",
      operator: "<",
      version: [2n, 0n],
    });
    assert.deepStrictEqual(parseRequirementLine("pytest  # test runner"), {
      name: "pytest",
      operator: ">",
      version: [0n],
    });
  });

  test("keeps the numeric prefix of a pre-release version", () => {
    assert.deepStrictEqual(parseRequirementLine("django==1.11.0rc1")?.version, [1n, 11n, 0n]);
  });

  test("treats a non-numeric constraint as a bare name", () => {
    assert.deepStrictEqual(parseRequirementLine("foo>=dev"), {
      name: "foo",
      operator: ">",
      version: [0n],
    });
  });

  test("skips blank lines, comments, pip options and URLs", () => {
    assert.strictEqual(parseRequirementLine(""), null);
    assert.strictEqual(parseRequirementLine("   "), null);
    assert.strictEqual(parseRequirementLine("# pinned for prod"), null);
    assert.strictEqual(parseRequirementLine("-r base.txt"), null);
    assert.strictEqual(parseRequirementLine("--index-url https://example.invalid/simple"), null);
    assert.strictEqual(parseRequirementLine("git+https://example.invalid/pkg.git#egg=pkg"), null);
  });
});

describe("parseRequirementLines", () => {
  test("drops skipped lines and keeps input order", () => {
    const requirements = parseRequirementLines(["a==1", "", "# x", "B<2"]);
    assert.deepStrictEqual(requirements, [
      { name: "a", operator: "==", version: [1n] },
      { name: "b", operator: "<", version: [2n] },
    ]);
  });
});

describe("parseSpecString", () => {
  test("parses a two-bound spec", () => {
    assert.deepStrictEqual(parseSpecString("django", ">=1.0,<2.0"), {
      lower: { name: "django", operator: ">=", version: [1n, 0n] },
      upper: { name: "django", operator: "<", version: [2n, 0n] },
    });
  });

  test("fills a missing upper bound with > 0", () => {
    assert.deepStrictEqual(parseSpecString("Django", "<1.11.9"), {
      lower: { name: "django", operator: "<", version: [1n, 11n, 9n] },
      upper: { name: "django", operator: ">", version: [0n] },
    });
  });

  test("tolerates whitespace around bounds", () => {
    const range = parseSpecString("pkg", " >= 1.0 , < 2.0 ");
    assert.strictEqual(range.lower.operator, ">=");
    assert.deepStrictEqual(range.upper.version, [2n, 0n]);
  });

  test("reads the release prefix of pre-release and post bounds", () => {
    assert.deepStrictEqual(parseSpecString("django", "<2.0b1").lower, { name: "django", operator: "<", version: [2n, 0n] });
    assert.deepStrictEqual(parseSpecString("pkg", ">=1.4.2rc1,<1.5.post2"), {
      lower: { name: "pkg", operator: ">=", version: [1n, 4n, 2n] },
      upper: { name: "pkg", operator: "<", version: [1n, 5n] },
    });
  });

  test("is deterministic", () => {
    assert.deepStrictEqual(parseSpecString("pkg", ">1.2,<=1.4"), parseSpecString("pkg", ">1.2,<=1.4"));
  });

  test("rejects malformed specs", () => {
    assert.throws(() => parseSpecString("pkg", "~1.0"), SpecParseError);
    assert.throws(() => parseSpecString("pkg", ">=abc"), SpecParseError);
    assert.throws(() => parseSpecString("pkg", ""), SpecParseError);
    assert.throws(() => parseSpecString("pkg", ">=1,<2,<3"), /at most 2 bounds/);
  });
});

describe("parseCatalogue", () => {
  test("parses fixture catalogue and counts malformed entries", () => {
    const { catalogue, invalidEntries } = parseCatalogue(loadFixtureCatalogue());

    assert.strictEqual(invalidEntries, 2);
    assert.deepStrictEqual([...catalogue.keys()], ["django", "flask", "requests", "broken-pkg", "pyyaml", "urllib3"]);
    assert.strictEqual(catalogue.get("django")?.length, 2);
    assert.strictEqual(catalogue.get("urllib3")?.length, 0);
  });

  test("skips metadata keys", () => {
    const { catalogue } = parseCatalogue({ $meta: { timestamp: 1 } });
    assert.strictEqual(catalogue.size, 0);
  });

  test("maps null CVE to undefined", () => {
    const { catalogue } = parseCatalogue(loadFixtureCatalogue());
    const [first, second] = catalogue.get("django") ?? [];
    assert.strictEqual(first.cve, "CVE-2000-0001");
    assert.strictEqual(first.id, "pyup.io-0001");
    assert.strictEqual(second.cve, undefined);
  });

  test("throws on non-object documents", () => {
    assert.throws(() => parseCatalogue([]), CatalogueFormatError);
    assert.throws(() => parseCatalogue("insecure"), CatalogueFormatError);
    assert.throws(() => parseCatalogue(null), CatalogueFormatError);
  });
});

describe("buildVulnerabilityRecords", () => {
  test("builds one record per entry and skips unparseable specs", () => {
    const { catalogue } = parseCatalogue(loadFixtureCatalogue());
    const { records, skipped } = buildVulnerabilityRecords(catalogue);

    assert.deepStrictEqual(
      records.map((r) => r.id),
      ["pyup.io-0001", "pyup.io-0002", "pyup.io-0003", "pyup.io-0004", "pyup.io-0006"],
    );
    assert.strictEqual(skipped.length, 1);
    assert.ok(skipped[0] instanceof CatalogueFormatError);
    assert.strictEqual(skipped[0].packageName, "broken-pkg");
    assert.strictEqual(skipped[0].advisoryId, "pyup.io-0005");
  });

  test("keeps every spec as a separate range", () => {
    const { catalogue } = parseCatalogue(loadFixtureCatalogue());
    const { records } = buildVulnerabilityRecords(catalogue, ["pyyaml"]);

    assert.strictEqual(records.length, 1);
    assert.deepStrictEqual(records[0].ranges, [
      {
        lower: { name: "pyyaml", operator: "<", version: [4n, 1n] },
        upper: { name: "pyyaml", operator: ">", version: [0n] },
      },
      {
        lower: { name: "pyyaml", operator: ">=", version: [5n, 0n] },
        upper: { name: "pyyaml", operator: "<", version: [5n, 1n] },
      },
    ]);
  });

  test("keeps entries whose bounds carry a pre-release suffix", () => {
    const { catalogue } = parseCatalogue({
      django: [{ id: "pyup.io-0100", advisory: "Django before 2.0b1 is vulnerable.", specs: ["<2.0b1"] }],
    });
    const { records, skipped } = buildVulnerabilityRecords(catalogue);
    const declared = parseRequirementLines(["django==1.5"]);

    assert.strictEqual(skipped.length, 0);
    assert.deepStrictEqual(findVulnerabilities(declared, records).map((m) => m.record.id), ["pyup.io-0100"]);
  });

  test("limits records to the requested names", () => {
    const { catalogue } = parseCatalogue(loadFixtureCatalogue());
    const { records, skipped } = buildVulnerabilityRecords(catalogue, ["Django", "PyYAML"]);

    assert.deepStrictEqual(records.map((r) => r.name), ["django", "django", "pyyaml"]);
    assert.strictEqual(skipped.length, 0);
  });
});
