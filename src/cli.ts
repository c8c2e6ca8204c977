#!/usr/bin/env node
/**
 * CLI entrypoint for the requirement advisory scanner.
 *
 * Usage:
 *   req-advisory-scanner [options] [target]
 *
 * Target is a local directory (default: cwd), a GitHub repository URL or a
 * GitLab project URL.
 *
 * Options:
 *   --catalogue <url|path>  Advisory catalogue (default: safety-db, or SAFETY_DB_URL)
 *   --github-token <token>  GitHub token (or GITHUB_TOKEN)
 *   --gitlab-token <token>  GitLab token (or GITLAB_TOKEN)
 *   --ignore-file <path>    Path to ignore file (default: .scanignore)
 *   --output <path>         Report path (default: ./report.json)
 *   --help                  Show help message
 *
 * For development: use `npm run dev` (no build needed).
 */

import fs from "node:fs";
import path from "node:path";
import { CatalogueClient } from "./clients/catalogue";
import { loadIgnoreList, filterIgnored } from "./ignore";
import { generateReport, Report } from "./report";
import { scan } from "./scan";
import { resolveSource } from "./sources";
import { LocalSource } from "./sources/local";

interface CliOptions {
  target: string;
  catalogue?: string;
  githubToken?: string;
  gitlabToken?: string;
  ignoreFile?: string;
  output: string;
}

function printHelp() {
  console.log(`
Usage: req-advisory-scanner [options] [target]

Options:
  --catalogue <url|path>  Advisory catalogue (default: safety-db, or SAFETY_DB_URL)
  --github-token <token>  GitHub token (or set GITHUB_TOKEN)
  --gitlab-token <token>  GitLab token (or set GITLAB_TOKEN)
  --ignore-file <path>    Path to ignore file (default: .scanignore)
  --output <path>         Report path (default: ./report.json)
  --help                  Show this help message

Examples:
  req-advisory-scanner                                    Scan requirement files in cwd
  req-advisory-scanner ./services/api                     Scan a local directory
  req-advisory-scanner https://github.com/owner/repo      Scan a GitHub repository
  req-advisory-scanner --catalogue ./insecure_full.json   Use a local catalogue copy
`);
  process.exit(0);
}

function requireValue(args: string[], i: number, flag: string): string {
  const value = args[i];
  if (!value || value.startsWith("-")) {
    console.error(`Missing value for ${flag}`);
    process.exit(1);
  }
  return value;
}

function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  const options: CliOptions = {
    target: process.cwd(),
    catalogue: process.env.SAFETY_DB_URL,
    githubToken: process.env.GITHUB_TOKEN,
    gitlabToken: process.env.GITLAB_TOKEN,
    output: path.join(process.cwd(), "report.json"),
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      printHelp();
    } else if (arg === "--catalogue") {
      options.catalogue = requireValue(args, ++i, arg);
    } else if (arg === "--github-token") {
      options.githubToken = requireValue(args, ++i, arg);
    } else if (arg === "--gitlab-token") {
      options.gitlabToken = requireValue(args, ++i, arg);
    } else if (arg === "--ignore-file") {
      options.ignoreFile = requireValue(args, ++i, arg);
    } else if (arg === "--output") {
      options.output = requireValue(args, ++i, arg);
    } else if (!arg.startsWith("-")) {
      options.target = arg;
    } else {
      console.error(`Unknown option: ${arg}`);
      process.exit(1);
    }
  }

  return options;
}

async function main() {
  const startTime = Date.now();
  const options = parseArgs();

  const source = resolveSource(options.target, {
    githubToken: options.githubToken,
    gitlabToken: options.gitlabToken,
  });
  const catalogue = new CatalogueClient({ location: options.catalogue });

  console.log(`Scanning: ${source.label}`);
  console.log(`\n🔍 Checking ${catalogue.location} for known vulnerabilities...`);

  const result = await scan(source, catalogue);
  console.log(`📦 Found ${result.requirements.length} requirements (${result.lines.length} lines)`);

  if (result.invalidEntries > 0) {
    console.warn(`⚠️ Catalogue contained ${result.invalidEntries} malformed entries`);
  }

  // Apply ignore list (from .scanignore or --ignore-file)
  const scannedDir = source instanceof LocalSource ? source.label : undefined;
  const ignoreList = loadIgnoreList(scannedDir, options.ignoreFile);
  const { filtered, ignoredCount, ignoredIds } = filterIgnored(result.matches, ignoreList);

  const durationMs = Date.now() - startTime;
  const report = generateReport(result.requirements, filtered, {
    target: source.label,
    catalogue: catalogue.location,
    timestamp: new Date().toISOString(),
    durationMs,
    ignoredCount,
    ignoredIds,
    skippedAdvisories: result.skipped.length,
  });
  printSummary(report);

  fs.writeFileSync(options.output, JSON.stringify(report, null, 2));

  const elapsed = (durationMs / 1000).toFixed(2);
  console.log(`\nFull report: ${options.output}`);
  console.log(`⏱️  Completed in ${elapsed} seconds`);

  // Exit with code 1 if vulnerabilities are found
  if (report.summary.vulnerableRequirements > 0) {
    process.exit(1);
  }
}

/**
 * Print summary of the report to the console.
 */
function printSummary(report: Report) {
  const { summary, findings } = report;
  const { ignoredCount, ignoredIds } = report.metadata;

  const lineWidth = ignoredCount > 0 ? 80 : 50;
  console.log("\n" + "─".repeat(lineWidth));
  let summaryLine = `Total Requirements: ${summary.totalRequirements}  |  Vulnerable: ${summary.vulnerableRequirements} (${summary.vulnerablePercentage.toFixed(1)}%)`;
  if (ignoredCount > 0) {
    summaryLine += `  |  Advisories Ignored: ${ignoredCount}`;
  }
  console.log(summaryLine);
  console.log("─".repeat(lineWidth));
  if (ignoredIds.length > 0) {
    console.log(`🙈 Suppressed by ignore list: ${ignoredIds.join(", ")}`);
  }

  const vulnerable = findings.filter((f) => f.advisories.length > 0);

  if (vulnerable.length === 0) {
    console.log("\n✅ No known vulnerabilities found 🎉");
    return;
  }

  console.log("\n⚠️ Vulnerable requirements:\n");
  for (const finding of vulnerable) {
    const ids = finding.advisories.map((a) => {
      const id = a.id ?? "advisory";
      return a.cve ? `${id} (${a.cve})` : id;
    }).join(", ");
    console.log(`  ${finding.name}${finding.constraint}`);
    console.log(`    └─ ${finding.advisories.length} advisory(s): ${ids}`);
    for (const advisory of finding.advisories) {
      console.log(`       • ${advisory.advisory.trim().split("\n")[0]}`);
    }
  }
}

main().catch((err: unknown) => {
  const error = err instanceof Error ? err : new Error(String(err));
  console.error("\n🚨 Scan failed:", error.message);
  if (process.env.DEBUG) console.error(error.stack);
  process.exit(1);
});
