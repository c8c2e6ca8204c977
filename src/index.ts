/**
 * Public API of req-advisory-scanner.
 */

export * from "./types";
export * from "./errors";
export { parseVersion, compareVersions, formatVersion, LESS, EQUAL, GREATER } from "./version";
export type { Ordering } from "./version";
export * from "./parsers";
export * from "./engine";
export * from "./sources";
export * from "./clients";
export { scan } from "./scan";
export type { ScanResult } from "./scan";
export { generateReport } from "./report";
export type { Report, Finding, ReportMetadata } from "./report";
export { loadIgnoreList, filterIgnored } from "./ignore";
