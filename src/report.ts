/**
 * Generate report to summarize requirement and advisory findings.
 */

import { formatConstraint, isNeutralBound } from "./parsers/utils";
import { BoundedRange, Match, Requirement } from "./types";

export interface ReportMetadata {
  target: string;
  catalogue: string;
  timestamp: string;
  durationMs: number;
  ignoredCount: number;
  ignoredIds: string[];
  skippedAdvisories: number;
}

export interface AdvisoryFinding {
  id?: string;
  cve?: string;
  advisory: string;
  specs: string[];
}

export interface Finding {
  name: string;
  constraint: string;
  advisories: AdvisoryFinding[];
}

export interface Report {
  metadata: ReportMetadata;
  summary: {
    totalRequirements: number;
    vulnerableRequirements: number;
    vulnerablePercentage: number;
    totalMatches: number;
  };
  findings: Finding[];
}

/**
 * Render a range the way the catalogue writes it. A neutral "> 0" upper bound
 * was filled in for a single-bound spec and is left out.
 */
export function formatRange(range: BoundedRange): string {
  if (isNeutralBound(range.upper)) return formatConstraint(range.lower);
  return `${formatConstraint(range.lower)},${formatConstraint(range.upper)}`;
}

/**
 * Build the report. Matches are attached to findings by requirement identity:
 * pass the same Requirement objects that produced `matches`, so that two equal
 * lines from different files each keep their own advisories.
 */
export function generateReport(
  requirements: Requirement[],
  matches: Match[],
  metadata: ReportMetadata,
): Report {
  const findings: Finding[] = requirements.map((requirement) => ({
    name: requirement.name,
    constraint: formatConstraint(requirement),
    advisories: matches
      .filter((m) => m.requirement === requirement)
      .map(({ record }) => ({
        id: record.id,
        cve: record.cve,
        advisory: record.advisory,
        specs: record.ranges.map(formatRange),
      })),
  }));

  const vulnerableRequirements = findings.filter((f) => f.advisories.length > 0).length;
  const vulnerablePercentage = findings.length > 0
    ? Math.round((vulnerableRequirements / findings.length) * 1000) / 10
    : 0;

  return {
    metadata,
    summary: {
      totalRequirements: findings.length,
      vulnerableRequirements,
      vulnerablePercentage,
      totalMatches: matches.length,
    },
    findings,
  };
}
