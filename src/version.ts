/**
 * Dotted numeric version values and their ordering.
 *
 * Components are arbitrary-size integers compared left to right, with
 * missing trailing components read as 0: "1.9" < "1.10" and "1.0" == "1.0.0".
 */

import { VersionParseError } from "./errors";
import { VersionValue } from "./types";

export type Ordering = -1 | 0 | 1;

export const LESS: Ordering = -1;
export const EQUAL: Ordering = 0;
export const GREATER: Ordering = 1;

const VERSION_PATTERN = /^\d+(\.\d+)*$/;

export const ZERO_VERSION: VersionValue = Object.freeze([0n]);

export function parseVersion(text: string): VersionValue {
  const trimmed = text.trim();
  if (!VERSION_PATTERN.test(trimmed)) {
    throw new VersionParseError(text);
  }
  return Object.freeze(trimmed.split(".").map((part) => BigInt(part)));
}

export function compareVersions(a: VersionValue, b: VersionValue): Ordering {
  const length = Math.max(a.length, b.length);

  for (let i = 0; i < length; i++) {
    const left = a[i] ?? 0n;
    const right = b[i] ?? 0n;
    if (left < right) return LESS;
    if (left > right) return GREATER;
  }

  return EQUAL;
}

export function formatVersion(version: VersionValue): string {
  return version.join(".");
}
