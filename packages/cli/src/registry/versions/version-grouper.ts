// pattern: Functional Core

import type { VersionGroup } from "../types.js";

/**
 * A version string split into its leading dotted numeric run and whatever
 * follows it. Numeric components are digit strings with leading zeros
 * removed, so arbitrarily long components compare without overflow.
 */
export interface ParsedVersion {
  numeric: string[];
  suffix: string;
}

export interface VersionGrouping {
  /** Ascending by key */
  groups: VersionGroup[];
  latestVersion: string | undefined;
}

const VERSION_PATTERN = /^[vV]?(\d+(?:\.\d+)*)(.*)$/s;

/**
 * Parse a version string, or return undefined when it does not start with a
 * number (optionally after a "v")
 */
export function parseVersion(raw: string): ParsedVersion | undefined {
  const match = VERSION_PATTERN.exec(raw);
  const digits = match?.[1];
  if (!match || digits === undefined) {
    return undefined;
  }

  return {
    numeric: digits.split(".").map(part => part.replace(/^0+(?=\d)/, "")),
    suffix: match[2] ?? "",
  };
}

function compareDigits(a: string, b: string): number {
  if (a.length !== b.length) {
    return a.length - b.length;
  }
  return compareStrings(a, b);
}

function compareStrings(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Total order over arbitrary version strings.
 *
 * Unparsed strings sort below every parsed one and among themselves
 * lexicographically. Parsed versions compare component by component; a
 * version that is a numeric prefix of another sorts first. Equal numeric
 * runs fall back to the suffix (so "1.2" < "1.2-rc1"), then the longer raw
 * string, then the raw strings themselves.
 */
export function compareVersions(a: string, b: string): number {
  if (a === b) {
    return 0;
  }

  const pa = parseVersion(a);
  const pb = parseVersion(b);

  if (!pa && !pb) {
    return compareStrings(a, b);
  }
  if (!pa) {
    return -1;
  }
  if (!pb) {
    return 1;
  }

  const shared = Math.min(pa.numeric.length, pb.numeric.length);
  for (let i = 0; i < shared; i++) {
    const diff = compareDigits(pa.numeric[i] ?? "", pb.numeric[i] ?? "");
    if (diff !== 0) {
      return diff;
    }
  }

  if (pa.numeric.length !== pb.numeric.length) {
    return pa.numeric.length - pb.numeric.length;
  }

  const suffixDiff = compareStrings(pa.suffix, pb.suffix);
  if (suffixDiff !== 0) {
    return suffixDiff;
  }

  if (a.length !== b.length) {
    return a.length - b.length;
  }

  return compareStrings(a, b);
}

/**
 * Group key: "major.minor" for versions with at least two numeric
 * components, otherwise the whole raw string
 */
export function versionGroupKey(raw: string): string {
  const parsed = parseVersion(raw);
  const [major, minor] = parsed?.numeric ?? [];
  if (major === undefined || minor === undefined) {
    return raw;
  }
  return `${major}.${minor}`;
}

export function sortVersions(versions: Iterable<string>): string[] {
  return [...new Set(versions)].sort(compareVersions);
}

/**
 * Group distinct versions by major.minor and pick the greatest overall.
 * Every input version lands in exactly one group.
 */
export function groupVersions(versions: Iterable<string>): VersionGrouping {
  const sorted = sortVersions(versions);
  const byKey = new Map<string, string[]>();

  for (const version of sorted) {
    const key = versionGroupKey(version);
    const members = byKey.get(key);
    if (members) {
      members.push(version);
    } else {
      byKey.set(key, [version]);
    }
  }

  const groups: VersionGroup[] = [...byKey.entries()]
    .sort(([a], [b]) => compareVersions(a, b))
    .map(([key, members]) => ({ key, versions: members }));

  return {
    groups,
    latestVersion: sorted[sorted.length - 1],
  };
}
