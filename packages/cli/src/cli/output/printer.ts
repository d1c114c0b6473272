// pattern: Functional Core

import { Chalk, type ChalkInstance } from "chalk";

import { isNotFound } from "../../search/result-aggregator.js";

import type {
  PackageInfo,
  RegistrySearchError,
  SearchResult,
  VersionGroup,
} from "../../registry/types.js";

const PLAIN = new Chalk({ level: 0 });

/**
 * Concise group listing: a group holding only its own key prints bare,
 * any other group prints its members in braces.
 */
export function formatVersionGroups(groups: readonly VersionGroup[]): string {
  return groups
    .map(group =>
      group.versions.length === 1 && group.versions[0] === group.key
        ? group.key
        : `{${group.versions.join(", ")}}`
    )
    .join(", ");
}

export function formatThreading(info: PackageInfo): string {
  switch (info.threadingSupport) {
    case "explicit":
      return info.threadFlags.length > 0
        ? `Supported (flags: ${info.threadFlags.join(", ")})`
        : "Supported";
    case "none-detected":
      return "No explicit support found";
    case "unknown":
      return "Unknown (no description)";
  }
}

export function formatPackageInfo(info: PackageInfo, chalk: ChalkInstance = PLAIN): string[] {
  const heading =
    info.registryName === info.name
      ? chalk.bold(info.displayName)
      : `${chalk.bold(info.displayName)} (as ${info.registryName})`;

  return [
    `  ${chalk.green("✓")} ${heading}`,
    `    URL:         ${info.url || "n/a"}`,
    `    Description: ${info.description || "No description available"}`,
    `    Latest:      ${chalk.cyan(info.latestVersion)}`,
    `    Versions:    ${info.versionGroups.length} major.minor, ${info.versions.length} total`,
    `    Groups:      ${formatVersionGroups(info.versionGroups)}`,
    `    License:     ${info.license}`,
    `    Threading:   ${formatThreading(info)}`,
  ];
}

export function formatRegistryError(
  error: RegistrySearchError,
  chalk: ChalkInstance = PLAIN
): string {
  const detail = error.detail ? `: ${error.detail}` : "";
  return `  ${chalk.yellow("!")} ${error.repository} ${error.reason.replace("_", " ")}${detail}`;
}

/**
 * The report for one package name. "Not found" is only claimed when every
 * registry answered cleanly.
 */
export function formatSearchResult(
  packageName: string,
  result: SearchResult,
  chalk: ChalkInstance = PLAIN
): string[] {
  if (isNotFound(result)) {
    return [`${chalk.red("✗")} ${chalk.bold(packageName)}: not found in any registry`];
  }

  const count = result.infos.length;
  const lines = [
    count > 0
      ? `${chalk.bold(packageName)}: found in ${count} ${count === 1 ? "registry" : "registries"}`
      : `${chalk.bold(packageName)}: not found in the registries that answered`,
  ];

  for (const info of result.infos) {
    lines.push(...formatPackageInfo(info, chalk));
  }

  if (result.errors.length > 0) {
    lines.push(`  Could not check ${result.errors.length} registry(ies):`);
    lines.push(...result.errors.map(error => formatRegistryError(error, chalk)));
  }

  return lines;
}

export function formatSearchResults(
  results: ReadonlyMap<string, SearchResult>,
  chalk: ChalkInstance = PLAIN
): string {
  return [...results]
    .map(([packageName, result]) => formatSearchResult(packageName, result, chalk).join("\n"))
    .join("\n\n");
}

/**
 * Plain object for `--json`, keyed by package name in search order
 */
export function toJsonReport(
  results: ReadonlyMap<string, SearchResult>
): Record<string, SearchResult> {
  return Object.fromEntries(results);
}
