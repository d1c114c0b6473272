// pattern: Functional Core

import { DEFAULT_BIOCONDUCTOR_RELEASES } from "../../registry/adapters/bioconductor.js";
import { DEFAULT_CONCURRENCY, DEFAULT_TIMEOUT_MS } from "../../search/package-searcher.js";

import type { SourceSettings } from "../../registry/types.js";
import type { SearchSettings, Settings } from "../types/index.js";

/**
 * Values given on the command line; undefined means "not given"
 */
export type SearchSettingsOverrides = Partial<
  Pick<SearchSettings, "registries" | "concurrency" | "timeoutMs" | "includePrerelease">
>;

/**
 * Merges the three settings layers. For every field the first defined
 * value wins:
 *
 * 1. Command-line overrides
 * 2. The settings file
 * 3. Built-in defaults
 *
 * Registries are the exception to field-by-field merging: a list given on
 * the command line replaces the file's list outright.
 */
export function resolveSearchSettings(
  overrides: SearchSettingsOverrides = {},
  file?: Settings
): SearchSettings {
  return {
    registries: overrides.registries ?? file?.registries,
    concurrency: overrides.concurrency ?? file?.concurrency ?? DEFAULT_CONCURRENCY,
    timeoutMs: overrides.timeoutMs ?? file?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    includePrerelease: overrides.includePrerelease ?? file?.includePrerelease ?? true,
    userAgent: file?.userAgent,
    githubToken: file?.githubToken,
    bioconductorReleases: file?.bioconductorReleases ?? DEFAULT_BIOCONDUCTOR_RELEASES,
  };
}

/**
 * The part of the settings every registry source reads
 */
export function toSourceSettings(settings: SearchSettings): SourceSettings {
  return {
    includePrerelease: settings.includePrerelease,
    bioconductorReleases: settings.bioconductorReleases,
    ...(settings.userAgent ? { userAgent: settings.userAgent } : {}),
    ...(settings.githubToken ? { githubToken: settings.githubToken } : {}),
  };
}
