// pattern: Functional Core

import { prerelease as semverPrerelease, valid as isValidSemver } from "semver";

import { isAbortError, RegistryRequestError } from "./http.js";

import type {
  RegistryFindResult,
  RegistryId,
  RegistrySearchError,
} from "./types.js";

/**
 * Check if a version string is valid semver
 */
export function isValidSemanticVersion(version: string): boolean {
  return isValidSemver(version) !== null;
}

// A keyword counts only as its own token after the numeric part, so
// "2.0-arch" and "3.1-source" stay releases
const PRERELEASE_KEYWORD = /(?:^|[\d.\-_+])(?:alpha|beta|rc|pre|dev|snapshot)(?:[\d.\-_+]|$)/i;
// Short PEP 440 forms such as "2.0a1" and "1.4b2"
const PEP440_PRERELEASE = /^v?\d+(?:\.\d+)*(?:a|b|rc)\d+$/i;

/**
 * Semver pre-release for valid semver, otherwise a pre-release keyword
 * token or a short PEP 440 pre-release
 */
export function isPrerelease(version: string): boolean {
  if (isValidSemanticVersion(version)) {
    return semverPrerelease(version) !== null;
  }
  return PRERELEASE_KEYWORD.test(version) || PEP440_PRERELEASE.test(version);
}

export function filterPrereleases(
  versions: Iterable<string>,
  includePrerelease: boolean
): string[] {
  const all = [...versions];
  return includePrerelease ? all : all.filter(v => !isPrerelease(v));
}

export interface PackageNameValidationRules {
  /** Defaults to 214 */
  maxLength?: number;
  pattern?: RegExp;
}

/**
 * A name outside these rules cannot exist in the registry
 */
export function validatePackageName(
  packageName: string,
  rules: PackageNameValidationRules = {}
): boolean {
  const { maxLength = 214, pattern } = rules;

  if (packageName.length === 0 || packageName.length > maxLength) {
    return false;
  }

  return !pattern || pattern.test(packageName);
}

/**
 * Common shape of R / conda / PyPI style names: letters, digits, dots,
 * hyphens and underscores, starting and ending with a letter or digit
 */
export const SIMPLE_PACKAGE_NAME = /^[a-zA-Z0-9]([a-zA-Z0-9._-]*[a-zA-Z0-9])?$/;

/**
 * Return the spelling from `candidates` that matches `packageName`
 * ignoring case, or undefined
 */
export function findCaseInsensitiveMatch(
  packageName: string,
  candidates: Iterable<string>
): string | undefined {
  const wanted = packageName.toLowerCase();
  for (const candidate of candidates) {
    if (candidate.toLowerCase() === wanted) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Convert anything thrown while querying a registry into an error value
 */
export function toRegistrySearchError(
  error: unknown,
  repository: RegistryId,
  packageName: string
): RegistrySearchError {
  if (error instanceof RegistryRequestError) {
    return { repository, packageName, reason: error.reason, detail: error.message };
  }

  if (isAbortError(error)) {
    return {
      repository,
      packageName,
      reason: "timeout",
      detail: `Request to ${repository} was aborted`,
    };
  }

  // Anything else came out of normalizing a response we did receive
  const detail = error instanceof Error ? error.message : String(error);
  return { repository, packageName, reason: "parse_failure", detail };
}

export function notFound(): RegistryFindResult {
  return { success: true, infos: [] };
}

export function failed(error: RegistrySearchError): RegistryFindResult {
  return { success: false, error };
}
