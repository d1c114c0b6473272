// pattern: Functional Core

/**
 * Identifiers of every registry source this package knows how to query
 */
export const REGISTRY_IDS = [
  "bioconda",
  "anaconda",
  "pypi",
  "bioconductor",
  "conda-forge",
  "cran",
  "ropensci",
  "posit",
  "biolib",
  "galaxy-toolshed",
  "docker-hub",
  "ghcr",
  "homebrew",
  "linux-manpages",
] as const;

export type RegistryId = (typeof REGISTRY_IDS)[number];

export function isRegistryId(value: string): value is RegistryId {
  return REGISTRY_IDS.some(id => id === value);
}

/**
 * Tri-state result of the threading heuristic. "unknown" means there was no
 * text to classify, which is not the same as finding nothing in it.
 */
export type ThreadingSupport = "explicit" | "none-detected" | "unknown";

/**
 * Versions sharing one major.minor key (or one whole unparsed string)
 */
export interface VersionGroup {
  readonly key: string;
  /** Distinct full version strings, ascending */
  readonly versions: readonly string[];
}

/**
 * Normalized record of one package's presence in one registry.
 * Instances are frozen; build them with `createPackageInfo`.
 */
export interface PackageInfo {
  /** The name the caller searched for */
  readonly name: string;
  /** The name as the registry spells it (corrected case, aliases) */
  readonly registryName: string;
  readonly repository: RegistryId;
  /** Human-readable registry name, e.g. "Docker Hub" */
  readonly displayName: string;
  /** Canonical package page, or "" */
  readonly url: string;
  readonly description: string;
  /** Distinct raw versions, ascending; never empty */
  readonly versions: readonly string[];
  readonly versionGroups: readonly VersionGroup[];
  readonly latestVersion: string;
  readonly license: string;
  readonly threadingSupport: ThreadingSupport;
  readonly threadFlags: readonly string[];
}

export type RegistryErrorReason =
  | "network_failure"
  | "parse_failure"
  | "rate_limited"
  | "timeout"
  | "unsupported";

/**
 * A per-(registry, package) failure. Collected as data, never thrown
 * across the search boundary.
 */
export interface RegistrySearchError {
  readonly repository: RegistryId;
  readonly packageName: string;
  readonly reason: RegistryErrorReason;
  readonly detail?: string;
}

/**
 * Outcome of one `find` call. An empty `infos` with success means the
 * registry was checked and the package is not there.
 */
export type RegistryFindResult =
  | { success: true; infos: PackageInfo[] }
  | { success: false; error: RegistrySearchError };

export interface FindOptions {
  /** Aborted by the searcher when the per-call timeout fires */
  signal?: AbortSignal;
}

/**
 * Static description of a registry source
 */
export interface RegistryConfig {
  id: RegistryId;
  /** Display name for the registry */
  displayName: string;
  /** Base URL for the registry API */
  baseUrl: string;
  /** Whether the source is part of the default search set */
  defaultEnabled: boolean;
}

/**
 * Interface every registry adapter implements
 */
export interface RegistrySource {
  readonly config: RegistryConfig;

  /**
   * Look a package up. Resolves to an error value instead of rejecting;
   * the searcher still guards against adapters that throw.
   */
  find(packageName: string, options?: FindOptions): Promise<RegistryFindResult>;

  /**
   * Validate that a package name could exist in this registry
   */
  validatePackageName(packageName: string): boolean;
}

/**
 * Per-package-name bundle of findings plus the error ledger
 */
export interface SearchResult {
  readonly infos: readonly PackageInfo[];
  readonly errors: readonly RegistrySearchError[];
}

/**
 * Settings shared by the built-in adapters
 */
export interface SourceSettings {
  includePrerelease: boolean;
  userAgent?: string;
  githubToken?: string;
  bioconductorReleases: number;
}
