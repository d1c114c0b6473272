// pattern: Functional Core
// Library entry point

export { PackageSearcher, normalizePackageNames, DEFAULT_CONCURRENCY, DEFAULT_TIMEOUT_MS } from "./search/package-searcher.js";
export type { PackageSearcherOptions, SearchProgress } from "./search/package-searcher.js";
export { aggregateResults, foundIn, isNotFound } from "./search/result-aggregator.js";
export type { RegistryOutcome } from "./search/result-aggregator.js";

export { RegistrySourceFactory } from "./registry/factory.js";
export { REGISTRY_IDS, isRegistryId } from "./registry/types.js";
export type {
  FindOptions,
  PackageInfo,
  RegistryConfig,
  RegistryErrorReason,
  RegistryFindResult,
  RegistryId,
  RegistrySearchError,
  RegistrySource,
  SearchResult,
  SourceSettings,
  ThreadingSupport,
  VersionGroup,
} from "./registry/types.js";
export { createPackageInfo } from "./registry/package-info.js";
export type { PackageInfoInput } from "./registry/package-info.js";
export { classifyThreading } from "./registry/threading.js";
export type { ThreadingClassification } from "./registry/threading.js";
export { compareVersions, groupVersions, sortVersions } from "./registry/versions/version-grouper.js";
export type { VersionGrouping } from "./registry/versions/version-grouper.js";

export { BioconductorRegistrySource } from "./registry/adapters/bioconductor.js";
export { BiolibRegistrySource } from "./registry/adapters/biolib.js";
export { CondaRegistrySource } from "./registry/adapters/conda.js";
export type { CondaChannel } from "./registry/adapters/conda.js";
export { CranRegistrySource } from "./registry/adapters/cran.js";
export { DockerHubRegistrySource } from "./registry/adapters/docker-hub.js";
export { GalaxyToolShedRegistrySource } from "./registry/adapters/galaxy.js";
export { GhcrRegistrySource } from "./registry/adapters/ghcr.js";
export { HomebrewRegistrySource } from "./registry/adapters/homebrew.js";
export { LinuxManpagesRegistrySource } from "./registry/adapters/manpages.js";
export { PositRegistrySource } from "./registry/adapters/posit.js";
export { PypiRegistrySource } from "./registry/adapters/pypi.js";
export { ROpenSciRegistrySource } from "./registry/adapters/ropensci.js";

export { loadSettings } from "./config/loaders/settings-file.js";
export { resolveSearchSettings, toSourceSettings } from "./config/mergers/search-settings.js";
export type { SearchSettings, Settings } from "./config/types/index.js";

export {
  ConfigurationError,
  FileSystemError,
  PkgscoutError,
  UsageError,
  ValidationError,
} from "./utils/errors.js";
