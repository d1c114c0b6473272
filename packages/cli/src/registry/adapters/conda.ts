// pattern: Mixed (unavoidable)
// for the registry source interface requirements, we must integrate both
// network I/O (imperative shell) and data transformation (functional core)
// in the same class. The parsing logic is extracted to pure functions.

import { type Static, Type } from "@sinclair/typebox";

import { ajv } from "../../utils/ajv.js";
import { fetchJson, fetchOptional, type RequestOptions } from "../http.js";
import { createPackageInfo } from "../package-info.js";
import {
  failed,
  findCaseInsensitiveMatch,
  notFound,
  SIMPLE_PACKAGE_NAME,
  toRegistrySearchError,
  validatePackageName,
} from "../utils.js";

import type {
  FindOptions,
  PackageInfo,
  RegistryConfig,
  RegistryFindResult,
  RegistrySource,
  SourceSettings,
} from "../types.js";

export type CondaChannel = "bioconda" | "anaconda" | "conda-forge";

const CHANNEL_DISPLAY_NAMES: Record<CondaChannel, string> = {
  bioconda: "Bioconda",
  anaconda: "Anaconda",
  "conda-forge": "Conda-forge",
};

/**
 * anaconda.org package API response
 */
export const CondaPackageResponse = Type.Object({
  name: Type.String(),
  summary: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  description: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  license: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  versions: Type.Array(Type.String()),
  latest_version: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});
export type CondaPackageResponse = Static<typeof CondaPackageResponse>;

const validateCondaPackageResponse = ajv.compile<CondaPackageResponse>(
  CondaPackageResponse
);

/**
 * Channel listing; only the names are read
 */
export const CondaPackageList = Type.Array(Type.Object({ name: Type.String() }));
export type CondaPackageList = Static<typeof CondaPackageList>;

const validateCondaPackageList = ajv.compile<CondaPackageList>(CondaPackageList);

// Bioconductor packages are repackaged on conda channels under this prefix
const BIOCONDUCTOR_ALIAS_PREFIX = "bioconductor-";

/**
 * Parse an anaconda.org response into a PackageInfo
 * Pure function - can be unit tested without network calls
 */
export function parseCondaPackageResponse(
  packageName: string,
  data: CondaPackageResponse,
  config: RegistryConfig,
  includePrerelease = true
): PackageInfo | undefined {
  return createPackageInfo({
    name: packageName,
    registryName: data.name,
    registry: config,
    url: `https://anaconda.org/${config.id}/${data.name}`,
    description: data.summary,
    readme: data.description,
    versions: data.versions,
    license: data.license,
    includePrerelease,
  });
}

/**
 * Names to try, in order of preference
 */
export function condaCandidateNames(packageName: string): string[] {
  const lower = packageName.toLowerCase();
  if (lower.startsWith(BIOCONDUCTOR_ALIAS_PREFIX)) {
    return [lower];
  }
  return [`${BIOCONDUCTOR_ALIAS_PREFIX}${lower}`, lower];
}

/**
 * Channel spellings of the candidates that differ from the candidates
 * themselves, in candidate order
 */
export function condaListedSpellings(
  candidates: readonly string[],
  listed: readonly string[]
): string[] {
  return candidates.flatMap(candidate => {
    const match = findCaseInsensitiveMatch(candidate, listed);
    return match && !candidates.includes(match) ? [match] : [];
  });
}

/**
 * Source for one anaconda.org channel
 */
export class CondaRegistrySource implements RegistrySource {
  readonly config: RegistryConfig;
  private readonly settings: Partial<SourceSettings>;

  constructor(
    channel: CondaChannel,
    settings: Partial<SourceSettings> = {},
    baseUrl = "https://api.anaconda.org"
  ) {
    this.config = {
      id: channel,
      displayName: CHANNEL_DISPLAY_NAMES[channel],
      baseUrl,
      defaultEnabled: true,
    };
    this.settings = settings;
  }

  async find(
    packageName: string,
    options: FindOptions = {}
  ): Promise<RegistryFindResult> {
    if (!this.validatePackageName(packageName)) {
      return notFound();
    }

    try {
      const requestOptions = {
        signal: options.signal,
        userAgent: this.settings.userAgent,
      };
      const candidates = condaCandidateNames(packageName);

      // The bioconductor- alias wins over the plain name when both exist
      for (const candidate of candidates) {
        const info = await this.lookup(packageName, candidate, requestOptions);
        if (info) {
          return { success: true, infos: [info] };
        }
      }

      // Names are case-sensitive in the API; retry with the channel's spelling
      const listing = await fetchOptional(
        () =>
          fetchJson(
            `${this.config.baseUrl}/packages/${this.config.id}`,
            validateCondaPackageList,
            requestOptions
          ),
        options.signal
      );
      const spellings = condaListedSpellings(
        candidates,
        (listing ?? []).map(entry => entry.name)
      );
      for (const spelling of spellings) {
        const info = await this.lookup(packageName, spelling, requestOptions);
        if (info) {
          return { success: true, infos: [info] };
        }
      }
      return notFound();
    } catch (error) {
      return failed(toRegistrySearchError(error, this.config.id, packageName));
    }
  }

  private async lookup(
    packageName: string,
    candidate: string,
    requestOptions: RequestOptions
  ): Promise<PackageInfo | undefined> {
    const url = `${this.config.baseUrl}/package/${this.config.id}/${encodeURIComponent(candidate)}`;
    const data = await fetchJson(url, validateCondaPackageResponse, requestOptions);
    return data
      ? parseCondaPackageResponse(packageName, data, this.config, this.settings.includePrerelease)
      : undefined;
  }

  validatePackageName(packageName: string): boolean {
    return validatePackageName(packageName, { pattern: SIMPLE_PACKAGE_NAME });
  }
}
