// pattern: Mixed (unavoidable)
// for the registry source interface requirements, we must integrate both
// network I/O (imperative shell) and data transformation (functional core)
// in the same class. The parsing logic is extracted to pure functions.

import { type Static, Type } from "@sinclair/typebox";

import { ajv } from "../../utils/ajv.js";
import { fetchJson } from "../http.js";
import { createPackageInfo } from "../package-info.js";
import {
  failed,
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

const NullableString = Type.Optional(Type.Union([Type.String(), Type.Null()]));

/**
 * PyPI JSON API response
 */
export const PypiPackageResponse = Type.Object({
  info: Type.Object({
    name: Type.String(),
    version: Type.String(),
    summary: NullableString,
    description: NullableString,
    license: NullableString,
    classifiers: Type.Optional(Type.Array(Type.String())),
  }),
  releases: Type.Record(Type.String(), Type.Array(Type.Unknown())),
});
export type PypiPackageResponse = Static<typeof PypiPackageResponse>;

const validatePypiPackageResponse = ajv.compile<PypiPackageResponse>(
  PypiPackageResponse
);

const LICENSE_CLASSIFIER_PREFIX = "License :: ";

/**
 * `info.license`, else the last segment of the first License classifier.
 * Long license texts pasted into `info.license` are cut to their first line.
 */
export function extractPypiLicense(
  info: PypiPackageResponse["info"]
): string | undefined {
  const declared = info.license?.trim();
  if (declared) {
    return declared.split("\n")[0]?.trim();
  }

  const classifier = info.classifiers?.find(entry =>
    entry.startsWith(LICENSE_CLASSIFIER_PREFIX)
  );
  return classifier?.split("::").pop()?.trim();
}

/**
 * Parse PyPI API response into a PackageInfo
 * Pure function - can be unit tested without network calls
 */
export function parsePypiPackageResponse(
  packageName: string,
  data: PypiPackageResponse,
  config: RegistryConfig,
  includePrerelease = true
): PackageInfo | undefined {
  // Releases without files are yanked or never uploaded
  const versions = Object.entries(data.releases)
    .filter(([, files]) => files.length > 0)
    .map(([version]) => version);

  return createPackageInfo({
    name: packageName,
    registryName: data.info.name,
    registry: config,
    url: `https://pypi.org/project/${data.info.name}`,
    description: data.info.summary,
    readme: data.info.description,
    versions,
    license: extractPypiLicense(data.info),
    includePrerelease,
  });
}

/**
 * Validate that a package name is valid for PyPI
 * Pure function - can be unit tested
 */
export function validatePypiPackageName(packageName: string): boolean {
  return validatePackageName(packageName, { pattern: SIMPLE_PACKAGE_NAME });
}

/**
 * PyPI registry source
 */
export class PypiRegistrySource implements RegistrySource {
  readonly config: RegistryConfig;
  private readonly settings: Partial<SourceSettings>;

  constructor(settings: Partial<SourceSettings> = {}, baseUrl = "https://pypi.org") {
    this.config = {
      id: "pypi",
      displayName: "PyPI",
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
      // PyPI normalizes case and separators itself
      const url = `${this.config.baseUrl}/pypi/${encodeURIComponent(packageName)}/json`;
      const data = await fetchJson(url, validatePypiPackageResponse, {
        signal: options.signal,
        userAgent: this.settings.userAgent,
      });
      if (!data) {
        return notFound();
      }

      const info = parsePypiPackageResponse(
        packageName,
        data,
        this.config,
        this.settings.includePrerelease
      );
      return { success: true, infos: info ? [info] : [] };
    } catch (error) {
      return failed(toRegistrySearchError(error, this.config.id, packageName));
    }
  }

  validatePackageName(packageName: string): boolean {
    return validatePypiPackageName(packageName);
  }
}
