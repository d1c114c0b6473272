// pattern: Mixed (unavoidable)
// for the registry source interface requirements, we must integrate both
// network I/O (imperative shell) and data transformation (functional core)
// in the same class. The parsing logic is extracted to pure functions.

import { type Static, Type } from "@sinclair/typebox";
import { parse as parseYaml } from "yaml";

import { ajv } from "../../utils/ajv.js";
import { fetchOptional, fetchText, RegistryRequestError } from "../http.js";
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

export const DEFAULT_BIOCONDUCTOR_RELEASES = 6;

/**
 * The part of bioconductor.org/config.yaml we read
 */
export const BioconductorSiteConfig = Type.Object({
  release_version: Type.String({ pattern: "^\\d+\\.\\d+$" }),
});
export type BioconductorSiteConfig = Static<typeof BioconductorSiteConfig>;

const validateSiteConfig = ajv.compile<BioconductorSiteConfig>(
  BioconductorSiteConfig
);

export type DcfRecord = Record<string, string>;

/**
 * Parse a Debian control file (R's PACKAGES / VIEWS format): records are
 * separated by blank lines, continuation lines start with whitespace
 */
export function parseDcf(text: string): DcfRecord[] {
  const records: DcfRecord[] = [];
  let current: DcfRecord = {};
  let lastField: string | undefined;

  const flush = (): void => {
    if (Object.keys(current).length > 0) {
      records.push(current);
    }
    current = {};
    lastField = undefined;
  };

  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === "") {
      flush();
      continue;
    }

    if (/^\s/.test(line)) {
      if (lastField !== undefined) {
        current[lastField] = `${current[lastField] ?? ""} ${line.trim()}`;
      }
      continue;
    }

    const separator = line.indexOf(":");
    if (separator <= 0) {
      continue;
    }
    lastField = line.slice(0, separator).trim();
    current[lastField] = line.slice(separator + 1).trim();
  }
  flush();

  return records;
}

/**
 * The current release and the ones before it, newest first. Releases count
 * down within one major version, e.g. 3.20, 3.19, ... 3.0.
 */
export function bioconductorReleaseHistory(current: string, count: number): string[] {
  const [majorText, minorText] = current.split(".");
  const major = Number(majorText);
  const minor = Number(minorText);
  if (!Number.isInteger(major) || !Number.isInteger(minor)) {
    return [];
  }

  const releases: string[] = [];
  for (let m = minor; m >= 0 && releases.length < count; m--) {
    releases.push(`${major}.${m}`);
  }
  return releases;
}

/**
 * Pull one package out of per-release VIEWS records (newest release first).
 * Metadata comes from the newest release that has the package; `readme`
 * is the vignette README, when there is one.
 */
export function parseBioconductorViews(
  packageName: string,
  recordsByRelease: DcfRecord[][],
  config: RegistryConfig,
  includePrerelease = true,
  readme?: string
): PackageInfo | undefined {
  const wanted = packageName.toLowerCase();
  const versions: string[] = [];
  let newest: DcfRecord | undefined;

  for (const records of recordsByRelease) {
    const record = records.find(
      entry => entry["Package"]?.toLowerCase() === wanted
    );
    const version = record?.["Version"];
    if (!record || !version) {
      continue;
    }
    newest ??= record;
    versions.push(version);
  }

  const registryName = newest?.["Package"];
  if (!newest || !registryName) {
    return undefined;
  }

  return createPackageInfo({
    name: packageName,
    registryName,
    registry: config,
    url: `${config.baseUrl}/packages/release/bioc/html/${registryName}.html`,
    description: newest["Title"],
    readme: [newest["Description"], readme].filter(Boolean).join("\n\n"),
    versions,
    license: newest["License"],
    includePrerelease,
  });
}

/**
 * Bioconductor software packages across recent releases
 */
export class BioconductorRegistrySource implements RegistrySource {
  readonly config: RegistryConfig;
  private readonly settings: Partial<SourceSettings>;

  constructor(
    settings: Partial<SourceSettings> = {},
    baseUrl = "https://bioconductor.org"
  ) {
    this.config = {
      id: "bioconductor",
      displayName: "Bioconductor",
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

      const current = await this.fetchCurrentRelease(requestOptions);
      const releases = bioconductorReleaseHistory(
        current,
        this.settings.bioconductorReleases ?? DEFAULT_BIOCONDUCTOR_RELEASES
      );

      const recordsByRelease = await Promise.all(
        releases.map(async release => {
          const text = await fetchText(
            `${this.config.baseUrl}/packages/${release}/bioc/VIEWS`,
            requestOptions
          );
          return text ? parseDcf(text) : [];
        })
      );

      const info = parseBioconductorViews(
        packageName,
        recordsByRelease,
        this.config,
        this.settings.includePrerelease
      );
      if (!info) {
        return notFound();
      }

      const readme = await fetchOptional(
        () =>
          fetchText(
            `${this.config.baseUrl}/packages/release/bioc/vignettes/${encodeURIComponent(info.registryName)}/inst/doc/README`,
            requestOptions
          ),
        options.signal
      );
      if (!readme) {
        return { success: true, infos: [info] };
      }

      const enriched = parseBioconductorViews(
        packageName,
        recordsByRelease,
        this.config,
        this.settings.includePrerelease,
        readme
      );
      return { success: true, infos: [enriched ?? info] };
    } catch (error) {
      return failed(toRegistrySearchError(error, this.config.id, packageName));
    }
  }

  private async fetchCurrentRelease(requestOptions: {
    signal: AbortSignal | undefined;
    userAgent: string | undefined;
  }): Promise<string> {
    const url = `${this.config.baseUrl}/config.yaml`;
    const text = await fetchText(url, requestOptions);
    // failsafe keeps "3.20" a string instead of the number 3.2
    const siteConfig: unknown = text ? parseYaml(text, { schema: "failsafe" }) : null;

    if (!validateSiteConfig(siteConfig)) {
      throw new RegistryRequestError(
        `No release_version in ${url}`,
        "parse_failure"
      );
    }
    return siteConfig.release_version;
  }

  validatePackageName(packageName: string): boolean {
    return validatePackageName(packageName, { pattern: SIMPLE_PACKAGE_NAME });
  }
}
