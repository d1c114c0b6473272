// pattern: Mixed (unavoidable)
// for the registry source interface requirements, we must integrate both
// network I/O (imperative shell) and data transformation (functional core)
// in the same class. The parsing logic is extracted to pure functions.

import { fetchText } from "../http.js";
import { createPackageInfo } from "../package-info.js";
import {
  failed,
  notFound,
  SIMPLE_PACKAGE_NAME,
  toRegistrySearchError,
  validatePackageName,
} from "../utils.js";
import { extractMetaContent, extractText } from "./html.js";

import type {
  FindOptions,
  PackageInfo,
  RegistryConfig,
  RegistryFindResult,
  RegistrySource,
  SourceSettings,
} from "../types.js";

const DEFAULT_ACCOUNT = "bio-utils";

/**
 * Application pages to try, in order
 */
export function biolibCandidateUrls(baseUrl: string, packageName: string): string[] {
  const urls = [packageName.toLowerCase(), packageName].map(
    name => `${baseUrl}/${DEFAULT_ACCOUNT}/${encodeURIComponent(name)}/`
  );
  return [...new Set(urls)];
}

/**
 * Scrape an application page. Pages carry their versions in embedded
 * JSON as "semantic_version" values; a page without one is not a package.
 */
export function parseBiolibPage(
  packageName: string,
  html: string,
  url: string,
  config: RegistryConfig,
  includePrerelease = true
): PackageInfo | undefined {
  const versions = [...html.matchAll(/"semantic_version"\s*:\s*"([^"]+)"/g)].flatMap(
    match => (match[1] ? [match[1]] : [])
  );

  const title =
    extractText(html, /<h1[^>]*>([\s\S]*?)<\/h1>/i) ??
    extractText(html, /<title[^>]*>([\s\S]*?)<\/title>/i);
  const registryName = title?.split(":")[0]?.trim() || packageName;

  return createPackageInfo({
    name: packageName,
    registryName,
    registry: config,
    url,
    description: extractMetaContent(html, "description"),
    versions,
    includePrerelease,
  });
}

/**
 * BioLib application pages
 */
export class BiolibRegistrySource implements RegistrySource {
  readonly config: RegistryConfig;
  private readonly settings: Partial<SourceSettings>;

  constructor(settings: Partial<SourceSettings> = {}, baseUrl = "https://biolib.com") {
    this.config = {
      id: "biolib",
      displayName: "BioLib",
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
      for (const url of biolibCandidateUrls(this.config.baseUrl, packageName)) {
        const html = await fetchText(url, {
          signal: options.signal,
          userAgent: this.settings.userAgent,
        });
        if (!html) {
          continue;
        }

        const info = parseBiolibPage(
          packageName,
          html,
          url,
          this.config,
          this.settings.includePrerelease
        );
        if (info) {
          return { success: true, infos: [info] };
        }
      }
      return notFound();
    } catch (error) {
      return failed(toRegistrySearchError(error, this.config.id, packageName));
    }
  }

  validatePackageName(packageName: string): boolean {
    return validatePackageName(packageName, { pattern: SIMPLE_PACKAGE_NAME });
  }
}
