// pattern: Mixed (unavoidable)
// for the registry source interface requirements, we must integrate both
// network I/O (imperative shell) and data transformation (functional core)
// in the same class. The parsing logic is extracted to pure functions.

import { fetchOptional, fetchText, type RequestOptions } from "../http.js";
import { createPackageInfo } from "../package-info.js";
import {
  failed,
  findCaseInsensitiveMatch,
  notFound,
  SIMPLE_PACKAGE_NAME,
  toRegistrySearchError,
  validatePackageName,
} from "../utils.js";
import { escapeRegExp, extractText } from "./html.js";

import type {
  FindOptions,
  PackageInfo,
  RegistryConfig,
  RegistryFindResult,
  RegistrySource,
  SourceSettings,
} from "../types.js";

export interface CranPackagePage {
  name: string | undefined;
  title: string | undefined;
  summary: string | undefined;
  version: string | undefined;
  license: string | undefined;
}

function tableRow(html: string, label: string): string | undefined {
  return extractText(
    html,
    new RegExp(`<td>\\s*${label}:\\s*</td>\\s*<td[^>]*>([\\s\\S]*?)</td>`, "i")
  );
}

/**
 * Read the fields we need from a CRAN package index page
 */
export function parseCranPackagePage(html: string): CranPackagePage {
  return {
    name: /<h2>\s*([^:<]+?)\s*:/i.exec(html)?.[1],
    title: extractText(html, /<h2>[^:<]*:([\s\S]*?)<\/h2>/i),
    summary: extractText(html, /<\/h2>\s*<p>([\s\S]*?)<\/p>/i),
    version: tableRow(html, "Version"),
    license: tableRow(html, "License"),
  };
}

/**
 * Versions named by `<name>_<version>.tar.gz` links in an Archive listing
 */
export function parseCranArchiveListing(packageName: string, html: string): string[] {
  const pattern = new RegExp(
    `${escapeRegExp(packageName)}_([^"/<>\\s]+?)\\.tar\\.gz`,
    "g"
  );
  const versions = new Set<string>();
  for (const match of html.matchAll(pattern)) {
    if (match[1]) {
      versions.add(match[1]);
    }
  }
  return [...versions];
}

/**
 * Package names linked from `available_packages_by_name.html`
 */
export function parseCranPackageList(html: string): string[] {
  const names = new Set<string>();
  for (const match of html.matchAll(/web\/packages\/([A-Za-z][A-Za-z0-9.]*)\/index\.html/g)) {
    if (match[1]) {
      names.add(match[1]);
    }
  }
  return [...names];
}

export function buildCranPackageInfo(
  packageName: string,
  page: CranPackagePage,
  archivedVersions: string[],
  config: RegistryConfig,
  includePrerelease = true
): PackageInfo | undefined {
  const registryName = page.name ?? packageName;
  const versions = page.version ? [page.version, ...archivedVersions] : archivedVersions;

  return createPackageInfo({
    name: packageName,
    registryName,
    registry: config,
    url: `${config.baseUrl}/web/packages/${registryName}/index.html`,
    description: page.summary ?? page.title,
    readme: page.title,
    versions,
    license: page.license,
    includePrerelease,
  });
}

/**
 * CRAN, read from its static package pages and source archive
 */
export class CranRegistrySource implements RegistrySource {
  readonly config: RegistryConfig;
  private readonly settings: Partial<SourceSettings>;

  constructor(
    settings: Partial<SourceSettings> = {},
    baseUrl = "https://cran.r-project.org"
  ) {
    this.config = {
      id: "cran",
      displayName: "CRAN",
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

      let registryName = packageName;
      let pages = await this.fetchPages(packageName, requestOptions);
      if (!pages) {
        // CRAN paths are case-sensitive; retry with the spelling CRAN lists
        const corrected = await this.findListedSpelling(packageName, requestOptions);
        if (!corrected) {
          return notFound();
        }
        registryName = corrected;
        pages = await this.fetchPages(corrected, requestOptions);
        if (!pages) {
          return notFound();
        }
      }

      const page = parseCranPackagePage(pages.page);
      const info = buildCranPackageInfo(
        packageName,
        { ...page, name: page.name ?? registryName },
        pages.archive ? parseCranArchiveListing(registryName, pages.archive) : [],
        this.config,
        this.settings.includePrerelease
      );
      return { success: true, infos: info ? [info] : [] };
    } catch (error) {
      return failed(toRegistrySearchError(error, this.config.id, packageName));
    }
  }

  private async fetchPages(
    name: string,
    requestOptions: RequestOptions
  ): Promise<{ page: string; archive: string | null } | null> {
    const encoded = encodeURIComponent(name);
    const [page, archive] = await Promise.all([
      fetchText(`${this.config.baseUrl}/web/packages/${encoded}/index.html`, requestOptions),
      fetchText(`${this.config.baseUrl}/src/contrib/Archive/${encoded}/`, requestOptions),
    ]);
    return page ? { page, archive } : null;
  }

  /**
   * Another spelling of the name from the package list, if there is one
   */
  private async findListedSpelling(
    packageName: string,
    requestOptions: RequestOptions
  ): Promise<string | undefined> {
    const listing = await fetchOptional(
      () =>
        fetchText(
          `${this.config.baseUrl}/web/packages/available_packages_by_name.html`,
          requestOptions
        ),
      requestOptions.signal
    );
    const match = listing
      ? findCaseInsensitiveMatch(packageName, parseCranPackageList(listing))
      : undefined;
    return match === packageName ? undefined : match;
  }

  validatePackageName(packageName: string): boolean {
    // R package names: letters, digits and dots, starting with a letter
    return (
      validatePackageName(packageName, { pattern: SIMPLE_PACKAGE_NAME }) &&
      /^[a-zA-Z][a-zA-Z0-9.]*$/.test(packageName)
    );
  }
}
