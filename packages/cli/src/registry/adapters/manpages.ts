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
import { extractText, htmlToText } from "./html.js";

import type {
  FindOptions,
  PackageInfo,
  RegistryConfig,
  RegistryFindResult,
  RegistrySource,
  SourceSettings,
} from "../types.js";

export const MANUAL_SECTIONS = [1, 2, 3, 4, 5, 6, 7, 8] as const;

const MANPAGES_LICENSE = "GNU Free Documentation License";

// <h2>...NAME...</h2><pre>ls - list directory contents</pre>
const NAME_SECTION =
  /<h2[^>]*>(?:(?!<\/h2>)[\s\S])*?\bNAME\b[\s\S]*?<\/h2>\s*<pre[^>]*>([\s\S]*?)<\/pre>/i;
const NAME_DIV = /<div[^>]*class=["']NAME["'][^>]*>([\s\S]*?)<\/div>/i;

export function manPageUrl(baseUrl: string, packageName: string, section: number): string {
  return `${baseUrl}/man${section}/${encodeURIComponent(packageName)}.${section}.html`;
}

/**
 * The one-line summary after " - " in the NAME section
 */
export function extractManPageSummary(html: string): string | undefined {
  const nameSection = extractText(html, NAME_SECTION) ?? extractText(html, NAME_DIV);
  if (!nameSection) {
    return undefined;
  }
  const separator = nameSection.indexOf(" - ");
  return separator === -1 ? nameSection : nameSection.slice(separator + 3).trim();
}

export function parseManPage(
  packageName: string,
  html: string,
  section: number,
  url: string,
  config: RegistryConfig
): PackageInfo | undefined {
  return createPackageInfo({
    name: packageName,
    registry: config,
    url,
    description: extractManPageSummary(html),
    versions: [`Section ${section}`],
    license: MANPAGES_LICENSE,
    // The whole page is scanned for thread options
    readme: htmlToText(html),
  });
}

/**
 * man7.org manual pages. Opt-in: a page proves a command exists on Linux,
 * not that it is installable, and each miss costs up to eight requests.
 */
export class LinuxManpagesRegistrySource implements RegistrySource {
  readonly config: RegistryConfig;
  private readonly settings: Partial<SourceSettings>;

  constructor(
    settings: Partial<SourceSettings> = {},
    baseUrl = "https://man7.org/linux/man-pages"
  ) {
    this.config = {
      id: "linux-manpages",
      displayName: "Linux Manpages",
      baseUrl,
      defaultEnabled: false,
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
      // Sections are tried in order and the first page found wins
      for (const section of MANUAL_SECTIONS) {
        const url = manPageUrl(this.config.baseUrl, packageName, section);
        const html = await fetchText(url, {
          signal: options.signal,
          userAgent: this.settings.userAgent,
        });
        if (html === null) {
          continue;
        }

        const info = parseManPage(packageName, html, section, url, this.config);
        return { success: true, infos: info ? [info] : [] };
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
