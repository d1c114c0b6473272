// pattern: Imperative Shell

import { fetchJson } from "../http.js";
import {
  failed,
  notFound,
  SIMPLE_PACKAGE_NAME,
  toRegistrySearchError,
  validatePackageName,
} from "../utils.js";
import {
  fetchOptionalVersionList,
  parseRPackageDescription,
  validateRPackageDescription,
} from "./r-description.js";

import type {
  FindOptions,
  RegistryConfig,
  RegistryFindResult,
  RegistrySource,
  SourceSettings,
} from "../types.js";

/**
 * rOpenSci's r-universe
 */
export class ROpenSciRegistrySource implements RegistrySource {
  readonly config: RegistryConfig;
  private readonly settings: Partial<SourceSettings>;

  constructor(
    settings: Partial<SourceSettings> = {},
    baseUrl = "https://ropensci.r-universe.dev"
  ) {
    this.config = {
      id: "ropensci",
      displayName: "rOpenSci",
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
      const encoded = encodeURIComponent(packageName);

      const description = await fetchJson(
        `${this.config.baseUrl}/api/packages/${encoded}`,
        validateRPackageDescription,
        requestOptions
      );
      if (!description) {
        return notFound();
      }

      const history = await fetchOptionalVersionList(
        `${this.config.baseUrl}/api/versions/${encodeURIComponent(description.Package)}`,
        requestOptions
      );

      const info = parseRPackageDescription(
        packageName,
        description,
        history,
        `${this.config.baseUrl}/${description.Package}`,
        this.config,
        this.settings.includePrerelease
      );
      return { success: true, infos: info ? [info] : [] };
    } catch (error) {
      return failed(toRegistrySearchError(error, this.config.id, packageName));
    }
  }

  validatePackageName(packageName: string): boolean {
    return validatePackageName(packageName, { pattern: SIMPLE_PACKAGE_NAME });
  }
}
