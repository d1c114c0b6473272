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
 * Posit Package Manager; serves the same DESCRIPTION records as r-universe
 */
export class PositRegistrySource implements RegistrySource {
  readonly config: RegistryConfig;
  private readonly settings: Partial<SourceSettings>;

  constructor(
    settings: Partial<SourceSettings> = {},
    baseUrl = "https://packagemanager.posit.co/client"
  ) {
    this.config = {
      id: "posit",
      displayName: "Posit Package Manager",
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
      const packageUrl = `${this.config.baseUrl}/packages/${encodeURIComponent(packageName)}`;

      const description = await fetchJson(
        packageUrl,
        validateRPackageDescription,
        requestOptions
      );
      if (!description) {
        return notFound();
      }

      const history = await fetchOptionalVersionList(
        `${packageUrl}/versions`,
        requestOptions
      );

      const info = parseRPackageDescription(
        packageName,
        description,
        history,
        `${this.config.baseUrl}/packages/${description.Package}`,
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
