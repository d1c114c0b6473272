// pattern: Mixed (unavoidable)
// for the registry source interface requirements, we must integrate both
// network I/O (imperative shell) and data transformation (functional core)
// in the same class. The parsing logic is extracted to pure functions.

import { type Static, Type } from "@sinclair/typebox";

import { ajv } from "../../utils/ajv.js";
import { fetchJson } from "../http.js";
import { createPackageInfo } from "../package-info.js";
import { failed, notFound, toRegistrySearchError, validatePackageName } from "../utils.js";

import type {
  FindOptions,
  PackageInfo,
  RegistryConfig,
  RegistryFindResult,
  RegistrySource,
  SourceSettings,
} from "../types.js";

const OptionalString = Type.Optional(Type.Union([Type.String(), Type.Null()]));

export const HomebrewFormula = Type.Object({
  name: Type.String(),
  desc: OptionalString,
  homepage: OptionalString,
  license: OptionalString,
  versions: Type.Object({
    stable: OptionalString,
    head: OptionalString,
  }),
});
export type HomebrewFormula = Static<typeof HomebrewFormula>;

const validateFormula = ajv.compile<HomebrewFormula>(HomebrewFormula);

const FORMULA_NAME = /^[a-zA-Z0-9][a-zA-Z0-9@+._-]*$/;

export function parseHomebrewFormula(
  packageName: string,
  formula: HomebrewFormula,
  config: RegistryConfig,
  includePrerelease = true
): PackageInfo | undefined {
  const { stable, head } = formula.versions;
  const versions = [stable ?? "", head ? "HEAD" : ""];

  return createPackageInfo({
    name: packageName,
    registryName: formula.name,
    registry: config,
    url: `https://formulae.brew.sh/formula/${formula.name}`,
    description: formula.desc,
    versions,
    license: formula.license,
    includePrerelease,
  });
}

export class HomebrewRegistrySource implements RegistrySource {
  readonly config: RegistryConfig;
  private readonly settings: Partial<SourceSettings>;

  constructor(
    settings: Partial<SourceSettings> = {},
    baseUrl = "https://formulae.brew.sh/api"
  ) {
    this.config = {
      id: "homebrew",
      displayName: "Homebrew",
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
      // Formula names are lowercase; the API does not fold case
      const formula = await fetchJson(
        `${this.config.baseUrl}/formula/${encodeURIComponent(packageName.toLowerCase())}.json`,
        validateFormula,
        { signal: options.signal, userAgent: this.settings.userAgent }
      );
      if (!formula) {
        return notFound();
      }

      const info = parseHomebrewFormula(
        packageName,
        formula,
        this.config,
        this.settings.includePrerelease
      );
      return { success: true, infos: info ? [info] : [] };
    } catch (error) {
      return failed(toRegistrySearchError(error, this.config.id, packageName));
    }
  }

  validatePackageName(packageName: string): boolean {
    return validatePackageName(packageName, { pattern: FORMULA_NAME, maxLength: 100 });
  }
}
