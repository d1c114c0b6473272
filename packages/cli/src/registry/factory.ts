// pattern: Functional Core

import { BioconductorRegistrySource } from "./adapters/bioconductor.js";
import { BiolibRegistrySource } from "./adapters/biolib.js";
import { CondaRegistrySource } from "./adapters/conda.js";
import { CranRegistrySource } from "./adapters/cran.js";
import { DockerHubRegistrySource } from "./adapters/docker-hub.js";
import { GalaxyToolShedRegistrySource } from "./adapters/galaxy.js";
import { GhcrRegistrySource } from "./adapters/ghcr.js";
import { HomebrewRegistrySource } from "./adapters/homebrew.js";
import { LinuxManpagesRegistrySource } from "./adapters/manpages.js";
import { PositRegistrySource } from "./adapters/posit.js";
import { PypiRegistrySource } from "./adapters/pypi.js";
import { ROpenSciRegistrySource } from "./adapters/ropensci.js";
import { REGISTRY_IDS } from "./types.js";

import type { RegistryId, RegistrySource, SourceSettings } from "./types.js";

/**
 * Factory for creating registry sources by id
 */
// eslint-disable-next-line @typescript-eslint/no-extraneous-class -- factory pattern with only static methods
export class RegistrySourceFactory {
  /**
   * Create the registry source for the specified id
   */
  static createSource(
    id: RegistryId,
    settings: Partial<SourceSettings> = {}
  ): RegistrySource {
    switch (id) {
      case "bioconda":
      case "anaconda":
      case "conda-forge":
        return new CondaRegistrySource(id, settings);
      case "pypi":
        return new PypiRegistrySource(settings);
      case "bioconductor":
        return new BioconductorRegistrySource(settings);
      case "cran":
        return new CranRegistrySource(settings);
      case "ropensci":
        return new ROpenSciRegistrySource(settings);
      case "posit":
        return new PositRegistrySource(settings);
      case "biolib":
        return new BiolibRegistrySource(settings);
      case "galaxy-toolshed":
        return new GalaxyToolShedRegistrySource(settings);
      case "docker-hub":
        return new DockerHubRegistrySource(settings);
      case "ghcr":
        return new GhcrRegistrySource(settings);
      case "homebrew":
        return new HomebrewRegistrySource(settings);
      case "linux-manpages":
        return new LinuxManpagesRegistrySource(settings);
      default: {
        const unsupported: never = id;
        throw new Error(`Unsupported registry: ${String(unsupported)}`);
      }
    }
  }

  /**
   * Every registry with its display name and whether a default search
   * with these settings includes it, in search order
   */
  static getSupportedRegistries(settings: Partial<SourceSettings> = {}): {
    id: RegistryId;
    displayName: string;
    defaultEnabled: boolean;
  }[] {
    return REGISTRY_IDS.map(id => {
      const { displayName, defaultEnabled } = this.createSource(id, settings).config;
      return { id, displayName, defaultEnabled };
    });
  }

  /**
   * Create sources for the given ids in the caller's order, or the default
   * set in registry-list order when none are named
   */
  static createSources(
    settings: Partial<SourceSettings> = {},
    ids?: readonly RegistryId[]
  ): RegistrySource[] {
    if (ids) {
      return [...new Set(ids)].map(id => this.createSource(id, settings));
    }
    return REGISTRY_IDS.map(id => this.createSource(id, settings)).filter(
      source => source.config.defaultEnabled
    );
  }

  static createDefaultSources(settings: Partial<SourceSettings> = {}): RegistrySource[] {
    return this.createSources(settings);
  }
}
