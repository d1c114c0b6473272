// pattern: Functional Core

import { classifyThreading } from "./threading.js";
import { filterPrereleases } from "./utils.js";
import { groupVersions, sortVersions } from "./versions/version-grouper.js";

import type { PackageInfo, RegistryConfig } from "./types.js";

export interface PackageInfoInput {
  /** The name the caller searched for */
  name: string;
  /** The registry's own spelling; defaults to `name` */
  registryName?: string;
  registry: Pick<RegistryConfig, "id" | "displayName">;
  url?: string;
  description?: string | null;
  versions: Iterable<string>;
  license?: string | null;
  /** Extra text scanned for threading hints only */
  readme?: string | null;
  includePrerelease?: boolean;
}

/**
 * Build a normalized, frozen PackageInfo. Returns undefined when no
 * version survives cleaning, since a record without versions is
 * reported as not found.
 */
export function createPackageInfo(input: PackageInfoInput): PackageInfo | undefined {
  const cleaned = [...input.versions]
    .map(version => version.trim())
    .filter(version => version.length > 0);
  const versions = filterPrereleases(
    new Set(cleaned),
    input.includePrerelease ?? true
  );

  const { groups, latestVersion } = groupVersions(versions);
  if (latestVersion === undefined) {
    return undefined;
  }

  const description = (input.description ?? "").trim();
  const license = (input.license ?? "").trim();
  const threading = classifyThreading(description, input.readme ?? undefined);

  return Object.freeze({
    name: input.name,
    registryName: input.registryName ?? input.name,
    repository: input.registry.id,
    displayName: input.registry.displayName,
    url: input.url ?? "",
    description,
    versions: Object.freeze(sortVersions(versions)),
    versionGroups: Object.freeze(
      groups.map(group =>
        Object.freeze({ key: group.key, versions: Object.freeze([...group.versions]) })
      )
    ),
    latestVersion,
    license: license || "Unknown",
    threadingSupport: threading.support,
    threadFlags: Object.freeze(threading.flags),
  });
}
