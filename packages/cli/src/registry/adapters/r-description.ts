// pattern: Mixed (unavoidable)
// DESCRIPTION records as served by r-universe and Posit Package Manager.
// The optional history fetch is the only I/O here.

import { type Static, Type } from "@sinclair/typebox";

import { ajv } from "../../utils/ajv.js";
import { fetchJson, fetchOptional, type RequestOptions } from "../http.js";
import { createPackageInfo } from "../package-info.js";

import type { PackageInfo, RegistryConfig } from "../types.js";

const OptionalString = Type.Optional(Type.Union([Type.String(), Type.Null()]));

/**
 * DESCRIPTION-style record served by r-universe and Posit Package Manager
 */
export const RPackageDescription = Type.Object({
  Package: Type.String(),
  Version: Type.String(),
  Title: OptionalString,
  Description: OptionalString,
  License: OptionalString,
});
export type RPackageDescription = Static<typeof RPackageDescription>;

export const RPackageVersionList = Type.Array(
  Type.Object({ Version: OptionalString })
);
export type RPackageVersionList = Static<typeof RPackageVersionList>;

export const validateRPackageDescription = ajv.compile<RPackageDescription>(
  RPackageDescription
);
export const validateRPackageVersionList = ajv.compile<RPackageVersionList>(
  RPackageVersionList
);

/**
 * Fetch the optional version history. Any failure leaves only the current
 * version, so it never fails the lookup itself.
 */
export async function fetchOptionalVersionList(
  url: string,
  requestOptions: RequestOptions
): Promise<string[]> {
  const list = await fetchOptional(
    () => fetchJson(url, validateRPackageVersionList, requestOptions),
    requestOptions.signal
  );
  return (list ?? []).flatMap(entry => (entry.Version ? [entry.Version] : []));
}

/**
 * Pure function - can be unit tested without network calls
 */
export function parseRPackageDescription(
  packageName: string,
  description: RPackageDescription,
  history: string[],
  url: string,
  config: RegistryConfig,
  includePrerelease = true
): PackageInfo | undefined {
  return createPackageInfo({
    name: packageName,
    registryName: description.Package,
    registry: config,
    url,
    description: description.Title ?? description.Description,
    readme: description.Description,
    versions: [description.Version, ...history],
    license: description.License,
    includePrerelease,
  });
}
