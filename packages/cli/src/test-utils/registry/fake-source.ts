// pattern: Test

import { createPackageInfo } from "../../registry/package-info.js";

import type {
  FindOptions,
  PackageInfo,
  RegistryConfig,
  RegistryFindResult,
  RegistryId,
  RegistrySearchError,
  RegistrySource,
} from "../../registry/types.js";

export type FindBehavior = (
  packageName: string,
  options: FindOptions
) => Promise<RegistryFindResult>;

/**
 * In-process RegistrySource whose answers come from a callback
 */
export class FakeRegistrySource implements RegistrySource {
  readonly config: RegistryConfig;
  readonly calls: string[] = [];

  constructor(
    id: RegistryId,
    private readonly behavior: FindBehavior,
    displayName: string = id
  ) {
    this.config = {
      id,
      displayName,
      baseUrl: `https://${id}.test`,
      defaultEnabled: true,
    };
  }

  find(packageName: string, options: FindOptions = {}): Promise<RegistryFindResult> {
    this.calls.push(packageName);
    return this.behavior(packageName, options);
  }

  validatePackageName(packageName: string): boolean {
    return packageName.length > 0;
  }
}

export function fakeInfo(
  repository: RegistryId,
  packageName: string,
  versions: string[] = ["1.0.0"]
): PackageInfo {
  const info = createPackageInfo({
    name: packageName,
    registry: { id: repository, displayName: repository },
    url: `https://${repository}.test/${packageName}`,
    versions,
  });
  if (!info) {
    throw new Error("fakeInfo needs at least one version");
  }
  return info;
}

export function found(repository: RegistryId, versions?: string[]): FindBehavior {
  return async packageName => ({
    success: true,
    infos: [fakeInfo(repository, packageName, versions)],
  });
}

export const absent: FindBehavior = async () => ({ success: true, infos: [] });

export function failing(
  repository: RegistryId,
  reason: RegistrySearchError["reason"]
): FindBehavior {
  return async packageName => ({
    success: false,
    error: { repository, packageName, reason },
  });
}

/**
 * Answers only once the caller aborts, the way a stalled request would
 */
export const stalled: FindBehavior = (_packageName, options) =>
  new Promise<RegistryFindResult>((_resolve, reject) => {
    options.signal?.addEventListener("abort", () => {
      reject(new DOMException("This operation was aborted", "AbortError"));
    });
  });
