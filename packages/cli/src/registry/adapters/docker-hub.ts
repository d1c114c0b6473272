// pattern: Mixed (unavoidable)
// for the registry source interface requirements, we must integrate both
// network I/O (imperative shell) and data transformation (functional core)
// in the same class. The parsing logic is extracted to pure functions.

import { type Static, Type } from "@sinclair/typebox";

import { ajv } from "../../utils/ajv.js";
import { fetchJson } from "../http.js";
import { createPackageInfo } from "../package-info.js";
import { failed, notFound, toRegistrySearchError } from "../utils.js";

import type {
  FindOptions,
  PackageInfo,
  RegistryConfig,
  RegistryFindResult,
  RegistrySource,
  SourceSettings,
} from "../types.js";

const OptionalString = Type.Optional(Type.Union([Type.String(), Type.Null()]));

/**
 * Docker Hub registry API response types
 */
export const DockerHubSearchResponse = Type.Object({
  results: Type.Array(
    Type.Object({
      repo_name: Type.String(),
      short_description: OptionalString,
      is_official: Type.Optional(Type.Boolean()),
    })
  ),
});
export type DockerHubSearchResponse = Static<typeof DockerHubSearchResponse>;
export type DockerHubSearchResult = DockerHubSearchResponse["results"][number];

export const DockerHubTagsResponse = Type.Object({
  count: Type.Optional(Type.Number()),
  results: Type.Array(
    Type.Object({
      name: Type.String(),
      tag_status: Type.Optional(Type.String()),
    })
  ),
});
export type DockerHubTagsResponse = Static<typeof DockerHubTagsResponse>;

const validateSearchResponse = ajv.compile<DockerHubSearchResponse>(
  DockerHubSearchResponse
);
const validateTagsResponse = ajv.compile<DockerHubTagsResponse>(
  DockerHubTagsResponse
);

/**
 * Parse Docker image name into namespace and repository
 * Pure function - can be unit tested
 */
export function parseDockerImageName(imageName: string): {
  namespace: string;
  repository: string;
  fullName: string;
} {
  // Handle official images (no namespace)
  if (!imageName.includes("/")) {
    return {
      namespace: "library",
      repository: imageName,
      fullName: `library/${imageName}`,
    };
  }

  // Handle registry.com/namespace/repo format - just take the last two parts
  const parts = imageName.split("/");
  const namespace = parts[parts.length - 2];
  const repository = parts[parts.length - 1];
  if (!namespace || !repository) {
    throw new Error(`Invalid image name: ${imageName}`);
  }
  return {
    namespace,
    repository,
    fullName: `${namespace}/${repository}`,
  };
}

/**
 * Validate that an image name is valid for Docker Hub
 * Pure function - can be unit tested
 */
export function validateDockerImageName(imageName: string): boolean {
  if (!imageName || imageName.trim() === "") {
    return false;
  }

  // Allow: letters, numbers, hyphens, underscores, dots, and single slash
  const dockerImagePattern = /^[a-zA-Z0-9]([a-zA-Z0-9._-]*\/)?[a-zA-Z0-9._-]*$/;
  if (!dockerImagePattern.test(imageName)) {
    return false;
  }

  const parts = imageName.split("/");
  if (parts.length > 2) {
    return false;
  }

  // Parts cannot be empty, or start or end with special characters
  return parts.every(
    part => part.length > 0 && /^[a-zA-Z0-9]/.test(part) && /[a-zA-Z0-9]$/.test(part)
  );
}

/**
 * Official image first, then any namespace's image of that name, then the
 * top search hit
 */
export function selectDockerHubRepository(
  imageName: string,
  results: DockerHubSearchResult[]
): DockerHubSearchResult | undefined {
  const wanted = imageName.toLowerCase();
  const official = results.find(result => {
    const repo = result.repo_name.toLowerCase();
    return repo === wanted || repo === `library/${wanted}`;
  });
  return (
    official ??
    results.find(result => result.repo_name.toLowerCase().endsWith(`/${wanted}`)) ??
    results[0]
  );
}

/**
 * Parse Docker Hub tags response into a PackageInfo
 * Pure function - can be unit tested without network calls
 */
export function parseDockerHubTagsResponse(
  imageName: string,
  repository: DockerHubSearchResult,
  tagsData: DockerHubTagsResponse,
  config: RegistryConfig,
  includePrerelease = true
): PackageInfo | undefined {
  const { fullName } = parseDockerImageName(repository.repo_name);

  // Only include active tags
  const tags = tagsData.results
    .filter(tag => tag.tag_status === undefined || tag.tag_status === "active")
    .map(tag => tag.name);

  return createPackageInfo({
    name: imageName,
    registryName: fullName,
    registry: config,
    url: `https://hub.docker.com/r/${fullName}`,
    description: repository.short_description,
    versions: tags,
    includePrerelease,
  });
}

/**
 * Docker Hub registry source for container images
 */
export class DockerHubRegistrySource implements RegistrySource {
  readonly config: RegistryConfig;
  private readonly settings: Partial<SourceSettings>;

  constructor(settings: Partial<SourceSettings> = {}, baseUrl = "https://hub.docker.com") {
    this.config = {
      id: "docker-hub",
      displayName: "Docker Hub",
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

      const searchUrl = new URL("/v2/search/repositories/", this.config.baseUrl);
      searchUrl.searchParams.set("query", packageName.toLowerCase());
      searchUrl.searchParams.set("page_size", "25");

      const search = await fetchJson(
        searchUrl.toString(),
        validateSearchResponse,
        requestOptions
      );
      const repository = selectDockerHubRepository(packageName, search?.results ?? []);
      if (!repository) {
        return notFound();
      }

      const { fullName } = parseDockerImageName(repository.repo_name);
      const tags = await fetchJson(
        `${this.config.baseUrl}/v2/repositories/${fullName}/tags/?page_size=100`,
        validateTagsResponse,
        requestOptions
      );
      if (!tags) {
        return notFound();
      }

      const info = parseDockerHubTagsResponse(
        packageName,
        repository,
        tags,
        this.config,
        this.settings.includePrerelease
      );
      return { success: true, infos: info ? [info] : [] };
    } catch (error) {
      return failed(toRegistrySearchError(error, this.config.id, packageName));
    }
  }

  /**
   * Validate that an image name is valid for Docker Hub
   */
  validatePackageName(packageName: string): boolean {
    return validateDockerImageName(packageName);
  }
}
