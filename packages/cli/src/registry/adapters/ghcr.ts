// pattern: Mixed (unavoidable)
// for the registry source interface requirements, we must integrate both
// network I/O (imperative shell) and data transformation (functional core)
// in the same class. The parsing logic is extracted to pure functions.

import { type Static, Type } from "@sinclair/typebox";

import { ajv } from "../../utils/ajv.js";
import { fetchJson, fetchOptional } from "../http.js";
import { createPackageInfo } from "../package-info.js";
import { failed, notFound, toRegistrySearchError } from "../utils.js";
import { validateDockerImageName } from "./docker-hub.js";

import type {
  FindOptions,
  PackageInfo,
  RegistryConfig,
  RegistryFindResult,
  RegistrySource,
  SourceSettings,
} from "../types.js";

export const GithubRepositorySearchResponse = Type.Object({
  items: Type.Array(
    Type.Object({
      name: Type.String(),
      owner: Type.Object({ login: Type.String() }),
      description: Type.Optional(Type.Union([Type.String(), Type.Null()])),
      license: Type.Optional(
        Type.Union([
          Type.Object({ spdx_id: Type.Optional(Type.Union([Type.String(), Type.Null()])) }),
          Type.Null(),
        ])
      ),
    })
  ),
});
export type GithubRepositorySearchResponse = Static<
  typeof GithubRepositorySearchResponse
>;
export type GithubRepository = GithubRepositorySearchResponse["items"][number];

export const GithubPackageVersions = Type.Array(
  Type.Object({
    metadata: Type.Optional(
      Type.Object({
        container: Type.Optional(
          Type.Object({ tags: Type.Array(Type.String()) })
        ),
      })
    ),
  })
);
export type GithubPackageVersions = Static<typeof GithubPackageVersions>;

export const GithubReadme = Type.Object({
  content: Type.String(),
  encoding: Type.Optional(Type.String()),
});
export type GithubReadme = Static<typeof GithubReadme>;

const validateSearchResponse = ajv.compile<GithubRepositorySearchResponse>(
  GithubRepositorySearchResponse
);
const validatePackageVersions = ajv.compile<GithubPackageVersions>(
  GithubPackageVersions
);
const validateReadme = ajv.compile<GithubReadme>(GithubReadme);

/**
 * The contents API answers base64 unless asked for a raw media type
 */
export function decodeGithubReadme(readme: GithubReadme): string {
  return readme.encoding === "base64"
    ? Buffer.from(readme.content, "base64").toString("utf8")
    : readme.content;
}

export function selectGithubRepository(
  packageName: string,
  items: GithubRepository[]
): GithubRepository | undefined {
  const wanted = packageName.toLowerCase();
  return items.find(item => item.name.toLowerCase() === wanted) ?? items[0];
}

/**
 * The first tag of each published version; untagged versions are skipped
 */
export function parseGithubPackageVersions(
  packageName: string,
  repository: GithubRepository,
  versions: GithubPackageVersions,
  config: RegistryConfig,
  includePrerelease = true,
  readme?: string
): PackageInfo | undefined {
  const tags = versions.flatMap(version => {
    const tag = version.metadata?.container?.tags[0];
    return tag ? [tag] : [];
  });
  const { login } = repository.owner;

  return createPackageInfo({
    name: packageName,
    registryName: `${login}/${repository.name}`,
    registry: config,
    url: `https://github.com/${login}/${repository.name}/pkgs/container/${repository.name}`,
    description: repository.description,
    readme,
    versions: tags,
    license: repository.license?.spdx_id,
    includePrerelease,
  });
}

/**
 * GitHub Container Registry. Listing package versions needs a token, so
 * without one the source declines instead of guessing, and a default
 * search leaves it out.
 */
export class GhcrRegistrySource implements RegistrySource {
  readonly config: RegistryConfig;
  private readonly settings: Partial<SourceSettings>;

  constructor(settings: Partial<SourceSettings> = {}, baseUrl = "https://api.github.com") {
    this.config = {
      id: "ghcr",
      displayName: "GitHub Container Registry",
      baseUrl,
      defaultEnabled: Boolean(settings.githubToken),
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

    const token = this.settings.githubToken;
    if (!token) {
      return failed({
        repository: this.config.id,
        packageName,
        reason: "unsupported",
        detail: "A GitHub token is required to list container versions",
      });
    }

    try {
      const requestOptions = {
        signal: options.signal,
        userAgent: this.settings.userAgent,
        headers: {
          Accept: "application/vnd.github+json",
          Authorization: `Bearer ${token}`,
        },
      };

      const searchUrl = new URL("/search/repositories", this.config.baseUrl);
      searchUrl.searchParams.set("q", `${packageName} in:name topic:container`);
      searchUrl.searchParams.set("per_page", "100");

      const search = await fetchJson(
        searchUrl.toString(),
        validateSearchResponse,
        requestOptions
      );
      const repository = selectGithubRepository(packageName, search?.items ?? []);
      if (!repository) {
        return notFound();
      }

      const { login } = repository.owner;
      const versions = await fetchJson(
        `${this.config.baseUrl}/users/${encodeURIComponent(login)}/packages/container/${encodeURIComponent(repository.name)}/versions`,
        validatePackageVersions,
        requestOptions
      );

      const readme = await fetchOptional(
        () =>
          fetchJson(
            `${this.config.baseUrl}/repos/${encodeURIComponent(login)}/${encodeURIComponent(repository.name)}/readme`,
            validateReadme,
            requestOptions
          ),
        options.signal
      );

      const info = parseGithubPackageVersions(
        packageName,
        repository,
        versions ?? [],
        this.config,
        this.settings.includePrerelease,
        readme ? decodeGithubReadme(readme) : undefined
      );
      return { success: true, infos: info ? [info] : [] };
    } catch (error) {
      return failed(toRegistrySearchError(error, this.config.id, packageName));
    }
  }

  validatePackageName(packageName: string): boolean {
    return validateDockerImageName(packageName) && !packageName.includes("/");
  }
}
