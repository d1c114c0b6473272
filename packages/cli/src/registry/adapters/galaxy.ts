// pattern: Mixed (unavoidable)
// for the registry source interface requirements, we must integrate both
// network I/O (imperative shell) and data transformation (functional core)
// in the same class. The parsing logic is extracted to pure functions.

import { type Static, Type } from "@sinclair/typebox";

import { ajv } from "../../utils/ajv.js";
import { fetchJson, fetchOptional, fetchText } from "../http.js";
import { createPackageInfo } from "../package-info.js";
import {
  failed,
  notFound,
  SIMPLE_PACKAGE_NAME,
  toRegistrySearchError,
  validatePackageName,
} from "../utils.js";

import type {
  FindOptions,
  PackageInfo,
  RegistryConfig,
  RegistryFindResult,
  RegistrySource,
  SourceSettings,
} from "../types.js";

export const ToolShedRepository = Type.Object({
  id: Type.String(),
  name: Type.String(),
  owner: Type.String(),
  description: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  long_description: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});
export type ToolShedRepository = Static<typeof ToolShedRepository>;

export const ToolShedRepositoryList = Type.Array(ToolShedRepository);
export type ToolShedRepositoryList = Static<typeof ToolShedRepositoryList>;

/**
 * Installable revisions keyed by "<numeric>:<changeset>"
 */
export const ToolShedMetadata = Type.Record(
  Type.String(),
  Type.Object({
    changeset_revision: Type.String(),
    tools: Type.Optional(
      Type.Array(Type.Object({ version: Type.Optional(Type.String()) }))
    ),
  })
);
export type ToolShedMetadata = Static<typeof ToolShedMetadata>;

const validateRepositoryList = ajv.compile<ToolShedRepositoryList>(
  ToolShedRepositoryList
);
const validateMetadata = ajv.compile<ToolShedMetadata>(ToolShedMetadata);

/**
 * Exact name match (ignoring case), else the first result
 */
export function selectToolShedRepository(
  packageName: string,
  repositories: ToolShedRepository[]
): ToolShedRepository | undefined {
  const wanted = packageName.toLowerCase();
  return repositories.find(repo => repo.name.toLowerCase() === wanted) ?? repositories[0];
}

/**
 * Tool versions across all revisions; short changeset ids when no tool
 * declares a version
 */
export function toolShedVersions(metadata: ToolShedMetadata): string[] {
  const revisions = Object.values(metadata);
  const toolVersions = revisions.flatMap(revision =>
    (revision.tools ?? []).flatMap(tool => (tool.version ? [tool.version] : []))
  );
  if (toolVersions.length > 0) {
    return toolVersions;
  }
  return revisions.map(revision => revision.changeset_revision.slice(0, 7));
}

export function parseToolShedRepository(
  packageName: string,
  repository: ToolShedRepository,
  metadata: ToolShedMetadata,
  config: RegistryConfig,
  includePrerelease = true,
  readme?: string
): PackageInfo | undefined {
  return createPackageInfo({
    name: packageName,
    registryName: repository.name,
    registry: config,
    url: `${config.baseUrl}/view/${repository.owner}/${repository.name}`,
    description: repository.description,
    readme: [repository.long_description, readme].filter(Boolean).join("\n\n"),
    versions: toolShedVersions(metadata),
    includePrerelease,
  });
}

/**
 * Galaxy Tool Shed
 */
export class GalaxyToolShedRegistrySource implements RegistrySource {
  readonly config: RegistryConfig;
  private readonly settings: Partial<SourceSettings>;

  constructor(
    settings: Partial<SourceSettings> = {},
    baseUrl = "https://toolshed.g2.bx.psu.edu"
  ) {
    this.config = {
      id: "galaxy-toolshed",
      displayName: "Galaxy Tool Shed",
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

      const repositories = await fetchJson(
        `${this.config.baseUrl}/api/repositories?name=${encodeURIComponent(packageName)}`,
        validateRepositoryList,
        requestOptions
      );
      const repository = selectToolShedRepository(packageName, repositories ?? []);
      if (!repository) {
        return notFound();
      }

      const metadata = await fetchJson(
        `${this.config.baseUrl}/api/repositories/${encodeURIComponent(repository.id)}/metadata`,
        validateMetadata,
        requestOptions
      );

      const readmeUrl = new URL("/repository/download", this.config.baseUrl);
      readmeUrl.searchParams.set("repository_id", repository.id);
      readmeUrl.searchParams.set("file", "README.md");
      const readme = await fetchOptional(
        () => fetchText(readmeUrl.toString(), requestOptions),
        options.signal
      );

      const info = parseToolShedRepository(
        packageName,
        repository,
        metadata ?? {},
        this.config,
        this.settings.includePrerelease,
        readme
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
