// pattern: Functional Core
import { type Static, Type } from "@sinclair/typebox";

import { REGISTRY_IDS } from "../../registry/types.js";

export const RegistryIdV1 = Type.Union(
  REGISTRY_IDS.map(id => Type.Literal(id)),
  {
    description: "A built-in registry source",
    errorMessage: `must be one of: ${REGISTRY_IDS.join(", ")}`,
  }
);
export type RegistryIdV1 = Static<typeof RegistryIdV1>;

export const SettingsV1 = Type.Object(
  {
    version: Type.Literal(1),
    registries: Type.Optional(
      Type.Array(RegistryIdV1, {
        minItems: 1,
        uniqueItems: true,
        description:
          "Registries to search, in the order results are reported. Defaults to the built-in default set.",
      })
    ),
    concurrency: Type.Optional(
      Type.Integer({
        minimum: 1,
        maximum: 64,
        description: "Maximum registry requests in flight",
        default: 8,
      })
    ),
    timeoutMs: Type.Optional(
      Type.Integer({
        minimum: 100,
        maximum: 120_000,
        description: "Per-registry request budget in milliseconds",
        default: 15_000,
      })
    ),
    includePrerelease: Type.Optional(
      Type.Boolean({ description: "Report pre-release versions", default: true })
    ),
    userAgent: Type.Optional(Type.String({ minLength: 1 })),
    githubToken: Type.Optional(
      Type.String({
        minLength: 1,
        description: "Token for the GitHub API, used to list container versions",
      })
    ),
    bioconductorReleases: Type.Optional(
      Type.Integer({
        minimum: 1,
        maximum: 40,
        description: "How many Bioconductor releases to scan for past versions",
        default: 6,
      })
    ),
  },
  { additionalProperties: false }
);
export type SettingsV1 = Static<typeof SettingsV1>;

// Current settings version
export const Settings = SettingsV1;
export type Settings = SettingsV1;

/**
 * Fully resolved search settings: every layer merged, every default filled
 */
export interface SearchSettings {
  registries: RegistryIdV1[] | undefined;
  concurrency: number;
  timeoutMs: number;
  includePrerelease: boolean;
  userAgent: string | undefined;
  githubToken: string | undefined;
  bioconductorReleases: number;
}
