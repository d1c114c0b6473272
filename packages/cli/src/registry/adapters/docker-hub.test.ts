// pattern: Test

import { afterEach, describe, expect, it, vi } from "vitest";

import {
  jsonResponse,
  statusResponse,
  stubFetchRoutes,
} from "../../test-utils/http/fetch-routes.js";
import {
  DockerHubRegistrySource,
  parseDockerHubTagsResponse,
  parseDockerImageName,
  selectDockerHubRepository,
  validateDockerImageName,
} from "./docker-hub.js";

describe("parseDockerImageName", () => {
  it("should handle official images without namespace", () => {
    expect(parseDockerImageName("nginx")).toEqual({
      namespace: "library",
      repository: "nginx",
      fullName: "library/nginx",
    });
  });

  it("should handle user images with namespace", () => {
    expect(parseDockerImageName("biocontainers/fastqc").fullName).toBe(
      "biocontainers/fastqc"
    );
  });

  it("should handle registry prefix by taking last two parts", () => {
    const result = parseDockerImageName("registry.io/namespace/repo");

    expect(result.namespace).toBe("namespace");
    expect(result.repository).toBe("repo");
    expect(result.fullName).toBe("namespace/repo");
  });
});

describe("validateDockerImageName", () => {
  it("should accept valid Docker image names", () => {
    expect(validateDockerImageName("nginx")).toBe(true);
    expect(validateDockerImageName("myuser/myapp")).toBe(true);
    expect(validateDockerImageName("user123/app_name")).toBe(true);
    expect(validateDockerImageName("test.registry/myapp")).toBe(true);
  });

  it("should reject invalid Docker image names", () => {
    expect(validateDockerImageName("")).toBe(false);
    expect(validateDockerImageName(" ")).toBe(false);
    expect(validateDockerImageName("invalid name with spaces")).toBe(false);
    expect(validateDockerImageName("-leading-hyphen")).toBe(false);
    expect(validateDockerImageName("trailing.dot.")).toBe(false);
    expect(validateDockerImageName("user/-invalid")).toBe(false);
    expect(validateDockerImageName("registry.io/namespace/repo/extra")).toBe(false);
  });

  it("should handle edge cases", () => {
    expect(validateDockerImageName("a")).toBe(true);
    expect(validateDockerImageName("a/b")).toBe(true);
    expect(validateDockerImageName("user/")).toBe(false);
    expect(validateDockerImageName("/repo")).toBe(false);
  });
});

describe("selectDockerHubRepository", () => {
  const results = [
    { repo_name: "someone/fastqc-tools" },
    { repo_name: "biocontainers/fastqc" },
    { repo_name: "fastqc", is_official: true },
  ];

  it("prefers the official image", () => {
    expect(selectDockerHubRepository("FastQC", results)?.repo_name).toBe("fastqc");
  });

  it("then an image of the same name in any namespace", () => {
    expect(
      selectDockerHubRepository("fastqc", results.slice(0, 2))?.repo_name
    ).toBe("biocontainers/fastqc");
  });

  it("then the first hit", () => {
    expect(selectDockerHubRepository("qc", results)?.repo_name).toBe(
      "someone/fastqc-tools"
    );
  });
});

describe("parseDockerHubTagsResponse", () => {
  const { config } = new DockerHubRegistrySource();

  it("keeps active tags only", () => {
    const info = parseDockerHubTagsResponse(
      "fastqc",
      { repo_name: "biocontainers/fastqc", short_description: "FastQC image" },
      {
        count: 3,
        results: [
          { name: "v0.11.9_cv8", tag_status: "active" },
          { name: "latest", tag_status: "active" },
          { name: "v0.11.5", tag_status: "inactive" },
        ],
      },
      config
    );

    expect(info?.registryName).toBe("biocontainers/fastqc");
    expect(info?.url).toBe("https://hub.docker.com/r/biocontainers/fastqc");
    expect(info?.versions).toEqual(["latest", "v0.11.9_cv8"]);
    expect(info?.latestVersion).toBe("v0.11.9_cv8");
    expect(info?.description).toBe("FastQC image");
  });
});

describe("DockerHubRegistrySource", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const searchUrl =
    "https://hub.docker.com/v2/search/repositories/?query=samtools&page_size=25";

  it("searches then lists tags", async () => {
    stubFetchRoutes({
      [searchUrl]: jsonResponse({
        results: [{ repo_name: "biocontainers/samtools" }],
      }),
      "https://hub.docker.com/v2/repositories/biocontainers/samtools/tags/?page_size=100":
        jsonResponse({ results: [{ name: "v1.9-4-deb_cv1" }] }),
    });

    const result = await new DockerHubRegistrySource().find("samtools");

    expect(result.success && result.infos[0]?.versions).toEqual(["v1.9-4-deb_cv1"]);
  });

  it("reports an empty search as not found", async () => {
    stubFetchRoutes({ [searchUrl]: jsonResponse({ results: [] }) });

    expect(await new DockerHubRegistrySource().find("samtools")).toEqual({
      success: true,
      infos: [],
    });
  });

  it("reports search failures", async () => {
    stubFetchRoutes({ [searchUrl]: statusResponse(502) });

    const result = await new DockerHubRegistrySource().find("samtools");

    expect(result.success ? undefined : result.error.reason).toBe("network_failure");
  });
});
