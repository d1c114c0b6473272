// pattern: Test

import { afterEach, describe, expect, it, vi } from "vitest";

import {
  jsonResponse,
  stubFetchRoutes,
  textResponse,
} from "../../test-utils/http/fetch-routes.js";
import {
  GalaxyToolShedRegistrySource,
  selectToolShedRepository,
  toolShedVersions,
} from "./galaxy.js";

const repositories = [
  { id: "r1", name: "fastqc_wrapper", owner: "someone" },
  { id: "r2", name: "FastQC", owner: "devteam", description: "Read QC" },
];

describe("selectToolShedRepository", () => {
  it("prefers an exact name match", () => {
    expect(selectToolShedRepository("fastqc", repositories)?.id).toBe("r2");
  });

  it("falls back to the first result", () => {
    expect(selectToolShedRepository("qc", repositories)?.id).toBe("r1");
    expect(selectToolShedRepository("qc", [])).toBeUndefined();
  });
});

describe("toolShedVersions", () => {
  it("collects tool versions", () => {
    expect(
      toolShedVersions({
        "0:aaaaaaaaaaaa": {
          changeset_revision: "aaaaaaaaaaaa",
          tools: [{ version: "0.73" }],
        },
        "1:bbbbbbbbbbbb": {
          changeset_revision: "bbbbbbbbbbbb",
          tools: [{ version: "0.74+galaxy0" }, {}],
        },
      })
    ).toEqual(["0.73", "0.74+galaxy0"]);
  });

  it("uses short changesets when no tool has a version", () => {
    expect(
      toolShedVersions({ "0:1234567890ab": { changeset_revision: "1234567890ab" } })
    ).toEqual(["1234567"]);
  });
});

describe("GalaxyToolShedRegistrySource", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("searches then reads the repository metadata", async () => {
    stubFetchRoutes({
      "https://toolshed.g2.bx.psu.edu/api/repositories?name=fastqc": jsonResponse(repositories),
      "https://toolshed.g2.bx.psu.edu/api/repositories/r2/metadata": jsonResponse({
        "0:aaaaaaaaaaaa": {
          changeset_revision: "aaaaaaaaaaaa",
          tools: [{ version: "0.74" }],
        },
      }),
    });

    const result = await new GalaxyToolShedRegistrySource().find("fastqc");
    const info = result.success ? result.infos[0] : undefined;

    expect(info?.registryName).toBe("FastQC");
    expect(info?.url).toBe("https://toolshed.g2.bx.psu.edu/view/devteam/FastQC");
    expect(info?.versions).toEqual(["0.74"]);
    expect(info?.description).toBe("Read QC");
  });

  it("scans the repository README for threading hints", async () => {
    stubFetchRoutes({
      "https://toolshed.g2.bx.psu.edu/api/repositories?name=fastqc": jsonResponse(repositories),
      "https://toolshed.g2.bx.psu.edu/api/repositories/r2/metadata": jsonResponse({
        "0:aaaaaaaaaaaa": { changeset_revision: "aaaaaaaaaaaa" },
      }),
      "https://toolshed.g2.bx.psu.edu/repository/download?repository_id=r2&file=README.md":
        textResponse("Set the number of threads with -t."),
    });

    const result = await new GalaxyToolShedRegistrySource().find("fastqc");
    const info = result.success ? result.infos[0] : undefined;

    expect(info?.versions).toEqual(["aaaaaaa"]);
    expect(info?.threadingSupport).toBe("explicit");
    expect(info?.threadFlags).toEqual(["-t"]);
  });

  it("reports an empty search as not found", async () => {
    stubFetchRoutes({
      "https://toolshed.g2.bx.psu.edu/api/repositories?name=nothing": jsonResponse([]),
    });

    expect(await new GalaxyToolShedRegistrySource().find("nothing")).toEqual({
      success: true,
      infos: [],
    });
  });
});
