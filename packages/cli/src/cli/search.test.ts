// pattern: Test

import { mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

import { jsonResponse, stubFetchRoutes } from "../test-utils/http/fetch-routes.js";

import { initializeLogger, setCliLogLevel } from "./_deps.js";
import { collectRegistry, makeSearchCommand, parsePositiveInteger } from "./search.js";

describe("collectRegistry", () => {
  it("accumulates known ids once each", () => {
    expect(collectRegistry("pypi", collectRegistry("cran", []))).toEqual(["cran", "pypi"]);
    expect(collectRegistry("pypi", ["pypi"])).toEqual(["pypi"]);
  });

  it("rejects unknown ids", () => {
    expect(() => collectRegistry("npm", [])).toThrow('Unknown registry "npm"');
  });
});

describe("parsePositiveInteger", () => {
  it("accepts positive integers only", () => {
    expect(parsePositiveInteger("12")).toBe(12);
    expect(() => parsePositiveInteger("0")).toThrow('Expected a positive integer, got "0"');
    expect(() => parsePositiveInteger("1.5")).toThrow();
    expect(() => parsePositiveInteger("ten")).toThrow();
  });
});

describe("search command", () => {
  let testDir: string;
  let output: string[];

  beforeAll(() => {
    initializeLogger("json", true);
    setCliLogLevel("error");
  });

  beforeEach(async () => {
    testDir = join(
      tmpdir(),
      `pkgscout-cli-${Date.now()}-${Math.random().toString(36).substring(7)}`
    );
    await mkdir(testDir, { recursive: true });

    output = [];
    vi.spyOn(process.stdout, "write").mockImplementation(chunk => {
      output.push(String(chunk));
      return true;
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    process.exitCode = undefined;
    await rm(testDir, { recursive: true, force: true });
  });

  it("prints a JSON report for the selected registry", async () => {
    const configPath = join(testDir, "pkgscout.json");
    await writeFile(configPath, JSON.stringify({ version: 1, timeoutMs: 5000 }));
    stubFetchRoutes({
      "https://pypi.org/pypi/multiqc/json": jsonResponse({
        info: { name: "multiqc", version: "1.21", summary: "Aggregate bioinformatics results" },
        releases: { "1.20": [{}], "1.21": [{}] },
      }),
    });

    await makeSearchCommand().parseAsync(
      ["multiqc", "--registry", "pypi", "--json", "--config", configPath],
      { from: "user" }
    );

    const report: unknown = JSON.parse(output.join(""));
    expect(report).toMatchObject({
      multiqc: {
        infos: [{ repository: "pypi", latestVersion: "1.21", versions: ["1.20", "1.21"] }],
        errors: [],
      },
    });
    expect(process.exitCode).toBeUndefined();
  });

  it("lets --prerelease override the settings file", async () => {
    const configPath = join(testDir, "pkgscout.json");
    await writeFile(configPath, JSON.stringify({ version: 1, includePrerelease: false }));
    stubFetchRoutes({
      "https://pypi.org/pypi/multiqc/json": jsonResponse({
        info: { name: "multiqc", version: "1.21" },
        releases: { "1.21": [{}], "1.22a1": [{}] },
      }),
    });

    await makeSearchCommand().parseAsync(
      ["multiqc", "--registry", "pypi", "--json", "--prerelease", "--config", configPath],
      { from: "user" }
    );

    expect(JSON.parse(output.join(""))).toMatchObject({
      multiqc: { infos: [{ latestVersion: "1.22a1" }] },
    });
  });

  it("honours the settings file when neither pre-release flag is given", async () => {
    const configPath = join(testDir, "pkgscout.json");
    await writeFile(configPath, JSON.stringify({ version: 1, includePrerelease: false }));
    stubFetchRoutes({
      "https://pypi.org/pypi/multiqc/json": jsonResponse({
        info: { name: "multiqc", version: "1.21" },
        releases: { "1.21": [{}], "1.22a1": [{}] },
      }),
    });

    await makeSearchCommand().parseAsync(
      ["multiqc", "--registry", "pypi", "--json", "--config", configPath],
      { from: "user" }
    );

    expect(JSON.parse(output.join(""))).toMatchObject({
      multiqc: { infos: [{ latestVersion: "1.21", versions: ["1.21"] }] },
    });
  });

  it("prints a text report", async () => {
    stubFetchRoutes({});
    const configPath = join(testDir, "pkgscout.yaml");
    await writeFile(configPath, "version: 1\n");

    await makeSearchCommand().parseAsync(
      ["nosuchpkg", "--registry", "homebrew", "--config", configPath],
      { from: "user" }
    );

    expect(output.join("")).toBe("✗ nosuchpkg: not found in any registry\n");
  });

  it("fails with exit code 1 on invalid settings", async () => {
    const configPath = join(testDir, "pkgscout.json");
    await writeFile(configPath, JSON.stringify({ version: 1, concurrency: 0 }));
    const mockFetch = stubFetchRoutes({});

    await makeSearchCommand().parseAsync(["fastqc", "--config", configPath], {
      from: "user",
    });

    expect(process.exitCode).toBe(1);
    expect(mockFetch).not.toHaveBeenCalled();
    expect(output).toEqual([]);
  });
});
