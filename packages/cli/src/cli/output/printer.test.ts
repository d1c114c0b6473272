// pattern: Test

import { describe, expect, it } from "vitest";

import { createPackageInfo } from "../../registry/package-info.js";
import { aggregateResults } from "../../search/result-aggregator.js";

import {
  formatSearchResult,
  formatSearchResults,
  formatVersionGroups,
  toJsonReport,
} from "./printer.js";

import type { PackageInfo } from "../../registry/types.js";

function fastqcInBioconda(): PackageInfo {
  const info = createPackageInfo({
    name: "fastqc",
    registry: { id: "bioconda", displayName: "Bioconda" },
    url: "https://anaconda.org/bioconda/fastqc",
    description: "A quality control tool for high throughput sequence data. Use -t to set threads.",
    versions: ["0.10.1", "0.11.2", "0.11.3", "0.12.1"],
    license: "GPL-3.0",
  });
  if (!info) {
    throw new Error("fixture has versions");
  }
  return info;
}

describe("formatVersionGroups", () => {
  it("braces groups whose members differ from the key", () => {
    expect(
      formatVersionGroups([
        { key: "0.11", versions: ["0.11.2", "0.11.3"] },
        { key: "5", versions: ["5"] },
        { key: "latest", versions: ["latest"] },
      ])
    ).toBe("{0.11.2, 0.11.3}, 5, latest");
  });
});

describe("formatSearchResult", () => {
  it("prints every field of a finding", () => {
    const result = aggregateResults([
      { repository: "bioconda", result: { success: true, infos: [fastqcInBioconda()] } },
    ]);

    expect(formatSearchResult("fastqc", result)).toEqual([
      "fastqc: found in 1 registry",
      "  ✓ Bioconda",
      "    URL:         https://anaconda.org/bioconda/fastqc",
      "    Description: A quality control tool for high throughput sequence data. Use -t to set threads.",
      "    Latest:      0.12.1",
      "    Versions:    3 major.minor, 4 total",
      "    Groups:      {0.10.1}, {0.11.2, 0.11.3}, {0.12.1}",
      "    License:     GPL-3.0",
      "    Threading:   Supported (flags: -t)",
    ]);
  });

  it("says not found only when no registry failed", () => {
    const clean = aggregateResults([
      { repository: "pypi", result: { success: true, infos: [] } },
    ]);

    expect(formatSearchResult("nosuchpkg", clean)).toEqual([
      "✗ nosuchpkg: not found in any registry",
    ]);
  });

  it("reports failures instead of claiming not found", () => {
    const failed = aggregateResults([
      { repository: "pypi", result: { success: true, infos: [] } },
      {
        repository: "cran",
        result: {
          success: false,
          error: {
            repository: "cran",
            packageName: "nosuchpkg",
            reason: "network_failure",
            detail: "HTTP 503 for https://cran.r-project.org/web/packages/nosuchpkg/index.html",
          },
        },
      },
    ]);

    expect(formatSearchResult("nosuchpkg", failed)).toEqual([
      "nosuchpkg: not found in the registries that answered",
      "  Could not check 1 registry(ies):",
      "  ! cran network failure: HTTP 503 for https://cran.r-project.org/web/packages/nosuchpkg/index.html",
    ]);
  });
});

describe("formatSearchResults", () => {
  it("separates package reports with a blank line", () => {
    const empty = aggregateResults([]);
    const results = new Map([
      ["a1", empty],
      ["b2", empty],
    ]);

    expect(formatSearchResults(results)).toBe(
      "✗ a1: not found in any registry\n\n✗ b2: not found in any registry"
    );
  });
});

describe("toJsonReport", () => {
  it("keys results by package name", () => {
    const result = aggregateResults([
      { repository: "bioconda", result: { success: true, infos: [fastqcInBioconda()] } },
    ]);

    const report = toJsonReport(new Map([["fastqc", result]]));

    expect(Object.keys(report)).toEqual(["fastqc"]);
    expect(JSON.parse(JSON.stringify(report))).toMatchObject({
      fastqc: { infos: [{ repository: "bioconda", latestVersion: "0.12.1" }], errors: [] },
    });
  });
});
