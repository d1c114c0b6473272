// pattern: Test

import { afterEach, describe, expect, it, vi } from "vitest";

import {
  jsonResponse,
  statusResponse,
  stubFetchRoutes,
} from "../../test-utils/http/fetch-routes.js";
import {
  extractPypiLicense,
  parsePypiPackageResponse,
  type PypiPackageResponse,
  PypiRegistrySource,
  validatePypiPackageName,
} from "./pypi.js";

const multiqcResponse: PypiPackageResponse = {
  info: {
    name: "multiqc",
    version: "1.21",
    summary: "Create aggregate bioinformatics analysis reports",
    description: "Runs in parallel across samples.",
    license: "",
    classifiers: [
      "Programming Language :: Python :: 3",
      "License :: OSI Approved :: GNU General Public License v3 (GPLv3)",
    ],
  },
  releases: {
    "1.19": [{ filename: "multiqc-1.19.tar.gz" }],
    "1.20": [{ filename: "multiqc-1.20.tar.gz" }],
    "1.21": [{ filename: "multiqc-1.21.tar.gz" }],
    "1.21.dev0": [],
    "1.22a1": [{ filename: "multiqc-1.22a1.tar.gz" }],
  },
};

describe("validatePypiPackageName", () => {
  it("should accept valid Python package names", () => {
    expect(validatePypiPackageName("requests")).toBe(true);
    expect(validatePypiPackageName("scikit-learn")).toBe(true);
    expect(validatePypiPackageName("django_extensions")).toBe(true);
    expect(validatePypiPackageName("zope.interface")).toBe(true);
  });

  it("should reject invalid Python package names", () => {
    expect(validatePypiPackageName("")).toBe(false);
    expect(validatePypiPackageName("package with spaces")).toBe(false);
    expect(validatePypiPackageName("package/with/slashes")).toBe(false);
    expect(validatePypiPackageName("-leading-hyphen")).toBe(false);
    expect(validatePypiPackageName("trailing_underscore_")).toBe(false);
  });
});

describe("extractPypiLicense", () => {
  it("prefers the declared license", () => {
    expect(
      extractPypiLicense({ ...multiqcResponse.info, license: "MIT\nfull text..." })
    ).toBe("MIT");
  });

  it("falls back to the license classifier", () => {
    expect(extractPypiLicense(multiqcResponse.info)).toBe(
      "GNU General Public License v3 (GPLv3)"
    );
  });

  it("returns undefined without either", () => {
    expect(
      extractPypiLicense({ name: "x", version: "1", license: null })
    ).toBeUndefined();
  });
});

describe("parsePypiPackageResponse", () => {
  const { config } = new PypiRegistrySource();

  it("drops releases without files", () => {
    const info = parsePypiPackageResponse("MultiQC", multiqcResponse, config);

    expect(info?.name).toBe("MultiQC");
    expect(info?.registryName).toBe("multiqc");
    expect(info?.url).toBe("https://pypi.org/project/multiqc");
    expect(info?.versions).toEqual(["1.19", "1.20", "1.21", "1.22a1"]);
    expect(info?.versionGroups.map(group => group.key)).toEqual([
      "1.19",
      "1.20",
      "1.21",
      "1.22",
    ]);
    expect(info?.latestVersion).toBe("1.22a1");
    expect(info?.threadingSupport).toBe("explicit");
  });

  it("can leave out pre-releases", () => {
    const info = parsePypiPackageResponse("multiqc", multiqcResponse, config, false);
    expect(info?.latestVersion).toBe("1.21");
  });
});

describe("PypiRegistrySource", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("fetches the JSON API", async () => {
    const mockFetch = stubFetchRoutes({
      "https://pypi.org/pypi/multiqc/json": jsonResponse(multiqcResponse),
    });

    const result = await new PypiRegistrySource().find("multiqc");

    expect(result.success && result.infos.map(info => info.latestVersion)).toEqual([
      "1.22a1",
    ]);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it("treats 404 as not found", async () => {
    stubFetchRoutes({});
    expect(await new PypiRegistrySource().find("no-such-package")).toEqual({
      success: true,
      infos: [],
    });
  });

  it("reports rate limiting", async () => {
    stubFetchRoutes({ "https://pypi.org/pypi/numpy/json": statusResponse(429) });

    const result = await new PypiRegistrySource().find("numpy");

    expect(result.success ? undefined : result.error.reason).toBe("rate_limited");
  });
});
