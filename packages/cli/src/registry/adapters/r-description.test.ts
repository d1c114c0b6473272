// pattern: Test

import { afterEach, describe, expect, it, vi } from "vitest";

import {
  jsonResponse,
  statusResponse,
  stubFetchRoutes,
} from "../../test-utils/http/fetch-routes.js";
import { PositRegistrySource } from "./posit.js";
import { ROpenSciRegistrySource } from "./ropensci.js";

const magickDescription = {
  Package: "magick",
  Version: "2.8.4",
  Title: "Advanced Graphics and Image-Processing in R",
  Description: "Bindings to ImageMagick, with OpenMP support.",
  License: "MIT + file LICENSE",
};

describe("ROpenSciRegistrySource", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("merges the current version with the history", async () => {
    stubFetchRoutes({
      "https://ropensci.r-universe.dev/api/packages/magick": jsonResponse(magickDescription),
      "https://ropensci.r-universe.dev/api/versions/magick": jsonResponse([
        { Version: "2.8.3" },
        { Version: null },
        { Version: "2.8.4" },
      ]),
    });

    const result = await new ROpenSciRegistrySource().find("magick");
    const info = result.success ? result.infos[0] : undefined;

    expect(info?.versions).toEqual(["2.8.3", "2.8.4"]);
    expect(info?.description).toBe("Advanced Graphics and Image-Processing in R");
    expect(info?.license).toBe("MIT + file LICENSE");
    expect(info?.threadingSupport).toBe("explicit");
    expect(info?.url).toBe("https://ropensci.r-universe.dev/magick");
  });

  it("keeps the current version when the history is unavailable", async () => {
    stubFetchRoutes({
      "https://ropensci.r-universe.dev/api/packages/magick": jsonResponse(magickDescription),
      "https://ropensci.r-universe.dev/api/versions/magick": statusResponse(500),
    });

    const result = await new ROpenSciRegistrySource().find("magick");

    expect(result.success && result.infos[0]?.versions).toEqual(["2.8.4"]);
  });

  it("reports an unknown package as not found", async () => {
    stubFetchRoutes({});
    expect(await new ROpenSciRegistrySource().find("magick")).toEqual({
      success: true,
      infos: [],
    });
  });
});

describe("PositRegistrySource", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("reads the package and its versions", async () => {
    const base = "https://packagemanager.posit.co/client/packages/magick";
    stubFetchRoutes({
      [base]: jsonResponse(magickDescription),
      [`${base}/versions`]: jsonResponse([{ Version: "2.7.0" }]),
    });

    const result = await new PositRegistrySource().find("magick");
    const info = result.success ? result.infos[0] : undefined;

    expect(info?.displayName).toBe("Posit Package Manager");
    expect(info?.versions).toEqual(["2.7.0", "2.8.4"]);
    expect(info?.url).toBe(base);
  });

  it("reports a malformed package record", async () => {
    stubFetchRoutes({
      "https://packagemanager.posit.co/client/packages/magick": jsonResponse({
        Package: "magick",
      }),
    });

    const result = await new PositRegistrySource().find("magick");

    expect(result.success ? undefined : result.error.reason).toBe("parse_failure");
  });
});
