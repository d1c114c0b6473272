// pattern: Test

import { afterEach, describe, expect, it, vi } from "vitest";

import { stubFetchRoutes, textResponse } from "../../test-utils/http/fetch-routes.js";
import { biolibCandidateUrls, BiolibRegistrySource, parseBiolibPage } from "./biolib.js";

const PAGE = `<html><head>
<title>SignalP 6: BioLib</title>
<meta name="description" content="Signal peptide prediction using 4 threads by default">
</head><body>
<h1>SignalP_6: Protein signal peptides</h1>
<script>{"app":{"semantic_version":"6.0.1"},"versions":[{"semantic_version":"6.0.0"},{"semantic_version":"6.0.1"}]}</script>
</body></html>`;

describe("biolibCandidateUrls", () => {
  it("tries the lower-cased name first", () => {
    expect(biolibCandidateUrls("https://biolib.com", "SignalP_6")).toEqual([
      "https://biolib.com/bio-utils/signalp_6/",
      "https://biolib.com/bio-utils/SignalP_6/",
    ]);
  });

  it("does not repeat a lower-case name", () => {
    expect(biolibCandidateUrls("https://biolib.com", "blast")).toEqual([
      "https://biolib.com/bio-utils/blast/",
    ]);
  });
});

describe("parseBiolibPage", () => {
  const { config } = new BiolibRegistrySource();

  it("reads title, description and embedded versions", () => {
    const info = parseBiolibPage("signalp_6", PAGE, "https://biolib.com/x/", config);

    expect(info?.registryName).toBe("SignalP_6");
    expect(info?.description).toBe(
      "Signal peptide prediction using 4 threads by default"
    );
    expect(info?.versions).toEqual(["6.0.0", "6.0.1"]);
    expect(info?.license).toBe("Unknown");
  });

  it("treats a page without versions as not a package", () => {
    expect(
      parseBiolibPage("x", "<h1>Search</h1>", "https://biolib.com/x/", config)
    ).toBeUndefined();
  });
});

describe("BiolibRegistrySource", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("falls through to the second candidate", async () => {
    stubFetchRoutes({ "https://biolib.com/bio-utils/SignalP_6/": textResponse(PAGE) });

    const result = await new BiolibRegistrySource().find("SignalP_6");

    expect(result.success && result.infos[0]?.url).toBe(
      "https://biolib.com/bio-utils/SignalP_6/"
    );
  });

  it("reports not found when no page has versions", async () => {
    stubFetchRoutes({
      "https://biolib.com/bio-utils/blast/": textResponse("<h1>Not here</h1>"),
    });

    expect(await new BiolibRegistrySource().find("blast")).toEqual({
      success: true,
      infos: [],
    });
  });
});
