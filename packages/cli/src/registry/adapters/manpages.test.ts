// pattern: Test

import { afterEach, describe, expect, it, vi } from "vitest";

import {
  statusResponse,
  stubFetchRoutes,
  textResponse,
} from "../../test-utils/http/fetch-routes.js";
import {
  extractManPageSummary,
  LinuxManpagesRegistrySource,
  manPageUrl,
} from "./manpages.js";

const BASE = "https://man7.org/linux/man-pages";

const TAR_PAGE = `<html><head><title>tar(1) - Linux manual page</title></head><body>
<h2><a id="NAME" href="#NAME"></a>NAME &nbsp; <a href="#top_of_page"><span class="top-link">top</span></a></h2><pre>
       tar - an archiving utility
</pre>
<h2><a id="OPTIONS" href="#OPTIONS"></a>OPTIONS</h2><pre>
       --threads=N
              Use N threads for compression.
</pre>
</body></html>`;

describe("extractManPageSummary", () => {
  it("reads the text after the dash in the NAME section", () => {
    expect(extractManPageSummary(TAR_PAGE)).toBe("an archiving utility");
  });

  it("also understands the div layout", () => {
    expect(
      extractManPageSummary('<div class="NAME">grep, egrep - print lines</div>')
    ).toBe("print lines");
  });

  it("returns undefined without a NAME section", () => {
    expect(extractManPageSummary("<p>nothing</p>")).toBeUndefined();
  });
});

describe("LinuxManpagesRegistrySource", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("is not part of the default search set", () => {
    expect(new LinuxManpagesRegistrySource().config.defaultEnabled).toBe(false);
  });

  it("walks the sections until a page exists", async () => {
    const mockFetch = stubFetchRoutes({
      [manPageUrl(BASE, "tar", 1)]: textResponse(TAR_PAGE),
    });

    const result = await new LinuxManpagesRegistrySource().find("tar");
    const info = result.success ? result.infos[0] : undefined;

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(info?.versions).toEqual(["Section 1"]);
    expect(info?.url).toBe("https://man7.org/linux/man-pages/man1/tar.1.html");
    expect(info?.license).toBe("GNU Free Documentation License");
    expect(info?.threadingSupport).toBe("explicit");
    expect(info?.threadFlags).toEqual(["--threads"]);
  });

  it("tries every section before giving up", async () => {
    const mockFetch = stubFetchRoutes({});

    expect(await new LinuxManpagesRegistrySource().find("nothing")).toEqual({
      success: true,
      infos: [],
    });
    expect(mockFetch).toHaveBeenCalledTimes(8);
    expect(mockFetch.mock.calls[7]?.[0]).toBe(`${BASE}/man8/nothing.8.html`);
  });

  it("stops at the first server error", async () => {
    stubFetchRoutes({ [manPageUrl(BASE, "tar", 1)]: statusResponse(500) });

    const result = await new LinuxManpagesRegistrySource().find("tar");

    expect(result.success ? undefined : result.error).toEqual({
      repository: "linux-manpages",
      packageName: "tar",
      reason: "network_failure",
      detail: "HTTP 500 for https://man7.org/linux/man-pages/man1/tar.1.html",
    });
  });
});
