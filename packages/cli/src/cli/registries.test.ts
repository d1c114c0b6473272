// pattern: Test

import { describe, expect, it } from "vitest";

import { registryTableRows } from "./registries.js";

describe("registryTableRows", () => {
  it("lists registries in search order with their default status", () => {
    const rows = registryTableRows();

    expect(rows[0]).toEqual(["bioconda", "Bioconda", "yes"]);
    expect(rows[2]).toEqual(["pypi", "PyPI", "yes"]);
    expect(rows.at(-1)).toEqual(["linux-manpages", "Linux Manpages", "no (opt-in)"]);
    expect(rows).toHaveLength(14);
  });
});
