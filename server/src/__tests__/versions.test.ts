import { describe, expect, it } from "vitest";

import { compareVersions, isVersionVulnerable, parseVersion } from "../services/versions.js";

describe("parseVersion", () => {
  it("reads up to three numeric components", () => {
    expect(parseVersion("1.2.3")).toEqual([1, 2, 3]);
    expect(parseVersion("1.2.3.4")).toEqual([1, 2, 3]);
    expect(parseVersion("2.5")).toEqual([2, 5, 0]);
    expect(parseVersion("7")).toEqual([7, 0, 0]);
  });

  it("strips version prefixes case-insensitively", () => {
    expect(parseVersion("v1.2")).toEqual([1, 2, 0]);
    expect(parseVersion("Version 2.5.1")).toEqual([2, 5, 1]);
    expect(parseVersion("VER3")).toEqual([3, 0, 0]);
  });

  it("ignores suffixes after the numeric run", () => {
    expect(parseVersion("3.1-beta")).toEqual([3, 1, 0]);
    expect(parseVersion("24.08 (x64)")).toEqual([24, 8, 0]);
  });

  it("returns [0] when nothing numeric leads", () => {
    expect(parseVersion("")).toEqual([0]);
    expect(parseVersion("latest")).toEqual([0]);
  });
});

describe("compareVersions", () => {
  it("compares numerically per component", () => {
    expect(compareVersions("1.10", "1.9")).toBe(1);
    expect(compareVersions("1.9", "1.10")).toBe(-1);
    expect(compareVersions("v1.0", "1.0.1")).toBe(-1);
  });

  it("pads missing components with zero", () => {
    expect(compareVersions("2.0", "2.0.0")).toBe(0);
    expect(compareVersions("latest", "0")).toBe(0);
  });
});

describe("isVersionVulnerable", () => {
  it("is true only below the safe version", () => {
    expect(isVersionVulnerable("19.00", "23.01")).toBe(true);
    expect(isVersionVulnerable("23.01", "23.01")).toBe(false);
    expect(isVersionVulnerable("23.1.0", "23.01")).toBe(false);
    expect(isVersionVulnerable("24.0", "23.01")).toBe(false);
  });

  it("never flags empty versions", () => {
    expect(isVersionVulnerable("", "1.0")).toBe(false);
    expect(isVersionVulnerable("  ", "1.0")).toBe(false);
    expect(isVersionVulnerable("0.9", "")).toBe(false);
  });
});
