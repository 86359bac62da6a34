// CHANGE: Pin relaxed semantic-version ordering.
// WHY: Update badges depend on these comparisons, including vendor tags that do not parse.

import { describe, expect, it } from "vitest";
import { compare, isNewer, parseVersion, sortByVersion } from "../src/version.js";

describe("compare", () => {
  it("orders numeric components numerically", () => {
    expect(compare("1.10.0", "1.9.0")).toBe("greater");
    expect(compare("1.2.3", "1.2.4")).toBe("less");
    expect(compare("2.0.0", "2.0.0")).toBe("equal");
  });

  it("treats a leading v and missing components as equivalent", () => {
    expect(compare("v2.3", "2.3.0")).toBe("equal");
    expect(compare("V1", "1.0.1")).toBe("less");
  });

  it("orders pre-releases before the release", () => {
    expect(compare("1.0.0-beta", "1.0.0")).toBe("less");
    expect(compare("1.0.0", "1.0.0-rc.1")).toBe("greater");
  });

  it("compares pre-release identifiers numerically or lexically", () => {
    expect(compare("1.0.0-rc.2", "1.0.0-rc.10")).toBe("less");
    expect(compare("1.0.0-alpha", "1.0.0-beta")).toBe("less");
    expect(compare("1.0.0-alpha", "1.0.0-alpha.1")).toBe("less");
  });

  it("ignores build metadata", () => {
    expect(compare("1.0.0+build.5", "1.0.0+build.9")).toBe("equal");
  });

  it("compares non-numeric core components lexically", () => {
    expect(compare("2.1.beta", "2.1.alpha")).toBe("greater");
    expect(compare("2024.05.r1", "2024.05.r2")).toBe("less");
    expect(compare("1.x", "1.0")).toBe("greater");
    expect(compare("1.x", "2.0")).toBe("less");
  });

  it.each(["", "latest", "release-1", "2024-05-01 nightly", "..."])("ranks malformed %j below well-formed versions", value => {
    expect(compare(value, value)).toBe("equal");
    expect(compare(value, "1.0.0")).toBe("less");
    expect(compare("1.0.0", value)).toBe("greater");
  });
});

describe("isNewer", () => {
  it("is false right after installing the listed version", () => {
    expect(isNewer("2.3.0", "2.3.0")).toBe(false);
    expect(isNewer("v2.3.0", "2.3.0")).toBe(false);
  });

  it("flags installs with unknown versions as outdated", () => {
    expect(isNewer("1.0.0", "Unknown")).toBe(true);
    expect(isNewer("Unknown", "1.0.0")).toBe(false);
  });
});

describe("parseVersion", () => {
  it("splits core and pre-release parts", () => {
    expect(parseVersion("v1.2.3-rc.1+sha.abc")).toEqual({ core: [1, 2, 3], prerelease: ["rc", "1"] });
    expect(parseVersion("2.1.beta")).toEqual({ core: [2, 1, "beta"], prerelease: [] });
    expect(parseVersion("release-1")).toBeNull();
  });
});

describe("sortByVersion", () => {
  it("ranks newest first", () => {
    const sorted = sortByVersion(["1.0.0", "garbage", "1.10.0", "1.2.0-beta", "1.2.0"], value => value);
    expect(sorted).toEqual(["1.10.0", "1.2.0", "1.2.0-beta", "1.0.0", "garbage"]);
  });
});
