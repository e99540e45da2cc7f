import { describe, expect, it } from "@jest/globals";

import {
  compareSemver,
  compareSemverWithBuild,
  createSemver,
  finalizeVersion,
  formatSemver,
  maxVersion,
  parseStrictSemver,
  releaseEquals,
  ZERO_VERSION,
} from "../../src/versions/semver.js";

function parse(text: string) {
  const version = parseStrictSemver(text);
  if (!version) {
    throw new Error(`test fixture ${text} is not semver`);
  }
  return version;
}

describe("compareSemver", () => {
  it("orders core numbers numerically", () => {
    expect(compareSemver(parse("4.10.0"), parse("4.9.3"))).toBe(1);
    expect(compareSemver(parse("3.6.14"), parse("4.0.0"))).toBe(-1);
  });

  it("ranks a release above its prereleases", () => {
    expect(compareSemver(parse("4.2.0"), parse("4.2.0-rc1"))).toBe(1);
    expect(compareSemver(parse("4.2.0-alpha"), parse("4.2.0-beta"))).toBe(-1);
  });

  it("compares prerelease identifiers one by one", () => {
    expect(compareSemver(parse("1.0.0-alpha.2"), parse("1.0.0-alpha.10"))).toBe(-1);
    expect(compareSemver(parse("1.0.0-1"), parse("1.0.0-alpha"))).toBe(-1);
    expect(compareSemver(parse("1.0.0-alpha"), parse("1.0.0-alpha.1"))).toBe(-1);
  });

  it("ignores build metadata", () => {
    expect(compareSemver(parse("4.3.0+a"), parse("4.3.0+b"))).toBe(0);
    expect(compareSemverWithBuild(parse("4.3.0+a"), parse("4.3.0+b"))).toBe(-1);
  });
});

describe("semantic version helpers", () => {
  it("formats every part", () => {
    expect(formatSemver(createSemver(4, 3, 0, "alpha", "daily.abc"))).toBe(
      "4.3.0-alpha+daily.abc",
    );
  });

  it("strips prerelease and build when finalizing", () => {
    expect(finalizeVersion(parse("4.3.0-alpha+daily.abc"))).toEqual(
      createSemver(4, 3, 0),
    );
    expect(releaseEquals(parse("4.5.2"), parse("4.5.2-window"))).toBe(true);
  });

  it("rejects leading zeros in strict parsing", () => {
    expect(parseStrictSemver("2.80.0")).toEqual(createSemver(2, 80, 0));
    expect(parseStrictSemver("2.08.0")).toBeUndefined();
  });

  it("picks the highest version or the fallback", () => {
    expect(maxVersion([parse("3.6.2"), parse("4.1.0"), parse("4.0.9")])).toEqual(
      createSemver(4, 1, 0),
    );
    expect(maxVersion([])).toBe(ZERO_VERSION);
  });
});
