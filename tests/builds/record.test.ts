import { describe, expect, it } from "@jest/globals";

import {
  buildRecordsEqual,
  compareBuildRecords,
  createBuildRecord,
  fullVersion,
  sortBuildRecords,
  toBasicBuildInfo,
  withUserFields,
} from "../../src/builds/record.js";
import { formatSemver } from "../../src/versions/semver.js";
import { makeBuild, utc } from "../support/factories/builds.js";

describe("createBuildRecord", () => {
  it("fills the user fields with defaults and freezes the record", () => {
    const record = makeBuild();

    expect(record.customName).toBe("");
    expect(record.isFavorite).toBe(false);
    expect(record.isFrozen).toBe(false);
    expect(record.customExecutable).toBeNull();
    expect(record.folder).toBeUndefined();
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("moves stable builds of an LTS release to the lts branch", () => {
    const input = {
      link: "https://builds.example.test/blender-4.2.1.zip",
      subversion: "4.2.1",
      branch: "stable",
      commitTime: utc("2024-08-19T11:21:00Z"),
    };

    expect(createBuildRecord(input, { ltsVersions: ["4.2"] }).branch).toBe("lts");
    expect(createBuildRecord(input, { ltsVersions: ["3.6"] }).branch).toBe("stable");
    expect(
      createBuildRecord({ ...input, branch: "daily" }, { ltsVersions: ["4.2"] })
        .branch,
    ).toBe("daily");
  });
});

describe("withUserFields", () => {
  it("replaces only the given fields", () => {
    const record = makeBuild({ customName: "studio", customExecutable: "bin/blender" });

    const updated = withUserFields(record, {
      isFavorite: true,
      customExecutable: null,
    });

    expect(updated.customName).toBe("studio");
    expect(updated.isFavorite).toBe(true);
    expect(updated.customExecutable).toBeNull();
    expect(record.isFavorite).toBe(false);
    expect(Object.isFrozen(updated)).toBe(true);
  });
});

describe("buildRecordsEqual", () => {
  it("compares hashes when both builds have one", () => {
    const left = makeBuild({ subversion: "4.3.0", buildHash: "aaa111" });
    const right = makeBuild({ subversion: "4.3.0", buildHash: "bbb222" });

    expect(buildRecordsEqual(left, right)).toBe(false);
    expect(buildRecordsEqual(left, makeBuild({ subversion: "4.4.0", buildHash: "aaa111" }))).toBe(true);
  });

  it("falls back to the release numbers", () => {
    expect(
      buildRecordsEqual(
        makeBuild({ subversion: "4.5.2" }),
        makeBuild({ subversion: "4.5.2-window", buildHash: "ccc333" }),
      ),
    ).toBe(true);
    expect(
      buildRecordsEqual(makeBuild({ subversion: "4.5.2" }), makeBuild({ subversion: "4.5.3" })),
    ).toBe(false);
  });
});

describe("fullVersion", () => {
  it("appends branch and hash as build metadata", () => {
    const record = makeBuild({ subversion: "4.3.0-alpha", branch: "daily", buildHash: "abc123" });
    expect(formatSemver(fullVersion(record))).toBe("4.3.0-alpha+daily.abc123");
  });

  it("replaces characters semver does not allow", () => {
    const record = makeBuild({ subversion: "4.4.0", branch: "Pr 123" });
    expect(formatSemver(fullVersion(record))).toBe("4.4.0+Pr-123");
  });
});

describe("sortBuildRecords", () => {
  it("orders by release, then by commit time, newest first", () => {
    const older = makeBuild({ subversion: "4.3.0", commitTime: utc("2024-09-01T00:00:00Z") });
    const newer = makeBuild({ subversion: "4.3.0-alpha", commitTime: utc("2024-09-02T00:00:00Z") });
    const previous = makeBuild({ subversion: "4.2.0", commitTime: utc("2024-12-01T00:00:00Z") });

    expect(sortBuildRecords([older, previous, newer])).toEqual([newer, older, previous]);
    expect(sortBuildRecords([older, previous, newer], "ascending")).toEqual([
      previous,
      older,
      newer,
    ]);
  });

  it("uses the full version when a commit time is invalid", () => {
    const first = makeBuild({ branch: "daily", buildHash: "aaa", commitTime: new Date(Number.NaN) });
    const second = makeBuild({ branch: "daily", buildHash: "bbb" });

    expect(compareBuildRecords(first, second)).toBe(-1);
  });
});

describe("toBasicBuildInfo", () => {
  it("reports an unknown hash as empty text", () => {
    const record = makeBuild({ folder: "stable" });

    expect(toBasicBuildInfo(record)).toEqual({
      version: record.version,
      branch: "stable",
      buildHash: "",
      commitTime: utc("2024-07-16T10:00:00Z"),
      folder: "stable",
    });
  });
});
