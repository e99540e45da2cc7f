import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";

import { BuildExecutableNotFoundError } from "../../../src/builds/errors.js";
import type { BuildProbe } from "../../../src/builds/probe.js";
import { executeListCommand } from "../../../src/commands/list/command.js";
import { createDefaultSettings } from "../../../src/configs/settings/defaults.js";
import { InvalidQuerySyntaxError } from "../../../src/query/errors.js";
import { writeInstalledBuild } from "../../support/library.js";

describe("executeListCommand", () => {
  let root: string;
  let brokenDir: string;
  let probed: string[];

  const probe: BuildProbe = async (path) => {
    probed.push(path);
    throw new BuildExecutableNotFoundError(path);
  };

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "blendshelf-list-"));
    probed = [];

    await writeInstalledBuild(root, "stable", "blender-4.2.1", {
      branch: "stable",
      subversion: "4.2.1",
      build_hash: "396f546c9d82",
      commit_time: "2024-08-19T11:21:00+00:00",
    });
    await writeInstalledBuild(root, "daily", "blender-4.3.0", {
      branch: "daily",
      subversion: "4.3.0-alpha",
      build_hash: "ddc9f92777cb",
      commit_time: "2024-09-30T08:00:00+00:00",
    });
    await writeInstalledBuild(root, "custom", "fork", {
      branch: "fork",
      subversion: "3.6.0",
      build_hash: null,
      commit_time: "2024-01-10T12:00:00+00:00",
    });
    brokenDir = join(root, "stable", "broken");
    await mkdir(brokenDir);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("lists one tab and reports damaged builds", async () => {
    const result = await executeListCommand({
      libraryRoot: root,
      settings: createDefaultSettings(),
      tab: "stable",
      probe,
      platform: "linux",
    });

    expect(result.builds.map((build) => [build.subversion, build.branch])).toEqual([
      ["4.2.1", "lts"],
    ]);
    expect(result.warnings).toEqual([
      `Damaged build at ${brokenDir}: Executable not found: ${join(brokenDir, "blender")}`,
    ]);
    expect(result.output.split("\n").slice(0, 3)).toEqual([
      `Source: ${root}`,
      "Query: *.*.*-stable,lts",
      "Builds: 1",
    ]);
  });

  it("shows custom builds under their folder", async () => {
    const result = await executeListCommand({
      libraryRoot: root,
      settings: createDefaultSettings(),
      tab: "custom",
      probe,
      platform: "linux",
    });

    expect(result.builds.map((build) => build.branch)).toEqual(["fork"]);
  });

  it("narrows by query", async () => {
    const result = await executeListCommand({
      libraryRoot: root,
      settings: createDefaultSettings(),
      query: "^.^.^",
      probe,
      platform: "linux",
    });

    expect(result.builds.map((build) => build.subversion)).toEqual(["4.3.0-alpha"]);
  });

  it("rejects a bad query before touching the library", async () => {
    await expect(
      executeListCommand({
        libraryRoot: root,
        settings: createDefaultSettings(),
        query: "newest",
        probe,
        platform: "linux",
      }),
    ).rejects.toThrow(InvalidQuerySyntaxError);
    expect(probed).toEqual([]);
  });
});
