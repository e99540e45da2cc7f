import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";

import { BuildExecutableNotFoundError } from "../../src/builds/errors.js";
import type { BuildProbe } from "../../src/builds/probe.js";
import { SIDECAR_FILENAME } from "../../src/builds/sidecar.js";
import { scanLibrary, type ScanWarning } from "../../src/library/scan.js";
import { utc } from "../support/factories/builds.js";

const DAILY_REPORT = [
  "Blender 4.3.0 Alpha",
  "\tbuild commit date: 2024-09-30",
  "\tbuild commit time: 08:00",
  "\tbuild hash: ddc9f92777cb",
].join("\n");

describe("scanLibrary", () => {
  let root: string;
  let probed: string[];
  let warnings: ScanWarning[];

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "blendshelf-library-"));
    probed = [];
    warnings = [];
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function probeWith(output: string): BuildProbe {
    return async (path) => {
      probed.push(path);
      return output;
    };
  }

  it("trusts current sidecars without probing", async () => {
    const buildDir = await createBuildDir("stable", "blender-4.2.1");
    await writeSidecarJson(buildDir, "1.5", {
      branch: "stable",
      subversion: "4.2.1",
      build_hash: "396f546c9d82",
      commit_time: "2024-08-19T11:21:00+00:00",
    });

    const scan = await scanLibrary({
      root,
      probe: probeWith(DAILY_REPORT),
      platform: "linux",
      ltsVersions: ["4.2"],
    });

    expect(probed).toEqual([]);
    expect(scan.damaged).toEqual([]);
    expect(scan.builds.map((build) => [build.subversion, build.branch, build.folder])).toEqual([
      ["4.2.1", "lts", "stable"],
    ]);
  });

  it("probes builds without a sidecar and writes one", async () => {
    const buildDir = await createBuildDir("daily", "blender-4.3.0");

    const scan = await scanLibrary({
      root,
      probe: probeWith(DAILY_REPORT),
      platform: "linux",
      onWarning: (warning) => warnings.push(warning),
    });

    expect(probed).toEqual([join(buildDir, "blender")]);
    expect(warnings).toEqual([]);
    const [build] = scan.builds;
    expect(build?.subversion).toBe("4.3.0 Alpha");
    expect(build?.branch).toBe("daily");
    expect(build?.buildHash).toBe("ddc9f92777cb");
    expect(build?.commitTime).toEqual(new Date(2024, 8, 30, 8, 0));

    const written: unknown = JSON.parse(
      await readFile(join(buildDir, SIDECAR_FILENAME), "utf8"),
    );
    expect(written).toMatchObject({
      file_version: "1.5",
      blinfo: [{ branch: "daily", subversion: "4.3.0 Alpha", build_hash: "ddc9f92777cb" }],
    });
  });

  it("re-derives stale sidecars but keeps their version and user fields", async () => {
    const buildDir = await createBuildDir("daily", "blender-4.3.0");
    await writeSidecarJson(buildDir, "1.4", {
      branch: "daily",
      subversion: "4.3.0-alpha",
      build_hash: null,
      commit_time: "2024-09-29T20:00:00+00:00",
      custom_name: "lookdev",
      is_favorite: true,
    });

    const scan = await scanLibrary({
      root,
      probe: probeWith(DAILY_REPORT),
      platform: "linux",
      onWarning: (warning) => warnings.push(warning),
    });

    expect(warnings).toEqual([
      {
        kind: "stale-sidecar",
        path: join(buildDir, SIDECAR_FILENAME),
        fileVersion: "1.4",
      },
    ]);
    const [build] = scan.builds;
    expect(build?.subversion).toBe("4.3.0-alpha");
    expect(build?.commitTime).toEqual(utc("2024-09-29T20:00:00Z"));
    expect(build?.buildHash).toBe("ddc9f92777cb");
    expect(build?.customName).toBe("lookdev");
    expect(build?.isFavorite).toBe(true);
  });

  it("collects builds that cannot be read as damaged", async () => {
    const buildDir = await createBuildDir("custom", "broken");

    const scan = await scanLibrary({
      root,
      platform: "linux",
      probe: async (path) => {
        throw new BuildExecutableNotFoundError(path);
      },
    });

    expect(scan.builds).toEqual([]);
    expect(scan.damaged).toEqual([
      {
        path: buildDir,
        folder: "custom",
        reason: `Executable not found: ${join(buildDir, "blender")}`,
      },
    ]);
  });

  it("reports version reports without a version as damaged", async () => {
    await createBuildDir("stable", "empty");

    const scan = await scanLibrary({ root, platform: "linux", probe: probeWith("") });

    expect(scan.damaged.map((entry) => entry.reason)).toEqual([
      'No valid version found in "".',
    ]);
  });

  it("scans only the requested folders", async () => {
    await createBuildDir("daily", "blender-4.3.0");

    const scan = await scanLibrary({
      root,
      folders: ["stable"],
      probe: probeWith(DAILY_REPORT),
      platform: "linux",
    });

    expect(scan.builds).toEqual([]);
    expect(probed).toEqual([]);
  });

  async function createBuildDir(folder: string, name: string): Promise<string> {
    const path = join(root, folder, name);
    await mkdir(path, { recursive: true });
    return path;
  }

  async function writeSidecarJson(
    buildDir: string,
    fileVersion: string,
    entry: Record<string, unknown>,
  ): Promise<void> {
    await writeFile(
      join(buildDir, SIDECAR_FILENAME),
      JSON.stringify({ file_version: fileVersion, blinfo: [entry] }),
      "utf8",
    );
  }
});
