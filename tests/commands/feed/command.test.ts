import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";

import { FeedParseError } from "../../../src/builds/errors.js";
import { executeFeedCommand } from "../../../src/commands/feed/command.js";
import { createDefaultSettings } from "../../../src/configs/settings/defaults.js";
import { InvalidQuerySyntaxError } from "../../../src/query/errors.js";
import { writeFeed } from "../../support/library.js";

const FEED = [
  {
    link: "https://builds.example.test/blender-4.2.1-linux-x64.tar.xz",
    version: "4.2.1",
    branch: "stable",
    buildHash: "a1",
    commitTime: "2024-08-19T11:21:00Z",
  },
  {
    link: "https://builds.example.test/blender-4.2.3-linux-x64.tar.xz",
    version: "4.2.3",
    branch: "stable",
    buildHash: "a3",
    commitTime: "2024-10-01T00:00:00Z",
  },
  {
    link: "https://builds.example.test/blender-4.3.0-linux-x64.tar.xz",
    version: "4.3.0",
    branch: "stable",
    buildHash: "b1",
    commitTime: "2024-11-19T00:00:00Z",
  },
  {
    link: "https://builds.example.test/blender-2.79b-linux.tar.bz2",
    version: "2.79b",
    branch: "stable",
    commitTime: "2018-03-22T14:10:00Z",
  },
  {
    link: "https://builds.example.test/readme.txt",
    version: "nope",
    branch: "daily",
    commitTime: "2024-07-16T10:00:00Z",
  },
];

describe("executeFeedCommand", () => {
  let tempDir: string;
  let feedPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "blendshelf-feed-"));
    feedPath = join(tempDir, "feed.json");
    await writeFeed(feedPath, FEED);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("lists every usable build, newest first", async () => {
    const result = await executeFeedCommand({
      feedPath,
      settings: createDefaultSettings(),
    });

    expect(result.builds.map((build) => [build.subversion, build.branch])).toEqual([
      ["4.3.0", "stable"],
      ["4.2.3", "lts"],
      ["4.2.1", "lts"],
    ]);
    expect(result.warnings).toEqual([
      'Skipped https://builds.example.test/readme.txt: no version found in "nope".',
    ]);
  });

  it("applies the query", async () => {
    const result = await executeFeedCommand({
      feedPath,
      settings: createDefaultSettings(),
      query: "4.2.^",
    });

    expect(result.output.split("\n")).toEqual([
      `Source: ${feedPath}`,
      "Query: 4.2.^",
      "Builds: 1",
      "",
      "VERSION  LABEL  BRANCH  HASH  COMMITTED             FLAGS",
      "4.2.3    LTS    lts     a3    2024-10-01 00:00 UTC",
    ]);
  });

  it("keeps old stable releases when the minimum is None", async () => {
    const settings = createDefaultSettings();
    settings.scraping.minimumStableVersion = "None";

    const result = await executeFeedCommand({ feedPath, settings, query: "2.*.*" });

    expect(result.builds.map((build) => build.subversion)).toEqual(["2.79b"]);
  });

  it("rejects invalid queries and feeds", async () => {
    await expect(
      executeFeedCommand({ feedPath, settings: createDefaultSettings(), query: "4.2" }),
    ).rejects.toThrow(InvalidQuerySyntaxError);

    await expect(
      executeFeedCommand({
        feedPath: join(tempDir, "missing.json"),
        settings: createDefaultSettings(),
      }),
    ).rejects.toThrow("ENOENT");

    const objectFeed = join(tempDir, "object.json");
    await writeFile(objectFeed, "{}", "utf8");
    await expect(
      executeFeedCommand({ feedPath: objectFeed, settings: createDefaultSettings() }),
    ).rejects.toThrow(FeedParseError);
  });
});
