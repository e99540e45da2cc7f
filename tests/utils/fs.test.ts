import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, test } from "@jest/globals";

import { isDirectory, isFile, isMissing, listDirectories } from "../../src/utils/fs.js";

describe("isMissing", () => {
  test("returns true for ENOENT errors", () => {
    const error = new Error("missing") as NodeJS.ErrnoException;
    error.code = "ENOENT";

    expect(isMissing(error)).toBe(true);
  });

  test("returns false for other errors", () => {
    const error = new Error("boom") as NodeJS.ErrnoException;
    error.code = "EACCES";

    expect(isMissing(error)).toBe(false);
    expect(isMissing(new Error("generic"))).toBe(false);
  });
});

describe("directory helpers", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "blendshelf-fs-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  test("lists subdirectories sorted and skips files", async () => {
    await mkdir(join(tempDir, "daily"));
    await mkdir(join(tempDir, "custom"));
    await writeFile(join(tempDir, "settings.yaml"), "", "utf8");

    await expect(listDirectories(tempDir)).resolves.toEqual(["custom", "daily"]);
  });

  test("lists a missing directory as empty", async () => {
    await expect(listDirectories(join(tempDir, "absent"))).resolves.toEqual([]);
  });

  test("tells files and directories apart", async () => {
    await writeFile(join(tempDir, "blender"), "", "utf8");

    await expect(isFile(join(tempDir, "blender"))).resolves.toBe(true);
    await expect(isDirectory(join(tempDir, "blender"))).resolves.toBe(false);
    await expect(isDirectory(tempDir)).resolves.toBe(true);
    await expect(isFile(join(tempDir, "absent"))).resolves.toBe(false);
  });
});
