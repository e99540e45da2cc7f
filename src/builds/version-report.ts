import { basename, dirname, join, relative } from "node:path";

import { isDirectory, isFile } from "../utils/fs.js";
import { parseIsoTimestamp } from "../utils/timestamps.js";
import type { BuildRecord } from "./types.js";

export type HostPlatform = "windows" | "linux" | "macos";

export function toHostPlatform(platform: NodeJS.Platform): HostPlatform {
  if (platform === "win32") {
    return "windows";
  }
  if (platform === "darwin") {
    return "macos";
  }
  return "linux";
}

const BLENDER_EXECUTABLES: Record<HostPlatform, string> = {
  windows: "blender.exe",
  linux: "blender",
  macos: "Blender/Blender.app/Contents/MacOS/Blender",
};

const BFORARTISTS_EXECUTABLES: Record<HostPlatform, string> = {
  windows: "bforartists.exe",
  linux: "bforartists",
  macos: "Bforartists/Bforartists.app/Contents/MacOS/Bforartists",
};

export interface ResolvedExecutable {
  path: string;
  /**
   * Set when the executable sits outside the standard layout (a bare `.app`
   * bundle) and must be remembered as the custom executable.
   */
  customExecutable?: string;
  /** The stored custom executable no longer exists. */
  customExecutableMissing: boolean;
}

/**
 * Picks the executable of a build directory: the custom executable when it
 * exists, otherwise Bforartists before Blender, bare macOS bundles first.
 */
export async function resolveExecutablePath(
  buildDirectory: string,
  platform: HostPlatform,
  customExecutable: string | null = null,
): Promise<ResolvedExecutable> {
  let customExecutableMissing = false;
  if (customExecutable) {
    const customPath = join(buildDirectory, customExecutable);
    if (await isFile(customPath)) {
      return { path: customPath, customExecutableMissing };
    }
    customExecutableMissing = true;
  }

  const bundled = async (app: string, binary: string) => {
    if (platform !== "macos" || !(await isDirectory(join(buildDirectory, app)))) {
      return undefined;
    }
    const path = join(buildDirectory, app, "Contents", "MacOS", binary);
    return {
      path,
      customExecutable: relative(buildDirectory, path).split("\\").join("/"),
      customExecutableMissing,
    };
  };

  const bforartistsBundle = await bundled("Bforartists.app", "Bforartists");
  if (bforartistsBundle) {
    return bforartistsBundle;
  }

  const bforartists = join(buildDirectory, BFORARTISTS_EXECUTABLES[platform]);
  if (await isFile(bforartists)) {
    return { path: bforartists, customExecutableMissing };
  }

  const blenderBundle = await bundled("Blender.app", "Blender");
  if (blenderBundle) {
    return blenderBundle;
  }

  return {
    path: join(buildDirectory, BLENDER_EXECUTABLES[platform]),
    customExecutableMissing,
  };
}

export interface VersionReport {
  /** Version text after the product name, e.g. "4.2.1 LTS". */
  subversion: string;
  buildHash: string;
  commitTime?: Date;
  /** Product name when the report used an unrecognized first line. */
  customName: string;
}

/**
 * Reads the output of `<executable> -v`.
 *
 * ```
 * Blender 4.2.1 LTS
 *         build date: 2024-08-19
 *         build commit date: 2024-08-19
 *         build commit time: 11:21
 *         build hash: 396f546c9d82
 * ```
 *
 * @returns undefined when the output names no version at all.
 */
export function parseVersionReport(output: string): VersionReport | undefined {
  const commitDate = /build commit date: (.*)/u.exec(output)?.[1]?.trim();
  const commitClock = /build commit time: (.*)/u.exec(output)?.[1]?.trim();
  const buildHash = /build hash: (.*)/u.exec(output)?.[1]?.trim() ?? "";

  const commitTime =
    commitDate !== undefined && commitClock !== undefined
      ? parseIsoTimestamp(`${commitDate} ${commitClock}`, { zone: "local" })
      : undefined;

  const named = /(?:Blender|Bforartists) (.*)/u.exec(output)?.[1]?.trim();
  if (named) {
    return { subversion: named, buildHash, commitTime, customName: "" };
  }

  const firstLine = output.split(/\r?\n/u)[0]?.trim() ?? "";
  const separator = firstLine.lastIndexOf(" ");
  if (separator === -1) {
    return undefined;
  }

  return {
    subversion: firstLine.slice(separator + 1),
    buildHash,
    commitTime,
    customName: firstLine.slice(0, separator),
  };
}

/**
 * Branch of an installed build, from where it sits in the library:
 * `custom` builds use their own folder name, experimental builds the tag
 * between `+` and the next `.` of the folder name.
 */
export function deriveBranch(
  buildDirectory: string,
  previous?: Pick<BuildRecord, "branch">,
): string {
  const folder = basename(dirname(buildDirectory));
  const name = basename(buildDirectory);

  if (folder === "custom") {
    return name;
  }

  if (folder === "experimental") {
    const tag = /\+(.+?)\./u.exec(name)?.[1];
    if (tag !== undefined) {
      return tag;
    }
    return previous?.branch ?? folder;
  }

  return folder;
}
