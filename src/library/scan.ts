import { basename, join } from "node:path";

import { BuildError } from "../builds/errors.js";
import { probeBuildExecutable, type BuildProbe } from "../builds/probe.js";
import { createBuildRecord } from "../builds/record.js";
import { readSidecar, writeSidecar } from "../builds/sidecar.js";
import type { BuildRecord } from "../builds/types.js";
import {
  deriveBranch,
  parseVersionReport,
  resolveExecutablePath,
  toHostPlatform,
  type HostPlatform,
} from "../builds/version-report.js";
import { toErrorMessage } from "../utils/errors.js";
import { listDirectories } from "../utils/fs.js";
import { InvalidVersionFormatError } from "../versions/errors.js";

export const LIBRARY_FOLDERS = [
  "stable",
  "daily",
  "experimental",
  "bforartists",
  "upbge-stable",
  "upbge-weekly",
  "custom",
] as const;

export type LibraryFolder = (typeof LIBRARY_FOLDERS)[number];

export interface DamagedBuild {
  path: string;
  folder: string;
  reason: string;
}

export type ScanWarning =
  | { kind: "stale-sidecar"; path: string; fileVersion: string | undefined }
  | { kind: "malformed-sidecar"; path: string; reason: string }
  | { kind: "sidecar-write-failed"; path: string; reason: string }
  | { kind: "missing-custom-executable"; path: string; executable: string };

export interface ScanLibraryOptions {
  root: string;
  folders?: readonly string[];
  probe?: BuildProbe;
  platform?: HostPlatform;
  ltsVersions?: readonly string[];
  /** Clock for builds whose version report carries no commit time. */
  now?: () => Date;
  onWarning?: (warning: ScanWarning) => void;
}

export interface LibraryScan {
  builds: BuildRecord[];
  damaged: DamagedBuild[];
}

export async function scanLibrary(
  options: ScanLibraryOptions,
): Promise<LibraryScan> {
  const folders = options.folders ?? LIBRARY_FOLDERS;
  const builds: BuildRecord[] = [];
  const damaged: DamagedBuild[] = [];

  for (const folder of folders) {
    const folderPath = join(options.root, folder);
    for (const name of await listDirectories(folderPath)) {
      const buildDirectory = join(folderPath, name);
      try {
        builds.push(await loadInstalledBuild(buildDirectory, options));
      } catch (error) {
        if (
          error instanceof BuildError ||
          error instanceof InvalidVersionFormatError
        ) {
          damaged.push({
            path: buildDirectory,
            folder,
            reason: error.messageForDisplay(),
          });
          continue;
        }
        throw error;
      }
    }
  }

  return { builds, damaged };
}

/**
 * Reads one installed build. A current sidecar is trusted as is; anything
 * else is re-derived from the executable and the sidecar rewritten.
 */
export async function loadInstalledBuild(
  buildDirectory: string,
  options: Omit<ScanLibraryOptions, "root" | "folders">,
): Promise<BuildRecord> {
  const sidecar = await readSidecar(buildDirectory, {
    ltsVersions: options.ltsVersions,
  });

  if (sidecar.kind === "loaded" && sidecar.current) {
    return sidecar.record;
  }

  if (sidecar.kind === "loaded") {
    options.onWarning?.({
      kind: "stale-sidecar",
      path: sidecar.path,
      fileVersion: sidecar.fileVersion,
    });
  } else if (sidecar.kind === "malformed") {
    options.onWarning?.({
      kind: "malformed-sidecar",
      path: sidecar.path,
      reason: sidecar.error.details,
    });
  }

  const previous = sidecar.kind === "loaded" ? sidecar.record : undefined;
  const record = await deriveInstalledBuild(buildDirectory, previous, options);

  try {
    await writeSidecar(buildDirectory, record);
  } catch (error) {
    options.onWarning?.({
      kind: "sidecar-write-failed",
      path: buildDirectory,
      reason: toErrorMessage(error),
    });
  }

  return record;
}

async function deriveInstalledBuild(
  buildDirectory: string,
  previous: BuildRecord | undefined,
  options: Omit<ScanLibraryOptions, "root" | "folders">,
): Promise<BuildRecord> {
  const platform = options.platform ?? toHostPlatform(process.platform);
  const probe = options.probe ?? probeBuildExecutable;

  const executable = await resolveExecutablePath(
    buildDirectory,
    platform,
    previous?.customExecutable ?? null,
  );
  if (executable.customExecutableMissing && previous?.customExecutable) {
    options.onWarning?.({
      kind: "missing-custom-executable",
      path: buildDirectory,
      executable: previous.customExecutable,
    });
  }

  const output = await probe(executable.path);
  const report = parseVersionReport(output);
  if (!report) {
    throw new InvalidVersionFormatError(output.split(/\r?\n/u)[0] ?? "");
  }

  const customExecutable =
    executable.customExecutable ??
    (executable.customExecutableMissing ? null : previous?.customExecutable ?? null);

  return createBuildRecord(
    {
      link: buildDirectory,
      subversion: previous?.subversion ?? report.subversion,
      branch: deriveBranch(buildDirectory, previous),
      buildHash: report.buildHash || null,
      commitTime:
        previous?.commitTime ?? report.commitTime ?? (options.now ?? (() => new Date()))(),
      customName: previous?.customName ?? report.customName,
      isFavorite: previous?.isFavorite ?? false,
      isFrozen: previous?.isFrozen ?? false,
      customExecutable,
      folder: basename(join(buildDirectory, "..")),
    },
    { ltsVersions: options.ltsVersions },
  );
}
