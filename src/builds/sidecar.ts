import { readFile, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import { z } from "zod";

import { isMissing } from "../utils/fs.js";
import {
  formatIsoTimestamp,
  parseIsoTimestamp,
  parseLegacyTimestamp,
} from "../utils/timestamps.js";
import { InvalidVersionFormatError } from "../versions/errors.js";
import { SidecarParseError } from "./errors.js";
import { createBuildRecord, withUserFields } from "./record.js";
import type { BuildRecord, BuildUserFields } from "./types.js";

export const SIDECAR_FILENAME = ".blinfo";
export const SIDECAR_FILE_VERSION = "1.5";

const sidecarEntrySchema = z.object({
  branch: z.string(),
  subversion: z.string(),
  build_hash: z.string().nullable(),
  commit_time: z.string(),
  custom_name: z.string().nullish(),
  is_favorite: z.boolean().nullish(),
  custom_executable: z.string().nullish(),
  is_frozen: z.boolean().nullish(),
});

const sidecarDocumentSchema = z.object({
  file_version: z.string().optional(),
  blinfo: z.array(sidecarEntrySchema).min(1),
});

export type SidecarEntry = z.infer<typeof sidecarEntrySchema>;
export type SidecarDocument = z.infer<typeof sidecarDocumentSchema>;

export type SidecarReadResult =
  | { kind: "missing"; path: string }
  | { kind: "malformed"; path: string; error: SidecarParseError }
  | {
      kind: "loaded";
      path: string;
      record: BuildRecord;
      fileVersion: string | undefined;
      /** False when the file predates SIDECAR_FILE_VERSION. */
      current: boolean;
    };

export interface ReadSidecarOptions {
  ltsVersions?: readonly string[];
}

export function sidecarPath(buildDirectory: string): string {
  return join(buildDirectory, SIDECAR_FILENAME);
}

export async function readSidecar(
  buildDirectory: string,
  options: ReadSidecarOptions = {},
): Promise<SidecarReadResult> {
  const path = sidecarPath(buildDirectory);

  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    if (isMissing(error)) {
      return { kind: "missing", path };
    }
    throw error;
  }

  try {
    const document = parseSidecarDocument(raw, path);
    const record = sidecarEntryToRecord(
      buildDirectory,
      document.blinfo[0],
      options,
    );
    return {
      kind: "loaded",
      path,
      record,
      fileVersion: document.file_version,
      current: document.file_version === SIDECAR_FILE_VERSION,
    };
  } catch (error) {
    if (error instanceof SidecarParseError) {
      return { kind: "malformed", path, error };
    }
    if (error instanceof InvalidVersionFormatError) {
      return {
        kind: "malformed",
        path,
        error: new SidecarParseError(path, error.message),
      };
    }
    throw error;
  }
}

export function parseSidecarDocument(
  raw: string,
  displayPath: string,
): SidecarDocument & { blinfo: [SidecarEntry, ...SidecarEntry[]] } {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new SidecarParseError(
      displayPath,
      error instanceof Error ? error.message : "invalid JSON",
    );
  }

  const result = sidecarDocumentSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new SidecarParseError(
      displayPath,
      `${location}${issue?.message ?? "invalid sidecar"}`,
    );
  }

  const [first, ...rest] = result.data.blinfo;
  if (!first) {
    throw new SidecarParseError(displayPath, "blinfo is empty");
  }
  return { ...result.data, blinfo: [first, ...rest] };
}

function sidecarEntryToRecord(
  buildDirectory: string,
  entry: SidecarEntry,
  options: ReadSidecarOptions,
): BuildRecord {
  const commitTime =
    parseIsoTimestamp(entry.commit_time, { zone: "local" }) ??
    parseLegacyTimestamp(entry.commit_time);
  if (!commitTime) {
    throw new SidecarParseError(
      sidecarPath(buildDirectory),
      `unrecognized commit_time "${entry.commit_time}"`,
    );
  }

  return createBuildRecord(
    {
      link: buildDirectory,
      subversion: entry.subversion,
      branch: entry.branch,
      buildHash: entry.build_hash,
      commitTime,
      customName: entry.custom_name ?? "",
      isFavorite: entry.is_favorite ?? false,
      isFrozen: entry.is_frozen ?? false,
      customExecutable: entry.custom_executable || null,
      folder: basename(dirname(buildDirectory)),
    },
    { ltsVersions: options.ltsVersions },
  );
}

export function toSidecarDocument(record: BuildRecord): SidecarDocument {
  return {
    file_version: SIDECAR_FILE_VERSION,
    blinfo: [
      {
        branch: record.branch,
        subversion: record.subversion,
        build_hash: record.buildHash,
        commit_time: formatIsoTimestamp(record.commitTime),
        custom_name: record.customName,
        is_favorite: record.isFavorite,
        custom_executable: record.customExecutable,
        is_frozen: record.isFrozen,
      },
    ],
  };
}

export async function writeSidecar(
  buildDirectory: string,
  record: BuildRecord,
): Promise<SidecarDocument> {
  const document = toSidecarDocument(record);
  await writeFile(
    sidecarPath(buildDirectory),
    `${JSON.stringify(document, null, 2)}\n`,
    "utf8",
  );
  return document;
}

/**
 * Rewrites the user-settable fields of an existing sidecar.
 *
 * @throws SidecarParseError when the sidecar is missing or unreadable.
 */
export async function updateSidecarFields(
  buildDirectory: string,
  fields: BuildUserFields,
  options: ReadSidecarOptions = {},
): Promise<BuildRecord> {
  const result = await readSidecar(buildDirectory, options);
  if (result.kind === "missing") {
    throw new SidecarParseError(result.path, "file not found");
  }
  if (result.kind === "malformed") {
    throw result.error;
  }

  const updated = withUserFields(result.record, fields);
  await writeSidecar(buildDirectory, updated);
  return updated;
}
