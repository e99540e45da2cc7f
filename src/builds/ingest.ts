import { posix } from "node:path";

import { z } from "zod";

import { parseIsoTimestamp } from "../utils/timestamps.js";
import { InvalidVersionFormatError } from "../versions/errors.js";
import { tryParseBuildVersion } from "../versions/parser.js";
import {
  compareSemver,
  createSemver,
  finalizeVersion,
  formatSemver,
  type SemanticVersion,
} from "../versions/semver.js";
import { FeedParseError } from "./errors.js";
import { createBuildRecord } from "./record.js";
import type { BuildRecord } from "./types.js";

export const FLOOR_STABLE_VERSION = createSemver(2, 48, 0);

const MINIMUM_STABLE_BRANCHES = new Set(["stable", "lts"]);

export const buildDescriptorSchema = z.object({
  link: z.string().min(1),
  version: z.string().min(1),
  branch: z.string().min(1),
  buildHash: z.string().nullish(),
  commitTime: z.string().min(1),
});

export type BuildDescriptor = z.infer<typeof buildDescriptorSchema>;

export type IngestWarning =
  | { kind: "invalid-descriptor"; index: number; reason: string }
  | { kind: "invalid-version"; index: number; link: string; version: string }
  | { kind: "invalid-commit-time"; index: number; link: string; commitTime: string };

export interface IngestOptions {
  /** Stable and LTS builds below this version are pruned. */
  minimumStableVersion?: SemanticVersion;
  ltsVersions?: readonly string[];
  onWarning?: (warning: IngestWarning) => void;
}

export interface IngestResult {
  builds: BuildRecord[];
  pruned: number;
}

/**
 * Parses the JSON text of a build feed: an array of descriptors. Entries
 * are validated one by one in `ingestBuildFeed`.
 *
 * @throws FeedParseError when the text is not a JSON array.
 */
export function parseBuildFeed(raw: string, displayPath: string): unknown[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new FeedParseError(
      displayPath,
      error instanceof Error ? error.message : "invalid JSON",
    );
  }
  if (!Array.isArray(json)) {
    throw new FeedParseError(displayPath, "expected a JSON array");
  }
  return json;
}

export function ingestBuildFeed(
  entries: readonly unknown[],
  options: IngestOptions = {},
): IngestResult {
  const minimum = options.minimumStableVersion ?? FLOOR_STABLE_VERSION;
  const builds: BuildRecord[] = [];
  let pruned = 0;

  entries.forEach((entry, index) => {
    const parsed = buildDescriptorSchema.safeParse(entry);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      options.onWarning?.({
        kind: "invalid-descriptor",
        index,
        reason: issue
          ? `${issue.path.join(".") || "entry"}: ${issue.message}`
          : "invalid descriptor",
      });
      return;
    }

    const descriptor = parsed.data;
    const subversion = resolveSubversion(descriptor);
    if (subversion === undefined) {
      options.onWarning?.({
        kind: "invalid-version",
        index,
        link: descriptor.link,
        version: descriptor.version,
      });
      return;
    }

    const commitTime = parseIsoTimestamp(descriptor.commitTime);
    if (!commitTime) {
      options.onWarning?.({
        kind: "invalid-commit-time",
        index,
        link: descriptor.link,
        commitTime: descriptor.commitTime,
      });
      return;
    }

    const record = createBuildRecord(
      {
        link: descriptor.link,
        subversion,
        branch: descriptor.branch,
        buildHash: descriptor.buildHash || null,
        commitTime,
      },
      { ltsVersions: options.ltsVersions },
    );

    if (
      MINIMUM_STABLE_BRANCHES.has(record.branch) &&
      compareSemver(finalizeVersion(record.version), minimum) < 0
    ) {
      pruned += 1;
      return;
    }

    builds.push(record);
  });

  return { builds, pruned };
}

/**
 * The version text a record is built from: the descriptor's own version
 * when it parses, otherwise a version found in the file name of the link.
 */
function resolveSubversion(descriptor: BuildDescriptor): string | undefined {
  if (tryParseBuildVersion(descriptor.version)) {
    return descriptor.version;
  }

  const fileName = posix.basename(descriptor.link.split(/[?#]/u)[0] ?? "");
  const found = tryParseBuildVersion(fileName, { search: true });
  return found ? formatSemver(found) : undefined;
}

/**
 * Reads the minimum stable version setting: `major.minor` text, or "None"
 * for no minimum.
 *
 * @throws InvalidVersionFormatError when the text is not a version.
 */
export function parseMinimumStableVersion(text: string): SemanticVersion {
  const trimmed = text.trim();
  if (trimmed === "None") {
    return FLOOR_STABLE_VERSION;
  }
  const version = tryParseBuildVersion(trimmed);
  if (!version) {
    throw new InvalidVersionFormatError(trimmed);
  }
  return finalizeVersion(version);
}
