import { parseBuildVersion } from "../versions/parser.js";
import {
  compareSemver,
  compareSemverWithBuild,
  finalizeVersion,
  releaseEquals,
  type SemanticVersion,
  withBuild,
} from "../versions/semver.js";
import type {
  BasicBuildInfo,
  BuildRecord,
  BuildRecordInput,
  BuildUserFields,
} from "./types.js";

export interface CreateBuildRecordOptions {
  /** `major.minor` prefixes of LTS releases, e.g. "4.2". */
  ltsVersions?: readonly string[];
}

/**
 * @throws InvalidVersionFormatError when `subversion` is unparsable.
 */
export function createBuildRecord(
  input: BuildRecordInput,
  options: CreateBuildRecordOptions = {},
): BuildRecord {
  const version = parseBuildVersion(input.subversion);
  const branch = resolveLtsBranch(
    input.branch,
    input.subversion,
    options.ltsVersions ?? [],
  );

  const record: BuildRecord = {
    link: input.link,
    subversion: input.subversion,
    version,
    branch,
    buildHash: input.buildHash ?? null,
    commitTime: input.commitTime,
    customName: input.customName ?? "",
    isFavorite: input.isFavorite ?? false,
    isFrozen: input.isFrozen ?? false,
    customExecutable: input.customExecutable ?? null,
    ...(input.folder !== undefined ? { folder: input.folder } : {}),
  };
  return Object.freeze(record);
}

export function withUserFields(
  record: BuildRecord,
  fields: BuildUserFields,
): BuildRecord {
  return Object.freeze({
    ...record,
    customName: fields.customName ?? record.customName,
    isFavorite: fields.isFavorite ?? record.isFavorite,
    isFrozen: fields.isFrozen ?? record.isFrozen,
    customExecutable:
      fields.customExecutable !== undefined
        ? fields.customExecutable
        : record.customExecutable,
  });
}

function resolveLtsBranch(
  branch: string,
  subversion: string,
  ltsVersions: readonly string[],
): string {
  if (branch !== "stable") {
    return branch;
  }
  return ltsVersions.some((prefix) => subversion.startsWith(prefix))
    ? "lts"
    : branch;
}

export function hasBuildHash(record: Pick<BuildRecord, "buildHash">): boolean {
  return record.buildHash !== null && record.buildHash.length > 0;
}

/**
 * Two records with known hashes are the same build iff the hashes match.
 * Otherwise major.minor.patch decides, so "4.5.2" and "4.5.2-window" agree.
 */
export function buildRecordsEqual(a: BuildRecord, b: BuildRecord): boolean {
  if (hasBuildHash(a) && hasBuildHash(b)) {
    return a.buildHash === b.buildHash;
  }
  return releaseEquals(a.version, b.version);
}

/**
 * The version with `branch.hash` appended as build metadata, giving records
 * of the same version a deterministic order.
 */
export function fullVersion(record: BuildRecord): SemanticVersion {
  const build = [record.branch, record.buildHash ?? ""]
    .map(toBuildIdentifier)
    .filter((part) => part.length > 0)
    .join(".");
  return withBuild(record.version, build.length > 0 ? build : undefined);
}

function toBuildIdentifier(value: string): string {
  return value.replace(/[^0-9A-Za-z-]+/gu, "-");
}

export function isComparableTime(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

export function compareBuildRecords(a: BuildRecord, b: BuildRecord): number {
  const release = compareSemver(
    finalizeVersion(a.version),
    finalizeVersion(b.version),
  );
  if (release !== 0) {
    return release;
  }

  if (isComparableTime(a.commitTime) && isComparableTime(b.commitTime)) {
    const difference = a.commitTime.getTime() - b.commitTime.getTime();
    if (difference !== 0) {
      return difference < 0 ? -1 : 1;
    }
    return 0;
  }

  return compareSemverWithBuild(fullVersion(a), fullVersion(b));
}

export function sortBuildRecords(
  records: readonly BuildRecord[],
  direction: "ascending" | "descending" = "descending",
): BuildRecord[] {
  const sorted = [...records].sort(compareBuildRecords);
  return direction === "descending" ? sorted.reverse() : sorted;
}

export function toBasicBuildInfo(record: BuildRecord): BasicBuildInfo {
  return {
    version: record.version,
    branch: record.branch,
    buildHash: record.buildHash ?? "",
    commitTime: record.commitTime,
    ...(record.folder !== undefined ? { folder: record.folder } : {}),
  };
}
