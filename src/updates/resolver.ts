import { isComparableTime } from "../builds/record.js";
import type { BuildRecord } from "../builds/types.js";
import {
  compareSemver,
  finalizeVersion,
  formatSemver,
  maxVersion,
  releaseEquals,
  type SemanticVersion,
} from "../versions/semver.js";

export const UPDATE_BEHAVIORS = ["major", "minor", "patch"] as const;

/** How far an update may move away from the installed release. */
export type UpdateBehavior = (typeof UPDATE_BEHAVIORS)[number];

export interface FindUpdateOptions {
  /** Every installed build; defaults to the installed build alone. */
  library?: readonly BuildRecord[];
}

interface InstalledIndex {
  hashes: ReadonlySet<string>;
  releases: readonly SemanticVersion[];
  /** Latest commit time per installed release, keyed by `major.minor.patch`. */
  latestCommit: ReadonlyMap<string, number>;
}

function indexLibrary(library: readonly BuildRecord[]): InstalledIndex {
  const hashes = new Set<string>();
  const releases: SemanticVersion[] = [];
  const latestCommit = new Map<string, number>();

  for (const record of library) {
    if (record.buildHash) {
      hashes.add(record.buildHash);
    }
    const release = finalizeVersion(record.version);
    releases.push(release);

    const key = formatSemver(release);
    const time = record.commitTime.getTime();
    const previous = latestCommit.get(key);
    if (previous === undefined || time > previous || Number.isNaN(previous)) {
      latestCommit.set(key, time);
    }
  }

  return { hashes, releases, latestCommit };
}

function isNewerThan(candidate: Date, reference: number | undefined): boolean {
  if (!isComparableTime(candidate) || reference === undefined || Number.isNaN(reference)) {
    return false;
  }
  return candidate.getTime() > reference;
}

function isBetterVersion(
  candidate: SemanticVersion,
  current: SemanticVersion,
  releases: readonly SemanticVersion[],
  behavior: UpdateBehavior,
): boolean {
  if (behavior === "major") {
    return compareSemver(candidate, maxVersion(releases)) > 0;
  }

  if (candidate.major !== current.major) {
    return false;
  }
  if (behavior === "minor") {
    const highest = maxVersion(releases.filter((v) => v.major === current.major));
    return compareSemver(candidate, highest) > 0;
  }

  if (candidate.minor !== current.minor) {
    return false;
  }
  const highest = maxVersion(
    releases.filter((v) => v.major === current.major && v.minor === current.minor),
  );
  return candidate.patch > highest.patch;
}

/**
 * Picks the remote build to offer for `installed`: the best newer release
 * allowed by `behavior`, or failing that the most recent rebuild of the
 * installed release.
 */
export function findUpdate(
  installed: BuildRecord,
  candidates: readonly BuildRecord[],
  behavior: UpdateBehavior,
  options: FindUpdateOptions = {},
): BuildRecord | undefined {
  const current = finalizeVersion(installed.version);
  const library = options.library ?? [installed];
  const index = indexLibrary(library);

  let bestVersion: BuildRecord | undefined;
  let bestVersionRelease: SemanticVersion | undefined;
  let bestRebuild: BuildRecord | undefined;

  for (const candidate of candidates) {
    if (candidate.branch !== installed.branch) {
      continue;
    }
    if (candidate.buildHash && index.hashes.has(candidate.buildHash)) {
      continue;
    }

    const release = finalizeVersion(candidate.version);
    const key = formatSemver(release);
    if (
      index.latestCommit.has(key) &&
      !isNewerThan(candidate.commitTime, index.latestCommit.get(key))
    ) {
      continue;
    }

    if (
      isBetterVersion(release, current, index.releases, behavior) &&
      (bestVersionRelease === undefined ||
        compareSemver(release, bestVersionRelease) > 0)
    ) {
      bestVersion = candidate;
      bestVersionRelease = release;
    }

    if (
      releaseEquals(release, current) &&
      isNewerThan(candidate.commitTime, installed.commitTime.getTime()) &&
      !(installed.branch === "daily" && compareSemver(candidate.version, installed.version) < 0) &&
      (bestRebuild === undefined ||
        candidate.commitTime.getTime() > bestRebuild.commitTime.getTime())
    ) {
      bestRebuild = candidate;
    }
  }

  return bestVersion ?? bestRebuild;
}

/** True when moving to `candidate` changes the major or minor release. */
export function isMajorVersionUpdate(
  installed: Pick<BuildRecord, "version">,
  candidate: Pick<BuildRecord, "version">,
): boolean {
  return (
    installed.version.major !== candidate.version.major ||
    installed.version.minor !== candidate.version.minor
  );
}
