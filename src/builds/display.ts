import { compareSemver, createSemver, formatSemver, finalizeVersion } from "../versions/semver.js";
import type { BuildRecord } from "./types.js";

// Releases before this one used "2.79b"-style names.
const OLD_VERSION_CUTOFF = createSemver(2, 83, 0);

const PRERELEASE_LABEL_BRANCHES = new Set(["daily", "experimental", "patch"]);

export function displayVersion(record: Pick<BuildRecord, "version">): string {
  const { version } = record;
  if (compareSemver(version, OLD_VERSION_CUTOFF) < 0) {
    return `${version.major}.${version.minor}${version.prerelease ?? ""}`;
  }
  return formatSemver(finalizeVersion(version));
}

export function displayLabel(
  record: Pick<BuildRecord, "branch" | "version" | "subversion">,
): string {
  const { branch, version, subversion } = record;

  if (branch === "lts") {
    return "LTS";
  }

  if (PRERELEASE_LABEL_BRANCHES.has(branch)) {
    if (version.prerelease !== undefined) {
      return toTitleCase(version.prerelease.replace(/-/gu, " "));
    }
    const separator = subversion.indexOf("-");
    return toTitleCase(
      separator === -1 ? subversion : subversion.slice(separator + 1),
    );
  }

  if (version.prerelease?.startsWith("rc")) {
    return `Release Candidate ${version.prerelease.slice(2)}`;
  }

  return toTitleCase(branch);
}

/** Upper-cases the first letter of every run of letters, lower-cases the rest. */
export function toTitleCase(text: string): string {
  return text.replace(
    /\p{L}+/gu,
    (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase(),
  );
}
