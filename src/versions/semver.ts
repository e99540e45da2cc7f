/**
 * Semantic version primitives shared by the parser, build records and the
 * update resolver.
 */

export interface SemanticVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly prerelease?: string;
  readonly build?: string;
}

const STRICT_SEMVER_PATTERN =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-((?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*)(?:\.(?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*))*))?(?:\+([0-9a-zA-Z-]+(?:\.[0-9a-zA-Z-]+)*))?$/u;

export const ZERO_VERSION: SemanticVersion = createSemver(0, 0, 0);

export function createSemver(
  major: number,
  minor: number,
  patch: number,
  prerelease?: string,
  build?: string,
): SemanticVersion {
  const version: SemanticVersion = {
    major,
    minor,
    patch,
    ...(prerelease ? { prerelease } : {}),
    ...(build ? { build } : {}),
  };
  return Object.freeze(version);
}

/**
 * Parses a strict `major.minor.patch[-prerelease][+build]` string.
 * Returns undefined for anything else, including leading zeros.
 */
export function parseStrictSemver(text: string): SemanticVersion | undefined {
  const match = STRICT_SEMVER_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }

  return createSemver(
    Number(match[1]),
    Number(match[2]),
    Number(match[3]),
    match[4],
    match[5],
  );
}

export function formatSemver(version: SemanticVersion): string {
  let text = `${version.major}.${version.minor}.${version.patch}`;
  if (version.prerelease) {
    text += `-${version.prerelease}`;
  }
  if (version.build) {
    text += `+${version.build}`;
  }
  return text;
}

/** Release-level version: prerelease and build metadata stripped. */
export function finalizeVersion(version: SemanticVersion): SemanticVersion {
  if (version.prerelease === undefined && version.build === undefined) {
    return version;
  }
  return createSemver(version.major, version.minor, version.patch);
}

export function withBuild(
  version: SemanticVersion,
  build: string | undefined,
): SemanticVersion {
  return createSemver(
    version.major,
    version.minor,
    version.patch,
    version.prerelease,
    build,
  );
}

export function compareCore(a: SemanticVersion, b: SemanticVersion): number {
  if (a.major !== b.major) {
    return a.major < b.major ? -1 : 1;
  }
  if (a.minor !== b.minor) {
    return a.minor < b.minor ? -1 : 1;
  }
  if (a.patch !== b.patch) {
    return a.patch < b.patch ? -1 : 1;
  }
  return 0;
}

/**
 * Semver precedence: core numbers first, then a release ranks above its
 * prereleases, then prerelease identifiers one by one. Build metadata is
 * ignored.
 */
export function compareSemver(a: SemanticVersion, b: SemanticVersion): number {
  const core = compareCore(a, b);
  if (core !== 0) {
    return core;
  }
  return comparePrerelease(a.prerelease, b.prerelease);
}

/** Like compareSemver, with build metadata as a final text tiebreak. */
export function compareSemverWithBuild(
  a: SemanticVersion,
  b: SemanticVersion,
): number {
  const precedence = compareSemver(a, b);
  if (precedence !== 0) {
    return precedence;
  }
  return compareText(a.build ?? "", b.build ?? "");
}

export function releaseEquals(a: SemanticVersion, b: SemanticVersion): boolean {
  return compareCore(a, b) === 0;
}

export function maxVersion(
  versions: Iterable<SemanticVersion>,
  fallback: SemanticVersion = ZERO_VERSION,
): SemanticVersion {
  let highest = fallback;
  let seen = false;
  for (const version of versions) {
    if (!seen || compareSemver(version, highest) > 0) {
      highest = version;
      seen = true;
    }
  }
  return highest;
}

function comparePrerelease(
  a: string | undefined,
  b: string | undefined,
): number {
  if (a === b) {
    return 0;
  }
  if (a === undefined) {
    return 1;
  }
  if (b === undefined) {
    return -1;
  }

  const left = a.split(".");
  const right = b.split(".");
  const length = Math.min(left.length, right.length);
  for (let index = 0; index < length; index += 1) {
    const result = compareIdentifier(left[index] ?? "", right[index] ?? "");
    if (result !== 0) {
      return result;
    }
  }

  return left.length === right.length ? 0 : left.length < right.length ? -1 : 1;
}

function compareIdentifier(a: string, b: string): number {
  const aNumeric = /^\d+$/u.test(a);
  const bNumeric = /^\d+$/u.test(b);

  if (aNumeric && bNumeric) {
    const difference = Number(a) - Number(b);
    return difference === 0 ? 0 : difference < 0 ? -1 : 1;
  }
  if (aNumeric) {
    return -1;
  }
  if (bNumeric) {
    return 1;
  }
  return compareText(a, b);
}

function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
