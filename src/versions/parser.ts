import { InvalidVersionFormatError } from "./errors.js";
import { createSemver, parseStrictSemver, type SemanticVersion } from "./semver.js";

export interface ParseBuildVersionOptions {
  /**
   * Let the fallback patterns match anywhere in the text instead of only at
   * its start. Used for full file names rather than clean labels.
   */
  search?: boolean;
}

interface VersionCaptures {
  major: number;
  minor: number;
  patch?: number;
  prerelease?: string;
}

interface VersionMatcher {
  tryMatch(text: string, search: boolean): VersionCaptures | undefined;
}

function createVersionMatcher(source: string): VersionMatcher {
  const anywhere = new RegExp(source, "u");
  const anchored = new RegExp(`^(?:${source})`, "u");

  return {
    tryMatch(text, search) {
      const match = (search ? anywhere : anchored).exec(text);
      const groups = match?.groups;
      if (!groups || groups.ma === undefined || groups.mi === undefined) {
        return undefined;
      }

      return {
        major: Number(groups.ma),
        minor: Number(groups.mi),
        patch: groups.pa !== undefined ? Number(groups.pa) : undefined,
        prerelease: groups.pre,
      };
    },
  };
}

// Tried in order; the first match wins.
const VERSION_MATCHERS: readonly VersionMatcher[] = [
  // 2.80.0 Alpha -> 2.80.0-alpha
  createVersionMatcher(
    String.raw`(?<ma>\d+)\.(?<mi>\d+)\.(?<pa>\d+)[ \-](?<pre>[^+]*[^wli][^ndux][^s]?)`,
  ),
  // 2.80 (sub 75) -> 2.80.75
  createVersionMatcher(String.raw`(?<ma>\d+)\.(?<mi>\d+) \(sub (?<pa>\d+)\)`),
  // 4.3 Beta -> 4.3.0-beta
  createVersionMatcher(
    String.raw`(?<ma>\d+)\.(?<mi>\d+)[ \-](?<pre>[^+]*[^wli][^ndux][^s]?)`,
  ),
  // 2.79 -> 2.79.0
  createVersionMatcher(String.raw`(?<ma>\d+)\.(?<mi>\d+)$`),
  // 2.79rc1 -> 2.79.0-rc1
  createVersionMatcher(String.raw`(?<ma>\d+)\.(?<mi>\d+)(?<pre>[^\-]{0,3})`),
  // 2.79b -> 2.79.0-b
  createVersionMatcher(String.raw`(?<ma>\d+)\.(?<mi>\d+)(?<pre>\D[^.\s]*)?`),
];

// Everything from the first digit up to a trailing platform tag.
const FILENAME_CLEANER = /(?!blender-)\d.*(?=-linux|-windows)/u;

const parseCache = new Map<string, SemanticVersion>();

/**
 * Converts the many upstream version spellings ("4.2.0", "2.79rc1",
 * "2.80 (sub 75)", "blender-4.3.0-alpha-linux64") into a semantic version.
 *
 * Deterministic, so results are memoized per (text, search) pair.
 *
 * @throws InvalidVersionFormatError when no pattern recognizes the text.
 */
export function parseBuildVersion(
  raw: string,
  options: ParseBuildVersionOptions = {},
): SemanticVersion {
  const search = options.search ?? false;
  const key = `${search ? "s" : "m"}:${raw}`;

  const cached = parseCache.get(key);
  if (cached) {
    return cached;
  }

  const version = parseUncached(raw, search);
  parseCache.set(key, version);
  return version;
}

export function tryParseBuildVersion(
  raw: string,
  options: ParseBuildVersionOptions = {},
): SemanticVersion | undefined {
  try {
    return parseBuildVersion(raw, options);
  } catch (error) {
    if (error instanceof InvalidVersionFormatError) {
      return undefined;
    }
    throw error;
  }
}

function parseUncached(raw: string, search: boolean): SemanticVersion {
  const strict = parseStrictSemver(raw);
  if (strict) {
    return strict;
  }

  let text = raw;
  const cleaned = FILENAME_CLEANER.exec(raw);
  if (cleaned) {
    text = cleaned[0];
    const strictCleaned = parseStrictSemver(text);
    if (strictCleaned) {
      return strictCleaned;
    }
  }

  for (const matcher of VERSION_MATCHERS) {
    const captures = matcher.tryMatch(text, search);
    if (captures) {
      return createSemver(
        captures.major,
        captures.minor,
        captures.patch ?? 0,
        normalizePrerelease(captures.prerelease),
      );
    }
  }

  throw new InvalidVersionFormatError(raw);
}

function normalizePrerelease(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const normalized = value.toLowerCase().replace(/^[- ]+|[- ]+$/gu, "");
  if (normalized.length === 0 || normalized.trim() === "lts") {
    return undefined;
  }
  return normalized;
}
