import type { SemanticVersion } from "../versions/semver.js";

/**
 * One discovered build, remote or installed. Frozen once constructed; the
 * user fields change only through `withUserFields`.
 */
export interface BuildRecord {
  /** Download URL for remote builds, build directory for installed ones. */
  readonly link: string;
  /** Version text exactly as the source reported it. */
  readonly subversion: string;
  readonly version: SemanticVersion;
  /** Release channel such as stable, lts or daily; free-form for custom and PR builds. */
  readonly branch: string;
  /** Short commit hash; null when unknown. */
  readonly buildHash: string | null;
  readonly commitTime: Date;
  readonly customName: string;
  readonly isFavorite: boolean;
  readonly isFrozen: boolean;
  /** Executable path relative to the build directory. */
  readonly customExecutable: string | null;
  /** Library folder the build lives in (installed builds only). */
  readonly folder?: string;
}

export interface BuildRecordInput {
  link: string;
  subversion: string;
  branch: string;
  buildHash?: string | null;
  commitTime: Date;
  customName?: string;
  isFavorite?: boolean;
  isFrozen?: boolean;
  customExecutable?: string | null;
  folder?: string;
}

/** The fields a user may change on an installed build. */
export interface BuildUserFields {
  customName?: string;
  isFavorite?: boolean;
  isFrozen?: boolean;
  customExecutable?: string | null;
}

/**
 * Presentation-free projection of a record used by the query matcher.
 */
export interface BasicBuildInfo {
  readonly version: SemanticVersion;
  readonly branch: string;
  /** Empty when unknown. */
  readonly buildHash: string;
  readonly commitTime: Date;
  readonly folder?: string;
}
