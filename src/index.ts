export { displayLabel, displayVersion } from "./builds/display.js";
export {
  BuildError,
  BuildExecutableNotFoundError,
  FeedParseError,
  SidecarParseError,
  VersionProbeError,
} from "./builds/errors.js";
export {
  ingestBuildFeed,
  parseBuildFeed,
  parseMinimumStableVersion,
  type BuildDescriptor,
  type IngestWarning,
} from "./builds/ingest.js";
export { probeBuildExecutable, type BuildProbe } from "./builds/probe.js";
export {
  buildRecordsEqual,
  compareBuildRecords,
  createBuildRecord,
  fullVersion,
  sortBuildRecords,
  toBasicBuildInfo,
  withUserFields,
} from "./builds/record.js";
export {
  readSidecar,
  SIDECAR_FILE_VERSION,
  SIDECAR_FILENAME,
  updateSidecarFields,
  writeSidecar,
  type SidecarReadResult,
} from "./builds/sidecar.js";
export type {
  BasicBuildInfo,
  BuildRecord,
  BuildRecordInput,
  BuildUserFields,
} from "./builds/types.js";
export {
  deriveBranch,
  parseVersionReport,
  resolveExecutablePath,
} from "./builds/version-report.js";
export { loadSettings } from "./configs/settings/loader.js";
export { SettingsError } from "./configs/settings/errors.js";
export type { BlendshelfSettings } from "./configs/settings/types.js";
export {
  LIBRARY_FOLDERS,
  scanLibrary,
  type DamagedBuild,
  type LibraryScan,
} from "./library/scan.js";
export { InvalidQueryError, InvalidQuerySyntaxError } from "./query/errors.js";
export { selectVisibleBuilds, tabQuery, type LibraryTab } from "./query/filters.js";
export { matchBuilds, matchItems } from "./query/matcher.js";
export {
  anyQuery,
  createQuery,
  defaultQuery,
  mergeQueries,
  parseQuery,
  queriesEqual,
  versionQuery,
  withBranches,
  withBuildHash,
  withCommitTime,
  withFolder,
} from "./query/query.js";
export { formatQuery } from "./query/syntax.js";
export {
  ANY,
  exact,
  literalTime,
  NEWEST,
  OLDEST,
  type CommitTimeSelector,
  type Selector,
  type VersionSearchQuery,
} from "./query/types.js";
export { resolveAvailableUpdate } from "./updates/available.js";
export {
  buildUpdatePolicyConfig,
  resolveBranchPolicy,
  type BranchPolicy,
  type UpdatePolicyConfig,
} from "./updates/policy.js";
export {
  findUpdate,
  isMajorVersionUpdate,
  type UpdateBehavior,
} from "./updates/resolver.js";
export { InvalidVersionFormatError } from "./versions/errors.js";
export { parseBuildVersion, tryParseBuildVersion } from "./versions/parser.js";
export {
  compareSemver,
  finalizeVersion,
  formatSemver,
  type SemanticVersion,
} from "./versions/semver.js";
