import type { IngestWarning } from "../../builds/ingest.js";
import type { DamagedBuild, ScanWarning } from "../../library/scan.js";

export function formatIngestWarning(warning: IngestWarning): string {
  switch (warning.kind) {
    case "invalid-descriptor":
      return `Skipped feed entry ${warning.index}: ${warning.reason}`;
    case "invalid-version":
      return `Skipped ${warning.link}: no version found in "${warning.version}".`;
    case "invalid-commit-time":
      return `Skipped ${warning.link}: unrecognized commit time "${warning.commitTime}".`;
  }
}

export function formatScanWarning(warning: ScanWarning): string {
  switch (warning.kind) {
    case "stale-sidecar":
      return `Refreshed ${warning.path} (file version ${warning.fileVersion ?? "unknown"}).`;
    case "malformed-sidecar":
      return `Rebuilt ${warning.path}: ${warning.reason}`;
    case "sidecar-write-failed":
      return `Could not update the build info of ${warning.path}: ${warning.reason}`;
    case "missing-custom-executable":
      return `Custom executable ${warning.executable} is missing in ${warning.path}; using the detected one.`;
  }
}

export function formatDamagedBuild(build: DamagedBuild): string {
  return `Damaged build at ${build.path}: ${build.reason}`;
}
