import { toBasicBuildInfo } from "../builds/record.js";
import type { BuildRecord } from "../builds/types.js";
import { matchItems } from "./matcher.js";
import { anyQuery, withBranches } from "./query.js";
import type { VersionSearchQuery } from "./types.js";

export const LIBRARY_TABS = [
  "stable",
  "daily",
  "experimental",
  "bforartists",
  "upbge",
  "custom",
  "all",
] as const;

export type LibraryTab = (typeof LIBRARY_TABS)[number];

const TAB_BRANCHES: Record<LibraryTab, readonly string[] | null> = {
  stable: ["stable", "lts"],
  daily: ["daily"],
  experimental: ["experimental", "patch"],
  bforartists: ["bforartists"],
  upbge: ["upbge-stable", "upbge-weekly"],
  custom: ["custom"],
  all: null,
};

export function isLibraryTab(value: string): value is LibraryTab {
  return LIBRARY_TABS.some((tab) => tab === value);
}

export function tabQuery(tab: LibraryTab): VersionSearchQuery {
  return withBranches(anyQuery(), TAB_BRANCHES[tab]);
}

// Builds in these folders carry their own tag as branch, so a query naming
// the folder also shows everything stored there.
const FOLDER_BRANCHES = ["custom", "experimental"] as const;

/**
 * Records a list view shows for `query`, in input order.
 */
export function selectVisibleBuilds(
  query: VersionSearchQuery,
  records: readonly BuildRecord[],
): BuildRecord[] {
  const matched = new Set(matchItems(query, records, toBasicBuildInfo));

  const folder = FOLDER_BRANCHES.find((name) => query.branches?.includes(name));
  if (folder !== undefined) {
    for (const record of records) {
      if (record.folder === folder) {
        matched.add(record);
      }
    }
  }

  return records.filter((record) => matched.has(record));
}
