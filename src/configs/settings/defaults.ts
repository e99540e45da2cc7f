import type { BlendshelfSettings, BranchUpdateSettings } from "./types.js";

export const SETTINGS_FILENAME = "settings.yaml";

// Long-term support lines published at blender.org/download/lts.
export const DEFAULT_LTS_VERSIONS = ["2.83", "2.93", "3.3", "3.6", "4.2", "4.5"];

function defaultBranchSettings(): BranchUpdateSettings {
  return { behavior: "patch", showButton: true };
}

export function createDefaultSettings(): BlendshelfSettings {
  return {
    updates: {
      advanced: false,
      behavior: "patch",
      showButton: true,
      branches: {
        stable: defaultBranchSettings(),
        daily: defaultBranchSettings(),
        experimental: defaultBranchSettings(),
        bforartists: defaultBranchSettings(),
        upbgeStable: defaultBranchSettings(),
        upbgeWeekly: defaultBranchSettings(),
      },
    },
    scraping: {
      minimumStableVersion: "3.0",
      ltsVersions: [...DEFAULT_LTS_VERSIONS],
    },
  };
}
