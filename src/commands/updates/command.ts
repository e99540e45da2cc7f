import type { BuildProbe } from "../../builds/probe.js";
import { sortBuildRecords } from "../../builds/record.js";
import type { BuildRecord } from "../../builds/types.js";
import type { HostPlatform } from "../../builds/version-report.js";
import type { BlendshelfSettings } from "../../configs/settings/types.js";
import { scanLibrary } from "../../library/scan.js";
import {
  renderUpdatesTranscript,
  type UpdateOffer,
} from "../../render/transcripts/updates.js";
import { resolveAvailableUpdate } from "../../updates/available.js";
import {
  buildUpdatePolicyConfig,
  resolveBranchPolicy,
  type UpdatePolicyConfig,
} from "../../updates/policy.js";
import { isMajorVersionUpdate } from "../../updates/resolver.js";
import { loadBuildFeed } from "../shared/feed.js";
import {
  formatDamagedBuild,
  formatIngestWarning,
  formatScanWarning,
} from "../shared/warnings.js";

export interface UpdatesCommandInput {
  libraryRoot: string;
  settings: BlendshelfSettings;
  feedPath: string;
  probe?: BuildProbe;
  platform?: HostPlatform;
}

export interface UpdatesCommandResult {
  offers: UpdateOffer[];
  warnings: string[];
  output: string;
}

export async function executeUpdatesCommand(
  input: UpdatesCommandInput,
): Promise<UpdatesCommandResult> {
  const warnings: string[] = [];

  const candidates = await loadBuildFeed({
    feedPath: input.feedPath,
    settings: input.settings,
    onWarning: (warning) => warnings.push(formatIngestWarning(warning)),
  });

  const scan = await scanLibrary({
    root: input.libraryRoot,
    probe: input.probe,
    platform: input.platform,
    ltsVersions: input.settings.scraping.ltsVersions,
    onWarning: (warning) => warnings.push(formatScanWarning(warning)),
  });
  warnings.push(...scan.damaged.map(formatDamagedBuild));

  const config = buildUpdatePolicyConfig(input.settings);
  const library = sortBuildRecords(scan.builds);
  const offers = library.map((installed) =>
    describeUpdate(installed, candidates, config, library),
  );

  return { offers, warnings, output: renderUpdatesTranscript(offers) };
}

export function describeUpdate(
  installed: BuildRecord,
  candidates: readonly BuildRecord[],
  config: UpdatePolicyConfig,
  library: readonly BuildRecord[],
): UpdateOffer {
  if (installed.isFrozen) {
    return { installed, status: "frozen" };
  }

  const policy = resolveBranchPolicy(config, installed.branch);
  if (!policy) {
    return { installed, status: "unmanaged" };
  }
  if (!policy.visible) {
    return { installed, status: "hidden" };
  }

  const update = resolveAvailableUpdate(installed, candidates, config, library);
  if (!update) {
    return { installed, status: "current" };
  }

  return {
    installed,
    status: "update",
    update,
    majorChange: isMajorVersionUpdate(installed, update),
  };
}
