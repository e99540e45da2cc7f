import type { BuildProbe } from "../../builds/probe.js";
import { sortBuildRecords } from "../../builds/record.js";
import type { BuildRecord } from "../../builds/types.js";
import type { HostPlatform } from "../../builds/version-report.js";
import type { BlendshelfSettings } from "../../configs/settings/types.js";
import { scanLibrary } from "../../library/scan.js";
import { selectVisibleBuilds, tabQuery, type LibraryTab } from "../../query/filters.js";
import { mergeQueries, parseQuery } from "../../query/query.js";
import { formatQuery } from "../../query/syntax.js";
import { renderBuildListTranscript } from "../../render/transcripts/builds.js";
import { formatDamagedBuild, formatScanWarning } from "../shared/warnings.js";

export interface ListCommandInput {
  libraryRoot: string;
  settings: BlendshelfSettings;
  tab?: LibraryTab;
  query?: string;
  probe?: BuildProbe;
  platform?: HostPlatform;
}

export interface ListCommandResult {
  builds: BuildRecord[];
  warnings: string[];
  output: string;
}

export async function executeListCommand(
  input: ListCommandInput,
): Promise<ListCommandResult> {
  // Parse first so a bad query fails before the library is probed.
  const userQuery = input.query !== undefined ? parseQuery(input.query) : undefined;
  const query = userQuery
    ? mergeQueries(tabQuery(input.tab ?? "all"), userQuery)
    : tabQuery(input.tab ?? "all");

  const warnings: string[] = [];
  const scan = await scanLibrary({
    root: input.libraryRoot,
    probe: input.probe,
    platform: input.platform,
    ltsVersions: input.settings.scraping.ltsVersions,
    onWarning: (warning) => warnings.push(formatScanWarning(warning)),
  });
  warnings.push(...scan.damaged.map(formatDamagedBuild));

  const builds = sortBuildRecords(selectVisibleBuilds(query, scan.builds));

  return {
    builds,
    warnings,
    output: renderBuildListTranscript(builds, {
      source: input.libraryRoot,
      query: formatQuery(query),
    }),
  };
}
