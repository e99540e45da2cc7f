import { sortBuildRecords, toBasicBuildInfo } from "../../builds/record.js";
import type { BuildRecord } from "../../builds/types.js";
import type { BlendshelfSettings } from "../../configs/settings/types.js";
import { matchItems } from "../../query/matcher.js";
import { anyQuery, parseQuery } from "../../query/query.js";
import { formatQuery } from "../../query/syntax.js";
import { renderBuildListTranscript } from "../../render/transcripts/builds.js";
import { loadBuildFeed } from "../shared/feed.js";
import { formatIngestWarning } from "../shared/warnings.js";

export interface FeedCommandInput {
  feedPath: string;
  settings: BlendshelfSettings;
  query?: string;
}

export interface FeedCommandResult {
  builds: BuildRecord[];
  warnings: string[];
  output: string;
}

export async function executeFeedCommand(
  input: FeedCommandInput,
): Promise<FeedCommandResult> {
  const query = input.query !== undefined ? parseQuery(input.query) : anyQuery();

  const warnings: string[] = [];
  const records = await loadBuildFeed({
    feedPath: input.feedPath,
    settings: input.settings,
    onWarning: (warning) => warnings.push(formatIngestWarning(warning)),
  });

  const builds = sortBuildRecords(matchItems(query, records, toBasicBuildInfo));

  return {
    builds,
    warnings,
    output: renderBuildListTranscript(builds, {
      source: input.feedPath,
      query: formatQuery(query),
    }),
  };
}
