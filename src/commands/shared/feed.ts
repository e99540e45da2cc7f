import { readFile } from "node:fs/promises";

import {
  ingestBuildFeed,
  type IngestWarning,
  parseBuildFeed,
  parseMinimumStableVersion,
} from "../../builds/ingest.js";
import type { BuildRecord } from "../../builds/types.js";
import type { BlendshelfSettings } from "../../configs/settings/types.js";

export interface LoadFeedInput {
  feedPath: string;
  settings: BlendshelfSettings;
  onWarning?: (warning: IngestWarning) => void;
}

/**
 * Reads a build feed and turns it into records under the scraping
 * settings.
 *
 * @throws FeedParseError when the file is not a JSON array.
 */
export async function loadBuildFeed(input: LoadFeedInput): Promise<BuildRecord[]> {
  const { feedPath, settings, onWarning } = input;
  const raw = await readFile(feedPath, "utf8");

  const { builds } = ingestBuildFeed(parseBuildFeed(raw, feedPath), {
    minimumStableVersion: parseMinimumStableVersion(
      settings.scraping.minimumStableVersion,
    ),
    ltsVersions: settings.scraping.ltsVersions,
    onWarning,
  });
  return builds;
}
