import { Command } from "commander";

import { executeFeedCommand } from "../commands/feed/command.js";
import { ensureFeedFile, resolveCliContext } from "../preflight/index.js";
import { addLibraryOptions, type LibraryOptions, queryOption } from "./commander-utils.js";
import { type Alert, toWarningAlerts, writeCommandOutput } from "./output.js";

export interface FeedCommandOptions extends LibraryOptions {
  file: string;
  query?: string;
}

export interface FeedCommandResult {
  alerts: Alert[];
  body: string;
}

export async function runFeedCommand(
  options: FeedCommandOptions,
): Promise<FeedCommandResult> {
  const feedPath = await ensureFeedFile(options.file);
  const { settings } = await resolveCliContext({
    library: options.library,
    settingsPath: options.settings,
  });

  const execution = await executeFeedCommand({
    feedPath,
    settings,
    query: options.query,
  });

  return {
    alerts: toWarningAlerts(execution.warnings),
    body: execution.output,
  };
}

export function createFeedCommand(): Command {
  return addLibraryOptions(
    new Command("feed")
      .description("Read a build feed and list the builds it offers")
      .argument("<file>", "JSON array of build descriptors"),
  )
    .addOption(queryOption("4.2.^-lts"))
    .allowExcessArguments(false)
    .action(async (file: string, options: Omit<FeedCommandOptions, "file">) => {
      const result = await runFeedCommand({ ...options, file });
      writeCommandOutput({ body: result.body, alerts: result.alerts });
    });
}
