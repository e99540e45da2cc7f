import { Command } from "commander";

import { executeUpdatesCommand } from "../commands/updates/command.js";
import { ensureFeedFile, resolveCliContext } from "../preflight/index.js";
import { addLibraryOptions, type LibraryOptions } from "./commander-utils.js";
import { type Alert, toWarningAlerts, writeCommandOutput } from "./output.js";

export interface UpdatesCommandOptions extends LibraryOptions {
  feed: string;
}

export interface UpdatesCommandResult {
  alerts: Alert[];
  body: string;
}

export async function runUpdatesCommand(
  options: UpdatesCommandOptions,
): Promise<UpdatesCommandResult> {
  const feedPath = await ensureFeedFile(options.feed);
  const { libraryRoot, settings } = await resolveCliContext({
    library: options.library,
    settingsPath: options.settings,
    requireLibrary: true,
  });

  const execution = await executeUpdatesCommand({
    libraryRoot,
    settings,
    feedPath,
  });

  return {
    alerts: toWarningAlerts(execution.warnings),
    body: execution.output,
  };
}

export function createUpdatesCommand(): Command {
  return addLibraryOptions(
    new Command("updates")
      .description("Show the update offered for each installed build")
      .requiredOption("--feed <file>", "JSON array of available build descriptors"),
  )
    .allowExcessArguments(false)
    .action(async (options: UpdatesCommandOptions) => {
      const result = await runUpdatesCommand(options);
      writeCommandOutput({ body: result.body, alerts: result.alerts });
    });
}
