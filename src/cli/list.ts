import { Command } from "commander";

import { executeListCommand } from "../commands/list/command.js";
import { resolveCliContext } from "../preflight/index.js";
import { isLibraryTab } from "../query/filters.js";
import {
  addLibraryOptions,
  type LibraryOptions,
  queryOption,
  tabOption,
} from "./commander-utils.js";
import { type Alert, toWarningAlerts, writeCommandOutput } from "./output.js";

export interface ListCommandOptions extends LibraryOptions {
  tab?: string;
  query?: string;
}

export interface ListCommandResult {
  alerts: Alert[];
  body: string;
}

export async function runListCommand(
  options: ListCommandOptions = {},
): Promise<ListCommandResult> {
  const { libraryRoot, settings } = await resolveCliContext({
    library: options.library,
    settingsPath: options.settings,
    requireLibrary: true,
  });

  const tab = options.tab !== undefined && isLibraryTab(options.tab) ? options.tab : undefined;
  const execution = await executeListCommand({
    libraryRoot,
    settings,
    tab,
    query: options.query,
  });

  return {
    alerts: toWarningAlerts(execution.warnings),
    body: execution.output,
  };
}

export function createListCommand(): Command {
  return addLibraryOptions(new Command("list").description("List installed builds"))
    .addOption(tabOption())
    .addOption(queryOption("4.^.^@^"))
    .allowExcessArguments(false)
    .action(async (options: ListCommandOptions) => {
      const result = await runListCommand(options);
      writeCommandOutput({ body: result.body, alerts: result.alerts });
    });
}
