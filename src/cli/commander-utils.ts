import { type Command, type CommanderError, Option } from "commander";

import { LIBRARY_TABS } from "../query/filters.js";

/** Options every library-aware subcommand accepts. */
export interface LibraryOptions {
  library?: string;
  settings?: string;
}

export function addLibraryOptions(command: Command): Command {
  return command
    .option(
      "--library <dir>",
      "Library folder (default: $BLENDSHELF_LIBRARY or the working directory)",
    )
    .option("--settings <file>", "Settings file (default: <library>/settings.yaml)");
}

export function queryOption(example: string): Option {
  return new Option("--query <query>", `Version search query, e.g. ${example}`);
}

export function tabOption(): Option {
  return new Option("--tab <tab>", "Only show one library tab").choices(LIBRARY_TABS);
}

/**
 * Commander prints its own usage errors, help and version before throwing
 * under `exitOverride`; those must not be rendered a second time.
 */
export function commanderAlreadyRendered(error: CommanderError): boolean {
  const { code } = error;
  if (!code.startsWith("commander.")) {
    return false;
  }
  return code !== "commander.executeSubCommandAsync";
}
