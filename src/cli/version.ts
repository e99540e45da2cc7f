import { Command } from "commander";

import { executeVersionCommand } from "../commands/version/command.js";
import { writeCommandOutput } from "./output.js";

export interface VersionCommandOptions {
  text: string;
  search?: boolean;
}

export function runVersionCommand(options: VersionCommandOptions): {
  body: string;
} {
  const { output } = executeVersionCommand({
    text: options.text,
    search: options.search,
  });
  return { body: output };
}

export function createVersionCommand(): Command {
  return new Command("version")
    .description("Normalize a build version string")
    .argument("<text>", "Version text, e.g. \"2.80 (sub 75)\" or \"4.2.1 LTS\"")
    .option("--search", "Find the version anywhere in the text, e.g. in a file name")
    .allowExcessArguments(false)
    .action((text: string, options: { search?: boolean }) => {
      const result = runVersionCommand({ text, search: Boolean(options.search) });
      writeCommandOutput({ body: result.body });
    });
}
