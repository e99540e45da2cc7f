import { join } from "node:path";

import { Command } from "commander";

import { executeMarkCommand } from "../commands/mark/command.js";
import { ensureBuildDirectory, resolveCliContext } from "../preflight/index.js";
import { writeCommandOutput } from "./output.js";

export interface MarkCommandOptions {
  buildDir: string;
  favorite?: boolean;
  frozen?: boolean;
  name?: string;
  executable?: string;
  settings?: string;
}

export async function runMarkCommand(
  options: MarkCommandOptions,
): Promise<{ body: string }> {
  const buildPath = await ensureBuildDirectory(options.buildDir);
  const { settings } = await resolveCliContext({
    // <library>/<folder>/<build>
    library: join(buildPath, "..", ".."),
    settingsPath: options.settings,
  });

  const { output } = await executeMarkCommand({
    buildPath,
    favorite: options.favorite,
    frozen: options.frozen,
    name: options.name,
    executable: options.executable,
    ltsVersions: settings.scraping.ltsVersions,
  });
  return { body: output };
}

export function createMarkCommand(): Command {
  return new Command("mark")
    .description("Change the user fields of an installed build")
    .argument("<build-dir>", "Build folder holding a .blinfo file")
    .option("--favorite", "Mark as favorite")
    .option("--no-favorite", "Clear the favorite mark")
    .option("--frozen", "Never offer updates for this build")
    .option("--no-frozen", "Offer updates again")
    .option("--name <text>", "Custom display name")
    .option("--executable <path>", "Executable relative to the build folder; empty to clear")
    .option("--settings <file>", "Settings file (default: <library>/settings.yaml)")
    .allowExcessArguments(false)
    .action(async (buildDir: string, options: Omit<MarkCommandOptions, "buildDir">) => {
      const result = await runMarkCommand({ ...options, buildDir });
      writeCommandOutput({ body: result.body });
    });
}
