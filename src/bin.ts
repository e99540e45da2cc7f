#!/usr/bin/env node

import process from "node:process";

import { Command, CommanderError } from "commander";

import { commanderAlreadyRendered } from "./cli/commander-utils.js";
import { CliError, toCliError } from "./cli/errors.js";
import { createFeedCommand } from "./cli/feed.js";
import { createListCommand } from "./cli/list.js";
import { createMarkCommand } from "./cli/mark.js";
import { writeCommandOutput } from "./cli/output.js";
import { createUpdatesCommand } from "./cli/updates.js";
import { createVersionCommand } from "./cli/version.js";
import { renderCliError } from "./render/utils/errors.js";
import { toErrorMessage } from "./utils/errors.js";
import { getBlendshelfVersion } from "./utils/version.js";

function installProcessGuards(): void {
  process.on("uncaughtException", (error) => {
    console.error(`[blendshelf] Uncaught exception: ${toErrorMessage(error)}`);
    console.error(error);
    process.exit(1);
  });

  process.on("unhandledRejection", (reason) => {
    console.error(`[blendshelf] Unhandled rejection: ${toErrorMessage(reason)}`);
    process.exit(1);
  });
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("blendshelf")
    .description("Manage local Blender builds and their updates")
    .version(getBlendshelfVersion(), "-v, --version", "print the blendshelf version")
    .exitOverride()
    .showHelpAfterError()
    .helpCommand(false);

  program.addCommand(createVersionCommand());
  program.addCommand(createListCommand());
  program.addCommand(createFeedCommand());
  program.addCommand(createUpdatesCommand());
  program.addCommand(createMarkCommand());

  return program;
}

export async function runCli(
  argv: readonly string[] = process.argv,
): Promise<void> {
  const program = createProgram();

  if (argv.length <= 2) {
    writeCommandOutput({ body: program.helpInformation() });
    return;
  }

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (commanderAlreadyRendered(error)) {
        process.exitCode = error.exitCode ?? 0;
        return;
      }

      writeCommandOutput({
        body: renderCliError(new CliError(toErrorMessage(error))),
        exitCode: error.exitCode ?? 1,
      });
      return;
    }

    writeCommandOutput({
      body: renderCliError(toCliError(error)),
      exitCode: 1,
    });
  }
}

if (require.main === module && process.env.BLENDSHELF_CLI_SKIP_AUTORUN !== "1") {
  installProcessGuards();
  void runCli();
}
