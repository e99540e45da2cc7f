import { CliError } from "../cli/errors.js";

export class LibraryNotFoundError extends CliError {
  constructor(libraryPath: string) {
    super(
      `Library folder not found: ${libraryPath}`,
      [],
      [
        "Pass `--library <dir>` or set BLENDSHELF_LIBRARY to the folder holding stable/, daily/ and the other build folders.",
      ],
    );
    this.name = "LibraryNotFoundError";
  }
}

export class BuildDirectoryNotFoundError extends CliError {
  constructor(buildPath: string) {
    super(`Build folder not found: ${buildPath}`);
    this.name = "BuildDirectoryNotFoundError";
  }
}

export class FeedNotFoundError extends CliError {
  constructor(feedPath: string) {
    super(`Build feed not found: ${feedPath}`);
    this.name = "FeedNotFoundError";
  }
}
