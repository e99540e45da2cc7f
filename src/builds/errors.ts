import { DisplayableError } from "../utils/errors.js";

export abstract class BuildError extends DisplayableError {}

export class SidecarParseError extends BuildError {
  constructor(
    public readonly displayPath: string,
    public readonly details: string,
  ) {
    super(`Failed to parse ${displayPath}: ${details}`);
    this.name = "SidecarParseError";
  }
}

export class BuildExecutableNotFoundError extends BuildError {
  constructor(public readonly executablePath: string) {
    super(`Executable not found: ${executablePath}`, {
      hintLines: [
        "Set a custom executable with `blendshelf mark <build-dir> --executable <path>`.",
      ],
    });
    this.name = "BuildExecutableNotFoundError";
  }
}

export class VersionProbeError extends BuildError {
  constructor(
    public readonly executablePath: string,
    detail: string,
  ) {
    super(`Failed to read the version of ${executablePath}: ${detail}`);
    this.name = "VersionProbeError";
  }
}

export class FeedParseError extends BuildError {
  constructor(
    public readonly displayPath: string,
    detail: string,
  ) {
    super(`Invalid build feed at ${displayPath}: ${detail}`, {
      hintLines: [
        'Expected a JSON array of {"link", "version", "branch", "commitTime", "buildHash"} objects.',
      ],
    });
    this.name = "FeedParseError";
  }
}
