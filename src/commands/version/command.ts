import { displayVersion } from "../../builds/display.js";
import { renderTranscript } from "../../render/utils/transcript.js";
import { parseBuildVersion } from "../../versions/parser.js";
import { finalizeVersion, formatSemver, type SemanticVersion } from "../../versions/semver.js";

export interface VersionCommandInput {
  text: string;
  search?: boolean;
}

export interface VersionCommandResult {
  version: SemanticVersion;
  output: string;
}

/**
 * @throws InvalidVersionFormatError when no version is found.
 */
export function executeVersionCommand(
  input: VersionCommandInput,
): VersionCommandResult {
  const version = parseBuildVersion(input.text, { search: input.search });

  const output = renderTranscript({
    metadata: [
      { label: "Input", value: input.text },
      { label: "Version", value: formatSemver(version) },
      { label: "Release", value: formatSemver(finalizeVersion(version)) },
      { label: "Display", value: displayVersion({ version }) },
    ],
  });

  return { version, output };
}
