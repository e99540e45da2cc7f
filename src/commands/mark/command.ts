import { displayLabel, displayVersion } from "../../builds/display.js";
import { updateSidecarFields } from "../../builds/sidecar.js";
import type { BuildRecord, BuildUserFields } from "../../builds/types.js";
import { CliError } from "../../cli/errors.js";
import { renderTranscript } from "../../render/utils/transcript.js";

export interface MarkCommandInput {
  buildPath: string;
  favorite?: boolean;
  frozen?: boolean;
  name?: string;
  /** Path relative to the build folder; empty clears it. */
  executable?: string;
  ltsVersions?: readonly string[];
}

export interface MarkCommandResult {
  record: BuildRecord;
  output: string;
}

export class NothingToMarkError extends CliError {
  constructor() {
    super(
      "Nothing to change.",
      [],
      ["Pass --favorite, --frozen, --name or --executable (or their --no- forms)."],
    );
    this.name = "NothingToMarkError";
  }
}

export async function executeMarkCommand(
  input: MarkCommandInput,
): Promise<MarkCommandResult> {
  const fields: BuildUserFields = {};
  if (input.favorite !== undefined) {
    fields.isFavorite = input.favorite;
  }
  if (input.frozen !== undefined) {
    fields.isFrozen = input.frozen;
  }
  if (input.name !== undefined) {
    fields.customName = input.name;
  }
  if (input.executable !== undefined) {
    fields.customExecutable = input.executable.length > 0 ? input.executable : null;
  }

  if (Object.keys(fields).length === 0) {
    throw new NothingToMarkError();
  }

  const record = await updateSidecarFields(input.buildPath, fields, {
    ltsVersions: input.ltsVersions,
  });

  const output = renderTranscript({
    metadata: [
      { label: "Build", value: input.buildPath },
      {
        label: "Version",
        value: `${displayVersion(record)} ${displayLabel(record)}`,
      },
      { label: "Name", value: record.customName },
      { label: "Favorite", value: record.isFavorite ? "yes" : "no" },
      { label: "Frozen", value: record.isFrozen ? "yes" : "no" },
      { label: "Executable", value: record.customExecutable },
    ],
  });

  return { record, output };
}
