import { dirname } from "node:path";

import { toErrorMessage } from "../utils/errors.js";
import { isFile } from "../utils/fs.js";
import { captureProcessOutput } from "../utils/process.js";
import { BuildExecutableNotFoundError, VersionProbeError } from "./errors.js";

const PROBE_TIMEOUT_MS = 30_000;

/** Reads the stdout of an executable's version report. */
export type BuildProbe = (executablePath: string) => Promise<string>;

/**
 * Runs `<executable> -v` from the executable's directory.
 *
 * @throws BuildExecutableNotFoundError when the executable is missing.
 * @throws VersionProbeError when it cannot be run or exits non-zero.
 */
export async function probeBuildExecutable(
  executablePath: string,
): Promise<string> {
  if (!(await isFile(executablePath))) {
    throw new BuildExecutableNotFoundError(executablePath);
  }

  let result;
  try {
    result = await captureProcessOutput({
      command: executablePath,
      args: ["-v"],
      cwd: dirname(executablePath),
      timeoutMs: PROBE_TIMEOUT_MS,
    });
  } catch (error) {
    throw new VersionProbeError(executablePath, toErrorMessage(error));
  }

  if (result.timedOut) {
    throw new VersionProbeError(
      executablePath,
      `no answer within ${PROBE_TIMEOUT_MS / 1000}s`,
    );
  }
  if (result.exitCode !== 0) {
    const reason = result.stderr.trim().split(/\r?\n/u)[0];
    throw new VersionProbeError(
      executablePath,
      reason ? `exit code ${result.exitCode}: ${reason}` : `exit code ${result.exitCode}`,
    );
  }

  return result.stdout;
}
