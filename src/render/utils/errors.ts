import type { HintedError } from "../../utils/errors.js";
import { formatErrorMessage } from "../../utils/output.js";
import { renderTranscript } from "./transcript.js";

/** `Error: <headline>`, then detail lines, then hints, blank-line separated. */
export function renderCliError(error: HintedError): string {
  return renderTranscript({
    sections: [
      [formatErrorMessage(error.headline)],
      [...error.detailLines],
      [...error.hintLines],
    ],
  });
}
