import { DisplayableError } from "../utils/errors.js";

export class InvalidVersionFormatError extends DisplayableError {
  constructor(public readonly input: string) {
    super(`No valid version found in "${input}".`, {
      hintLines: [
        "Expected something like 4.2.0, 4.3.0-alpha, 2.79rc1 or 2.80 (sub 75).",
      ],
    });
    this.name = "InvalidVersionFormatError";
  }
}
