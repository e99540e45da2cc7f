import { DisplayableError } from "../../utils/errors.js";

export class SettingsError extends DisplayableError {
  constructor(
    public readonly filePath: string,
    detail: string,
  ) {
    super(`Invalid settings file at ${filePath}: ${detail}`);
    this.name = "SettingsError";
  }
}
