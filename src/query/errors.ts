import { DisplayableError } from "../utils/errors.js";

export const QUERY_GRAMMAR =
  "<major>.<minor>.<patch>[-<branch>[,<branch>...]][+<build hash>][@<commit time>]";

export class InvalidQuerySyntaxError extends DisplayableError {
  constructor(public readonly input: string) {
    super(`Invalid version search query: "${input}".`, {
      hintLines: [
        `Expected ${QUERY_GRAMMAR}.`,
        "Each version part is a number, `^` (newest), `*` (any) or `-` (oldest), e.g. `4.^.^-stable@^`.",
      ],
    });
    this.name = "InvalidQuerySyntaxError";
  }
}

export class InvalidQueryError extends DisplayableError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidQueryError";
  }
}
