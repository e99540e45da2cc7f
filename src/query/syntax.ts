import {
  formatIsoTimestamp,
  hasFourDigitYear,
  parseIsoTimestamp,
} from "../utils/timestamps.js";
import { InvalidQueryError, InvalidQuerySyntaxError } from "./errors.js";
import {
  ANY,
  exact,
  literalTime,
  NEWEST,
  OLDEST,
  type CommitTimeSelector,
  type QueryInit,
  type Selector,
  type TemporalSelector,
  type VersionSearchQuery,
} from "./types.js";

// 4.3.^-stable,lts+cb886aba06d5@2024-07-31T23:53:51+00:00
const QUERY_PATTERN =
  /^([\^*-]|\d+)\.([\^*-]|\d+)\.([\^*-]|\d+)(?:-([^@\s+]+))?(?:\+(\w+))?(?:@([\^*-]|[\dT+:Z ^.-]+))?$/u;

const BRANCH_PATTERN = /^[^@\s+,]+$/u;
const BUILD_HASH_PATTERN = /^\w+$/u;
const LITERAL_TIME_PATTERN = /^[\dT+:Z ^.-]+$/u;

const SELECTOR_TOKENS: Record<TemporalSelector["kind"], string> = {
  newest: "^",
  any: "*",
  oldest: "-",
};

function readTemporalToken(token: string): TemporalSelector | undefined {
  switch (token) {
    case "^":
      return NEWEST;
    case "*":
      return ANY;
    case "-":
      return OLDEST;
    default:
      return undefined;
  }
}

function isTemporalToken(token: string): boolean {
  return readTemporalToken(token) !== undefined;
}

function readComponent(token: string): Selector<number> {
  return readTemporalToken(token) ?? exact(Number(token));
}

function readCommitTime(token: string): CommitTimeSelector {
  const temporal = readTemporalToken(token);
  if (temporal) {
    return temporal;
  }
  const date = parseIsoTimestamp(token);
  return date ? exact(date) : literalTime(token);
}

/**
 * Splits query text into fields. Validation of the field values is left to
 * `createQuery`.
 *
 * @throws InvalidQuerySyntaxError when the text does not follow the grammar.
 */
export function parseQueryFields(text: string): QueryInit {
  const match = QUERY_PATTERN.exec(text.trim());
  if (!match) {
    throw new InvalidQuerySyntaxError(text);
  }

  const [, major = "*", minor = "*", patch = "*", branches, buildHash, commitTime] =
    match;

  return {
    major: readComponent(major),
    minor: readComponent(minor),
    patch: readComponent(patch),
    branches: branches !== undefined ? branches.split(",") : null,
    buildHash: buildHash ?? null,
    commitTime: commitTime !== undefined ? readCommitTime(commitTime) : ANY,
  };
}

function formatComponent(selector: Selector<number>): string {
  return selector.kind === "exact"
    ? String(selector.value)
    : SELECTOR_TOKENS[selector.kind];
}

function formatCommitTime(selector: CommitTimeSelector): string {
  switch (selector.kind) {
    case "exact":
      return formatIsoTimestamp(selector.value);
    case "literal":
      return selector.text;
    default:
      return SELECTOR_TOKENS[selector.kind];
  }
}

/** Renders a query in the form `parseQuery` reads. `folder` is not rendered. */
export function formatQuery(query: VersionSearchQuery): string {
  let text = [query.major, query.minor, query.patch]
    .map(formatComponent)
    .join(".");

  if (query.branches && query.branches.length > 0) {
    text += `-${query.branches.join(",")}`;
  }
  if (query.buildHash) {
    text += `+${query.buildHash}`;
  }
  if (query.commitTime.kind !== "any") {
    text += `@${formatCommitTime(query.commitTime)}`;
  }
  return text;
}

/**
 * @throws InvalidQueryError when a value could not be written in query text.
 */
export function assertWritableQuery(query: VersionSearchQuery): void {
  for (const [name, selector] of [
    ["major", query.major],
    ["minor", query.minor],
    ["patch", query.patch],
  ] as const) {
    if (
      selector.kind === "exact" &&
      (!Number.isSafeInteger(selector.value) || selector.value < 0)
    ) {
      throw new InvalidQueryError(
        `${name} must be a non-negative integer, got ${selector.value}.`,
      );
    }
  }

  for (const branch of query.branches ?? []) {
    if (isTemporalToken(branch)) {
      throw new InvalidQueryError(
        `Branch "${branch}" cannot be matched by newest or oldest.`,
      );
    }
    if (!BRANCH_PATTERN.test(branch)) {
      throw new InvalidQueryError(
        `Branch "${branch}" may not be empty or contain ",", "@", "+" or spaces.`,
      );
    }
  }

  if (query.buildHash !== undefined) {
    if (isTemporalToken(query.buildHash)) {
      throw new InvalidQueryError(
        "A build hash cannot be matched by newest or oldest.",
      );
    }
    if (!BUILD_HASH_PATTERN.test(query.buildHash)) {
      throw new InvalidQueryError(
        `Build hash "${query.buildHash}" may only contain letters, digits and "_".`,
      );
    }
  }

  const { commitTime } = query;
  if (commitTime.kind === "exact" && Number.isNaN(commitTime.value.getTime())) {
    throw new InvalidQueryError("Commit time is an invalid date.");
  }
  if (commitTime.kind === "exact" && !hasFourDigitYear(commitTime.value)) {
    throw new InvalidQueryError(
      `Commit time year ${commitTime.value.getUTCFullYear()} is outside 0000-9999.`,
    );
  }
  if (
    commitTime.kind === "literal" &&
    (isTemporalToken(commitTime.text) ||
      !LITERAL_TIME_PATTERN.test(commitTime.text))
  ) {
    throw new InvalidQueryError(
      `Commit time "${commitTime.text}" is not a timestamp.`,
    );
  }
}
