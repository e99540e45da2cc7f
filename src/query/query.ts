import { parseIsoTimestamp } from "../utils/timestamps.js";
import { assertWritableQuery, parseQueryFields } from "./syntax.js";
import {
  ANY,
  exact,
  NEWEST,
  type CommitTimeSelector,
  type QueryInit,
  type Selector,
  type VersionSearchQuery,
} from "./types.js";

/**
 * Builds a frozen query. Unset fields match anything; an empty branch list
 * counts as unset.
 *
 * @throws InvalidQueryError when a field cannot be expressed in query text.
 */
export function createQuery(init: QueryInit = {}): VersionSearchQuery {
  const branches =
    init.branches && init.branches.length > 0
      ? Object.freeze([...init.branches])
      : undefined;

  const query: VersionSearchQuery = {
    major: init.major ?? ANY,
    minor: init.minor ?? ANY,
    patch: init.patch ?? ANY,
    commitTime: normalizeCommitTime(init.commitTime ?? ANY),
    ...(branches ? { branches } : {}),
    ...(init.buildHash ? { buildHash: init.buildHash } : {}),
    ...(init.folder ? { folder: init.folder } : {}),
  };

  assertWritableQuery(query);
  return Object.freeze(query);
}

function normalizeCommitTime(selector: CommitTimeSelector): CommitTimeSelector {
  if (selector.kind !== "literal") {
    return selector;
  }
  const date = parseIsoTimestamp(selector.text);
  return date ? exact(date) : selector;
}

type ComponentInput = number | Selector<number>;

function toSelector(input: ComponentInput): Selector<number> {
  return typeof input === "number" ? exact(input) : input;
}

/** `createQuery` with the version parts up front; numbers mean exact values. */
export function versionQuery(
  major: ComponentInput,
  minor: ComponentInput,
  patch: ComponentInput,
  extras: Omit<QueryInit, "major" | "minor" | "patch"> = {},
): VersionSearchQuery {
  return createQuery({
    ...extras,
    major: toSelector(major),
    minor: toSelector(minor),
    patch: toSelector(patch),
  });
}

/** `*.*.*` */
export function anyQuery(): VersionSearchQuery {
  return createQuery();
}

/** `^.^.^@^`: the newest build. */
export function defaultQuery(): VersionSearchQuery {
  return createQuery({
    major: NEWEST,
    minor: NEWEST,
    patch: NEWEST,
    commitTime: NEWEST,
  });
}

function toInit(query: VersionSearchQuery): QueryInit {
  return { ...query };
}

export function withBranches(
  query: VersionSearchQuery,
  branches: readonly string[] | null,
): VersionSearchQuery {
  return createQuery({ ...toInit(query), branches });
}

export function withBuildHash(
  query: VersionSearchQuery,
  buildHash: string | null,
): VersionSearchQuery {
  return createQuery({ ...toInit(query), buildHash });
}

export function withCommitTime(
  query: VersionSearchQuery,
  commitTime: CommitTimeSelector,
): VersionSearchQuery {
  return createQuery({ ...toInit(query), commitTime });
}

export function withFolder(
  query: VersionSearchQuery,
  folder: string | null,
): VersionSearchQuery {
  return createQuery({ ...toInit(query), folder });
}

/** Every field `right` sets (anything but Any or unset) overrides `left`. */
export function mergeQueries(
  left: VersionSearchQuery,
  right: VersionSearchQuery,
): VersionSearchQuery {
  const pick = <T extends { kind: string }>(a: T, b: T): T =>
    b.kind === "any" ? a : b;

  return createQuery({
    major: pick(left.major, right.major),
    minor: pick(left.minor, right.minor),
    patch: pick(left.patch, right.patch),
    commitTime: pick(left.commitTime, right.commitTime),
    branches: right.branches ?? left.branches ?? null,
    buildHash: right.buildHash ?? left.buildHash ?? null,
    folder: right.folder ?? left.folder ?? null,
  });
}

function selectorsEqual(
  a: CommitTimeSelector,
  b: CommitTimeSelector,
): boolean {
  if (a.kind === "exact" && b.kind === "exact") {
    return a.value.getTime() === b.value.getTime();
  }
  if (a.kind === "literal" && b.kind === "literal") {
    return a.text === b.text;
  }
  return a.kind === b.kind && a.kind !== "exact" && a.kind !== "literal";
}

function componentsEqual(a: Selector<number>, b: Selector<number>): boolean {
  if (a.kind === "exact" && b.kind === "exact") {
    return a.value === b.value;
  }
  return a.kind === b.kind && a.kind !== "exact";
}

function listsEqual(
  a: readonly string[] | undefined,
  b: readonly string[] | undefined,
): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return a.length === b.length && a.every((value, index) => value === b[index]);
}

export function queriesEqual(
  a: VersionSearchQuery,
  b: VersionSearchQuery,
): boolean {
  return (
    componentsEqual(a.major, b.major) &&
    componentsEqual(a.minor, b.minor) &&
    componentsEqual(a.patch, b.patch) &&
    listsEqual(a.branches, b.branches) &&
    a.buildHash === b.buildHash &&
    selectorsEqual(a.commitTime, b.commitTime) &&
    a.folder === b.folder
  );
}

const parsedQueries = new Map<string, VersionSearchQuery>();

/**
 * Reads query text. Parts left out match anything.
 *
 * @throws InvalidQuerySyntaxError when the text does not follow the grammar.
 * @throws InvalidQueryError when a branch or hash is `^` or `-`.
 */
export function parseQuery(text: string): VersionSearchQuery {
  const cached = parsedQueries.get(text);
  if (cached) {
    return cached;
  }
  const query = createQuery(parseQueryFields(text));
  parsedQueries.set(text, query);
  return query;
}
