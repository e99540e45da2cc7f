import type { BasicBuildInfo } from "../builds/types.js";
import { formatIsoTimestamp } from "../utils/timestamps.js";
import type { CommitTimeSelector, Selector, VersionSearchQuery } from "./types.js";

type Narrowing<T> = (items: readonly T[]) => T[];

function narrowNumeric<T>(
  selector: Selector<number>,
  read: (item: T) => number,
): Narrowing<T> | undefined {
  switch (selector.kind) {
    case "any":
      return undefined;
    case "exact": {
      const { value } = selector;
      return (items) => items.filter((item) => read(item) === value);
    }
    case "newest":
    case "oldest": {
      const wins =
        selector.kind === "newest"
          ? (value: number, best: number) => value > best
          : (value: number, best: number) => value < best;
      return (items) => {
        const values = items.map(read);
        let target = values[0];
        for (const value of values) {
          if (target === undefined || wins(value, target)) {
            target = value;
          }
        }
        return items.filter((_item, index) => values[index] === target);
      };
    }
  }
}

function narrowCommitTime<T>(
  selector: CommitTimeSelector,
  read: (item: T) => Date,
): Narrowing<T> | undefined {
  switch (selector.kind) {
    case "any":
      return undefined;
    case "exact": {
      const target = selector.value.getTime();
      return (items) => items.filter((item) => read(item).getTime() === target);
    }
    case "literal": {
      const { text } = selector;
      return (items) =>
        items.filter((item) => {
          const time = read(item);
          return !Number.isNaN(time.getTime()) && formatIsoTimestamp(time) === text;
        });
    }
    case "newest":
    case "oldest": {
      // Builds with an invalid date never count as newest or oldest.
      const missing = selector.kind === "newest" ? -Infinity : Infinity;
      return narrowNumeric<T>(selector, (item) => {
        const time = read(item).getTime();
        return Number.isNaN(time) ? missing : time;
      });
    }
  }
}

/**
 * The narrowing steps of a query, in priority order. Fields left as Any
 * contribute no step.
 */
function compileQuery<T>(
  query: VersionSearchQuery,
  project: (item: T) => BasicBuildInfo,
): Narrowing<T>[] {
  const steps: (Narrowing<T> | undefined)[] = [
    narrowNumeric<T>(query.major, (item) => project(item).version.major),
    narrowNumeric<T>(query.minor, (item) => project(item).version.minor),
    narrowNumeric<T>(query.patch, (item) => project(item).version.patch),
  ];

  const { branches, buildHash } = query;
  if (branches) {
    const wanted = new Set(branches);
    steps.push((items) => items.filter((item) => wanted.has(project(item).branch)));
  }
  if (buildHash !== undefined) {
    steps.push((items) =>
      items.filter((item) => project(item).buildHash === buildHash),
    );
  }
  steps.push(narrowCommitTime<T>(query.commitTime, (item) => project(item).commitTime));

  return steps.filter((step): step is Narrowing<T> => step !== undefined);
}

/**
 * Applies a query by sequential narrowing: each step sees only what the
 * previous steps kept, so `1.^.^` picks the newest patch of the newest
 * minor, not the newest patch overall.
 */
export function matchItems<T>(
  query: VersionSearchQuery,
  items: readonly T[],
  project: (item: T) => BasicBuildInfo,
): T[] {
  let current =
    query.folder !== undefined
      ? items.filter((item) => project(item).folder === query.folder)
      : [...items];

  for (const step of compileQuery(query, project)) {
    if (current.length === 0) {
      return [];
    }
    current = step(current);
  }
  return current;
}

export function matchBuilds(
  query: VersionSearchQuery,
  candidates: readonly BasicBuildInfo[],
): BasicBuildInfo[] {
  return matchItems(query, candidates, (candidate) => candidate);
}
