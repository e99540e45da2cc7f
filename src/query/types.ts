export type AnySelector = { readonly kind: "any" };
export type NewestSelector = { readonly kind: "newest" };
export type OldestSelector = { readonly kind: "oldest" };

export type TemporalSelector = AnySelector | NewestSelector | OldestSelector;

export type Selector<T> = TemporalSelector | { readonly kind: "exact"; readonly value: T };

/** A commit time that did not parse is compared as text. */
export type CommitTimeSelector =
  | Selector<Date>
  | { readonly kind: "literal"; readonly text: string };

export const ANY: AnySelector = Object.freeze({ kind: "any" });
export const NEWEST: NewestSelector = Object.freeze({ kind: "newest" });
export const OLDEST: OldestSelector = Object.freeze({ kind: "oldest" });

export function exact<T>(value: T): Selector<T> {
  const selector: Selector<T> = { kind: "exact", value };
  return Object.freeze(selector);
}

export function literalTime(text: string): CommitTimeSelector {
  const selector: CommitTimeSelector = { kind: "literal", text };
  return Object.freeze(selector);
}

/**
 * A filter over builds. Fields are matched in declaration order; `folder`
 * is applied first as a plain equality filter and has no wire form.
 */
export interface VersionSearchQuery {
  readonly major: Selector<number>;
  readonly minor: Selector<number>;
  readonly patch: Selector<number>;
  /** Any of these branches; unset matches every branch. */
  readonly branches?: readonly string[];
  readonly buildHash?: string;
  readonly commitTime: CommitTimeSelector;
  readonly folder?: string;
}

export interface QueryInit {
  major?: Selector<number>;
  minor?: Selector<number>;
  patch?: Selector<number>;
  branches?: readonly string[] | null;
  buildHash?: string | null;
  commitTime?: CommitTimeSelector;
  folder?: string | null;
}
