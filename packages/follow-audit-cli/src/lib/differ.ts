import { createTwoFilesPatch } from "diff";
import {
  DEFAULT_PROFILE_DOMAIN,
  extractLinks,
  filterByDomain,
  toLinkSet,
  type Link,
} from "./links.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DiffStrategy = "diff" | "set";

export const DIFF_STRATEGIES: readonly DiffStrategy[] = ["diff", "set"];

export interface DiffOptions {
  /** Only links containing this prefix are reported */
  domain?: string;
}

export interface NonFollowerOptions extends DiffOptions {
  strategy?: DiffStrategy;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Context lines around each hunk, matching the usual unified diff default */
const DIFF_CONTEXT_LINES = 3;

// ---------------------------------------------------------------------------
// Diffing
// ---------------------------------------------------------------------------

/**
 * Render a unified diff with `followings` as the old side and `followers`
 * as the new side. Identical inputs yield headers only.
 */
export function unifiedDiff(followings: string, followers: string): string {
  return createTwoFilesPatch(
    "followings",
    "followers",
    followings,
    followers,
    undefined,
    undefined,
    { context: DIFF_CONTEXT_LINES }
  );
}

/**
 * Links found anywhere in the diff text (hunk bodies and headers alike),
 * restricted to the profile domain and to links that never appear in
 * `followings`.
 */
export function findDiffLinks(
  followings: string,
  followers: string,
  options: DiffOptions = {}
): Link[] {
  const domain = options.domain ?? DEFAULT_PROFILE_DOMAIN;
  const baseline = toLinkSet(extractLinks(followings));
  const candidates = filterByDomain(extractLinks(unifiedDiff(followings, followers)), domain);

  return candidates.filter((link) => !baseline.has(link));
}

/**
 * Plain set difference: profile links of `followers` that `followings`
 * does not contain.
 */
export function findSetDifferenceLinks(
  followings: string,
  followers: string,
  options: DiffOptions = {}
): Link[] {
  const domain = options.domain ?? DEFAULT_PROFILE_DOMAIN;
  const baseline = toLinkSet(extractLinks(followings));

  return filterByDomain(extractLinks(followers), domain).filter(
    (link) => !baseline.has(link)
  );
}

export function findNonFollowers(
  followings: string,
  followers: string,
  options: NonFollowerOptions = {}
): Link[] {
  const { strategy = "diff", ...diffOptions } = options;

  switch (strategy) {
    case "diff":
      return findDiffLinks(followings, followers, diffOptions);
    case "set":
      return findSetDifferenceLinks(followings, followers, diffOptions);
  }
}

export function isDiffStrategy(value: string): value is DiffStrategy {
  return DIFF_STRATEGIES.some((strategy) => strategy === value);
}
