// ============================================================================
// FUZZY MATCHING
// ============================================================================
// Two names are the same when, after lower-casing and collapsing whitespace,
// they are equal or the shorter one (at least four characters) is contained
// in the longer one. When several candidates match, an exact match wins,
// otherwise the earliest candidate.

import { collapseWhitespace } from "../lexicon/text.js";

export const MIN_CONTAINMENT_LENGTH = 4;

export function normalizeKey(value: string): string {
  return collapseWhitespace(value.toLowerCase());
}

export function fuzzyEquals(a: string, b: string): boolean {
  const x = normalizeKey(a);
  const y = normalizeKey(b);
  if (x === y) return true;

  const [shorter, longer] = x.length <= y.length ? [x, y] : [y, x];
  return shorter.length >= MIN_CONTAINMENT_LENGTH && longer.includes(shorter);
}

/**
 * Index of the best fuzzy match for `target`, or -1.
 */
export function findFuzzyMatch(candidates: readonly string[], target: string): number {
  const key = normalizeKey(target);
  const exact = candidates.findIndex((c) => normalizeKey(c) === key);
  if (exact !== -1) return exact;
  return candidates.findIndex((c) => fuzzyEquals(c, target));
}

export function findExactKey(candidates: readonly string[], target: string): number {
  const key = normalizeKey(target);
  return candidates.findIndex((c) => normalizeKey(c) === key);
}
