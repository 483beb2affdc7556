// CHANGE: Order candidate versions by the Python packaging version rules.
// WHY: A release candidate must rank below its final release, and `1.0` and `1.0.0` are the same version.

import pep440 from "@renovatebot/pep440";

/**
 * Total order over version strings: negative when `left` precedes `right`.
 */
export type VersionComparator = (left: string, right: string) => number;

/**
 * Compare versions under PEP 440.
 *
 * Strings that are not valid PEP 440 versions rank below every valid one and
 * are ordered among themselves by numeric-aware text comparison.
 */
export const compareVersions: VersionComparator = (left, right) => {
  const leftValid = pep440.valid(left) !== null;
  const rightValid = pep440.valid(right) !== null;
  if (leftValid && rightValid) {
    return Math.sign(pep440.compare(left, right));
  }
  if (leftValid !== rightValid) {
    return leftValid ? 1 : -1;
  }
  return Math.sign(left.localeCompare(right, "en", { numeric: true }));
};

/**
 * Highest-versioned element, or undefined for an empty list.
 */
export function highest<T extends { readonly version: string }>(
  items: readonly T[],
  compare: VersionComparator = compareVersions
): T | undefined {
  let best: T | undefined;
  for (const item of items) {
    if (best === undefined || compare(item.version, best.version) > 0) {
      best = item;
    }
  }
  return best;
}
