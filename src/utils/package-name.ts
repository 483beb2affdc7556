// CHANGE: Provide canonical package name derivation shared across modules.
// WHY: Grouping and cache file names must agree on one spelling per package.

/**
 * Normalise a package name: lowercase, runs of `-`, `_` and `.` collapsed to `-`.
 */
export function normalizePackageName(name: string): string {
  return name.trim().toLowerCase().replace(/[-_.]+/g, "-");
}
