// CHANGE: Provide URL helpers for deriving candidate origins.
// WHY: Trust classification keys on the host of the index a candidate was listed on.

/**
 * Host (domain plus non-default port) of an index URL, lowercased.
 *
 * @returns Empty string when the URL cannot be parsed.
 */
export function originOf(indexUrl: string): string {
  try {
    return new URL(indexUrl).host.toLowerCase();
  } catch {
    return "";
  }
}

/**
 * Whether a URL points at a remote package repository rather than a local file or VCS link.
 */
export function isRepositoryUrl(indexUrl: string): boolean {
  try {
    const { protocol } = new URL(indexUrl);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Join a base API URL and path segments, encoding each segment.
 */
export function joinUrl(base: string, ...segments: readonly string[]): string {
  const trimmed = base.replace(/\/+$/, "");
  return [trimmed, ...segments.map(segment => encodeURIComponent(segment))].join("/");
}
