// CHANGE: Tag candidates as trusted or untrusted by origin domain.
// WHY: An origin missing from the untrusted list is trusted, so classification never favours the public index.

import type { ClassifiedCandidates, ResolvedCandidate, TrustClass } from "./types.js";
import { isRepositoryUrl } from "./utils/url.js";
import { normalizePackageName } from "./utils/package-name.js";

/**
 * Classify a single origin domain.
 */
export function classifyOrigin(domain: string, untrustedDomains: readonly string[]): TrustClass {
  const needle = domain.trim().toLowerCase();
  return untrustedDomains.some(untrusted => untrusted.toLowerCase() === needle) ? "untrusted" : "trusted";
}

/**
 * Classify a candidate; local files and VCS links are never untrusted.
 */
export function classifyCandidate(candidate: ResolvedCandidate, untrustedDomains: readonly string[]): TrustClass {
  if (!isRepositoryUrl(candidate.indexUrl)) {
    return "trusted";
  }
  return classifyOrigin(candidate.origin, untrustedDomains);
}

/**
 * Partition candidates by trust class, grouped by normalised package name.
 *
 * Groups keep the order in which package names first appear.
 */
export function classifyCandidates(
  candidates: readonly ResolvedCandidate[],
  untrustedDomains: readonly string[]
): Map<string, ClassifiedCandidates> {
  const groups = new Map<string, { name: string; trusted: ResolvedCandidate[]; untrusted: ResolvedCandidate[] }>();
  for (const candidate of candidates) {
    const key = normalizePackageName(candidate.name);
    let group = groups.get(key);
    if (!group) {
      group = { name: candidate.name, trusted: [], untrusted: [] };
      groups.set(key, group);
    }
    group[classifyCandidate(candidate, untrustedDomains)].push(candidate);
  }
  return groups;
}
