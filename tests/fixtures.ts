// CHANGE: Shared candidate builders for a private index and the public one.
// WHY: Keeps origins and URLs consistent across suites.

import type { ResolvedCandidate } from "../src/types.js";

export const PRIVATE_INDEX = "https://repo.internal.example/simple/sampleproject/";
export const PUBLIC_INDEX = "https://pypi.org/simple/sampleproject/";

export function trustedCandidate(version: string, name = "sampleproject"): ResolvedCandidate {
  return {
    name,
    version,
    origin: "repo.internal.example",
    indexUrl: PRIVATE_INDEX,
    url: `https://repo.internal.example/packages/${name}-${version}.tar.gz`
  };
}

export function untrustedCandidate(version: string, name = "sampleproject"): ResolvedCandidate {
  return {
    name,
    version,
    origin: "pypi.org",
    indexUrl: PUBLIC_INDEX,
    url: `https://files.pythonhosted.org/packages/${name}-${version}.tar.gz`
  };
}
