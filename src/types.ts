// CHANGE: Define strongly typed domain models for candidate arbitration.
// WHY: Tagged unions for trust class and decision remove implicit truthiness from the decision path.

/**
 * JSON-like value type used for permissive properties without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Explicit outcome of a fallible, non-fatal operation.
 */
export type Result<T, E> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: E };

/**
 * Source of the current instant; injected so staleness logic runs without real delays.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Concrete installable candidate produced by the host tool's resolution step.
 *
 * @property name - Package name as reported by the index.
 * @property version - Version string in the host tool's scheme.
 * @property origin - Domain of the index the candidate was found at.
 * @property indexUrl - Index page URL the candidate was listed on.
 * @property url - Artifact URL.
 */
export interface ResolvedCandidate {
  readonly name: string;
  readonly version: string;
  readonly origin: string;
  readonly indexUrl: string;
  readonly url: string;
}

export type TrustClass = "trusted" | "untrusted";

/**
 * Candidates of one package, partitioned by trust class.
 */
export interface ClassifiedCandidates {
  readonly name: string;
  readonly trusted: readonly ResolvedCandidate[];
  readonly untrusted: readonly ResolvedCandidate[];
}

export type PopularityWindow = "last_day" | "last_week" | "last_month";

export const POPULARITY_WINDOWS: readonly PopularityWindow[] = ["last_day", "last_week", "last_month"];

/**
 * Download counts snapshot for a package.
 *
 * Invariant: counts are non-negative integers.
 */
export interface PopularityStats {
  readonly name: string;
  readonly lastDay: number;
  readonly lastWeek: number;
  readonly lastMonth: number;
  readonly fetchedAt: string;
}

/**
 * Cached statistics with the record's filesystem modification time.
 */
export interface CacheEntry {
  readonly stats: PopularityStats;
  readonly modifiedAt: Date;
}

export type CombineMode = "all" | "any";

export interface ThresholdConstraint {
  readonly window: PopularityWindow;
  readonly minimum: number;
}

/**
 * Parsed popularity gate. An empty constraint list means the gate is disabled.
 */
export interface ThresholdSpec {
  readonly mode: CombineMode;
  readonly constraints: readonly ThresholdConstraint[];
}

/**
 * Candidate counts per trust class, carried by abort decisions.
 */
export interface OriginCounts {
  readonly trusted: number;
  readonly untrusted: number;
}

export type Decision =
  | { readonly kind: "allow-trusted"; readonly rationale: string; readonly selected?: ResolvedCandidate }
  | { readonly kind: "allow-untrusted"; readonly rationale: string; readonly selected: ResolvedCandidate }
  | { readonly kind: "abort"; readonly rationale: string; readonly name: string; readonly counts: OriginCounts };

export type ArbiterState = "start" | "classified" | "resolved" | "need-popularity" | "decided" | "terminal";

/**
 * Where the statistics used for a decision came from.
 */
export type PopularitySource = "cache" | "network" | "fallback";

export interface PopularityLookup {
  readonly stats: PopularityStats;
  readonly source: PopularitySource;
}
