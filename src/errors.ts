// CHANGE: Collect engine failure kinds into one tagged hierarchy.
// WHY: Only configuration and ambiguity failures may end a run; the rest are absorbed with a bias toward trusted sources.

import type { OriginCounts } from "./types.js";

export type ShyErrorKind = "config" | "network" | "cache" | "ambiguous-candidates" | "prompt-unavailable";

/**
 * Base class for every error raised or returned by the engine.
 */
export abstract class ShyError extends Error {
  abstract readonly kind: ShyErrorKind;

  protected constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid configuration value; fatal before any candidate is processed.
 */
export class ConfigError extends ShyError {
  readonly kind = "config";

  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Statistics service unreachable, timed out, or answered with an unexpected payload.
 */
export class NetworkError extends ShyError {
  readonly kind = "network";

  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Unreadable or corrupt cache record.
 */
export class CacheError extends ShyError {
  readonly kind = "cache";

  constructor(
    message: string,
    readonly path: string,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Both trust classes offer candidates, the untrusted one is newer, and no threshold is configured.
 */
export class AmbiguousCandidatesError extends ShyError {
  readonly kind = "ambiguous-candidates";

  constructor(
    message: string,
    readonly packageName: string,
    readonly counts: OriginCounts
  ) {
    super(message);
  }
}

/**
 * Confirmation required but neither a terminal nor a canned answer is available.
 */
export class PromptUnavailableError extends ShyError {
  readonly kind = "prompt-unavailable";

  constructor(message: string) {
    super(message);
  }
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
