// CHANGE: Parse and evaluate popularity threshold expressions.
// WHY: Malformed gates must fail while configuration loads, before any request leaves the process.

import { ConfigError } from "./errors.js";
import { POPULARITY_WINDOWS } from "./types.js";
import type { CombineMode, PopularityStats, PopularityWindow, Result, ThresholdConstraint, ThresholdSpec } from "./types.js";

const INTEGER_PATTERN = /^\d+(_\d+)*$/;

export const DISABLED_THRESHOLD: ThresholdSpec = { mode: "all", constraints: [] };

function isWindow(value: string): value is PopularityWindow {
  return POPULARITY_WINDOWS.some(window => window === value);
}

function parseCount(raw: string): number | undefined {
  if (!INTEGER_PATTERN.test(raw)) {
    return undefined;
  }
  const value = Number.parseInt(raw.replace(/_/g, ""), 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

function fail(text: string, reason: string): Result<ThresholdSpec, ConfigError> {
  return { ok: false, error: new ConfigError(`invalid popularity threshold "${text}": ${reason}`) };
}

/**
 * Parse a threshold expression.
 *
 * Accepted forms: `""` (disabled), `1000` (every window, all semantics),
 * `last_day=10&last_week=50`, `and:last_day=10`, `or:last_day=10&last_month=500`.
 */
export function parseThresholdSpec(text: string): Result<ThresholdSpec, ConfigError> {
  const trimmed = text.trim();
  if (trimmed === "") {
    return { ok: true, value: DISABLED_THRESHOLD };
  }

  const bare = parseCount(trimmed);
  if (bare !== undefined) {
    return {
      ok: true,
      value: {
        mode: "all",
        constraints: POPULARITY_WINDOWS.map(window => ({ window, minimum: bare }))
      }
    };
  }

  let mode: CombineMode = "all";
  let body = trimmed;
  if (body.startsWith("or:")) {
    mode = "any";
    body = body.slice("or:".length);
  } else if (body.startsWith("and:")) {
    body = body.slice("and:".length);
  }

  const constraints: ThresholdConstraint[] = [];
  for (const clause of body.split("&")) {
    const separator = clause.indexOf("=");
    if (separator < 0) {
      return fail(text, clause === "" ? "empty clause" : `expected window=count, got "${clause}"`);
    }
    const window = clause.slice(0, separator).trim();
    const rawCount = clause.slice(separator + 1).trim();
    if (!isWindow(window)) {
      return fail(text, `unknown window "${window}" (expected ${POPULARITY_WINDOWS.join(", ")})`);
    }
    const minimum = parseCount(rawCount);
    if (minimum === undefined) {
      return fail(text, `"${rawCount}" is not a non-negative integer`);
    }
    if (constraints.some(existing => existing.window === window)) {
      return fail(text, `window "${window}" listed more than once`);
    }
    constraints.push({ window, minimum });
  }
  return { ok: true, value: { mode, constraints } };
}

export function isThresholdEnabled(spec: ThresholdSpec): boolean {
  return spec.constraints.length > 0;
}

function windowCount(stats: PopularityStats, window: PopularityWindow): number {
  switch (window) {
    case "last_day":
      return stats.lastDay;
    case "last_week":
      return stats.lastWeek;
    case "last_month":
      return stats.lastMonth;
  }
}

/**
 * Decide whether statistics satisfy the gate. A disabled gate is never satisfied.
 */
export function evaluateThreshold(spec: ThresholdSpec, stats: PopularityStats): boolean {
  if (!isThresholdEnabled(spec)) {
    return false;
  }
  const met = (constraint: ThresholdConstraint): boolean => windowCount(stats, constraint.window) >= constraint.minimum;
  return spec.mode === "all" ? spec.constraints.every(met) : spec.constraints.some(met);
}

/**
 * Canonical text form for logs and configuration dumps.
 */
export function describeThreshold(spec: ThresholdSpec): string {
  if (!isThresholdEnabled(spec)) {
    return "disabled";
  }
  const junction = spec.mode === "all" ? "and" : "or";
  const clauses = spec.constraints.map(constraint => `${constraint.window}>=${constraint.minimum}`);
  return `${junction}(${clauses.join(", ")})`;
}
