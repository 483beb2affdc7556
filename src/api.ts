// CHANGE: Implement the statistics service client with response validation.
// WHY: Any payload other than three non-negative counts is treated the same as an unreachable service.

import { isAxiosError } from "axios";
import { NetworkError, describeError } from "./errors.js";
import { debug } from "./logger.js";
import type { JsonValue, PopularityStats, Result } from "./types.js";
import { getJson } from "./utils/http.js";
import { joinUrl } from "./utils/url.js";

function isRecord(value: JsonValue): value is { readonly [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCount(value: JsonValue): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

/**
 * Validate a `/packages/<name>/recent` body into statistics.
 *
 * @returns Stats, or undefined when the shape does not match.
 */
export function toPopularityStats(name: string, body: JsonValue, fetchedAt: Date): PopularityStats | undefined {
  if (!isRecord(body)) {
    return undefined;
  }
  const data = body.data;
  if (!isRecord(data)) {
    return undefined;
  }
  const { last_day: lastDay, last_week: lastWeek, last_month: lastMonth } = data;
  if (!isCount(lastDay) || !isCount(lastWeek) || !isCount(lastMonth)) {
    return undefined;
  }
  return { name, lastDay, lastWeek, lastMonth, fetchedAt: fetchedAt.toISOString() };
}

/**
 * URL of the recent-downloads resource for a package.
 */
export function recentStatsUrl(baseUrl: string, name: string): string {
  return joinUrl(baseUrl, "packages", name, "recent");
}

/**
 * Fetch recent download counts for a package. One request, no retry.
 *
 * @param baseUrl - Statistics API base URL.
 * @param name - Package name.
 * @param timeoutMs - Request timeout.
 * @param now - Timestamp recorded as the fetch time.
 */
export async function fetchRecentPopularity(
  baseUrl: string,
  name: string,
  timeoutMs: number,
  now: Date = new Date()
): Promise<Result<PopularityStats, NetworkError>> {
  const url = recentStatsUrl(baseUrl, name);
  let response: { readonly data: JsonValue; readonly status: number };
  try {
    response = await getJson<JsonValue>(url, timeoutMs);
  } catch (rawError) {
    const status = isAxiosError(rawError) ? rawError.response?.status : undefined;
    const reason = status === undefined ? describeError(rawError) : `status ${status}`;
    debug(`Statistics request failed for ${name}: ${reason}`);
    return { ok: false, error: new NetworkError(`statistics unavailable for ${name}: ${reason}`, url, status, { cause: rawError }) };
  }
  const stats = toPopularityStats(name, response.data, now);
  if (!stats) {
    debug(`Statistics response for ${name} has unexpected shape`);
    return { ok: false, error: new NetworkError(`statistics unavailable for ${name}: unexpected response`, url, response.status) };
  }
  return { ok: true, value: stats };
}
