// CHANGE: Persist popularity statistics per package with atomic writes.
// WHY: Independent installer processes share the directory; readers must never see a half-written record.

import path from "path";
import fs from "fs-extra";
import { CacheError, describeError } from "./errors.js";
import { debug } from "./logger.js";
import { systemClock } from "./types.js";
import type { CacheEntry, Clock, JsonValue, PopularityStats, Result } from "./types.js";
import { normalizePackageName } from "./utils/package-name.js";

/**
 * Store of last-fetched statistics keyed by package name.
 *
 * `get` never throws and applies no freshness rule; callers check staleness with {@link isFresh}.
 */
export interface PopularityCache {
  get(name: string): Promise<CacheEntry | undefined>;
  put(name: string, stats: PopularityStats): Promise<Result<void, CacheError>>;
}

/**
 * Whether an entry is young enough to trust.
 *
 * @param maxAgeMs - Inclusive staleness bound.
 */
export function isFresh(entry: CacheEntry, maxAgeMs: number, now: Date): boolean {
  return now.getTime() - entry.modifiedAt.getTime() <= maxAgeMs;
}

function isRecord(value: JsonValue): value is { readonly [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCount(value: JsonValue): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

interface PopularityRecord {
  readonly package: string;
  readonly last_day: number;
  readonly last_week: number;
  readonly last_month: number;
  readonly fetched_at: string;
}

function toRecord(stats: PopularityStats): PopularityRecord {
  return {
    package: stats.name,
    last_day: stats.lastDay,
    last_week: stats.lastWeek,
    last_month: stats.lastMonth,
    fetched_at: stats.fetchedAt
  };
}

function fromRecord(name: string, raw: JsonValue): PopularityStats | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const { last_day: lastDay, last_week: lastWeek, last_month: lastMonth, fetched_at: fetchedAt } = raw;
  if (!isCount(lastDay) || !isCount(lastWeek) || !isCount(lastMonth) || typeof fetchedAt !== "string") {
    return undefined;
  }
  return { name, lastDay, lastWeek, lastMonth, fetchedAt };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * File-backed cache: one JSON record per package under `<root>/popularity/`.
 *
 * The record's modification time, set from the injected clock on write, is the staleness reference.
 */
export class FilePopularityCache implements PopularityCache {
  private readonly directory: string;

  constructor(
    root: string,
    private readonly clock: Clock = systemClock
  ) {
    this.directory = path.join(root, "popularity");
  }

  /**
   * Location of the record for a package.
   */
  recordPath(name: string): string {
    return path.join(this.directory, `${encodeURIComponent(normalizePackageName(name))}.json`);
  }

  async get(name: string): Promise<CacheEntry | undefined> {
    const file = this.recordPath(name);
    try {
      const stat = await fs.stat(file);
      const raw: JsonValue = await fs.readJson(file);
      const stats = fromRecord(name, raw);
      if (!stats) {
        const corrupt = new CacheError(`corrupt cache record for ${name}`, file);
        debug(`Cache miss (${corrupt.message}): ${file}`);
        return undefined;
      }
      debug(`Cache record found for ${name}: ${file}`);
      return { stats, modifiedAt: stat.mtime };
    } catch (rawError) {
      if (isMissingFile(rawError)) {
        debug(`Cache miss (absent): ${name}`);
      } else {
        const unreadable = new CacheError(`unreadable cache record for ${name}: ${describeError(rawError)}`, file, {
          cause: rawError
        });
        debug(`Cache miss (${unreadable.message})`);
      }
      return undefined;
    }
  }

  /**
   * Write a record by temporary file and rename, then stamp it with the clock's time.
   */
  async put(name: string, stats: PopularityStats): Promise<Result<void, CacheError>> {
    const file = this.recordPath(name);
    const tempPath = `${file}.${process.pid}.${Math.random().toString(36).slice(2)}.tmp`;
    const now = this.clock();
    try {
      await fs.ensureDir(this.directory);
      await fs.writeJson(tempPath, toRecord(stats));
      await fs.utimes(tempPath, now, now);
      await fs.move(tempPath, file, { overwrite: true });
      debug(`Cache record written for ${name}: ${file}`);
      return { ok: true, value: undefined };
    } catch (rawError) {
      await fs.remove(tempPath).catch((cleanupError: unknown) => {
        debug(`Temporary cache file ${tempPath} not removed: ${describeError(cleanupError)}`);
      });
      return {
        ok: false,
        error: new CacheError(`cache write failed for ${name}: ${describeError(rawError)}`, file, { cause: rawError })
      };
    }
  }

  /**
   * Remove every record.
   *
   * @returns Number of records deleted.
   */
  async clear(): Promise<number> {
    if (!(await fs.pathExists(this.directory))) {
      return 0;
    }
    const files = (await fs.readdir(this.directory)).filter(file => file.endsWith(".json"));
    await fs.remove(this.directory);
    debug(`Cache cleared: ${files.length} records under ${this.directory}`);
    return files.length;
  }
}
