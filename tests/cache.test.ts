// CHANGE: Verify cache records survive round trips and corrupt records read as misses.
// WHY: The cache is an optimisation; a bad record must never break arbitration.

import os from "os";
import path from "path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FilePopularityCache, isFresh } from "../src/cache.js";
import { CacheError } from "../src/errors.js";
import type { PopularityStats } from "../src/types.js";

const writtenAt = new Date("2024-05-01T12:00:00.000Z");

const stats: PopularityStats = {
  name: "sampleproject",
  lastDay: 1128,
  lastWeek: 7099,
  lastMonth: 28830,
  fetchedAt: "2024-05-01T12:00:00.000Z"
};

describe("FilePopularityCache", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "shy-cache-test-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(root);
  });

  it("returns undefined for an absent record", async () => {
    const cache = new FilePopularityCache(root);
    expect(await cache.get("sampleproject")).toBeUndefined();
  });

  it("stores a record and stamps it with the clock time", async () => {
    const cache = new FilePopularityCache(root, () => writtenAt);
    const written = await cache.put("sampleproject", stats);
    expect(written).toEqual({ ok: true, value: undefined });

    const entry = await cache.get("sampleproject");
    expect(entry?.stats).toEqual(stats);
    expect(entry?.modifiedAt.getTime()).toBe(writtenAt.getTime());
    expect(await fs.readJson(path.join(root, "popularity", "sampleproject.json"))).toEqual({
      package: "sampleproject",
      last_day: 1128,
      last_week: 7099,
      last_month: 28830,
      fetched_at: "2024-05-01T12:00:00.000Z"
    });
  });

  it("leaves no temporary files behind", async () => {
    const cache = new FilePopularityCache(root, () => writtenAt);
    await cache.put("sampleproject", stats);
    await cache.put("sampleproject", { ...stats, lastDay: 5 });
    expect(await fs.readdir(path.join(root, "popularity"))).toEqual(["sampleproject.json"]);
    expect((await cache.get("sampleproject"))?.stats.lastDay).toBe(5);
  });

  it("reports a failed write as a CacheError even when cleanup fails", async () => {
    const cache = new FilePopularityCache(root, () => writtenAt);
    vi.spyOn(fs, "move").mockImplementation(async () => {
      throw new Error("disk full");
    });
    vi.spyOn(fs, "remove").mockImplementation(async () => {
      throw new Error("permission denied");
    });

    const written = await cache.put("sampleproject", stats);

    expect(written.ok).toBe(false);
    if (!written.ok) {
      expect(written.error).toBeInstanceOf(CacheError);
      expect(written.error.message).toBe("cache write failed for sampleproject: disk full");
    }
  });

  it("shares one record across spellings of a package name", async () => {
    const cache = new FilePopularityCache(root, () => writtenAt);
    await cache.put("Sample_Project", { ...stats, name: "Sample_Project" });
    expect(cache.recordPath("sample.project")).toBe(path.join(root, "popularity", "sample-project.json"));
    expect((await cache.get("sample.project"))?.stats.lastMonth).toBe(28830);
  });

  it("treats corrupt records as a miss", async () => {
    const cache = new FilePopularityCache(root);
    await fs.outputFile(cache.recordPath("sampleproject"), "{ truncated");
    expect(await cache.get("sampleproject")).toBeUndefined();

    await fs.outputJson(cache.recordPath("sampleproject"), { last_day: "many" });
    expect(await cache.get("sampleproject")).toBeUndefined();
  });

  it("clears every record", async () => {
    const cache = new FilePopularityCache(root, () => writtenAt);
    await cache.put("a", { ...stats, name: "a" });
    await cache.put("b", { ...stats, name: "b" });
    expect(await cache.clear()).toBe(2);
    expect(await cache.get("a")).toBeUndefined();
    expect(await cache.clear()).toBe(0);
  });
});

describe("isFresh", () => {
  const entry = { stats, modifiedAt: writtenAt };
  const maxAgeMs = 60 * 60_000;

  it("is inclusive at the bound", () => {
    expect(isFresh(entry, maxAgeMs, new Date(writtenAt.getTime() + maxAgeMs))).toBe(true);
    expect(isFresh(entry, maxAgeMs, new Date(writtenAt.getTime() + maxAgeMs + 1))).toBe(false);
  });
});
