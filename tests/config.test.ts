// CHANGE: Verify environment parsing, defaults and configuration dump.
// WHY: Bad settings must fail at startup with the variable name in the message.

import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import { DEFAULTS, formatConfig, isTruthy, loadConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config).toEqual({
      untrustedDomains: ["pypi.org", "files.pythonhosted.org"],
      threshold: { mode: "all", constraints: [] },
      cacheDir: path.join(os.tmpdir(), "shy-cache"),
      statsApiUrl: "https://pypistats.org/api",
      maxCacheAgeMinutes: 1440,
      dumpConfig: false,
      promptAnswer: undefined,
      logFile: undefined,
      httpTimeoutMs: DEFAULTS.HTTP_TIMEOUT_MS,
      concurrency: DEFAULTS.CONCURRENCY
    });
  });

  it("reads every variable", () => {
    const config = loadConfig({
      SHY_UNTRUSTED: " PyPI.org, mirror.example ,",
      SHY_POPULARITY: "or:last_day=100",
      SHY_CACHE: "/var/cache/shy",
      SHY_STATS_API_URL: "https://stats.example/api/",
      SHY_MAX_CACHE_AGE: "30",
      SHY_DUMP_CONFIG: "Yes",
      SHY_PROMPT: "no",
      SHY_LOG_FILE: "/var/log/shy.log",
      SHY_HTTP_TIMEOUT: "2500",
      SHY_CONCURRENCY: "2"
    });
    expect(config.untrustedDomains).toEqual(["pypi.org", "mirror.example"]);
    expect(config.threshold).toEqual({ mode: "any", constraints: [{ window: "last_day", minimum: 100 }] });
    expect(config.cacheDir).toBe("/var/cache/shy");
    expect(config.statsApiUrl).toBe("https://stats.example/api");
    expect(config.maxCacheAgeMinutes).toBe(30);
    expect(config.dumpConfig).toBe(true);
    expect(config.promptAnswer).toBe("no");
    expect(config.logFile).toBe("/var/log/shy.log");
    expect(config.httpTimeoutMs).toBe(2500);
    expect(config.concurrency).toBe(2);
  });

  it("allows an empty untrusted list", () => {
    expect(loadConfig({ SHY_UNTRUSTED: "" }).untrustedDomains).toEqual([]);
  });

  it("fails eagerly on a malformed threshold", () => {
    expect(() => loadConfig({ SHY_POPULARITY: "last_day=100&last_day=5" })).toThrow(ConfigError);
  });

  it.each([
    [{ SHY_MAX_CACHE_AGE: "soon" }, 'SHY_MAX_CACHE_AGE must be a non-negative integer, got "soon"'],
    [{ SHY_HTTP_TIMEOUT: "0" }, 'SHY_HTTP_TIMEOUT must be positive, got "0"'],
    [{ SHY_STATS_API_URL: "ftp://stats.example" }, 'SHY_STATS_API_URL must use http or https, got "ftp://stats.example"']
  ])("rejects %j", (env, message) => {
    expect(() => loadConfig(env)).toThrow(new ConfigError(message));
  });
});

describe("isTruthy", () => {
  it("recognises 1, yes and true", () => {
    expect(["1", "yes", "TRUE"].map(isTruthy)).toEqual([true, true, true]);
    expect([undefined, "", "no", "0"].map(isTruthy)).toEqual([false, false, false, false]);
  });
});

describe("formatConfig", () => {
  it("prints one VAR=value line per setting", () => {
    const lines = formatConfig(loadConfig({ SHY_CACHE: "/tmp/c", SHY_POPULARITY: "100" }));
    expect(lines).toEqual([
      "SHY_UNTRUSTED=pypi.org,files.pythonhosted.org",
      "SHY_POPULARITY=and(last_day>=100, last_week>=100, last_month>=100)",
      "SHY_CACHE=/tmp/c",
      "SHY_STATS_API_URL=https://pypistats.org/api",
      "SHY_MAX_CACHE_AGE=1440",
      "SHY_DUMP_CONFIG=",
      "SHY_PROMPT=",
      "SHY_LOG_FILE=",
      "SHY_HTTP_TIMEOUT=10000",
      "SHY_CONCURRENCY=4"
    ]);
  });
});
