// CHANGE: Build one explicit configuration value from the environment.
// WHY: Components receive settings as an argument, so every decision path is reproducible in tests.

import os from "os";
import path from "path";
import * as dotenv from "dotenv";
import { ConfigError } from "./errors.js";
import { describeThreshold, parseThresholdSpec } from "./threshold.js";
import type { ThresholdSpec } from "./types.js";

/**
 * Environment variable names for every setting.
 */
export const ENV = {
  UNTRUSTED: "SHY_UNTRUSTED",
  POPULARITY: "SHY_POPULARITY",
  CACHE: "SHY_CACHE",
  STATS_API_URL: "SHY_STATS_API_URL",
  MAX_CACHE_AGE: "SHY_MAX_CACHE_AGE",
  DUMP_CONFIG: "SHY_DUMP_CONFIG",
  PROMPT: "SHY_PROMPT",
  LOG_FILE: "SHY_LOG_FILE",
  HTTP_TIMEOUT: "SHY_HTTP_TIMEOUT",
  CONCURRENCY: "SHY_CONCURRENCY"
} as const;

export const DEFAULTS = {
  UNTRUSTED_DOMAINS: ["pypi.org", "files.pythonhosted.org"],
  STATS_API_URL: "https://pypistats.org/api",
  MAX_CACHE_AGE_MINUTES: 1440,
  HTTP_TIMEOUT_MS: 10_000,
  CONCURRENCY: 4
} as const;

/**
 * Effective settings shared by the classifier, cache, oracle, arbiter and mediator.
 *
 * Invariant: `threshold` is already parsed; a malformed spec never reaches this value.
 */
export interface ShyConfig {
  readonly untrustedDomains: readonly string[];
  readonly threshold: ThresholdSpec;
  readonly cacheDir: string;
  readonly statsApiUrl: string;
  readonly maxCacheAgeMinutes: number;
  readonly dumpConfig: boolean;
  readonly promptAnswer?: string;
  readonly logFile?: string;
  readonly httpTimeoutMs: number;
  readonly concurrency: number;
}

type Env = Readonly<Record<string, string | undefined>>;

export function isTruthy(value: string | undefined): boolean {
  return ["1", "yes", "true"].includes((value ?? "").trim().toLowerCase());
}

export function defaultCacheDir(): string {
  return path.join(os.tmpdir(), "shy-cache");
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseDomains(value: string | undefined): readonly string[] {
  if (value === undefined) {
    return DEFAULTS.UNTRUSTED_DOMAINS;
  }
  return value
    .split(",")
    .map(domain => domain.trim().toLowerCase())
    .filter(domain => domain.length > 0);
}

function parsePositiveInt(name: string, value: string | undefined, fallback: number, allowZero: boolean): number {
  const raw = nonEmpty(value);
  if (raw === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  const parsed = Number.parseInt(raw, 10);
  if (!allowZero && parsed === 0) {
    throw new ConfigError(`${name} must be positive, got "${raw}"`);
  }
  return parsed;
}

function parseApiUrl(value: string | undefined): string {
  const raw = nonEmpty(value) ?? DEFAULTS.STATS_API_URL;
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch (cause) {
    throw new ConfigError(`${ENV.STATS_API_URL} is not a valid URL: "${raw}"`, { cause });
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(`${ENV.STATS_API_URL} must use http or https, got "${raw}"`);
  }
  return raw.replace(/\/+$/, "");
}

/**
 * Construct configuration from environment variables.
 *
 * @param env - Variable source, `process.env` by default.
 * @throws ConfigError on a malformed threshold or numeric setting.
 */
export function loadConfig(env: Env = process.env): ShyConfig {
  const thresholdResult = parseThresholdSpec(env[ENV.POPULARITY] ?? "");
  if (!thresholdResult.ok) {
    throw thresholdResult.error;
  }
  return {
    untrustedDomains: parseDomains(env[ENV.UNTRUSTED]),
    threshold: thresholdResult.value,
    cacheDir: nonEmpty(env[ENV.CACHE]) ?? defaultCacheDir(),
    statsApiUrl: parseApiUrl(env[ENV.STATS_API_URL]),
    maxCacheAgeMinutes: parsePositiveInt(ENV.MAX_CACHE_AGE, env[ENV.MAX_CACHE_AGE], DEFAULTS.MAX_CACHE_AGE_MINUTES, true),
    dumpConfig: isTruthy(env[ENV.DUMP_CONFIG]),
    promptAnswer: nonEmpty(env[ENV.PROMPT]),
    logFile: nonEmpty(env[ENV.LOG_FILE]),
    httpTimeoutMs: parsePositiveInt(ENV.HTTP_TIMEOUT, env[ENV.HTTP_TIMEOUT], DEFAULTS.HTTP_TIMEOUT_MS, false),
    concurrency: parsePositiveInt(ENV.CONCURRENCY, env[ENV.CONCURRENCY], DEFAULTS.CONCURRENCY, false)
  };
}

/**
 * Load `.env` from the working directory into `process.env`, then build configuration.
 */
export function loadConfigFromProcess(): ShyConfig {
  dotenv.config();
  return loadConfig(process.env);
}

/**
 * Render effective configuration as `VAR=value` lines.
 */
export function formatConfig(config: ShyConfig): string[] {
  return [
    `${ENV.UNTRUSTED}=${config.untrustedDomains.join(",")}`,
    `${ENV.POPULARITY}=${describeThreshold(config.threshold)}`,
    `${ENV.CACHE}=${config.cacheDir}`,
    `${ENV.STATS_API_URL}=${config.statsApiUrl}`,
    `${ENV.MAX_CACHE_AGE}=${config.maxCacheAgeMinutes}`,
    `${ENV.DUMP_CONFIG}=${config.dumpConfig ? "true" : ""}`,
    `${ENV.PROMPT}=${config.promptAnswer ?? ""}`,
    `${ENV.LOG_FILE}=${config.logFile ?? ""}`,
    `${ENV.HTTP_TIMEOUT}=${config.httpTimeoutMs}`,
    `${ENV.CONCURRENCY}=${config.concurrency}`
  ];
}
