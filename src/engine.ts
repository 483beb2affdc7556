// CHANGE: Assemble cache, oracle, mediator and arbiter from one configuration value.
// WHY: Commands and tests share a single wiring path; tests swap the network, clock and prompt.

import { FileAuditLog } from "./audit.js";
import type { AuditLog } from "./audit.js";
import { FilePopularityCache } from "./cache.js";
import type { ShyConfig } from "./config.js";
import { DecisionMediator } from "./mediator.js";
import { PopularityOracle, httpStatsFetcher } from "./oracle.js";
import type { StatsFetcher } from "./oracle.js";
import { createPrompter } from "./prompt.js";
import type { Prompter } from "./prompt.js";
import { TrustArbiter } from "./arbiter.js";
import { systemClock } from "./types.js";
import type { Clock } from "./types.js";

export interface EngineOverrides {
  readonly clock?: Clock;
  readonly fetcher?: StatsFetcher;
  readonly prompter?: Prompter;
  readonly audit?: AuditLog;
  /** Treat the run as non-interactive when no canned answer is configured. */
  readonly noInput?: boolean;
}

export interface Engine {
  readonly arbiter: TrustArbiter;
  readonly oracle: PopularityOracle;
  readonly cache: FilePopularityCache;
  readonly audit: AuditLog;
}

export function createEngine(config: ShyConfig, overrides: EngineOverrides = {}): Engine {
  const clock = overrides.clock ?? systemClock;
  const audit = overrides.audit ?? new FileAuditLog(config.logFile, clock);
  const cache = new FilePopularityCache(config.cacheDir, clock);
  const oracle = new PopularityOracle({
    cache,
    clock,
    maxCacheAgeMinutes: config.maxCacheAgeMinutes,
    fetcher: overrides.fetcher ?? httpStatsFetcher(config.statsApiUrl, config.httpTimeoutMs)
  });
  const prompter = overrides.prompter ?? createPrompter({ cannedAnswer: config.promptAnswer, noInput: overrides.noInput });
  const mediator = new DecisionMediator(prompter, audit);
  const arbiter = new TrustArbiter({
    untrustedDomains: config.untrustedDomains,
    threshold: config.threshold,
    oracle,
    mediator,
    audit
  });
  return { arbiter, oracle, cache, audit };
}
