#!/usr/bin/env node
// CHANGE: Delegate execution to modular CLI runner and expose the engine as a library.
// WHY: Allows importing the arbiter and CLI helpers without triggering immediate command parsing.

import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { DEFAULT_QUERYABLE_DOMAINS, TrustArbiter, ambiguityMessage } from "./arbiter.js";
export type { TrustArbiterOptions } from "./arbiter.js";
export { FileAuditLog, MemoryAuditLog } from "./audit.js";
export type { AuditLog } from "./audit.js";
export { FilePopularityCache, isFresh } from "./cache.js";
export type { PopularityCache } from "./cache.js";
export { loadCandidates, parseCandidates } from "./candidates.js";
export { classifyCandidate, classifyCandidates, classifyOrigin } from "./classifier.js";
export { formatConfig, loadConfig } from "./config.js";
export type { ShyConfig } from "./config.js";
export { createEngine } from "./engine.js";
export * from "./errors.js";
export { DecisionMediator } from "./mediator.js";
export { PopularityOracle, httpStatsFetcher } from "./oracle.js";
export type { StatsFetcher } from "./oracle.js";
export { CannedPrompter, DisabledPrompter, TerminalPrompter, createPrompter } from "./prompt.js";
export type { Prompter } from "./prompt.js";
export { describeThreshold, evaluateThreshold, parseThresholdSpec } from "./threshold.js";
export { POPULARITY_WINDOWS, systemClock } from "./types.js";
export type * from "./types.js";
export { compareVersions } from "./utils/version.js";
