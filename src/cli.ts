// CHANGE: Extract CLI orchestration functions for reuse in program entrypoint and tests.
// WHY: Facilitates verification of exit codes and output without executing process-wide side effects.

import { Command } from "commander";
import pLimit from "p-limit";
import { loadCandidates } from "./candidates.js";
import { formatConfig, loadConfigFromProcess } from "./config.js";
import type { ShyConfig } from "./config.js";
import { createEngine } from "./engine.js";
import type { EngineOverrides } from "./engine.js";
import { AmbiguousCandidatesError, ConfigError, describeError } from "./errors.js";
import { debug, error as logError, info } from "./logger.js";
import { evaluateThreshold, isThresholdEnabled } from "./threshold.js";
import type { Decision } from "./types.js";

export const EXIT_CODES = {
  FAILURE: 1,
  DEPENDENCY_SECURITY: 2
} as const;

/**
 * One-line rendering of a decision for terminal output.
 */
export function formatDecision(name: string, decision: Decision): string {
  if (decision.kind === "abort") {
    return `${name}: abort (${decision.rationale})`;
  }
  const selected = decision.selected ? ` ${decision.selected.version} from ${decision.selected.origin}` : "";
  return `${name}: ${decision.kind}${selected} (${decision.rationale})`;
}

/**
 * Resolve mode entry point: arbitrate every package in a candidate file.
 *
 * @returns Decisions keyed by package name.
 * @throws AmbiguousCandidatesError when any package is aborted, after all decisions are printed.
 */
export async function resolveAction(
  source: string,
  options: { readonly input: boolean; readonly json: boolean },
  config: ShyConfig,
  overrides: EngineOverrides = {}
): Promise<Map<string, Decision>> {
  const engine = createEngine(config, { noInput: !options.input, ...overrides });
  await engine.audit.record(`command: resolve ${source}`);
  const candidates = await loadCandidates(source);
  const decisions = await engine.arbiter.decideAll(candidates);

  if (options.json) {
    console.log(JSON.stringify(Object.fromEntries(decisions), null, 2));
  } else {
    for (const [name, decision] of decisions) {
      console.log(formatDecision(name, decision));
    }
  }

  for (const decision of decisions.values()) {
    if (decision.kind === "abort") {
      throw new AmbiguousCandidatesError(decision.rationale, decision.name, decision.counts);
    }
  }
  info(`Resolved ${decisions.size} package(s).`);
  return decisions;
}

/**
 * Stats mode entry point: cache-aware popularity lookup for several packages.
 */
export async function statsAction(names: readonly string[], config: ShyConfig, overrides: EngineOverrides = {}): Promise<void> {
  const { oracle } = createEngine(config, overrides);
  const limit = pLimit(config.concurrency);
  const lookups = await Promise.all(names.map(name => limit(async () => ({ name, lookup: await oracle.lookup(name) }))));
  console.table(
    lookups.map(({ name, lookup }) => ({
      package: name,
      last_day: lookup.stats.lastDay,
      last_week: lookup.stats.lastWeek,
      last_month: lookup.stats.lastMonth,
      source: lookup.source,
      threshold: isThresholdEnabled(config.threshold) ? String(evaluateThreshold(config.threshold, lookup.stats)) : "disabled"
    }))
  );
}

/**
 * Cache clear entry point.
 */
export async function clearCacheAction(config: ShyConfig): Promise<void> {
  const { cache } = createEngine(config);
  const removed = await cache.clear();
  info(`Removed ${removed} cached record(s) from ${config.cacheDir}.`);
}

/**
 * Config mode entry point: print effective configuration on stderr, leaving stdout to decisions.
 */
export function configAction(config: ShyConfig): void {
  for (const line of formatConfig(config)) {
    console.error(line);
  }
}

/**
 * Construct commander program with configured commands.
 */
export function buildProgram(config: ShyConfig): Command {
  const program = new Command();
  program.name("shy").description("Arbitrate package candidates between trusted and untrusted repositories").version("1.0.0");

  program
    .command("resolve")
    .description("Decide which source to use for every package in a candidate list (JSON file, or - for stdin)")
    .argument("<candidates>", "candidate list path")
    .option("--no-input", "never prompt; keep trusted candidates when confirmation is needed")
    .option("--json", "print decisions as JSON", false)
    .action(async (source: string, options: { readonly input: boolean; readonly json: boolean }) => {
      await resolveAction(source, options, config);
    });

  program
    .command("stats")
    .description("Show popularity statistics, fetching and caching as needed")
    .argument("<packages...>", "package names")
    .action(async (names: string[]) => statsAction(names, config));

  const cacheCommand = program.command("cache").description("Popularity cache operations");
  cacheCommand.command("clear").description("Delete all cached statistics").action(async () => clearCacheAction(config));

  program
    .command("config")
    .description("Print effective configuration")
    .action(() => configAction(config));

  return program;
}

function exitCodeFor(rawError: unknown): number {
  return rawError instanceof AmbiguousCandidatesError ? EXIT_CODES.DEPENDENCY_SECURITY : EXIT_CODES.FAILURE;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 * @param loadSettings - Configuration source; reads `.env` and the environment by default.
 */
export async function runCli(argv: readonly string[], loadSettings: () => ShyConfig = loadConfigFromProcess): Promise<void> {
  let config: ShyConfig;
  try {
    config = loadSettings();
  } catch (rawError) {
    logError(rawError instanceof ConfigError ? rawError.message : `Configuration failed: ${describeError(rawError)}`);
    process.exitCode = EXIT_CODES.FAILURE;
    return;
  }

  if (config.dumpConfig) {
    configAction(config);
    return;
  }

  const program = buildProgram(config);
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str)
      })
      .parseAsync([...argv]);
  } catch (rawError) {
    debug(`CLI failure: ${rawError instanceof Error ? rawError.name : typeof rawError}`);
    logError(`shy: ${describeError(rawError)}`);
    process.exitCode = exitCodeFor(rawError);
  }
}
