// CHANGE: Decide between trusted and untrusted candidates of one package.
// WHY: Version precedence settles most cases; popularity and confirmation are consulted only when the public index is ahead.

import type { AuditLog } from "./audit.js";
import { classifyCandidates } from "./classifier.js";
import { debug, info } from "./logger.js";
import type { DecisionMediator } from "./mediator.js";
import type { PopularityOracle } from "./oracle.js";
import { describeThreshold, evaluateThreshold, isThresholdEnabled } from "./threshold.js";
import type {
  ArbiterState,
  ClassifiedCandidates,
  Decision,
  ResolvedCandidate,
  ThresholdSpec
} from "./types.js";
import { compareVersions, highest } from "./utils/version.js";
import type { VersionComparator } from "./utils/version.js";

export interface TrustArbiterOptions {
  readonly untrustedDomains: readonly string[];
  readonly threshold: ThresholdSpec;
  readonly oracle: PopularityOracle;
  readonly mediator: DecisionMediator;
  readonly audit: AuditLog;
  readonly compare?: VersionComparator;
  /** Untrusted origins whose download counts the statistics service reports. */
  readonly queryableDomains?: readonly string[];
}

export const DEFAULT_QUERYABLE_DOMAINS: readonly string[] = ["pypi.org"];

function originSummary(candidates: readonly ResolvedCandidate[]): string {
  const counts = new Map<string, number>();
  for (const candidate of candidates) {
    counts.set(candidate.origin, (counts.get(candidate.origin) ?? 0) + 1);
  }
  return Array.from(counts, ([origin, count]) => `${count} from ${origin}`).join(", ");
}

/**
 * Diagnostic naming the package and the candidate counts of each trust class.
 */
export function ambiguityMessage(group: ClassifiedCandidates): string {
  return (
    `multiple possible repository sources for ${group.name}: ` +
    `${group.trusted.length} trusted candidate(s) (${originSummary(group.trusted)}), ` +
    `${group.untrusted.length} untrusted candidate(s) (${originSummary(group.untrusted)})`
  );
}

function selectedLabel(decision: Decision): string {
  if (decision.kind === "abort" || !decision.selected) {
    return "nothing selected";
  }
  return `selected ${decision.selected.name} ${decision.selected.version} from ${decision.selected.origin}`;
}

export class TrustArbiter {
  private readonly compare: VersionComparator;
  private readonly queryableDomains: readonly string[];

  constructor(private readonly options: TrustArbiterOptions) {
    this.compare = options.compare ?? compareVersions;
    this.queryableDomains = (options.queryableDomains ?? DEFAULT_QUERYABLE_DOMAINS).map(domain => domain.toLowerCase());
  }

  /**
   * Arbitrate every package present in a candidate list, in order of first appearance.
   */
  async decideAll(candidates: readonly ResolvedCandidate[]): Promise<Map<string, Decision>> {
    const decisions = new Map<string, Decision>();
    const groups = classifyCandidates(candidates, this.options.untrustedDomains);
    for (const group of groups.values()) {
      decisions.set(group.name, await this.arbitrate(group));
    }
    return decisions;
  }

  /**
   * Arbitrate the candidates of a single package.
   */
  async decide(candidates: readonly ResolvedCandidate[]): Promise<Decision> {
    const groups = Array.from(classifyCandidates(candidates, this.options.untrustedDomains).values());
    if (groups.length > 1) {
      throw new Error(`expected candidates of one package, got ${groups.map(group => group.name).join(", ")}`);
    }
    const [group] = groups;
    if (!group) {
      await this.transition("start", "0 candidate(s)");
      return this.finish({ kind: "allow-trusted", rationale: "no candidates to arbitrate" });
    }
    return this.arbitrate(group);
  }

  private async arbitrate(group: ClassifiedCandidates): Promise<Decision> {
    const { name, trusted, untrusted } = group;
    await this.transition("start", `${name}: ${trusted.length + untrusted.length} candidate(s)`);
    await this.transition("classified", `${name}: ${trusted.length} trusted, ${untrusted.length} untrusted`);

    const bestTrusted = highest(trusted, this.compare);
    const bestUntrusted = highest(untrusted, this.compare);

    if (!bestUntrusted) {
      await this.transition("resolved", `${name}: only trusted candidates`);
      return this.finish({ kind: "allow-trusted", rationale: `${name}: only trusted sources offer candidates`, selected: bestTrusted });
    }
    if (!bestTrusted) {
      await this.transition("resolved", `${name}: only untrusted candidates`);
      return this.finish({ kind: "allow-untrusted", rationale: `${name}: only untrusted sources offer candidates`, selected: bestUntrusted });
    }

    if (this.compare(bestTrusted.version, bestUntrusted.version) >= 0) {
      await this.transition(
        "resolved",
        `${name}: trusted ${bestTrusted.version} >= untrusted ${bestUntrusted.version}`
      );
      return this.finish({
        kind: "allow-trusted",
        rationale: `${name}: trusted ${bestTrusted.version} from ${bestTrusted.origin} is not older than untrusted ${bestUntrusted.version}`,
        selected: bestTrusted
      });
    }

    const { threshold } = this.options;
    if (!isThresholdEnabled(threshold)) {
      await this.transition("resolved", `${name}: untrusted ${bestUntrusted.version} is newer and popularity check is disabled`);
      return this.finish({
        kind: "abort",
        rationale: ambiguityMessage(group),
        name,
        counts: { trusted: trusted.length, untrusted: untrusted.length }
      });
    }

    if (!this.queryableDomains.includes(bestUntrusted.origin.toLowerCase())) {
      await this.transition(
        "resolved",
        `${name}: no popularity statistics for ${bestUntrusted.origin}; threshold ${describeThreshold(threshold)} not satisfied`
      );
      info(`${name}: ${bestUntrusted.version} from ${bestUntrusted.origin} filtered, popularity cannot be queried`);
      return this.finish({
        kind: "allow-trusted",
        rationale: `${name}: popularity of untrusted ${bestUntrusted.version} from ${bestUntrusted.origin} cannot be queried`,
        selected: bestTrusted
      });
    }

    await this.transition(
      "need-popularity",
      `${name}: untrusted ${bestUntrusted.version} > trusted ${bestTrusted.version}`
    );
    const { stats, source } = await this.options.oracle.lookup(name);
    const satisfied = evaluateThreshold(threshold, stats);
    await this.transition(
      "need-popularity",
      `${name}: popularity from ${source} day=${stats.lastDay} week=${stats.lastWeek} month=${stats.lastMonth}; ` +
        `threshold ${describeThreshold(threshold)} ${satisfied ? "satisfied" : "not satisfied"}`
    );

    if (!satisfied) {
      info(`${name}: ${bestUntrusted.version} from ${bestUntrusted.origin} filtered by popularity threshold`);
      return this.finish({
        kind: "allow-trusted",
        rationale: `${name}: untrusted ${bestUntrusted.version} does not meet popularity threshold ${describeThreshold(threshold)}`,
        selected: bestTrusted
      });
    }

    return this.finish(await this.options.mediator.mediate({ name, trusted: bestTrusted, untrusted: bestUntrusted }));
  }

  private async finish(decision: Decision): Promise<Decision> {
    await this.transition("decided", `${decision.kind}: ${decision.rationale}`);
    await this.transition("terminal", selectedLabel(decision));
    return decision;
  }

  private async transition(state: ArbiterState, message: string): Promise<void> {
    debug(`[${state}] ${message}`);
    await this.options.audit.record(`[${state}] ${message}`);
  }
}
