// CHANGE: Resolve popularity-eligible ambiguities through confirmation.
// WHY: A newer public candidate is only taken on an explicit "yes"; silence or no terminal keeps the private one.

import type { AuditLog } from "./audit.js";
import { PromptUnavailableError } from "./errors.js";
import { info, warn } from "./logger.js";
import type { Prompter } from "./prompt.js";
import type { Decision, ResolvedCandidate } from "./types.js";

export interface MediationRequest {
  readonly name: string;
  readonly trusted: ResolvedCandidate;
  readonly untrusted: ResolvedCandidate;
}

export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase() === "yes";
}

export class DecisionMediator {
  constructor(
    private readonly prompter: Prompter,
    private readonly audit: AuditLog
  ) {}

  async mediate(request: MediationRequest): Promise<Decision> {
    const { name, trusted, untrusted } = request;
    let answer: string;
    try {
      answer = await this.ask(request);
    } catch (rawError) {
      if (!(rawError instanceof PromptUnavailableError)) {
        throw rawError;
      }
      warn(`${rawError.message}; keeping ${name} ${trusted.version} from ${trusted.origin}`);
      await this.audit.record(
        `prompt unavailable: ${name} trusted=${trusted.version} untrusted=${untrusted.version} chose=${trusted.origin}`
      );
      return {
        kind: "allow-trusted",
        rationale: `no terminal or canned answer to confirm ${name} ${untrusted.version} from ${untrusted.origin}`,
        selected: trusted
      };
    }

    const allowed = isAffirmative(answer);
    const chosen = allowed ? untrusted : trusted;
    await this.audit.record(
      `answer ${JSON.stringify(answer)}: ${name} trusted=${trusted.version} untrusted=${untrusted.version} chose=${chosen.origin}`
    );
    info(`${name}: using ${chosen.version} from ${chosen.origin}`);
    if (allowed) {
      return {
        kind: "allow-untrusted",
        rationale: `explicitly allowed ${name} ${untrusted.version} from ${untrusted.origin}`,
        selected: untrusted
      };
    }
    return {
      kind: "allow-trusted",
      rationale: `declined ${name} ${untrusted.version} from ${untrusted.origin}`,
      selected: trusted
    };
  }

  private async ask(request: MediationRequest): Promise<string> {
    if (!this.prompter.available) {
      throw new PromptUnavailableError(`confirmation needed for ${request.name} but prompting is unavailable`);
    }
    const { untrusted } = request;
    return this.prompter.ask(
      `installation candidate ${untrusted.name} ${untrusted.version} from ${untrusted.origin} satisfies popularity threshold; allow (yes/no)? `
    );
  }
}
