// CHANGE: Exercise confirmation answers and the no-terminal fallback.
// WHY: Only an explicit yes may select the public candidate.

import { PassThrough } from "node:stream";
import { afterEach, describe, expect, it, vi } from "vitest";
import { MemoryAuditLog } from "../src/audit.js";
import { DecisionMediator, isAffirmative } from "../src/mediator.js";
import { CannedPrompter, DisabledPrompter, TerminalPrompter, createPrompter } from "../src/prompt.js";
import { trustedCandidate, untrustedCandidate } from "./fixtures.js";

const request = { name: "sampleproject", trusted: trustedCandidate("1.3.0"), untrusted: untrustedCandidate("1.3.1") };

describe("isAffirmative", () => {
  it("accepts yes in any case", () => {
    expect(isAffirmative(" YES ")).toBe(true);
    expect(isAffirmative("no")).toBe(false);
    expect(isAffirmative("y")).toBe(false);
    expect(isAffirmative("")).toBe(false);
  });
});

describe("DecisionMediator", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("allows the untrusted candidate on a canned yes", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const audit = new MemoryAuditLog();
    const decision = await new DecisionMediator(new CannedPrompter("Yes"), audit).mediate(request);

    expect(decision.kind).toBe("allow-untrusted");
    expect(decision.kind !== "abort" && decision.selected?.version).toBe("1.3.1");
    expect(audit.lines).toEqual(['answer "Yes": sampleproject trusted=1.3.0 untrusted=1.3.1 chose=pypi.org']);
  });

  it("keeps the trusted candidate on a canned no", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const audit = new MemoryAuditLog();
    const decision = await new DecisionMediator(new CannedPrompter("no"), audit).mediate(request);

    expect(decision).toEqual({
      kind: "allow-trusted",
      rationale: "declined sampleproject 1.3.1 from pypi.org",
      selected: request.trusted
    });
    expect(audit.lines).toEqual(['answer "no": sampleproject trusted=1.3.0 untrusted=1.3.1 chose=repo.internal.example']);
  });

  it("fails closed with a warning when prompting is unavailable", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const prompter = new DisabledPrompter();
    const askSpy = vi.spyOn(prompter, "ask");
    const audit = new MemoryAuditLog();

    const decision = await new DecisionMediator(prompter, audit).mediate(request);

    expect(decision.kind).toBe("allow-trusted");
    expect(decision.kind !== "abort" && decision.selected).toBe(request.trusted);
    expect(askSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(audit.lines).toEqual(["prompt unavailable: sampleproject trusted=1.3.0 untrusted=1.3.1 chose=repo.internal.example"]);
  });
});

describe("TerminalPrompter", () => {
  it("is unavailable without a TTY", () => {
    expect(new TerminalPrompter(new PassThrough(), new PassThrough()).available).toBe(false);
  });

  it("reads one answer line", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const answer = new TerminalPrompter(input, output).ask("allow? ");
    input.write("yes\n");
    await expect(answer).resolves.toBe("yes");
  });

  it("answers empty when input ends", async () => {
    const input = new PassThrough();
    const answer = new TerminalPrompter(input, new PassThrough()).ask("allow? ");
    input.end();
    await expect(answer).resolves.toBe("");
  });
});

describe("createPrompter", () => {
  it("prefers a canned answer over --no-input", () => {
    expect(createPrompter({ cannedAnswer: "no", noInput: true })).toBeInstanceOf(CannedPrompter);
    expect(createPrompter({ noInput: true })).toBeInstanceOf(DisabledPrompter);
    expect(createPrompter({})).toBeInstanceOf(TerminalPrompter);
  });
});
