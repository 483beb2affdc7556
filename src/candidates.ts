// CHANGE: Read the candidate list handed over by the host installer.
// WHY: Arbitration only starts from well-formed candidates; anything else is a configuration failure.

import fs from "fs-extra";
import { ConfigError, describeError } from "./errors.js";
import { debug } from "./logger.js";
import type { JsonValue, ResolvedCandidate } from "./types.js";
import { originOf } from "./utils/url.js";

function isRecord(value: JsonValue): value is { readonly [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(raw: { readonly [key: string]: JsonValue }, keys: readonly string[], position: number): string {
  for (const key of keys) {
    const value = raw[key];
    if (typeof value === "string" && value.trim() !== "") {
      return value.trim();
    }
  }
  throw new ConfigError(`candidate #${position} is missing "${keys[0]}"`);
}

function toCandidate(raw: JsonValue, position: number): ResolvedCandidate {
  if (!isRecord(raw)) {
    throw new ConfigError(`candidate #${position} is not an object`);
  }
  const indexUrl = requireString(raw, ["index_url", "indexUrl"], position);
  const declaredOrigin = raw.origin;
  const origin =
    typeof declaredOrigin === "string" && declaredOrigin.trim() !== "" ? declaredOrigin.trim().toLowerCase() : originOf(indexUrl);
  return {
    name: requireString(raw, ["name"], position),
    version: requireString(raw, ["version"], position),
    origin,
    indexUrl,
    url: requireString(raw, ["url"], position)
  };
}

/**
 * Validate a candidate document: an array, or an object with a `candidates` array.
 *
 * @throws ConfigError on any malformed entry.
 */
export function parseCandidates(document: JsonValue): ResolvedCandidate[] {
  const list = isRecord(document) ? document.candidates : document;
  if (!Array.isArray(list)) {
    throw new ConfigError("candidate input must be an array or an object with a \"candidates\" array");
  }
  const items: readonly JsonValue[] = list;
  return items.map((raw, index) => toCandidate(raw, index + 1));
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Load candidates from a JSON file, or from stdin when the path is `-`.
 */
export async function loadCandidates(source: string, stdin: NodeJS.ReadableStream = process.stdin): Promise<ResolvedCandidate[]> {
  let document: JsonValue;
  try {
    const text = source === "-" ? await readStream(stdin) : await fs.readFile(source, "utf8");
    document = JSON.parse(text);
  } catch (rawError) {
    throw new ConfigError(`cannot read candidates from ${source === "-" ? "stdin" : source}: ${describeError(rawError)}`, {
      cause: rawError
    });
  }
  const candidates = parseCandidates(document);
  debug(`Loaded ${candidates.length} candidates from ${source === "-" ? "stdin" : source}`);
  return candidates;
}
