// CHANGE: Record arbitration steps in an append-only audit file.
// WHY: Operators need to reconstruct why a source was allowed or refused after the run.

import fs from "fs-extra";
import { describeError } from "./errors.js";
import { error as logError } from "./logger.js";
import { systemClock } from "./types.js";
import type { Clock } from "./types.js";

export interface AuditLog {
  record(message: string): Promise<void>;
}

/**
 * Appends `<ISO timestamp> <message>` lines. Without a path every call is a no-op.
 */
export class FileAuditLog implements AuditLog {
  constructor(
    private readonly filePath: string | undefined,
    private readonly clock: Clock = systemClock
  ) {}

  async record(message: string): Promise<void> {
    if (!this.filePath) {
      return;
    }
    try {
      await fs.appendFile(this.filePath, `${this.clock().toISOString()} ${message}\n`, "utf8");
    } catch (rawError) {
      logError(`Audit log write failed (${this.filePath}): ${describeError(rawError)}`);
    }
  }
}

/**
 * In-memory audit log.
 */
export class MemoryAuditLog implements AuditLog {
  readonly lines: string[] = [];

  async record(message: string): Promise<void> {
    this.lines.push(message);
  }
}
