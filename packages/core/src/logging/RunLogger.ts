import { promises as fs } from "node:fs";
import path from "node:path";
import { randomUUID } from "node:crypto";

export type RunLogEventType = "dispatch" | "response" | "failure" | "dry_run" | "cancelled";

export interface RunLogEvent {
  type: RunLogEventType;
  timestamp: string;
  data: Record<string, unknown>;
}

/** Appends one JSON line per pipeline event to `<logDir>/<runId>.jsonl`. */
export class RunLogger {
  readonly logPath: string;
  readonly logDir: string;
  readonly runId: string;

  constructor(logDir: string, runId: string = randomUUID()) {
    this.logDir = path.resolve(logDir);
    this.runId = runId;
    this.logPath = path.join(this.logDir, `${runId}.jsonl`);
  }

  async log(type: RunLogEventType, data: Record<string, unknown>): Promise<void> {
    await fs.mkdir(this.logDir, { recursive: true });
    const event: RunLogEvent = {
      type,
      timestamp: new Date().toISOString(),
      data,
    };
    await fs.appendFile(this.logPath, `${JSON.stringify(event)}\n`, "utf8");
  }
}
