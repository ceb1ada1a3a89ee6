import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import type { JsonObject, JsonValue } from "./json.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  run_id: string;
  scan?: string;
};

export type LogEventInput = {
  type: string;
  runId?: string;
  scan?: string;
  ts?: string | Date;
  [field: string]: JsonValue | Date | undefined;
};

export type EventLogger = {
  log(event: LogEventInput): void;
};

type EventDefaults = {
  runId?: string;
};

type LogFailureAction = "write" | "close";

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = resolveLoggerDebugEnabled();
  }

  log(event: LogEventInput): void {
    const normalized = eventWithTs(event, this.defaults);
    this.append(normalized);
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

export const nullLogger: EventLogger = {
  log: () => undefined,
};

/**
 * Wraps a logger so a throwing `log` becomes a console warning instead of
 * rejecting the scan or stage that emitted the event.
 */
export function guardLogger(logger: EventLogger): EventLogger {
  if (logger === nullLogger) return logger;
  return {
    log(event) {
      try {
        logger.log(event);
      } catch (err) {
        console.warn(`Warning: failed to log ${event.type} event: ${formatErrorMessage(err)}`);
      }
    },
  };
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { runId: providedRunId, scan, ts, type, ...rest } = event;

  const runId = providedRunId ?? defaults.runId;
  if (!runId) {
    throw new Error("run_id is required for log events");
  }

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = {
    ...normalizeFields(rest),
    ts: normalizedTs,
    type,
    run_id: runId,
  };

  if (scan) {
    result.scan = scan;
  }

  return result;
}

function normalizeFields(fields: Record<string, JsonValue | Date | undefined>): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    out[key] = value instanceof Date ? value.toISOString() : value;
  }
  return out;
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stackLine = formatErrorLines(error, { mode: "debug" }).find(
    (line) => line.kind === "stack",
  );
  return stackLine ? `${message}\n${stackLine.text}` : message;
}

function resolveLoggerDebugEnabled(): boolean {
  for (const arg of process.argv) {
    if (arg === "--") break;
    if (arg === "--debug") return true;
  }
  return false;
}
