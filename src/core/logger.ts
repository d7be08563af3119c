import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

/** One line of a session's event log. */
export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  session_id: string;
  run_id?: string;
  task_id?: string;
  payload?: JsonObject;
};

export type LogEventInput = JsonObject & {
  type: string;
  runId?: string;
  taskId?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

/** Ids stamped on every event a logger writes unless the event carries its own. */
export type EventScope = {
  sessionId: string;
  runId?: string;
  taskId?: string;
};

export type JsonlLoggerOptions = {
  /** Append the stack of a failed write to the warning. */
  debug?: boolean;
};

export interface EventLogger {
  log(event: LogEventInput): void;
}

export const NOOP_EVENT_LOGGER: EventLogger = {
  log: () => undefined,
};

// =============================================================================
// LOGGER
// =============================================================================

/**
 * Append-only JSONL event log, one file per session.
 * Logging never fails a turn: write errors become console warnings.
 */
export class JsonlLogger implements EventLogger {
  private readonly fd: number;
  private closed = false;

  constructor(
    readonly filePath: string,
    private readonly scope: EventScope,
    private readonly options: JsonlLoggerOptions = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fd = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fd, `${JSON.stringify(toLogEvent(event, this.scope))}\n`);
    } catch (err) {
      this.warn(`write log event to ${this.filePath}`, err);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      fs.fsyncSync(this.fd);
      fs.closeSync(this.fd);
    } catch (err) {
      this.warn(`close log file ${this.filePath}`, err);
    }
  }

  private warn(action: string, error: unknown): void {
    const message = `Warning: failed to ${action}: ${formatErrorMessage(error)}`;
    const stack = this.options.debug
      ? formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack")
      : undefined;
    console.warn(stack ? `${message}\n${stack.text}` : message);
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function toLogEvent(event: LogEventInput, scope: EventScope): LogEvent {
  const { runId, taskId, payload, ts, type, ...fields } = event;

  const result: LogEvent = {
    ...fields,
    ts: ts instanceof Date ? ts.toISOString() : ts ?? isoNow(),
    type,
    session_id: scope.sessionId,
  };

  const resolvedRunId = runId ?? scope.runId;
  if (resolvedRunId) result.run_id = resolvedRunId;

  const resolvedTaskId = taskId ?? scope.taskId;
  if (resolvedTaskId) result.task_id = resolvedTaskId;

  if (payload && Object.keys(payload).length > 0) result.payload = payload;

  return result;
}

/** Flat helper: `runId`, `taskId` and `ts` are lifted out, everything else is logged as is. */
export function logOrchestratorEvent(
  logger: EventLogger,
  type: string,
  fields: JsonObject & { runId?: string; taskId?: string; ts?: string | Date } = {},
): void {
  const { runId, taskId, ts, ...rest } = fields;
  const event: LogEventInput = { type, ...rest };

  if (runId !== undefined) event.runId = runId;
  if (taskId !== undefined) event.taskId = taskId;
  if (ts !== undefined) event.ts = ts;

  logger.log(event);
}
