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

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = {
  ts: string;
  level: LogLevel;
  type: string;
  job_id?: string;
  group?: string;
  message?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  level?: LogLevel;
  jobId?: string;
  group?: string;
  message?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

export type EventDefaults = {
  jobId?: string;
  group?: string;
};

export interface EventLogger {
  log(event: LogEventInput): void;
}

type LogFailureAction = "write" | "close";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// =============================================================================
// LOGGERS
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
    private readonly debugEnabled = false,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    this.append(eventWithTs(event, this.defaults));
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.debugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.debugEnabled));
    }
  }
}

export function createStdoutLogger(
  defaults: EventDefaults = {},
  options: { minLevel?: LogLevel } = {},
): EventLogger {
  const minLevel = options.minLevel ?? "info";
  return {
    log(event: LogEventInput) {
      const normalized = eventWithTs(event, defaults);
      if (LEVEL_ORDER[normalized.level] < LEVEL_ORDER[minLevel]) return;
      process.stdout.write(`${JSON.stringify(normalized)}\n`);
    },
  };
}

export function fanOutLogger(...loggers: EventLogger[]): EventLogger {
  return {
    log(event: LogEventInput) {
      for (const logger of loggers) {
        logger.log(event);
      }
    },
  };
}

// Scopes every event to a group without the caller repeating it.
export function withDefaults(logger: EventLogger, defaults: EventDefaults): EventLogger {
  return {
    log(event: LogEventInput) {
      logger.log({
        ...event,
        jobId: event.jobId ?? defaults.jobId,
        group: event.group ?? defaults.group,
      });
    },
  };
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const normalizedTs =
    typeof event.ts === "string"
      ? event.ts
      : event.ts instanceof Date
        ? event.ts.toISOString()
        : isoNow();

  const result: LogEvent = {
    ts: normalizedTs,
    level: event.level ?? "info",
    type: event.type,
  };

  const jobId = event.jobId ?? defaults.jobId;
  if (jobId) result.job_id = jobId;

  const group = event.group ?? defaults.group;
  if (group) result.group = group;

  if (event.message) result.message = event.message;

  if (event.payload && Object.keys(event.payload).length > 0) {
    result.payload = event.payload;
  }

  return result;
}

export function logUpdaterEvent(
  logger: EventLogger,
  type: string,
  fields: { level?: LogLevel; message?: string; group?: string; payload?: JsonObject } = {},
): void {
  const event: LogEventInput = { type, ...fields };
  logger.log(event);
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  debugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!debugEnabled) {
    return message;
  }

  const stackLine = formatErrorLines(error, { mode: "debug" }).find(
    (line) => line.kind === "stack",
  );
  return stackLine ? `${message}\n${stackLine.text}` : message;
}
