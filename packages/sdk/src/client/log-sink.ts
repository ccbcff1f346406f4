import type { LogStatus } from "@teleflush/shared/events";

/** A structured log record as handed over by a logging front-end. */
export interface LogRecord {
  /** Logger name, e.g. the module that emitted the record. */
  name?: string;
  level: string;
  message: string;
  tags?: readonly string[];
}

/** Generic sink for structured log records. */
export interface LogSink {
  write(record: LogRecord): void;
}

/** Anything that accepts intake-level log entries. */
export interface LogTarget {
  log(level: LogStatus, message: string, tags?: readonly string[]): void;
}

const LEVEL_ALIASES: Record<string, LogStatus> = {
  trace: "debug",
  debug: "debug",
  info: "info",
  notice: "info",
  warn: "warn",
  warning: "warn",
  error: "error",
  critical: "error",
  fatal: "error",
};

/** Map a front-end level name onto the intake status vocabulary. */
export function normalizeLevel(level: string): LogStatus {
  return LEVEL_ALIASES[level.toLowerCase()] ?? "info";
}

export function formatRecord(record: LogRecord): string {
  return record.name ? `${record.name}: ${record.message}` : record.message;
}

/** Build a sink bound to `target`; records go straight to its log buffer. */
export function createLogSink(target: LogTarget): LogSink {
  return {
    write(record: LogRecord): void {
      target.log(normalizeLevel(record.level), formatRecord(record), record.tags);
    },
  };
}
