/**
 * sharegrid logger.
 * Format: JSONL (one JSON object per line) on stderr, so stdout stays free for output.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";
export type LogAction =
  | "message_loaded"
  | "message_prepared"
  | "secret_loaded"
  | "secret_generated"
  | "secret_enlarged"
  | "ciphered_generated"
  | "file_saved"
  | "other";

export interface LogEntry {
  ts: string;
  level: LogLevel;
  action?: LogAction;
  message: string;
  details?: Record<string, unknown>;
  error?: string;
  stack?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, fatal: 4 };

const LOG_BUFFER: LogEntry[] = [];
const MAX_BUFFER = 500;

let threshold: LogLevel = "error";
let sink: (line: string) => void = (line) => console.error(line);

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/** -v count to level: 0 error, 1 warn, 2 info, 3+ debug. */
export function levelForVerbosity(count: number): LogLevel {
  if (count > 2) return "debug";
  if (count > 1) return "info";
  if (count > 0) return "warn";
  return "error";
}

/** Replace the output sink; returns the previous one. */
export function setLogSink(next: (line: string) => void): (line: string) => void {
  const prev = sink;
  sink = next;
  return prev;
}

function entry(level: LogLevel, message: string, opts?: { action?: LogAction; details?: Record<string, unknown>; error?: unknown }): LogEntry {
  const e: LogEntry = {
    ts: new Date().toISOString(),
    level,
    message,
    ...opts?.details && { details: opts.details },
  };
  if (opts?.action) e.action = opts.action;
  if (opts?.error !== undefined) {
    e.error = opts.error instanceof Error ? opts.error.message : String(opts.error);
    if (opts.error instanceof Error && opts.error.stack) e.stack = opts.error.stack;
  }
  return e;
}

function flush(ent: LogEntry): void {
  if (LEVEL_ORDER[ent.level] < LEVEL_ORDER[threshold]) return;
  LOG_BUFFER.push(ent);
  if (LOG_BUFFER.length > MAX_BUFFER) LOG_BUFFER.shift();
  sink(`[sharegrid] ${JSON.stringify(ent)}`);
}

export function logDebug(message: string, details?: Record<string, unknown>): void {
  flush(entry("debug", message, { details }));
}

export function logInfo(message: string, details?: Record<string, unknown>): void {
  flush(entry("info", message, { details }));
}

export function logWarn(message: string, details?: Record<string, unknown>): void {
  flush(entry("warn", message, { details }));
}

export function logError(message: string, error?: unknown, details?: Record<string, unknown>): void {
  flush(entry("error", message, { error, details }));
}

export function logFatal(message: string, error?: unknown, details?: Record<string, unknown>): void {
  flush(entry("fatal", message, { error, details }));
}

/** Pipeline event; logged at info level. */
export function logAction(action: LogAction, message: string, details?: Record<string, unknown>): void {
  flush(entry("info", message, { action, details }));
}

export function getLogBuffer(): LogEntry[] {
  return [...LOG_BUFFER];
}

export function getLogBufferAsText(): string {
  return LOG_BUFFER.map((e) => JSON.stringify(e)).join("\n");
}

export function clearLogBuffer(): void {
  LOG_BUFFER.length = 0;
}
