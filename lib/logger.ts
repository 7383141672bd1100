import pino from "pino";
import { AsyncLocalStorage } from "async_hooks";

// ---------------------------------------------------------------------------
// Async context store. Carries the run and form being processed through the
// transfer pipeline; both ids are merged into every log line.
// ---------------------------------------------------------------------------
interface LogContext {
  runId?: string;
  formUid?: string;
}

const store = new AsyncLocalStorage<LogContext>();

// ---------------------------------------------------------------------------
// Sensitive field redaction. Matched against every log object and replaced
// with "[REDACTED]" before the line is written.
// ---------------------------------------------------------------------------
const REDACT_PATHS = [
  "token",
  "secret",
  "clientSecret",
  "accessToken",
  "authorization",
  "headers.Authorization",
  "*.token",
  "*.secret",
  "*.clientSecret",
  "*.accessToken",
  "*.authorization",
];

// ---------------------------------------------------------------------------
// Base pino logger
// - NDJSON to stdout; the weekly job appends it to its log file
// - Verbosity via LOG_LEVEL (default: info, "silent" under test)
// ---------------------------------------------------------------------------
const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: { service: "kobo-media-transfer" },
  redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

type Extra = Record<string, unknown>;

export interface Logger {
  debug(msg: string, extra?: Extra): void;
  info(msg: string, extra?: Extra): void;
  warn(msg: string, extra?: Extra): void;
  error(msg: string, extra?: Extra): void;
}

function child(component: string) {
  return baseLogger.child({ component, ...store.getStore() });
}

/**
 * Create a structured logger bound to a named component.
 *
 *   const log = createLogger("executor");
 *   log.info("Upload finished", { fileName, bytes });
 *
 * Each call emits a JSON line with at minimum:
 *   { level, time, service, component, runId?, formUid?, msg, ...extra }
 */
export function createLogger(component: string): Logger {
  return {
    debug: (msg, extra) => child(component).debug(extra ?? {}, msg),
    info: (msg, extra) => child(component).info(extra ?? {}, msg),
    warn: (msg, extra) => child(component).warn(extra ?? {}, msg),
    error: (msg, extra) => child(component).error(extra ?? {}, msg),
  };
}

/** Run `fn` with the run id attached to all log lines emitted inside it. */
export function withRunContext<T>(runId: string, fn: () => Promise<T>): Promise<T> {
  return store.run({ runId }, fn);
}

/**
 * Run `fn` with the form uid attached, keeping the enclosing run id.
 * Call this around the processing of a single form.
 */
export function withFormContext<T>(formUid: string, fn: () => Promise<T>): Promise<T> {
  return store.run({ ...store.getStore(), formUid }, fn);
}
