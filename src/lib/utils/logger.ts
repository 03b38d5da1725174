/**
 * logger.ts — Structured logging
 *
 * Every line is a single JSON object so runs can be grepped or piped into a
 * log collector: { ts, level, scope, jobId?, msg, ...extra }.
 * Errors go to stderr, everything else to stdout. LOG_LEVEL gates output.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

// Read lazily so a .env loaded after import still applies.
function minimumLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

export function log(
  level: LogLevel,
  scope: string,
  jobId: string | undefined,
  message: string,
  extra?: Record<string, unknown>
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel()]) return;

  const entry = {
    ts: new Date().toISOString(),
    level,
    scope,
    ...(jobId ? { jobId } : {}),
    msg: message,
    ...extra,
  };
  if (level === "error") {
    console.error(JSON.stringify(entry));
  } else {
    console.log(JSON.stringify(entry));
  }
}
