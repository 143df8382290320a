/**
 * Structured logging.
 *
 * A compact console logger for CLI runs (written to stderr so command output
 * on stdout stays machine-readable) and log level parsing for config.
 */
import { Effect, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

function render(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/** `[HH:MM:SS.mmm] LEVEL message key=value ...` */
export function formatLogLine(
  level: string,
  message: unknown,
  date: Date,
  annotations: Iterable<readonly [string, unknown]> = [],
): string {
  const ts = date.toISOString().slice(11, 23);
  const lvl = level.toUpperCase().padEnd(5);
  const parts: unknown[] = Array.isArray(message) ? message : [message];
  let line = `[${ts}] ${lvl} ${parts.map(render).join(" ")}`;
  for (const [key, value] of annotations) {
    line += ` ${key}=${render(value)}`;
  }
  return line;
}

export const prettyLogger = Logger.make(({ logLevel, message, date, annotations }) => {
  console.error(formatLogLine(logLevel.label, message, date, annotations));
});

// ── Span helpers ───────────────────────────────────────────────────────────

export function withSpan<A, E, R>(name: string, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
  return Effect.withSpan(name)(effect);
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    default: return LogLevel.Info;
  }
}
