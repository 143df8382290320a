/**
 * Environment and log level configuration.
 */
import { existsSync, readFileSync } from "node:fs";
import type { LogLevel } from "effect";
import { parseLogLevel } from "@charvocab/effect-runtime";

export const LOG_LEVEL_ENV = "CHARVOCAB_LOG_LEVEL";

/** `KEY=value` lines; blank lines and `#` comments skipped, quotes stripped. */
export function parseEnvFile(content: string): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq < 0) continue;
    const key = trimmed.slice(0, eq).trim();
    vars[key] = trimmed.slice(eq + 1).trim().replace(/^["']|["']$/g, "");
  }
  return vars;
}

/** Load `.env.local` into `env` without overriding variables already set. */
export function loadEnvFile(path: string, env: NodeJS.ProcessEnv = process.env): void {
  if (!existsSync(path)) return;
  for (const [key, val] of Object.entries(parseEnvFile(readFileSync(path, "utf8")))) {
    if (!env[key]) env[key] = val;
  }
}

/** `--logLevel`, then the environment, then info. */
export function resolveLogLevel(
  kv: Record<string, string>,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel.LogLevel {
  return parseLogLevel(kv["logLevel"] ?? env[LOG_LEVEL_ENV] ?? "info");
}
