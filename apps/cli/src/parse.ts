/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { readFile } from "node:fs/promises";
import { InvalidInput, type CorpusSource } from "@charvocab/core";

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function requireArg(kv: Record<string, string>, key: string, label?: string): string {
  const val = kv[key];
  if (!val) {
    throw new InvalidInput({
      message: `Missing required argument: --${key}${label ? ` (${label})` : ""}`,
      entry: key,
    });
  }
  return val;
}

export function intArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  const val = kv[key];
  if (!val) return defaultVal;
  const n = Number(val);
  if (!Number.isInteger(n)) {
    throw new InvalidInput({ message: `--${key} must be an integer, got "${val}"`, entry: val });
  }
  return n;
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

export function boolArg(kv: Record<string, string>, key: string, defaultVal: boolean): boolean {
  const val = kv[key];
  if (!val) return defaultVal;
  return val === "true" || val === "1";
}

/** Comma-separated list, blanks dropped. */
export function listArg(kv: Record<string, string>, key: string): string[] {
  const val = kv[key];
  if (!val) return [];
  return val.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
}

/** Comma-separated token ids, e.g. `--ids=0,2,1,3`. */
export function idsArg(kv: Record<string, string>, key: string): number[] {
  return listArg(kv, key).map((s) => {
    const n = Number(s);
    if (!Number.isInteger(n)) {
      throw new InvalidInput({ message: `--${key} must be comma-separated integers, got "${s}"`, entry: s });
    }
    return n;
  });
}

/**
 * Corpus from `--text` (inline) or `--input` (one file, or several
 * comma-separated files joined in order).
 */
export function corpusArg(kv: Record<string, string>): CorpusSource {
  if (kv["text"] !== undefined) return kv["text"];
  const paths = listArg(kv, "input");
  if (paths.length === 0) {
    throw new InvalidInput({ message: "Missing corpus: pass --text=<inline text> or --input=<file[,file...]>" });
  }
  return paths.length === 1 ? { path: paths[0] } : { paths };
}

/** Load a JSON config file and merge with CLI overrides. */
export async function loadConfig(kv: Record<string, string>): Promise<Record<string, string>> {
  const configPath = kv["config"];
  if (!configPath) return kv;
  const raw = await readFile(configPath, "utf-8");
  const config: unknown = JSON.parse(raw);
  if (typeof config !== "object" || config === null || Array.isArray(config)) {
    throw new InvalidInput({ message: `Config file "${configPath}" must contain a JSON object`, entry: configPath });
  }
  const merged: Record<string, string> = {};
  for (const [key, value] of Object.entries(config)) {
    merged[key] = typeof value === "string" ? value : JSON.stringify(value);
  }
  // CLI overrides take precedence
  return { ...merged, ...kv };
}
