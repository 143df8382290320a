/**
 * Effect layers for dependency injection.
 *
 * Each service gets a Layer; `runWith` wires the defaults used by the CLI.
 */
import { Cause, Effect, Exit, Layer, Logger, type LogLevel } from "effect";
import { FileSystemService, type FileSystem } from "@charvocab/core";
import { nodeFileSystem } from "./node-fs.js";
import { prettyLogger } from "./logging.js";

// ── File system Layer ──────────────────────────────────────────────────────

export const FileSystemLive = Layer.succeed(FileSystemService, nodeFileSystem);

export const FileSystemFrom = (fs: FileSystem) =>
  Layer.succeed(FileSystemService, fs);

// ── Logger Layer ───────────────────────────────────────────────────────────

export const PrettyLoggerLive = Logger.replace(Logger.defaultLogger, prettyLogger);

// ── Runtime ────────────────────────────────────────────────────────────────

/**
 * Run an effect against the Node file system with the pretty logger at the
 * given minimum level. A failure rejects with the typed error itself rather
 * than a fiber failure wrapper.
 */
export async function runWith<A, E>(
  effect: Effect.Effect<A, E, FileSystemService>,
  logLevel: LogLevel.LogLevel,
): Promise<A> {
  const exit = await Effect.runPromiseExit(
    effect.pipe(
      Logger.withMinimumLogLevel(logLevel),
      Effect.provide(Layer.merge(FileSystemLive, PrettyLoggerLive)),
    ),
  );
  if (Exit.isSuccess(exit)) return exit.value;
  throw Cause.squash(exit.cause);
}
