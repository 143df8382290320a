/**
 * Persistence helpers for tokenizer artifacts.
 *
 * Vocabularies are stored as pretty-printed JSON:
 *
 * ```json
 * {
 *   "version": "char-tokenizer.v1",
 *   "stoi": { "<PAD>": 0, "<UNK>": 1, "a": 2 },
 *   "pad_id": 0,
 *   "unk_id": 1
 * }
 * ```
 *
 * All I/O goes through `FileSystemService`, so callers get typed failures
 * and tests can swap in an in-memory file system.
 */
import { dirname, join } from "node:path";
import { Effect } from "effect";
import {
  ARTIFACTS_VERSION,
  CorruptState,
  FileSystemService,
  type IOFailure,
  type RestoreError,
  type TokenizerArtifacts,
} from "@charvocab/core";
import { findMismatch, invert, type Vocab } from "./vocab.js";

/** Prefix of the temporary file written next to the destination. */
export const TEMP_PREFIX = ".tmp_tok_";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Largest id an encoded `Int32Array` can hold. */
export const MAX_TOKEN_ID = 0x7fffffff;

function isId(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= MAX_TOKEN_ID;
}

function isOptionalId(value: unknown): value is number | null {
  return value === null || isId(value);
}

function tempSuffix(): string {
  const rand = Math.random().toString(36).slice(2, 8);
  return `${process.pid}_${Date.now().toString(36)}_${rand}`;
}

// ── Serialisation ─────────────────────────────────────────────────────────

/** Render artifacts in the on-disk layout, `stoi` in id order. */
export function serializeArtifacts(artifacts: TokenizerArtifacts): string {
  const stoi = Object.fromEntries(Object.entries(artifacts.stoi).sort((a, b) => a[1] - b[1]));
  return JSON.stringify(
    {
      version: artifacts.version,
      stoi,
      pad_id: artifacts.padId,
      unk_id: artifacts.unkId,
    },
    null,
    2,
  );
}

/**
 * Parse and structurally validate a persisted vocabulary.
 *
 * A missing `version` is read as v1; any other version is rejected.
 */
export function parseArtifacts(raw: string, path?: string): Effect.Effect<TokenizerArtifacts, CorruptState> {
  const corrupt = (detail: string, cause?: unknown) =>
    new CorruptState({
      message: path === undefined ? `Invalid tokenizer artifacts: ${detail}` : `Invalid tokenizer file "${path}": ${detail}`,
      path,
      cause,
    });

  return Effect.try({
    try: (): unknown => JSON.parse(raw),
    catch: (cause) => corrupt("not valid JSON", cause),
  }).pipe(
    Effect.flatMap((data): Effect.Effect<TokenizerArtifacts, CorruptState> => {
      if (!isRecord(data)) {
        return Effect.fail(corrupt("expected a JSON object"));
      }
      if ("version" in data && data.version !== ARTIFACTS_VERSION) {
        return Effect.fail(corrupt(`unsupported version ${JSON.stringify(data.version)}`));
      }
      const stoi = data.stoi;
      if (!isRecord(stoi)) {
        return Effect.fail(corrupt("missing or bad 'stoi'"));
      }
      if (!("pad_id" in data) || !("unk_id" in data)) {
        return Effect.fail(corrupt("missing 'pad_id'/'unk_id'"));
      }
      const padId = data.pad_id;
      const unkId = data.unk_id;
      if (!isOptionalId(padId) || !isOptionalId(unkId)) {
        return Effect.fail(corrupt(`'pad_id'/'unk_id' must be an integer in [0, ${MAX_TOKEN_ID}] or null`));
      }

      const entries: [string, number][] = [];
      for (const [s, i] of Object.entries(stoi)) {
        if (!isId(i)) {
          return Effect.fail(corrupt(`stoi[${JSON.stringify(s)}] is not an integer in [0, ${MAX_TOKEN_ID}]`));
        }
        entries.push([s, i]);
      }

      return Effect.succeed({
        version: ARTIFACTS_VERSION,
        stoi: Object.fromEntries(entries),
        padId,
        unkId,
      } satisfies TokenizerArtifacts);
    }),
  );
}

/**
 * Rebuild both lookup tables from artifacts and check that they invert.
 *
 * Keys longer than one character are accepted only for the pad and unknown
 * ids, and those ids must be present in the table.
 */
export function vocabFromArtifacts(artifacts: TokenizerArtifacts): Effect.Effect<Vocab, CorruptState> {
  return Effect.suspend((): Effect.Effect<Vocab, CorruptState> => {
    const { padId, unkId } = artifacts;
    const stoi = new Map<string, number>();
    for (const [s, i] of Object.entries(artifacts.stoi)) {
      if (!isId(i)) {
        return Effect.fail(new CorruptState({ message: `stoi[${JSON.stringify(s)}] is not an integer in [0, ${MAX_TOKEN_ID}]` }));
      }
      if ([...s].length !== 1 && i !== padId && i !== unkId) {
        return Effect.fail(
          new CorruptState({ message: `stoi key ${JSON.stringify(s)} is not a single character or special token` }),
        );
      }
      stoi.set(s, i);
    }
    if (stoi.size === 0) {
      return Effect.fail(new CorruptState({ message: "stoi is empty" }));
    }

    const itos = invert(stoi);
    const mismatch = findMismatch(stoi, itos);
    if (mismatch !== undefined) {
      return Effect.fail(new CorruptState({ message: `Inconsistent stoi/itos: ${mismatch}` }));
    }
    for (const [label, id] of [["pad_id", padId], ["unk_id", unkId]] as const) {
      if (id !== null && !itos.has(id)) {
        return Effect.fail(new CorruptState({ message: `${label} ${id} is not in the vocabulary` }));
      }
    }

    return Effect.succeed({ stoi, itos, padId, unkId } satisfies Vocab);
  });
}

// ── File I/O ──────────────────────────────────────────────────────────────

/**
 * Write artifacts to `path` atomically.
 *
 * Creates the parent directory, writes a temporary file beside the
 * destination and renames it into place. On failure or interruption the
 * temporary file is removed and the destination keeps its previous content.
 */
export function saveArtifacts(
  path: string,
  artifacts: TokenizerArtifacts,
): Effect.Effect<void, IOFailure, FileSystemService> {
  return Effect.flatMap(FileSystemService, (fs) => {
    const dir = dirname(path);
    const tmpPath = join(dir, `${TEMP_PREFIX}${tempSuffix()}.json`);
    const json = serializeArtifacts(artifacts);

    const cleanup = fs.remove(tmpPath).pipe(
      Effect.catchAll((err) =>
        Effect.logWarning("Failed to remove temporary tokenizer file").pipe(
          Effect.annotateLogs({ path: tmpPath, cause: err.message }),
        ),
      ),
    );

    return fs.makeDirectory(dir).pipe(
      Effect.zipRight(
        fs.writeText(tmpPath, json).pipe(
          Effect.zipRight(fs.rename(tmpPath, path)),
          Effect.onError(() => cleanup),
        ),
      ),
      Effect.tap(() =>
        Effect.logDebug("Saved tokenizer artifacts").pipe(
          Effect.annotateLogs({ path, vocabSize: Object.keys(artifacts.stoi).length }),
        ),
      ),
    );
  });
}

/** Read and validate artifacts from `path`. */
export function loadArtifacts(path: string): Effect.Effect<TokenizerArtifacts, RestoreError, FileSystemService> {
  return Effect.flatMap(FileSystemService, (fs) => fs.readText(path)).pipe(
    Effect.flatMap((raw) => parseArtifacts(raw, path)),
  );
}
