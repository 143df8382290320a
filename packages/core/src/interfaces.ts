/**
 * Subsystem interfaces (ports). Every subsystem implements one of these.
 */
import { Context, Effect } from "effect";
import type {
  BuildError,
  CorruptState,
  DecodeError,
  EncodeError,
  FileNotFound,
  FitError,
  IOFailure,
  NotFitted,
  PersistError,
  RestoreError,
} from "./errors.js";

// ── Tokenizer ──────────────────────────────────────────────────────────────

/** Version tag written into every persisted vocabulary. */
export const ARTIFACTS_VERSION = "char-tokenizer.v1";

/** In-memory form of a persisted vocabulary. */
export interface TokenizerArtifacts {
  readonly version: typeof ARTIFACTS_VERSION;
  readonly stoi: Readonly<Record<string, number>>;
  readonly padId: number | null;
  readonly unkId: number | null;
}

/**
 * Where the training text comes from: inline text, one file, or an ordered
 * list of files joined with a newline.
 */
export type CorpusSource =
  | string
  | { readonly path: string }
  | { readonly paths: readonly string[] };

export interface FitOptions {
  /** Reserve `<PAD>` (id 0) and `<UNK>` (id 1). Default true. */
  readonly includeSpecials?: boolean;
  /** Characters seen fewer times than this are dropped. Default 1. */
  readonly minFreq?: number;
}

export interface EncodeOptions {
  /** Fail on unknown characters instead of substituting `<UNK>`. Default false. */
  readonly strict?: boolean;
}

export interface DecodeOptions {
  /** Drop pad and unknown ids from the output. Default true. */
  readonly skipSpecials?: boolean;
}

export interface Tokenizer {
  readonly name: string;
  readonly fitted: boolean;
  fit(source: CorpusSource, options?: FitOptions): Effect.Effect<TokenizerArtifacts, FitError, FileSystemService>;
  build(corpus: string, options?: FitOptions): Effect.Effect<TokenizerArtifacts, BuildError>;
  encode(text: string, options?: EncodeOptions): Effect.Effect<Int32Array, EncodeError>;
  decode(tokens: ArrayLike<number>, options?: DecodeOptions): Effect.Effect<string, DecodeError>;
  vocabSize(): Effect.Effect<number, NotFitted>;
  toArtifacts(): Effect.Effect<TokenizerArtifacts, NotFitted>;
  loadArtifacts(artifacts: TokenizerArtifacts): Effect.Effect<void, CorruptState>;
  persist(path: string): Effect.Effect<void, PersistError, FileSystemService>;
  restore(path: string): Effect.Effect<void, RestoreError, FileSystemService>;
}

// ── File system ────────────────────────────────────────────────────────────

export interface FileSystem {
  /** True when `path` names an existing regular file. */
  isFile(path: string): Effect.Effect<boolean, IOFailure>;
  readText(path: string): Effect.Effect<string, FileNotFound | IOFailure>;
  writeText(path: string, data: string): Effect.Effect<void, IOFailure>;
  /** Replace `to` with `from` in a single step. */
  rename(from: string, to: string): Effect.Effect<void, IOFailure>;
  remove(path: string): Effect.Effect<void, IOFailure>;
  /** Recursive; succeeds when the directory already exists. */
  makeDirectory(path: string): Effect.Effect<void, IOFailure>;
}

export class FileSystemService extends Context.Tag("FileSystemService")<
  FileSystemService,
  FileSystem
>() {}
