/**
 * Character-level tokenizer.
 *
 * Ranks every character of the corpus by frequency (ties by code point),
 * optionally reserves `<PAD>` and `<UNK>` ahead of them, and maps each
 * character to its rank. A vocabulary is fixed once fitted; the only way to
 * replace it is `restore`/`loadArtifacts`.
 */
import { Effect } from "effect";
import {
  ARTIFACTS_VERSION,
  AlreadyFitted,
  CorruptState,
  NotFitted,
  UnknownCharacter,
  UnknownId,
  type BuildError,
  type CorpusSource,
  type DecodeOptions,
  type EncodeOptions,
  type FileSystemService,
  type FitError,
  type FitOptions,
  type PersistError,
  type RestoreError,
  type Tokenizer,
  type TokenizerArtifacts,
} from "@charvocab/core";
import { readCorpus } from "./corpus.js";
import { buildVocab, type Vocab } from "./vocab.js";
import { loadArtifacts, saveArtifacts, vocabFromArtifacts } from "./persist.js";

export class CharTokenizer implements Tokenizer {
  readonly name = "char";

  /** char -> token id */
  private _stoi: ReadonlyMap<string, number> = new Map();

  /** token id -> char */
  private _itos: ReadonlyMap<number, string> = new Map();

  private _padId: number | null = null;
  private _unkId: number | null = null;

  /** Construct a tokenizer from a file written by `persist`. */
  static fromFile(path: string): Effect.Effect<CharTokenizer, RestoreError, FileSystemService> {
    return Effect.suspend(() => {
      const tok = new CharTokenizer();
      return tok.restore(path).pipe(Effect.as(tok));
    });
  }

  // ── State ────────────────────────────────────────────────────────────────

  get fitted(): boolean {
    return this._stoi.size > 0 && this._itos.size > 0;
  }

  get padId(): number | null {
    return this._padId;
  }

  get unkId(): number | null {
    return this._unkId;
  }

  get stoi(): ReadonlyMap<string, number> {
    return this._stoi;
  }

  get itos(): ReadonlyMap<number, string> {
    return this._itos;
  }

  /** Number of entries in the vocabulary, specials included. */
  vocabSize(): Effect.Effect<number, NotFitted> {
    return this._requireFitted("vocabSize").pipe(Effect.map(() => this._stoi.size));
  }

  // ── Fitting ──────────────────────────────────────────────────────────────

  /**
   * Build the vocabulary from inline text, a file, or a list of files.
   *
   * Refitting is rejected before any file is read.
   */
  fit(
    source: CorpusSource,
    options?: FitOptions,
  ): Effect.Effect<TokenizerArtifacts, FitError, FileSystemService> {
    return this._requireUnfitted().pipe(
      Effect.zipRight(readCorpus(source)),
      Effect.flatMap((corpus) => this.build(corpus, options)),
    );
  }

  /** Build the vocabulary from an assembled corpus string. */
  build(corpus: string, options: FitOptions = {}): Effect.Effect<TokenizerArtifacts, BuildError> {
    const includeSpecials = options.includeSpecials ?? true;
    const minFreq = options.minFreq ?? 1;
    return this._requireUnfitted().pipe(
      Effect.zipRight(buildVocab(corpus, { includeSpecials, minFreq })),
      Effect.map((vocab) => {
        this._setVocab(vocab);
        return this._artifacts();
      }),
      Effect.tap((artifacts) =>
        Effect.logDebug("Fitted char tokenizer").pipe(
          Effect.annotateLogs({
            corpusChars: corpus.length,
            vocabSize: this._stoi.size,
            specials: artifacts.padId !== null,
            minFreq,
          }),
        ),
      ),
    );
  }

  // ── Encode / decode ──────────────────────────────────────────────────────

  /**
   * Encode a string into one token id per character.
   *
   * Unknown characters become `<UNK>` unless `strict` is set or the
   * vocabulary has no unknown id, in which case they fail.
   */
  encode(text: string, options: EncodeOptions = {}): Effect.Effect<Int32Array, NotFitted | UnknownCharacter> {
    return this._requireFitted("encode").pipe(
      Effect.zipRight(
        Effect.suspend((): Effect.Effect<Int32Array, UnknownCharacter> => {
          const fallback = options.strict ? null : this._unkId;
          const ids: number[] = [];
          let position = 0;
          for (const ch of text) {
            const id = this._stoi.get(ch) ?? fallback;
            if (id === null) {
              return Effect.fail(
                new UnknownCharacter({
                  message: `Character ${JSON.stringify(ch)} at position ${position} is not in the vocabulary`,
                  char: ch,
                  position,
                }),
              );
            }
            ids.push(id);
            position++;
          }
          return Effect.succeed(new Int32Array(ids));
        }),
      ),
    );
  }

  /**
   * Decode token ids back into a string.
   *
   * With `skipSpecials` (the default) pad and unknown ids are dropped, as
   * long as the vocabulary defines both. Ids outside the vocabulary fail.
   */
  decode(tokens: ArrayLike<number>, options: DecodeOptions = {}): Effect.Effect<string, NotFitted | UnknownId> {
    return this._requireFitted("decode").pipe(
      Effect.zipRight(
        Effect.suspend((): Effect.Effect<string, UnknownId> => {
          const skip = (options.skipSpecials ?? true) && this._padId !== null && this._unkId !== null;
          const parts: string[] = [];
          for (let i = 0; i < tokens.length; i++) {
            const id = tokens[i];
            if (skip && (id === this._padId || id === this._unkId)) continue;
            const ch = this._itos.get(id);
            if (ch === undefined) {
              return Effect.fail(
                new UnknownId({ message: `Token id ${id} at position ${i} is not in the vocabulary`, id, position: i }),
              );
            }
            parts.push(ch);
          }
          return Effect.succeed(parts.join(""));
        }),
      ),
    );
  }

  // ── Artifacts and persistence ────────────────────────────────────────────

  toArtifacts(): Effect.Effect<TokenizerArtifacts, NotFitted> {
    return this._requireFitted("toArtifacts").pipe(Effect.map(() => this._artifacts()));
  }

  /**
   * Replace the current state with previously saved artifacts.
   *
   * The state is only swapped after the artifacts validate.
   */
  loadArtifacts(artifacts: TokenizerArtifacts): Effect.Effect<void, CorruptState> {
    return vocabFromArtifacts(artifacts).pipe(Effect.map((vocab) => this._setVocab(vocab)));
  }

  /** Atomically write the vocabulary to `path`. */
  persist(path: string): Effect.Effect<void, PersistError, FileSystemService> {
    return this.toArtifacts().pipe(Effect.flatMap((artifacts) => saveArtifacts(path, artifacts)));
  }

  /** Load a vocabulary from `path`, overwriting any current state. */
  restore(path: string): Effect.Effect<void, RestoreError, FileSystemService> {
    return loadArtifacts(path).pipe(
      Effect.flatMap((artifacts) =>
        this.loadArtifacts(artifacts).pipe(
          Effect.mapError((err) => new CorruptState({ message: `Invalid tokenizer file "${path}": ${err.message}`, path })),
        ),
      ),
      Effect.tap(() =>
        Effect.logDebug("Restored char tokenizer").pipe(Effect.annotateLogs({ path, vocabSize: this._stoi.size })),
      ),
    );
  }

  // ── Internal ─────────────────────────────────────────────────────────────

  private _requireFitted(operation: string): Effect.Effect<void, NotFitted> {
    return Effect.suspend((): Effect.Effect<void, NotFitted> =>
      this.fitted
        ? Effect.void
        : Effect.fail(new NotFitted({ message: `Tokenizer not fitted. Call fit(...) or restore(...) before ${operation}().` })),
    );
  }

  private _requireUnfitted(): Effect.Effect<void, AlreadyFitted> {
    return Effect.suspend((): Effect.Effect<void, AlreadyFitted> =>
      this.fitted
        ? Effect.fail(
            new AlreadyFitted({ message: "Tokenizer is already fitted. Create a new instance to fit again." }),
          )
        : Effect.void,
    );
  }

  private _artifacts(): TokenizerArtifacts {
    return {
      version: ARTIFACTS_VERSION,
      stoi: Object.fromEntries(this._stoi),
      padId: this._padId,
      unkId: this._unkId,
    };
  }

  /** Swap in a validated vocabulary. */
  private _setVocab(vocab: Vocab): void {
    this._stoi = vocab.stoi;
    this._itos = vocab.itos;
    this._padId = vocab.padId;
    this._unkId = vocab.unkId;
  }
}
