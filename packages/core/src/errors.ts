/**
 * Typed error classes for every tokenizer failure.
 *
 * Callers discriminate on `_tag` (`Effect.catchTag`, `Either`), never on the
 * message text.
 */
import { Data } from "effect";

export class AlreadyFitted extends Data.TaggedError("AlreadyFitted")<{
  readonly message: string;
}> {}

export class NotFitted extends Data.TaggedError("NotFitted")<{
  readonly message: string;
}> {}

/** Malformed or missing corpus source, or a bad fit option. */
export class InvalidInput extends Data.TaggedError("InvalidInput")<{
  readonly message: string;
  readonly entry?: unknown;
}> {}

export class EmptyVocabulary extends Data.TaggedError("EmptyVocabulary")<{
  readonly message: string;
  readonly minFreq: number;
}> {}

/** The freshly built mappings do not invert. Signals a bug in the builder. */
export class InternalInconsistency extends Data.TaggedError("InternalInconsistency")<{
  readonly message: string;
}> {}

export class UnknownCharacter extends Data.TaggedError("UnknownCharacter")<{
  readonly message: string;
  readonly char: string;
  readonly position: number;
}> {}

export class UnknownId extends Data.TaggedError("UnknownId")<{
  readonly message: string;
  readonly id: number;
  readonly position: number;
}> {}

export class CorruptState extends Data.TaggedError("CorruptState")<{
  readonly message: string;
  readonly path?: string;
  readonly cause?: unknown;
}> {}

export class FileNotFound extends Data.TaggedError("FileNotFound")<{
  readonly message: string;
  readonly path: string;
}> {}

export class IOFailure extends Data.TaggedError("IOFailure")<{
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}> {}

// ── Unions per operation ───────────────────────────────────────────────────

export type CorpusError = InvalidInput | FileNotFound | IOFailure;

export type BuildError = AlreadyFitted | InvalidInput | EmptyVocabulary | InternalInconsistency;

export type FitError = BuildError | CorpusError;

export type EncodeError = NotFitted | UnknownCharacter;

export type DecodeError = NotFitted | UnknownId;

export type PersistError = NotFitted | IOFailure;

export type RestoreError = FileNotFound | IOFailure | CorruptState;
