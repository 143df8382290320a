/**
 * @charvocab/tokenizers -- the character-level tokenizer and its helpers.
 *
 * Provides the vocabulary builder, corpus reader, persistence helpers and a
 * pre-populated registry so callers can look tokenizers up by name.
 */
import { Registry, type Tokenizer } from "@charvocab/core";
import { CharTokenizer } from "./char.js";

// ── Re-exports ────────────────────────────────────────────────────────────
export { CharTokenizer } from "./char.js";
export { readCorpus, SOURCE_SEPARATOR } from "./corpus.js";
export {
  PAD_TOKEN,
  UNK_TOKEN,
  buildVocab,
  countChars,
  rankChars,
  invert,
  findMismatch,
  type Vocab,
  type VocabOptions,
} from "./vocab.js";
export {
  TEMP_PREFIX,
  MAX_TOKEN_ID,
  serializeArtifacts,
  parseArtifacts,
  vocabFromArtifacts,
  saveArtifacts,
  loadArtifacts,
} from "./persist.js";

// ── Tokenizer registry ────────────────────────────────────────────────────

/**
 * Global tokenizer registry.
 *
 * Pre-registered implementations:
 * - `"char"` -- character-level tokenizer
 *
 * Usage:
 * ```ts
 * const tok = yield* tokenizerRegistry.get("char");
 * ```
 */
export const tokenizerRegistry = new Registry<Tokenizer>("tokenizer");

tokenizerRegistry.register("char", () => new CharTokenizer());
