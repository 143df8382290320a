/**
 * Resolve pluggable implementations from CLI args.
 */
import type { Effect } from "effect";
import type { InvalidInput, Tokenizer } from "@charvocab/core";
import { tokenizerRegistry } from "@charvocab/tokenizers";

export function resolveTokenizer(name: string): Effect.Effect<Tokenizer, InvalidInput> {
  return tokenizerRegistry.get(name);
}

export function listImplementations(): string {
  return `Tokenizers: ${tokenizerRegistry.list().join(", ")}`;
}
