/**
 * Frequency-ranked vocabulary construction.
 *
 * Characters are counted over the whole corpus, filtered by a minimum
 * frequency, and ranked by descending count with ties broken by ascending
 * code point, so the same corpus always yields the same ids.
 */
import { Effect } from "effect";
import { EmptyVocabulary, InternalInconsistency, InvalidInput } from "@charvocab/core";

export const PAD_TOKEN = "<PAD>";
export const UNK_TOKEN = "<UNK>";

export interface Vocab {
  readonly stoi: ReadonlyMap<string, number>;
  readonly itos: ReadonlyMap<number, string>;
  readonly padId: number | null;
  readonly unkId: number | null;
}

export interface VocabOptions {
  readonly includeSpecials: boolean;
  readonly minFreq: number;
}

/** Occurrences of every distinct code point in `corpus`. */
export function countChars(corpus: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const ch of corpus) {
    counts.set(ch, (counts.get(ch) ?? 0) + 1);
  }
  return counts;
}

function codePoint(ch: string): number {
  return ch.codePointAt(0) ?? 0;
}

/** Characters with `count >= minFreq`, most frequent first. */
export function rankChars(counts: ReadonlyMap<string, number>, minFreq: number): string[] {
  const kept: [string, number][] = [];
  for (const [ch, count] of counts) {
    if (count >= minFreq) kept.push([ch, count]);
  }
  kept.sort((a, b) => b[1] - a[1] || codePoint(a[0]) - codePoint(b[0]));
  return kept.map(([ch]) => ch);
}

/** Inverse of `stoi`. Duplicate ids collapse, which `findMismatch` reports. */
export function invert(stoi: ReadonlyMap<string, number>): Map<number, string> {
  const itos = new Map<number, string>();
  for (const [s, i] of stoi) itos.set(i, s);
  return itos;
}

/**
 * First entry at which the two maps fail to invert each other, or undefined
 * when they form a bijection.
 */
export function findMismatch(
  stoi: ReadonlyMap<string, number>,
  itos: ReadonlyMap<number, string>,
): string | undefined {
  for (const [s, i] of stoi) {
    const back = itos.get(i);
    if (back !== s) {
      return `${JSON.stringify(s)} -> ${i} -> ${back === undefined ? "nothing" : JSON.stringify(back)}`;
    }
  }
  for (const [i, s] of itos) {
    if (stoi.get(s) !== i) {
      return `${i} -> ${JSON.stringify(s)} -> ${String(stoi.get(s))}`;
    }
  }
  if (stoi.size !== itos.size) {
    return `stoi has ${stoi.size} entries but itos has ${itos.size}`;
  }
  return undefined;
}

/** Build a vocabulary from an already-assembled corpus string. */
export function buildVocab(
  corpus: string,
  options: VocabOptions,
): Effect.Effect<Vocab, InvalidInput | EmptyVocabulary | InternalInconsistency> {
  return Effect.suspend((): Effect.Effect<Vocab, InvalidInput | EmptyVocabulary | InternalInconsistency> => {
    const { includeSpecials, minFreq } = options;
    if (!Number.isInteger(minFreq) || minFreq < 1) {
      return Effect.fail(
        new InvalidInput({ message: `minFreq must be a positive integer, got ${minFreq}`, entry: minFreq }),
      );
    }

    const chars = rankChars(countChars(corpus), minFreq);
    if (chars.length === 0 && !includeSpecials) {
      return Effect.fail(
        new EmptyVocabulary({
          message: `No characters occur at least ${minFreq} time(s); cannot build a vocabulary without specials`,
          minFreq,
        }),
      );
    }

    const stoi = new Map<string, number>();
    let padId: number | null = null;
    let unkId: number | null = null;
    if (includeSpecials) {
      padId = stoi.size;
      stoi.set(PAD_TOKEN, padId);
      unkId = stoi.size;
      stoi.set(UNK_TOKEN, unkId);
    }
    for (const ch of chars) {
      if (!stoi.has(ch)) stoi.set(ch, stoi.size);
    }

    const itos = invert(stoi);
    const mismatch = findMismatch(stoi, itos);
    if (stoi.size === 0 || mismatch !== undefined) {
      return Effect.fail(
        new InternalInconsistency({
          message: `Vocabulary mappings do not invert after build: ${mismatch ?? "empty vocabulary"}`,
        }),
      );
    }

    return Effect.succeed({ stoi, itos, padId, unkId } satisfies Vocab);
  });
}
