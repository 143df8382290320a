import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { buildVocab, countChars, findMismatch, invert, rankChars } from "@charvocab/tokenizers";

describe("countChars", () => {
  it("counts code points", () => {
    expect([...countChars("abca😀")]).toEqual([
      ["a", 2],
      ["b", 1],
      ["c", 1],
      ["😀", 1],
    ]);
  });
});

describe("rankChars", () => {
  it("sorts by descending count, then ascending code point", () => {
    expect(rankChars(countChars("cbbaaa d"), 1)).toEqual(["a", "b", " ", "c", "d"]);
  });

  it("compares code points rather than UTF-16 units", () => {
    // U+FF21 sorts before U+1F600 even though its UTF-16 unit is larger.
    expect(rankChars(countChars("😀Ａ"), 1)).toEqual(["Ａ", "😀"]);
  });

  it("drops characters below the threshold", () => {
    expect(rankChars(countChars("aaabbc"), 2)).toEqual(["a", "b"]);
    expect(rankChars(countChars("aaabbc"), 4)).toEqual([]);
  });
});

describe("buildVocab", () => {
  it("places specials before characters", () => {
    const vocab = Effect.runSync(buildVocab("ba", { includeSpecials: true, minFreq: 1 }));
    expect(vocab.padId).toBe(0);
    expect(vocab.unkId).toBe(1);
    expect([...vocab.itos]).toEqual([
      [0, "<PAD>"],
      [1, "<UNK>"],
      [2, "a"],
      [3, "b"],
    ]);
  });

  it("starts character ids at 0 without specials", () => {
    const vocab = Effect.runSync(buildVocab("ba", { includeSpecials: false, minFreq: 1 }));
    expect(vocab.padId).toBeNull();
    expect([...vocab.stoi]).toEqual([["a", 0], ["b", 1]]);
  });

  it("rejects an empty corpus without specials", () => {
    const err = Effect.runSync(Effect.flip(buildVocab("", { includeSpecials: false, minFreq: 1 })));
    expect(err._tag).toBe("EmptyVocabulary");
  });

  it("rejects a non-positive or fractional minFreq", () => {
    for (const minFreq of [0, -1, 1.5, Number.NaN]) {
      const err = Effect.runSync(Effect.flip(buildVocab("abc", { includeSpecials: true, minFreq })));
      expect(err._tag).toBe("InvalidInput");
    }
  });
});

describe("findMismatch", () => {
  it("accepts a bijection", () => {
    const stoi = new Map([["a", 0], ["b", 1]]);
    expect(findMismatch(stoi, invert(stoi))).toBeUndefined();
  });

  it("reports the first entry that does not invert", () => {
    const stoi = new Map([["a", 0], ["b", 1]]);
    const itos = new Map([[0, "a"], [1, "c"]]);
    expect(findMismatch(stoi, itos)).toBe('"b" -> 1 -> "c"');
  });

  it("reports duplicate ids collapsed by inversion", () => {
    const stoi = new Map([["a", 0], ["b", 0]]);
    expect(findMismatch(stoi, invert(stoi))).toBe('"a" -> 0 -> "b"');
  });

  it("reports extra inverse entries", () => {
    const stoi = new Map([["a", 0]]);
    const itos = new Map([[0, "a"], [1, "b"]]);
    expect(findMismatch(stoi, itos)).toBe('1 -> "b" -> undefined');
  });
});
