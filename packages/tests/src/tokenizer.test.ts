import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { CharTokenizer, PAD_TOKEN, UNK_TOKEN } from "@charvocab/tokenizers";
import { MemoryFileSystem } from "./memory-fs.js";

function fitted(corpus: string, includeSpecials = true, minFreq = 1): CharTokenizer {
  const tok = new CharTokenizer();
  Effect.runSync(tok.build(corpus, { includeSpecials, minFreq }));
  return tok;
}

describe("CharTokenizer", () => {
  it("encode/decode roundtrip", () => {
    const tok = fitted("hello\n");
    const ids = Effect.runSync(tok.encode("hello\n"));
    expect(Effect.runSync(tok.decode(ids))).toBe("hello\n");
  });

  it("orders ids by frequency, then by code point, after the specials", () => {
    const tok = fitted("hello\n");
    expect([...tok.stoi]).toEqual([
      [PAD_TOKEN, 0],
      [UNK_TOKEN, 1],
      ["l", 2],
      ["\n", 3],
      ["e", 4],
      ["h", 5],
      ["o", 6],
    ]);
    expect(Array.from(Effect.runSync(tok.encode("hello\n")))).toEqual([5, 4, 2, 2, 6, 3]);
    expect(Effect.runSync(tok.vocabSize())).toBe(7);
  });

  it("reserves pad 0 and unk 1 and breaks ties alphabetically", () => {
    const tok = fitted("ab");
    expect(tok.padId).toBe(0);
    expect(tok.unkId).toBe(1);
    expect(tok.stoi.get("a")).toBe(2);
    expect(tok.stoi.get("b")).toBe(3);
  });

  it("skips specials on decode by default and renders their markers otherwise", () => {
    const tok = fitted("ab");
    const sample = [0, 2, 1, 3];
    expect(Effect.runSync(tok.decode(sample, { skipSpecials: true }))).toBe("ab");
    expect(Effect.runSync(tok.decode(sample))).toBe("ab");
    expect(Effect.runSync(tok.decode(sample, { skipSpecials: false }))).toBe("<PAD>a<UNK>b");
  });

  it("fails on ids outside the vocabulary", () => {
    const tok = fitted("ab");
    const err = Effect.runSync(Effect.flip(tok.decode([2, 999999])));
    expect(err._tag).toBe("UnknownId");
    if (err._tag === "UnknownId") {
      expect(err.id).toBe(999999);
      expect(err.position).toBe(1);
    }
  });

  it("substitutes <UNK> for unknown characters when not strict", () => {
    const tok = fitted("ab");
    expect(Array.from(Effect.runSync(tok.encode("abz")))).toEqual([2, 3, 1]);
  });

  it("fails on unknown characters in strict mode", () => {
    const tok = fitted("ab");
    const err = Effect.runSync(Effect.flip(tok.encode("abz", { strict: true })));
    expect(err._tag).toBe("UnknownCharacter");
    if (err._tag === "UnknownCharacter") {
      expect(err.char).toBe("z");
      expect(err.position).toBe(2);
    }
  });

  it("behaves as strict when there is no unknown id", () => {
    const tok = fitted("ab", false);
    expect(tok.padId).toBeNull();
    expect(tok.unkId).toBeNull();
    expect([...tok.stoi]).toEqual([["a", 0], ["b", 1]]);

    const err = Effect.runSync(Effect.flip(tok.encode("abc")));
    expect(err._tag).toBe("UnknownCharacter");
  });

  it("renders every id when the vocabulary has no specials", () => {
    const tok = fitted("ab", false);
    expect(Effect.runSync(tok.decode([0, 1, 0]))).toBe("aba");
  });

  it("counts astral characters as one character", () => {
    const tok = fitted("a😀b");
    expect(tok.stoi.get("😀")).toBe(4);
    expect(Array.from(Effect.runSync(tok.encode("😀a")))).toEqual([4, 2]);

    const err = Effect.runSync(Effect.flip(tok.encode("a😀x", { strict: true })));
    expect(err._tag === "UnknownCharacter" && err.position).toBe(2);
  });

  it("drops characters below minFreq but keeps specials", () => {
    const tok = fitted("aaabbc", true, 2);
    expect(Effect.runSync(tok.vocabSize())).toBe(4);
    expect(tok.stoi.has("c")).toBe(false);
    expect(Array.from(Effect.runSync(tok.encode("abc")))).toEqual([2, 3, 1]);
  });

  it("treats a specials-only vocabulary as fitted", () => {
    const tok = fitted("", true);
    expect(tok.fitted).toBe(true);
    expect(Effect.runSync(tok.vocabSize())).toBe(2);
    expect(Array.from(Effect.runSync(tok.encode("q")))).toEqual([1]);
    expect(Effect.runSync(tok.decode([1, 0]))).toBe("");
  });

  it("rejects an empty vocabulary without specials", () => {
    const err = Effect.runSync(Effect.flip(new CharTokenizer().build("abc", { includeSpecials: false, minFreq: 5 })));
    expect(err._tag).toBe("EmptyVocabulary");
  });

  it("rejects refitting", () => {
    const tok = fitted("ab");
    const err = Effect.runSync(Effect.flip(tok.build("xyz")));
    expect(err._tag).toBe("AlreadyFitted");
    expect(tok.stoi.has("x")).toBe(false);
  });

  it("rejects refitting before reading any file", async () => {
    const fs = new MemoryFileSystem().failOn("isFile");
    const tok = fitted("ab");
    const err = await Effect.runPromise(
      tok.fit({ path: "/corpus.txt" }).pipe(Effect.flip, Effect.provide(fs.layer)),
    );
    expect(err._tag).toBe("AlreadyFitted");
  });

  it("rejects every read operation before fitting", () => {
    const tok = new CharTokenizer();
    expect(tok.fitted).toBe(false);
    expect(Effect.runSync(Effect.flip(tok.encode("a")))._tag).toBe("NotFitted");
    expect(Effect.runSync(Effect.flip(tok.decode([0])))._tag).toBe("NotFitted");
    expect(Effect.runSync(Effect.flip(tok.vocabSize()))._tag).toBe("NotFitted");
    expect(Effect.runSync(Effect.flip(tok.toArtifacts()))._tag).toBe("NotFitted");
  });

  it("is deterministic across instances", () => {
    const corpus = "the quick brown fox jumps over the lazy dog\n";
    expect([...fitted(corpus).stoi]).toEqual([...fitted(corpus).stoi]);
  });

  it("keeps stoi and itos exact inverses", () => {
    const tok = fitted("abracadabra, said the magician\n");
    expect(tok.itos.size).toBe(tok.stoi.size);
    for (const [ch, id] of tok.stoi) expect(tok.itos.get(id)).toBe(ch);
    for (const [id, ch] of tok.itos) expect(tok.stoi.get(ch)).toBe(id);
  });

  it("round-trips any text drawn from the corpus", () => {
    const corpus = "Sing, O goddess, the anger of Achilles\n";
    const tok = fitted(corpus);
    for (const text of ["", "Sing", "goddess, the", corpus, "seeing\n"]) {
      expect(Effect.runSync(tok.encode(text).pipe(Effect.flatMap((ids) => tok.decode(ids))))).toBe(text);
    }
  });

  it("fits from a list of files joined by newlines", async () => {
    const fs = new MemoryFileSystem({ "/c/a.txt": "ab", "/c/b.txt": "ab" });
    const tok = new CharTokenizer();
    await Effect.runPromise(tok.fit({ paths: ["/c/a.txt", "/c/b.txt"] }).pipe(Effect.provide(fs.layer)));
    expect([...tok.stoi]).toEqual([
      [PAD_TOKEN, 0],
      [UNK_TOKEN, 1],
      ["a", 2],
      ["b", 3],
      ["\n", 4],
    ]);
  });

  it("returns artifacts describing the fitted vocabulary", () => {
    const tok = new CharTokenizer();
    const artifacts = Effect.runSync(tok.build("ba", { includeSpecials: false }));
    expect(artifacts).toEqual({ version: "char-tokenizer.v1", stoi: { a: 0, b: 1 }, padId: null, unkId: null });
    expect(Effect.runSync(tok.toArtifacts())).toEqual(artifacts);
  });
});
