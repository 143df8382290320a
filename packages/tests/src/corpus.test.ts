import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import type { CorpusError, CorpusSource, FileSystemService } from "@charvocab/core";
import { readCorpus } from "@charvocab/tokenizers";
import { MemoryFileSystem } from "./memory-fs.js";

function files(): MemoryFileSystem {
  return new MemoryFileSystem({ "/c/a.txt": "first", "/c/b.txt": "second\n" });
}

const read = (fs: MemoryFileSystem, source: CorpusSource) =>
  Effect.runPromise(readCorpus(source).pipe(Effect.provide(fs.layer)));

const failure = (fs: MemoryFileSystem, effect: Effect.Effect<string, CorpusError, FileSystemService>) =>
  Effect.runPromise(effect.pipe(Effect.flip, Effect.provide(fs.layer)));

describe("readCorpus", () => {
  it("returns inline text as-is", async () => {
    expect(await read(files(), "/c/a.txt is just text here")).toBe("/c/a.txt is just text here");
  });

  it("reads a single file", async () => {
    expect(await read(files(), { path: "/c/b.txt" })).toBe("second\n");
  });

  it("joins several files with a newline, in order", async () => {
    expect(await read(files(), { paths: ["/c/b.txt", "/c/a.txt"] })).toBe("second\n\nfirst");
  });

  it("rejects an empty file list", async () => {
    const err = await failure(files(), readCorpus({ paths: [] }));
    expect(err._tag).toBe("InvalidInput");
    expect(err.message).toBe("No files provided to build a corpus");
  });

  it("names the missing entry", async () => {
    const err = await failure(files(), readCorpus({ paths: ["/c/a.txt", "/c/missing.txt"] }));
    expect(err._tag).toBe("InvalidInput");
    expect(err.message).toBe('No readable file at paths[1]: "/c/missing.txt"');
  });

  it("rejects a missing single file", async () => {
    const err = await failure(files(), readCorpus({ path: "/c/missing.txt" }));
    expect(err._tag).toBe("InvalidInput");
  });

  it("rejects entries that are not path strings", async () => {
    const paths: string[] = JSON.parse('["/c/a.txt", 7]');
    const err = await failure(files(), readCorpus({ paths }));
    expect(err._tag).toBe("InvalidInput");
    expect(err.message).toBe("Expected a file path string for paths[1], got: 7");

    const empty = await failure(files(), readCorpus({ path: "" }));
    expect(empty._tag).toBe("InvalidInput");
  });

  it("surfaces read failures unchanged", async () => {
    const fs = files().failOn("readText", (p) => p === "/c/b.txt");
    const err = await failure(fs, readCorpus({ paths: ["/c/a.txt", "/c/b.txt"] }));
    expect(err._tag).toBe("IOFailure");
    expect(err.message).toBe("Injected readText failure");
  });
});
