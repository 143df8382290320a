/**
 * Corpus assembly: turns a `CorpusSource` into one training string.
 */
import { Effect } from "effect";
import {
  FileSystemService,
  InvalidInput,
  type CorpusError,
  type CorpusSource,
} from "@charvocab/core";

/** Separator placed between files of a multi-file corpus. */
export const SOURCE_SEPARATOR = "\n";

function readFileEntry(
  path: unknown,
  label: string,
): Effect.Effect<string, CorpusError, FileSystemService> {
  if (typeof path !== "string" || path.length === 0) {
    return Effect.fail(
      new InvalidInput({ message: `Expected a file path string for ${label}, got: ${JSON.stringify(path)}`, entry: path }),
    );
  }
  const file = path;
  return Effect.flatMap(FileSystemService, (fs) =>
    fs.isFile(file).pipe(
      Effect.flatMap((exists): Effect.Effect<string, CorpusError> =>
        exists
          ? fs.readText(file)
          : Effect.fail(new InvalidInput({ message: `No readable file at ${label}: "${file}"`, entry: file })),
      ),
    ),
  );
}

/**
 * Resolve a corpus source to its text.
 *
 * Multi-file corpora keep the given order and are joined with a newline.
 */
export function readCorpus(source: CorpusSource): Effect.Effect<string, CorpusError, FileSystemService> {
  if (typeof source === "string") {
    return Effect.succeed(source);
  }
  if ("path" in source) {
    return readFileEntry(source.path, "path");
  }
  if (source.paths.length === 0) {
    return Effect.fail(new InvalidInput({ message: "No files provided to build a corpus", entry: source.paths }));
  }
  return Effect.forEach(source.paths, (p, i) => readFileEntry(p, `paths[${i}]`)).pipe(
    Effect.map((parts) => parts.join(SOURCE_SEPARATOR)),
  );
}
