/**
 * Command: charvocab tokenizer build
 */
import { Effect } from "effect";
import type {
  CorpusSource,
  FileSystemService,
  FitError,
  PersistError,
  TokenizerArtifacts,
} from "@charvocab/core";
import { runWith, withSpan } from "@charvocab/effect-runtime";
import { parseKV, loadConfig, requireArg, intArg, strArg, boolArg, corpusArg } from "../parse.js";
import { resolveTokenizer } from "../resolve.js";
import { resolveLogLevel } from "../config.js";

export interface BuildOptions {
  readonly type: string;
  readonly source: CorpusSource;
  readonly out: string;
  readonly includeSpecials: boolean;
  readonly minFreq: number;
}

/** Fit a fresh tokenizer and persist it to `out`. */
export function buildTokenizer(
  opts: BuildOptions,
): Effect.Effect<TokenizerArtifacts, FitError | PersistError, FileSystemService> {
  return withSpan(
    "tokenizer.build",
    resolveTokenizer(opts.type).pipe(
      Effect.flatMap((tokenizer) =>
        tokenizer
          .fit(opts.source, { includeSpecials: opts.includeSpecials, minFreq: opts.minFreq })
          .pipe(Effect.tap(() => tokenizer.persist(opts.out))),
      ),
    ),
  );
}

export async function tokenizerBuildCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const opts: BuildOptions = {
    type: strArg(kv, "type", "char"),
    source: corpusArg(kv),
    out: requireArg(kv, "out", "output path for the vocabulary"),
    includeSpecials: boolArg(kv, "specials", true),
    minFreq: intArg(kv, "minFreq", 1),
  };
  const from = typeof opts.source === "string" ? "inline text" : "path" in opts.source ? opts.source.path : opts.source.paths.join(", ");

  const artifacts = await runWith(
    Effect.logInfo(`Building ${opts.type} tokenizer from ${from}`).pipe(
      Effect.annotateLogs({ specials: opts.includeSpecials, minFreq: opts.minFreq }),
      Effect.zipRight(buildTokenizer(opts)),
    ),
    resolveLogLevel(kv),
  );

  console.log(`Tokenizer built: vocab_size=${Object.keys(artifacts.stoi).length}`);
  console.log(`Artifacts saved to ${opts.out}`);
}
