/**
 * Command: charvocab info
 */
import { Effect } from "effect";
import type { FileSystemService, NotFitted, RestoreError } from "@charvocab/core";
import { CharTokenizer } from "@charvocab/tokenizers";
import { runWith } from "@charvocab/effect-runtime";
import { parseKV, loadConfig, requireArg } from "../parse.js";
import { resolveLogLevel } from "../config.js";

export interface TokenizerInfo {
  readonly vocabSize: number;
  readonly padId: number | null;
  readonly unkId: number | null;
}

export function tokenizerInfo(
  tokenizerPath: string,
): Effect.Effect<TokenizerInfo, RestoreError | NotFitted, FileSystemService> {
  return CharTokenizer.fromFile(tokenizerPath).pipe(
    Effect.flatMap((tok) =>
      tok.vocabSize().pipe(Effect.map((vocabSize) => ({ vocabSize, padId: tok.padId, unkId: tok.unkId }))),
    ),
  );
}

export async function infoCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const info = await runWith(tokenizerInfo(requireArg(kv, "tokenizer", "path to a saved vocabulary")), resolveLogLevel(kv));
  console.log(`vocab_size=${info.vocabSize}`);
  console.log(`pad_id=${info.padId ?? "none"}`);
  console.log(`unk_id=${info.unkId ?? "none"}`);
}
