/**
 * Command: charvocab decode
 */
import { Effect } from "effect";
import type { DecodeError, FileSystemService, RestoreError } from "@charvocab/core";
import { CharTokenizer } from "@charvocab/tokenizers";
import { runWith } from "@charvocab/effect-runtime";
import { parseKV, loadConfig, requireArg, boolArg, idsArg } from "../parse.js";
import { resolveLogLevel } from "../config.js";

export function decodeIds(
  tokenizerPath: string,
  ids: readonly number[],
  skipSpecials: boolean,
): Effect.Effect<string, RestoreError | DecodeError, FileSystemService> {
  return CharTokenizer.fromFile(tokenizerPath).pipe(
    Effect.flatMap((tok) => tok.decode(ids, { skipSpecials })),
  );
}

export async function decodeCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const tokenizerPath = requireArg(kv, "tokenizer", "path to a saved vocabulary");
  requireArg(kv, "ids", "comma-separated token ids");

  const text = await runWith(
    decodeIds(tokenizerPath, idsArg(kv, "ids"), boolArg(kv, "skipSpecials", true)),
    resolveLogLevel(kv),
  );
  process.stdout.write(text + "\n");
}
