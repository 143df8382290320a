/**
 * Command: charvocab encode
 */
import { Effect } from "effect";
import type { EncodeError, FileSystemService, RestoreError } from "@charvocab/core";
import { CharTokenizer } from "@charvocab/tokenizers";
import { runWith } from "@charvocab/effect-runtime";
import { parseKV, loadConfig, requireArg, boolArg } from "../parse.js";
import { resolveLogLevel } from "../config.js";

export function encodeText(
  tokenizerPath: string,
  text: string,
  strict: boolean,
): Effect.Effect<Int32Array, RestoreError | EncodeError, FileSystemService> {
  return CharTokenizer.fromFile(tokenizerPath).pipe(
    Effect.flatMap((tok) => tok.encode(text, { strict })),
  );
}

export async function encodeCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const tokenizerPath = requireArg(kv, "tokenizer", "path to a saved vocabulary");
  const text = requireArg(kv, "text", "text to encode");

  const ids = await runWith(encodeText(tokenizerPath, text, boolArg(kv, "strict", false)), resolveLogLevel(kv));
  console.log(Array.from(ids).join(","));
}
