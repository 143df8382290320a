#!/usr/bin/env -S node --import tsx
/**
 * charvocab CLI — the main entry point.
 *
 * Commands: tokenizer build, encode, decode, info
 */
import { loadEnvFile } from "./config.js";
import { describeError } from "./errors.js";
import { listImplementations } from "./resolve.js";
import { tokenizerBuildCmd } from "./commands/tokenizer-build.js";
import { encodeCmd } from "./commands/encode.js";
import { decodeCmd } from "./commands/decode.js";
import { infoCmd } from "./commands/info.js";

const USAGE = `
charvocab — character-level vocabularies for sequence models

Commands:
  tokenizer build  Fit a vocabulary from text and save it
  encode           Encode text with a saved vocabulary
  decode           Decode comma-separated ids with a saved vocabulary
  info             Show the size and special ids of a saved vocabulary

Options:
  --config=<file>  JSON file of default arguments (CLI flags win)
  --logLevel=<lvl> debug | info | warn | error (env: CHARVOCAB_LOG_LEVEL)
  --help, -h       Show this help

Examples:
  charvocab tokenizer build --input=data/a.txt,data/b.txt --minFreq=2 --out=artifacts/vocab.json
  charvocab tokenizer build --text="hello world" --specials=false --out=artifacts/tiny.json
  charvocab encode --tokenizer=artifacts/vocab.json --text="hello" --strict
  charvocab decode --tokenizer=artifacts/vocab.json --ids=5,3,7,7 --skipSpecials=false
  charvocab info --tokenizer=artifacts/vocab.json
`.trim();

async function main() {
  loadEnvFile(".env.local");
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    console.log(`\n${listImplementations()}`);
    process.exit(0);
  }

  const command = args[0];

  if (command === "tokenizer" && args[1] === "build") {
    await tokenizerBuildCmd(args.slice(2));
  } else if (command === "encode") {
    await encodeCmd(args.slice(1));
  } else if (command === "decode") {
    await decodeCmd(args.slice(1));
  } else if (command === "info") {
    await infoCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(describeError(err));
  process.exit(1);
});
