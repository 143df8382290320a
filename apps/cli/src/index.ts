/**
 * @charvocab/cli -- command implementations, exported for programmatic use.
 */
export { parseKV, requireArg, intArg, strArg, boolArg, listArg, idsArg, corpusArg, loadConfig } from "./parse.js";
export { parseEnvFile, loadEnvFile, resolveLogLevel, LOG_LEVEL_ENV } from "./config.js";
export { describeError } from "./errors.js";
export { resolveTokenizer, listImplementations } from "./resolve.js";
export { buildTokenizer, tokenizerBuildCmd, type BuildOptions } from "./commands/tokenizer-build.js";
export { encodeText, encodeCmd } from "./commands/encode.js";
export { decodeIds, decodeCmd } from "./commands/decode.js";
export { tokenizerInfo, infoCmd, type TokenizerInfo } from "./commands/info.js";
