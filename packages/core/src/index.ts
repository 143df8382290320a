/**
 * @charvocab/core -- shared errors, ports and the implementation registry.
 */
export * from "./errors.js";
export * from "./interfaces.js";
export { Registry } from "./registry.js";
