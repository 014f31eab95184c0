export { createIgnoreMatcher } from "./matcher.js";
export type { IgnoreMatcher } from "./matcher.js";
export { loadIgnoreFile, parseIgnoreFile, DEFAULT_IGNORE_FILE } from "./loader.js";
