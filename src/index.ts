export {
  KushnError,
  IoError,
  PatternError,
  TraversalError,
  SerializationError,
  ConfigError,
} from "./errors.js";
export type { KushnErrorKind } from "./errors.js";
export { hashFile, sha256, toPosixPath } from "./utils/index.js";
export { createIgnoreMatcher, loadIgnoreFile, parseIgnoreFile, DEFAULT_IGNORE_FILE } from "./ignore/index.js";
export type { IgnoreMatcher } from "./ignore/index.js";
export { walkDirectory, processFile } from "./traversal/index.js";
export type { WalkOptions, TraversalPolicy, TraversalIssue } from "./traversal/index.js";
export {
  fileEntrySchema,
  manifestSchema,
  DEFAULT_OUTPUT_NAME,
  serializeManifest,
  selfEntryPath,
  writeManifest,
  generateManifest,
} from "./manifest/index.js";
export type { FileEntry, Manifest, ManifestResult, GenerateOptions } from "./manifest/index.js";
export { loadConfig, kushnConfigSchema, CONFIG_FILE } from "./config/index.js";
export type { KushnConfig } from "./config/index.js";
