export { fileEntrySchema, manifestSchema, DEFAULT_OUTPUT_NAME } from "./schema.js";
export type { FileEntry, Manifest } from "./schema.js";
export { serializeManifest, selfEntryPath, writeManifest } from "./writer.js";
export type { ManifestResult } from "./writer.js";
export { generateManifest } from "./generate.js";
export type { GenerateOptions } from "./generate.js";
