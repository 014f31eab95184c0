import { writeFile } from "node:fs/promises";
import { join, posix } from "node:path";
import { fileEntrySchema, manifestSchema } from "./schema.js";
import type { FileEntry } from "./schema.js";
import { hashFile } from "../utils/hash.js";
import { toPosixPath } from "../utils/paths.js";
import { IoError, SerializationError, errorMessage } from "../errors.js";

export interface ManifestResult {
  /** `root` joined with the manifest name */
  outputPath: string;
  /** Final contents, self-entry last */
  entries: FileEntry[];
  selfEntry: FileEntry;
}

/**
 * Encode entries as a pretty-printed JSON array with `path` before `hash`.
 * No trailing newline.
 */
export function serializeManifest(entries: readonly FileEntry[]): string {
  const result = manifestSchema.safeParse(entries);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new SerializationError(`Cannot serialize manifest:\n${issues}`);
  }

  try {
    return JSON.stringify(
      result.data.map(({ path, hash }) => ({ path, hash })),
      null,
      2,
    );
  } catch (err) {
    throw new SerializationError(`Cannot serialize manifest: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * The path the manifest records for itself: the output name with "/"
 * separators and no "./" segments.
 */
export function selfEntryPath(outputName: string): string {
  const path = posix.normalize(toPosixPath(outputName));
  const result = fileEntrySchema.shape.path.safeParse(path);
  if (!result.success) {
    const reason = result.error.issues.map((i) => i.message).join("; ");
    throw new SerializationError(`Invalid manifest name "${outputName}": ${reason}`);
  }
  return path;
}

async function writeOutput(outputPath: string, content: string): Promise<void> {
  try {
    await writeFile(outputPath, content, "utf-8");
  } catch (err) {
    throw new IoError(`Failed to write ${outputPath}: ${errorMessage(err)}`, outputPath, { cause: err });
  }
}

/**
 * Write the manifest to `<root>/<outputName>` so that it lists itself.
 *
 * 1. Serialize `entries` and write the file.
 * 2. Hash the file as written.
 * 3. Append `{ path: outputName, hash }` and overwrite the file.
 *
 * The self-entry's hash is the digest of the step 1 bytes, not of the final
 * file. Hashing the final bytes would change them, so there is no fixpoint;
 * consumers verifying the self-entry must drop the last element and
 * re-serialize before hashing.
 */
export async function writeManifest(
  root: string,
  outputName: string,
  entries: readonly FileEntry[],
): Promise<ManifestResult> {
  const path = selfEntryPath(outputName);
  const outputPath = join(root, path);

  await writeOutput(outputPath, serializeManifest(entries));

  const selfEntry: FileEntry = { path, hash: await hashFile(outputPath) };
  const finalEntries = [...entries, selfEntry];

  await writeOutput(outputPath, serializeManifest(finalEntries));

  return { outputPath, entries: finalEntries, selfEntry };
}
