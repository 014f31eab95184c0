import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { IoError, errorMessage, isNotFound } from "../errors.js";

export const DEFAULT_IGNORE_FILE = ".kushnignore";

/**
 * Split ignore file content into patterns: one per line, trimmed, with blank
 * lines and `#` comments dropped.
 */
export function parseIgnoreFile(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

/**
 * Read the ignore file at the root of the tree being hashed.
 * A missing file means no extra patterns.
 */
export async function loadIgnoreFile(
  root: string,
  fileName: string = DEFAULT_IGNORE_FILE,
): Promise<string[]> {
  const ignorePath = join(root, fileName);

  let content: string;
  try {
    content = await readFile(ignorePath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return [];
    throw new IoError(`Failed to read ${ignorePath}: ${errorMessage(err)}`, ignorePath, { cause: err });
  }

  return parseIgnoreFile(content);
}
