import { lstat, readdir, realpath, stat } from "node:fs/promises";
import type { Stats } from "node:fs";
import { join, posix, sep } from "node:path";
import { createIgnoreMatcher } from "../ignore/matcher.js";
import type { IgnoreMatcher } from "../ignore/matcher.js";
import { fileEntrySchema } from "../manifest/schema.js";
import type { FileEntry } from "../manifest/schema.js";
import { hashFile } from "../utils/hash.js";
import { toPosixPath } from "../utils/paths.js";
import { TraversalError, errorMessage } from "../errors.js";

/**
 * What happens when a directory entry cannot be visited:
 *   strict   reject the whole walk with TraversalError
 *   lenient  report it through `onIssue` and keep going
 */
export type TraversalPolicy = "strict" | "lenient";

export interface TraversalIssue {
  /** Root-relative path of the entry that was skipped */
  path: string;
  reason: string;
  cause?: unknown;
}

export interface WalkOptions {
  matcher?: IgnoreMatcher;
  policy?: TraversalPolicy;
  onIssue?: (issue: TraversalIssue) => void;
}

type EntryKind = "file" | "directory" | "other";

const SEPARATOR = Buffer.from(sep);

/**
 * Names stay raw bytes until they are stored: a name that is not valid UTF-8
 * would not round-trip through a decoded string back to the same file.
 */
function childPath(dir: Buffer, name: Buffer): Buffer {
  return Buffer.concat([dir, SEPARATOR, name]);
}

/**
 * Walk `root` depth-first and hash every regular file the matcher keeps.
 *
 * Siblings are visited in byte order of their names, so the result is stable
 * for an unchanged tree. Symbolic links are followed; a link that leads back
 * to a directory already on the current descent is reported as a loop.
 * Stored paths decode names as UTF-8, replacing invalid bytes with U+FFFD.
 *
 * Entry failures follow `policy`. A file that cannot be hashed always rejects
 * with IoError.
 */
export async function walkDirectory(root: string, options: WalkOptions = {}): Promise<FileEntry[]> {
  const { matcher = createIgnoreMatcher(), policy = "strict", onIssue } = options;
  const entries: FileEntry[] = [];

  function skip(path: string, reason: string, cause?: unknown): void {
    if (policy === "strict") {
      throw new TraversalError(path, reason, { cause });
    }
    onIssue?.({ path, reason, cause });
  }

  async function kindOf(fullPath: Buffer, relPath: string): Promise<EntryKind | null> {
    let info: Stats;
    try {
      info = await lstat(fullPath);
    } catch (err) {
      skip(relPath, errorMessage(err), err);
      return null;
    }

    if (info.isSymbolicLink()) {
      try {
        info = await stat(fullPath);
      } catch (err) {
        skip(relPath, `broken symbolic link (${errorMessage(err)})`, err);
        return null;
      }
    }

    if (info.isDirectory()) return "directory";
    if (info.isFile()) return "file";
    return "other";
  }

  async function walk(dir: Buffer, relDir: string, names: Buffer[], ancestors: ReadonlySet<string>): Promise<void> {
    names.sort(Buffer.compare);

    for (const rawName of names) {
      const fullPath = childPath(dir, rawName);
      const name = toPosixPath(rawName.toString("utf-8"));
      const relPath = relDir ? `${relDir}/${name}` : name;
      const kind = await kindOf(fullPath, relPath);

      if (kind === "directory") {
        if (matcher.excludes(relPath, true)) continue;
        await descend(fullPath, relPath, ancestors);
      } else if (kind === "file") {
        if (matcher.excludes(relPath, false)) continue;
        entries.push({ path: relPath, hash: await hashFile(fullPath) });
      }
    }
  }

  async function descend(dir: Buffer, relDir: string, ancestors: ReadonlySet<string>): Promise<void> {
    let real: Buffer;
    try {
      real = await realpath(dir, { encoding: "buffer" });
    } catch (err) {
      skip(relDir, errorMessage(err), err);
      return;
    }

    const key = real.toString("hex");
    if (ancestors.has(key)) {
      skip(relDir, `symbolic link loop back to ${real.toString("utf-8")}`);
      return;
    }

    let names: Buffer[];
    try {
      names = await readdir(dir, { encoding: "buffer" });
    } catch (err) {
      skip(relDir, errorMessage(err), err);
      return;
    }

    await walk(dir, relDir, names, new Set([...ancestors, key]));
  }

  const rootPath = Buffer.from(root);

  // An unreadable root rejects under either policy.
  let rootReal: Buffer;
  let rootNames: Buffer[];
  try {
    rootReal = await realpath(rootPath, { encoding: "buffer" });
    rootNames = await readdir(rootPath, { encoding: "buffer" });
  } catch (err) {
    throw new TraversalError(root, errorMessage(err), { cause: err });
  }

  await walk(rootPath, "", rootNames, new Set([rootReal.toString("hex")]));
  return entries;
}

/**
 * Hash a single file given relative to `root`, unless the matcher excludes it.
 * Paths that resolve outside `root` are rejected.
 */
export async function processFile(
  root: string,
  relativePath: string,
  matcher: IgnoreMatcher = createIgnoreMatcher(),
): Promise<FileEntry | null> {
  const relPath = posix.normalize(toPosixPath(relativePath));
  const checked = fileEntrySchema.shape.path.safeParse(relPath);
  if (!checked.success) {
    const reason = checked.error.issues.map((i) => i.message).join("; ");
    throw new TraversalError(relativePath, reason);
  }
  if (matcher.excludes(relPath, false)) return null;

  return { path: relPath, hash: await hashFile(join(root, relPath)) };
}
