import { createIgnoreMatcher } from "../ignore/matcher.js";
import { walkDirectory } from "../traversal/walker.js";
import type { TraversalIssue, TraversalPolicy } from "../traversal/walker.js";
import { DEFAULT_OUTPUT_NAME } from "./schema.js";
import { selfEntryPath, writeManifest } from "./writer.js";
import type { ManifestResult } from "./writer.js";

export interface GenerateOptions {
  /** Directory to hash; every entry path is relative to it */
  root: string;
  /** Manifest filename, relative to root */
  output?: string;
  ignore?: readonly string[];
  policy?: TraversalPolicy;
  onIssue?: (issue: TraversalIssue) => void;
}

/**
 * Hash `root` and write a self-describing manifest inside it.
 *
 * Ignore rules and the output name are checked before the walk starts, so
 * bad input fails without touching the tree. A manifest left behind by an
 * earlier run is not listed as an ordinary file; it only appears as the
 * self-entry.
 */
export async function generateManifest(opts: GenerateOptions): Promise<ManifestResult> {
  const { root, output = DEFAULT_OUTPUT_NAME, ignore = [], policy = "strict", onIssue } = opts;

  const matcher = createIgnoreMatcher(ignore);
  const selfPath = selfEntryPath(output);

  const entries = await walkDirectory(root, { matcher, policy, onIssue });

  return writeManifest(
    root,
    output,
    entries.filter((e) => e.path !== selfPath),
  );
}
