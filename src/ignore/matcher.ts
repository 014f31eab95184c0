import picomatch from "picomatch";
import { PatternError, errorMessage } from "../errors.js";
import { toPosixPath } from "../utils/paths.js";

export interface IgnoreMatcher {
  /** The rules this matcher was compiled from, separator-normalized. */
  readonly rules: readonly string[];
  /**
   * Decide whether a root-relative path is left out of the manifest.
   * Directories are checked against the subtree form of each rule only;
   * files against both the subtree form and the anywhere-in-tree form.
   */
  excludes(path: string, isDirectory: boolean): boolean;
}

type Matcher = (path: string) => boolean;

const GLOB_OPTIONS = {
  // Dotfiles are ordinary files here: "*.log" must catch ".hidden/app.log".
  dot: true,
  // A single "*" crosses "/" as well, so "src/*.ts" also catches "src/deep/a.ts".
  bash: true,
  // A leading "!" is a literal character, not a negation of the whole rule.
  nonegate: true,
  // Unbalanced [ ( { become syntax errors instead of literal characters.
  strictBrackets: true,
};

function compile(rule: string, glob: string): Matcher {
  try {
    return picomatch(glob, GLOB_OPTIONS);
  } catch (err) {
    throw new PatternError(rule, errorMessage(err), { cause: err });
  }
}

/**
 * Compile raw ignore rules into a matcher.
 *
 * Each rule yields two globs: `<rule>/**`, the directory the rule names plus
 * everything below it, and the rule behind a leading globstar segment, which
 * matches that path at any depth.
 *
 * Every rule is compiled up front, so a bad pattern throws PatternError
 * before a single directory is read.
 */
export function createIgnoreMatcher(rawRules: readonly string[] = []): IgnoreMatcher {
  const rules = rawRules.map(toPosixPath);
  const directoryMatchers: Matcher[] = [];
  const fileMatchers: Matcher[] = [];

  for (const rule of rules) {
    if (rule.length === 0) {
      throw new PatternError(rule, "pattern is empty");
    }
    directoryMatchers.push(compile(rule, `${rule}/**`));
    fileMatchers.push(compile(rule, `**/${rule}`));
  }

  return {
    rules,

    excludes(path: string, isDirectory: boolean): boolean {
      const normalized = toPosixPath(path);
      if (directoryMatchers.some((m) => m(normalized))) return true;
      if (isDirectory) return false;
      return fileMatchers.some((m) => m(normalized));
    },
  };
}
