import { join, resolve } from "node:path";
import { parseArgs } from "node:util";
import chalk from "chalk";
import { loadConfig } from "../../config/loader.js";
import { CONFIG_FILE } from "../../config/schema.js";
import { loadIgnoreFile } from "../../ignore/loader.js";
import { generateManifest } from "../../manifest/generate.js";
import type { ManifestResult } from "../../manifest/writer.js";
import type { TraversalIssue, TraversalPolicy } from "../../traversal/walker.js";

export interface GenerateCommandOptions {
  root: string;
  /** Overrides `output` from kushn.toml */
  output?: string;
  /** Overrides `on_error` from kushn.toml */
  policy?: TraversalPolicy;
  onIssue?: (issue: TraversalIssue) => void;
}

/**
 * Resolve settings (flags over kushn.toml over defaults), gather ignore
 * patterns from the config and the ignore file, and write the manifest.
 */
export async function runGenerate(opts: GenerateCommandOptions): Promise<ManifestResult> {
  const { root } = opts;
  const config = await loadConfig(join(root, CONFIG_FILE));
  const filePatterns = await loadIgnoreFile(root, config.ignore_file);

  return generateManifest({
    root,
    output: opts.output ?? config.output,
    ignore: [...config.ignore, ...filePatterns],
    policy: opts.policy ?? config.on_error,
    onIssue: opts.onIssue,
  });
}

function formatIssue(issue: TraversalIssue): string {
  return `${chalk.yellow("warning:")} skipped ${issue.path}: ${issue.reason}`;
}

export default async function generate(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      name: { type: "string", short: "n" },
      dir: { type: "string", short: "C" },
      lenient: { type: "boolean" },
      strict: { type: "boolean" },
    },
    strict: true,
  });

  if (values["lenient"] && values["strict"]) {
    console.error(chalk.red("--lenient and --strict cannot be combined"));
    process.exitCode = 1;
    return;
  }

  let policy: TraversalPolicy | undefined;
  if (values["lenient"]) policy = "lenient";
  if (values["strict"]) policy = "strict";

  const result = await runGenerate({
    root: resolve(values["dir"] ?? "."),
    output: values["name"],
    policy,
    onIssue: (issue) => console.error(formatIssue(issue)),
  });

  console.log(chalk.green(`File hashes generated and saved to ${result.selfEntry.path}.`));
}
