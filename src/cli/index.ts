#!/usr/bin/env node
import { createRequire } from "node:module";
import chalk from "chalk";
import generate from "./commands/generate.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };
export { version };

function printUsage(): void {
  console.log(`kushn - write a self-describing SHA-256 manifest of a directory

Usage: kushn [options]

Options:
  -n, --name <file>  Manifest file name (default: kushn_result.json)
  -C, --dir <dir>    Directory to hash (default: current directory)
  --lenient          Report unreadable entries and keep going
  --strict           Stop at the first unreadable entry (default)
  --help, -h         Show this help message
  --version, -V      Show version

Patterns in .kushnignore (one per line) and settings in kushn.toml are read
from the hashed directory.`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes("--help") || args.includes("-h")) {
    printUsage();
    return;
  }
  if (args.includes("--version") || args.includes("-V")) {
    console.log(version);
    return;
  }

  await generate(args);
}

main().catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
});
