import { readFile } from "node:fs/promises";
import { parse as parseTOML } from "smol-toml";
import { kushnConfigSchema } from "./schema.js";
import type { KushnConfig } from "./schema.js";
import { ConfigError, errorMessage, isNotFound } from "../errors.js";

/**
 * Load and validate kushn.toml.
 * A missing file yields the defaults.
 */
export async function loadConfig(filePath: string): Promise<KushnConfig> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return kushnConfigSchema.parse({});
    throw new ConfigError(`Cannot read ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = parseTOML(raw);
  } catch (err) {
    throw new ConfigError(`Invalid TOML in ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  const result = kushnConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid config in ${filePath}:\n${issues}`);
  }

  return result.data;
}
