import { z } from "zod/v4";
import { DEFAULT_OUTPUT_NAME } from "../manifest/schema.js";
import { DEFAULT_IGNORE_FILE } from "../ignore/loader.js";

export const CONFIG_FILE = "kushn.toml";

export const traversalPolicySchema = z.enum(["strict", "lenient"]);

/**
 * kushn.toml, read from the root being hashed:
 *
 *   output      = "kushn_result.json"
 *   ignore_file = ".kushnignore"
 *   ignore      = ["dist", "*.log"]
 *   on_error    = "strict" | "lenient"
 */
export const kushnConfigSchema = z.strictObject({
  output: z.string().min(1, "Output name must not be empty").default(DEFAULT_OUTPUT_NAME),
  ignore_file: z.string().min(1, "Ignore file name must not be empty").default(DEFAULT_IGNORE_FILE),
  ignore: z.array(z.string().min(1, "Ignore patterns must not be empty")).default([]),
  on_error: traversalPolicySchema.default("strict"),
});

export type KushnConfig = z.infer<typeof kushnConfigSchema>;
