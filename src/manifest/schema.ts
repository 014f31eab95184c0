import { z } from "zod/v4";

export const DEFAULT_OUTPUT_NAME = "kushn_result.json";

export const fileEntrySchema = z.object({
  /** Root-relative, "/"-separated. */
  path: z
    .string()
    .min(1, "Path must not be empty")
    .refine((p) => !p.includes("\\"), "Path must use forward slashes")
    .refine((p) => !p.startsWith("/"), "Path must be relative to the root")
    .refine((p) => p !== ".." && !p.startsWith("../"), "Path must stay inside the root"),
  hash: z.string().regex(/^[a-f0-9]{64}$/, "Hash must be 64 lowercase hex characters"),
});

export type FileEntry = z.infer<typeof fileEntrySchema>;

export const manifestSchema = z.array(fileEntrySchema);

export type Manifest = z.infer<typeof manifestSchema>;
