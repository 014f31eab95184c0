import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { IoError, errorMessage } from "../errors.js";

/**
 * SHA-256 a file's raw bytes and return the lowercase hex digest.
 *
 * The file is streamed, never decoded, so line endings and encodings do not
 * affect the result. A read that fails part way rejects; there is no partial
 * digest.
 */
export async function hashFile(filePath: string | Buffer): Promise<string> {
  const hash = createHash("sha256");
  const stream = createReadStream(filePath, { highWaterMark: 64 * 1024 });

  try {
    for await (const chunk of stream) {
      hash.update(chunk);
    }
  } catch (err) {
    const display = filePath.toString();
    throw new IoError(`Failed to hash ${display}: ${errorMessage(err)}`, display, { cause: err });
  } finally {
    stream.destroy();
  }

  return hash.digest("hex");
}

/**
 * SHA-256 hex hash of a string or buffer.
 */
export function sha256(input: string | Buffer): string {
  return createHash("sha256").update(input).digest("hex");
}
