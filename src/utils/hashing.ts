// CHANGE: Provide SHA-256 hashing utility for downloaded release assets.
// WHY: Release assets carrying a `sha256:` digest are verified before extraction.

import { createHash } from "crypto";
import fs from "fs-extra";

/**
 * Compute SHA-256 hash of a file without loading it whole.
 *
 * @param filePath - File to hash.
 * @returns Hexadecimal SHA-256 digest.
 */
export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of fs.createReadStream(filePath)) {
    hash.update(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return hash.digest("hex");
}

/**
 * Split a `sha256:<hex>` digest as reported by GitHub into its hex part.
 *
 * @returns Lower-case hex digest, or undefined for other algorithms.
 */
export function parseSha256Digest(digest: string | undefined): string | undefined {
  const match = digest ? /^sha256:([0-9a-fA-F]{64})$/.exec(digest.trim()) : null;
  return match ? match[1].toLowerCase() : undefined;
}
