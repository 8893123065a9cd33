import { createHash } from "crypto";

/** Upper bound of the per-file random token (inclusive) */
export const FILE_TOKEN_MAX = 32767;

/**
 * Commit message for a timestamp: the lowercase SHA-256 hex digest of the
 * timestamp string. Always 64 characters.
 */
export function commitMessage(timestamp: string): string {
  return createHash("sha256").update(timestamp).digest("hex");
}

/**
 * Tag name for a digit string: the lowercase SHA-512 hex digest.
 * Always 128 characters.
 */
export function tagName(digits: string): string {
  return createHash("sha512").update(digits).digest("hex");
}

export function assetFileName(nanos: bigint, token: number): string {
  return `file_${nanos}_${token}.txt`;
}
