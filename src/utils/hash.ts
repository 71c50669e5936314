import { createHash } from "node:crypto";

/** Width of the truncated digests used in cache keys. */
export const SHORT_HASH_LENGTH = 8;

/**
 * SHA-256 hex hash of a string.
 */
export function sha256(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

/**
 * First {@link SHORT_HASH_LENGTH} hex characters of the SHA-256 of `input`.
 */
export function shortHash(input: string): string {
  return sha256(input).slice(0, SHORT_HASH_LENGTH);
}
