/**
 * Hashing utilities
 */

import { sha256 } from "@noble/hashes/sha256";
import { KEY_FINGERPRINT_LENGTH } from "../constants";

/**
 * Hash data using SHA-256
 */
export function sha256Hash(data: Buffer | Uint8Array | string): Buffer {
  const input = typeof data === "string" ? Buffer.from(data) : data;
  return Buffer.from(sha256(input));
}

/**
 * Short, non-reversible key identifier safe to put in logs
 */
export function keyFingerprint(key: Uint8Array): string {
  return sha256Hash(key).toString("hex").slice(0, KEY_FINGERPRINT_LENGTH);
}
