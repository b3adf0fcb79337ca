/**
 * Constants for encrypted segment streams
 */

/** AES block size in bytes, also the CBC IV length */
export const AES_BLOCK_SIZE = 16;

/** Key lengths AES accepts, in bytes, mapped to the CBC algorithm name */
export const AES_CBC_ALGORITHMS = {
  16: "aes-128-cbc",
  24: "aes-192-cbc",
  32: "aes-256-cbc",
} as const;

/** Extension of a persisted segment file */
export const SEGMENT_FILE_EXTENSION = ".ts";

/** Fetch attempts per segment, first try included */
export const DEFAULT_RETRY_ATTEMPTS = 4;

/** Backoff step; retry k sleeps k times this */
export const DEFAULT_RETRY_BACKOFF_MS = 5_000;

/** Per-request timeout of the default HTTP client */
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

/** Length of the hex key fingerprint written to logs */
export const KEY_FINGERPRINT_LENGTH = 16;
