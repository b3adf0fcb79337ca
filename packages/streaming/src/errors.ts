/**
 * Error classes for segment downloads
 */

/** Base error class */
export class StreamingError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "StreamingError";
  }
}

/** Key could not be fetched */
export class KeyFetchError extends StreamingError {
  constructor(uri: string, cause?: unknown) {
    super(`Failed to fetch key from ${uri}: ${describe(cause)}`, "KEY_FETCH_ERROR", { uri }, { cause });
    this.name = "KeyFetchError";
  }
}

/** Key or IV unusable for a block cipher */
export class CipherInitError extends StreamingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CIPHER_INIT_ERROR", details);
    this.name = "CipherInitError";
  }
}

/** Stream uses something other than one key for every segment */
export class UnsupportedFormatError extends StreamingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "UNSUPPORTED_FORMAT", details);
    this.name = "UnsupportedFormatError";
  }
}

/** Download options rejected */
export class ConfigurationError extends StreamingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", details);
    this.name = "ConfigurationError";
  }
}

/** Transport failure, timeout or non-2xx response */
export class NetworkError extends StreamingError {
  constructor(uri: string, message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(`Request to ${uri} failed: ${message}`, "NETWORK_ERROR", { uri, ...details }, { cause });
    this.name = "NetworkError";
  }
}

/** Decryption error */
export class DecryptError extends StreamingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "DECRYPTION_ERROR", details);
    this.name = "DecryptError";
  }
}

/** Segment file could not be written */
export class IOError extends StreamingError {
  constructor(path: string, cause?: unknown) {
    super(`Failed to write ${path}: ${describe(cause)}`, "IO_ERROR", { path }, { cause });
    this.name = "IOError";
  }
}

/** The per-segment callback threw */
export class CallbackError extends StreamingError {
  constructor(segmentIndex: number, cause: unknown) {
    super(
      `Segment callback failed for segment ${segmentIndex}: ${describe(cause)}`,
      "CALLBACK_ERROR",
      { segmentIndex },
      { cause }
    );
    this.name = "CallbackError";
  }
}

/** Download cancelled by the caller */
export class CancellationError extends StreamingError {
  constructor(reason?: unknown) {
    super(
      reason === undefined ? "Download cancelled" : `Download cancelled: ${describe(reason)}`,
      "CANCELLED",
      undefined,
      { cause: reason }
    );
    this.name = "CancellationError";
  }
}

/**
 * Whether a failed segment attempt is worth another try.
 * Network and decrypt failures are; everything else is final.
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof NetworkError || error instanceof DecryptError;
}

function describe(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value === undefined) return "Unknown error";
  return String(value);
}
