/**
 * Stream key resolution
 *
 * The whole stream is decrypted with one key, taken from the first segment's
 * key reference. Later segments may repeat that reference but never change it.
 */

import {
  BlockCipher,
  CipherInitError,
  KeyFetchError,
  UnsupportedFormatError,
  keyFingerprint,
  type KeyReference,
  type Segment,
  type SegmentSequence,
} from "@tsgrab/streaming";
import type { HttpClient } from "../io/http";
import type { Logger } from "../utils/logger";

/** Cipher and IV shared read-only by every worker */
export interface CryptoContext {
  readonly cipher: BlockCipher;
  readonly iv: Buffer;
  readonly keyUri: string;
}

function sameKeyReference(a: KeyReference, b: KeyReference): boolean {
  if (a.uri !== b.uri) return false;
  const ivA = a.iv ?? new Uint8Array(0);
  const ivB = b.iv ?? new Uint8Array(0);
  return Buffer.from(ivA).equals(Buffer.from(ivB));
}

/**
 * Reject streams whose segments point at more than one key
 */
export function assertSingleKey(sequence: SegmentSequence): KeyReference {
  const first = sequence[0];
  const streamKey = first?.key;
  if (!streamKey) {
    throw new UnsupportedFormatError("First segment carries no key reference", {
      segmentIndex: first?.index,
    });
  }

  const mismatch = sequence.find(
    (segment) => segment.key !== undefined && !sameKeyReference(segment.key, streamKey)
  );
  if (mismatch) {
    throw new UnsupportedFormatError(
      `Segment ${mismatch.index} uses a different key than the first segment`,
      { segmentIndex: mismatch.index, keyUri: mismatch.key?.uri }
    );
  }

  return streamKey;
}

/**
 * Fetch the key for `first` and build the shared crypto context.
 * Without an explicit IV the key bytes double as the IV.
 */
export async function resolveCryptoContext(
  first: Segment,
  http: HttpClient,
  options: { signal?: AbortSignal; logger?: Logger } = {}
): Promise<CryptoContext> {
  const keyRef = first.key;
  if (!keyRef) {
    throw new UnsupportedFormatError("First segment carries no key reference", {
      segmentIndex: first.index,
    });
  }

  let key: Buffer;
  try {
    key = await http.get(keyRef.uri, { signal: options.signal });
  } catch (error) {
    throw new KeyFetchError(keyRef.uri, error);
  }

  const cipher = new BlockCipher(key);
  const iv = keyRef.iv && keyRef.iv.length > 0 ? Buffer.from(keyRef.iv) : key;
  if (iv.length < cipher.blockSize) {
    throw new CipherInitError(
      `Invalid IV length: expected at least ${cipher.blockSize}, got ${iv.length}`,
      { ivLength: iv.length }
    );
  }

  options.logger?.debug(
    {
      keyUri: keyRef.uri,
      keyLength: cipher.keyLength,
      fingerprint: keyFingerprint(key),
      explicitIv: iv !== key,
    },
    "Resolved stream key"
  );

  return { cipher, iv, keyUri: keyRef.uri };
}
