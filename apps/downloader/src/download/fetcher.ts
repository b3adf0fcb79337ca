/**
 * Fetch, decrypt and persist a single segment
 */

import type { FileHandle } from "fs/promises";
import { decryptSegment, type Segment } from "@tsgrab/streaming";
import type { HttpClient } from "../io/http";
import type { SegmentStorage } from "../io/storage";
import type { CryptoContext } from "./key-resolver";

export interface FetchSegmentDeps {
  http: HttpClient;
  storage: SegmentStorage;
  signal?: AbortSignal;
}

/**
 * One attempt, no retry. Throws `NetworkError`, `DecryptError` or `IOError`.
 * The returned handle is open; the caller closes it.
 */
export async function fetchSegment(
  segment: Segment,
  crypto: CryptoContext,
  destination: string,
  deps: FetchSegmentDeps
): Promise<FileHandle> {
  const encrypted = await deps.http.get(segment.uri, { signal: deps.signal });
  const plaintext = decryptSegment(encrypted, crypto.cipher, crypto.iv);
  return deps.storage.write(destination, plaintext);
}
