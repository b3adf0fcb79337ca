/**
 * AES-CBC decryption for HLS segments
 */

import { createCipheriv, createDecipheriv } from "crypto";
import { AES_BLOCK_SIZE, AES_CBC_ALGORITHMS } from "../constants";
import { CipherInitError, DecryptError } from "../errors";

type KeyLength = keyof typeof AES_CBC_ALGORITHMS;

function isKeyLength(length: number): length is KeyLength {
  return length in AES_CBC_ALGORITHMS;
}

/**
 * AES block cipher bound to one key. Shared read-only across workers.
 */
export class BlockCipher {
  readonly blockSize = AES_BLOCK_SIZE;
  private readonly algorithm: (typeof AES_CBC_ALGORITHMS)[KeyLength];
  private readonly key: Buffer;

  constructor(key: Uint8Array) {
    const length = key.length;
    if (!isKeyLength(length)) {
      throw new CipherInitError(
        `Invalid key length: expected 16, 24 or 32, got ${length}`,
        { keyLength: length }
      );
    }
    this.key = Buffer.from(key);
    this.algorithm = AES_CBC_ALGORITHMS[length];
  }

  get keyLength(): number {
    return this.key.length;
  }

  /**
   * Raw CBC decrypt, no padding handling. `iv` must be exactly one block.
   */
  decryptCbc(data: Uint8Array, iv: Uint8Array): Buffer {
    if (data.length === 0 || data.length % this.blockSize !== 0) {
      throw new DecryptError(
        `Ciphertext length ${data.length} is not a positive multiple of ${this.blockSize}`,
        { length: data.length }
      );
    }
    if (iv.length !== this.blockSize) {
      throw new DecryptError(
        `Invalid IV length: expected ${this.blockSize}, got ${iv.length}`
      );
    }

    try {
      const decipher = createDecipheriv(this.algorithm, this.key, iv);
      decipher.setAutoPadding(false);
      return Buffer.concat([decipher.update(data), decipher.final()]);
    } catch (error) {
      throw new DecryptError(
        `Decryption failed: ${error instanceof Error ? error.message : "Unknown error"}`
      );
    }
  }

  /**
   * CBC encrypt with PKCS#7 padding, for producing test fixtures
   */
  encryptCbc(data: Uint8Array, iv: Uint8Array): Buffer {
    const cipher = createCipheriv(this.algorithm, this.key, iv);
    return Buffer.concat([cipher.update(data), cipher.final()]);
  }
}

/**
 * Strip PKCS#5/#7 padding the way legacy HLS downloaders do: trust the last
 * byte as the pad length and drop that many bytes. The pad bytes themselves
 * are not checked. A pad length past the start of the buffer yields an empty
 * buffer.
 *
 * Kept separate so a validating variant can replace it at the call site.
 */
export function legacyPaddingStrip(data: Buffer): Buffer {
  if (data.length === 0) {
    return data;
  }
  const padding = data[data.length - 1];
  return data.subarray(0, Math.max(0, data.length - padding));
}

/**
 * Decrypt one segment: CBC with the first block of `iv`, then legacy unpadding
 */
export function decryptSegment(
  encryptedData: Uint8Array,
  cipher: BlockCipher,
  iv: Uint8Array
): Buffer {
  if (iv.length < cipher.blockSize) {
    throw new DecryptError(
      `Invalid IV length: expected at least ${cipher.blockSize}, got ${iv.length}`
    );
  }
  const decrypted = cipher.decryptCbc(encryptedData, iv.subarray(0, cipher.blockSize));
  return legacyPaddingStrip(decrypted);
}

/**
 * Encrypt segment data with PKCS#7 padding
 */
export function encryptSegment(
  data: Uint8Array,
  key: Uint8Array,
  iv: Uint8Array
): Buffer {
  return new BlockCipher(key).encryptCbc(data, iv.subarray(0, AES_BLOCK_SIZE));
}
