/**
 * Whole-buffer transforms applied around a finished envelope.
 *
 * Encode order is compress then encrypt; decode undoes encryption first.
 * Neither stage knows anything about the envelope layout.
 */

import { createCipheriv, createDecipheriv, pbkdf2Sync, randomBytes } from "node:crypto";
import * as pako from "pako";
import { TransformError } from "./errors";

/**
 * Compression settings. There is one compressor (gzip); the levels trade
 * speed against size.
 */
export enum CompressionLevel {
  None = "none",
  Fastest = "fastest",
  Optimal = "optimal",
  SmallestSize = "smallest",
}

const zlibLevels = {
  [CompressionLevel.Fastest]: 1,
  [CompressionLevel.Optimal]: 6,
  [CompressionLevel.SmallestSize]: 9,
} as const;

/** First two bytes of every gzip member. */
const GZIP_MAGIC = [0x1f, 0x8b];

export const CIPHER = "aes-256-cbc";
export const IV_LENGTH = 16;
export const KEY_LENGTH = 32;
export const KDF_ITERATIONS = 10000;
export const KDF_DIGEST = "sha256";

/**
 * Salt used for key derivation. It is fixed (all zeros) rather than random,
 * which weakens the derivation; it is part of the format, and changing it
 * requires a new format version.
 */
export const KDF_SALT: Uint8Array = new Uint8Array(16);

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Returns true if the buffer starts like a gzip member.
 */
export function isCompressed(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === GZIP_MAGIC[0] && data[1] === GZIP_MAGIC[1];
}

/**
 * Compresses a buffer. `CompressionLevel.None` returns the input unchanged.
 * @throws TransformError if the compressor fails
 */
export function compress(data: Uint8Array, level: CompressionLevel): Uint8Array {
  if (level === CompressionLevel.None) {
    return data;
  }
  try {
    return pako.gzip(data, { level: zlibLevels[level] });
  } catch (err) {
    throw new TransformError("compression", `Compression failed: ${describe(err)}`, { cause: err });
  }
}

/**
 * Decompresses a gzip buffer.
 * @throws TransformError if the buffer is not valid gzip data
 */
export function decompress(data: Uint8Array): Uint8Array {
  let result: Uint8Array | undefined;
  try {
    result = pako.ungzip(data);
  } catch (err) {
    // pako throws its status message as a plain string
    throw new TransformError("compression", `Decompression failed: ${describe(err)}`, { cause: err });
  }
  // A stream that ends early produces no result rather than an error.
  if (!(result instanceof Uint8Array)) {
    throw new TransformError("compression", "Decompression failed: compressed stream is incomplete");
  }
  return result;
}

/**
 * Derives the AES key from a password with PBKDF2-HMAC-SHA256 over the fixed
 * salt.
 */
export function deriveKey(password: string): Buffer {
  return pbkdf2Sync(password, KDF_SALT, KDF_ITERATIONS, KEY_LENGTH, KDF_DIGEST);
}

/**
 * Encrypts a buffer with AES-256-CBC. A fresh random IV is generated on every
 * call and prepended to the ciphertext: `[IV: 16][ciphertext]`.
 * @throws TransformError if the cipher fails
 */
export function encrypt(data: Uint8Array, password: string): Uint8Array {
  try {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(CIPHER, deriveKey(password), iv);
    const body = Buffer.concat([cipher.update(data), cipher.final()]);
    return new Uint8Array(Buffer.concat([iv, body]));
  } catch (err) {
    throw new TransformError("encryption", `Encryption failed: ${describe(err)}`, { cause: err });
  }
}

/**
 * Decrypts a buffer produced by encrypt().
 * @throws TransformError if the buffer is too short or the key does not match
 */
export function decrypt(data: Uint8Array, password: string): Uint8Array {
  if (data.length < IV_LENGTH) {
    throw new TransformError(
      "encryption",
      `Encrypted buffer is ${data.length} bytes, shorter than its ${IV_LENGTH}-byte IV`
    );
  }
  try {
    const iv = data.subarray(0, IV_LENGTH);
    const decipher = createDecipheriv(CIPHER, deriveKey(password), iv);
    const body = Buffer.concat([decipher.update(data.subarray(IV_LENGTH)), decipher.final()]);
    return new Uint8Array(body);
  } catch (err) {
    throw new TransformError("encryption", `Decryption failed: ${describe(err)}`, { cause: err });
  }
}
