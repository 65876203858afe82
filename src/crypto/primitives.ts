import { cbc } from '@noble/ciphers/aes';
import { hkdf as nobleHkdf } from '@noble/hashes/hkdf';
import { hmac } from '@noble/hashes/hmac';
import { sha256 as nobleSha256 } from '@noble/hashes/sha256';
import { sha512 as nobleSha512 } from '@noble/hashes/sha512';
import { ValidationError, assertLength } from '../errors.js';

/**
 * AES block size, also the IV size for CBC
 */
export const AES_BLOCK_SIZE = 16;

/**
 * SHA-256 digest size
 */
export const HASH_LENGTH = 32;

/**
 * Truncated hash size used for identity, destination and packet hashes
 */
export const TRUNCATED_HASH_LENGTH = 16;

/**
 * Largest output RFC 5869 allows with SHA-256
 */
const HKDF_MAX_LENGTH = 255 * HASH_LENGTH;

export function sha256(data: Uint8Array): Uint8Array {
  return nobleSha256(data);
}

export function sha512(data: Uint8Array): Uint8Array {
  return nobleSha512(data);
}

/**
 * Full SHA-256 digest
 */
export function fullHash(data: Uint8Array): Uint8Array {
  return nobleSha256(data);
}

/**
 * First 16 bytes of SHA-256
 */
export function truncatedHash(data: Uint8Array): Uint8Array {
  return nobleSha256(data).slice(0, TRUNCATED_HASH_LENGTH);
}

export function hmacSha256(key: Uint8Array, data: Uint8Array): Uint8Array {
  return hmac(nobleSha256, key, data);
}

/**
 * HKDF-SHA256 (RFC 5869).
 * A missing or empty salt is 32 zero bytes, a missing info is empty.
 */
export function hkdf(
  length: number,
  ikm: Uint8Array,
  salt?: Uint8Array | null,
  info?: Uint8Array | null
): Uint8Array {
  if (!Number.isInteger(length) || length < 1 || length > HKDF_MAX_LENGTH) {
    throw new ValidationError(`Invalid HKDF output length: ${length}`);
  }
  if (ikm.length === 0) {
    throw new ValidationError('Cannot derive key from empty input material');
  }
  const effectiveSalt = salt && salt.length > 0 ? salt : new Uint8Array(HASH_LENGTH);
  return nobleHkdf(nobleSha256, ikm, effectiveSalt, info ?? new Uint8Array(0), length);
}

/**
 * PKCS#7 pad to a multiple of the AES block size
 */
export function pkcs7Pad(data: Uint8Array, blockSize: number = AES_BLOCK_SIZE): Uint8Array {
  const padLength = blockSize - (data.length % blockSize);
  const padded = new Uint8Array(data.length + padLength);
  padded.set(data);
  padded.fill(padLength, data.length);
  return padded;
}

/**
 * Strip PKCS#7 padding, rejecting malformed pads
 */
export function pkcs7Unpad(data: Uint8Array, blockSize: number = AES_BLOCK_SIZE): Uint8Array {
  if (data.length === 0 || data.length % blockSize !== 0) {
    throw new ValidationError(`Invalid padded length: ${data.length}`);
  }
  const padLength = data[data.length - 1];
  if (padLength < 1 || padLength > blockSize) {
    throw new ValidationError(`Invalid padding value: ${padLength}`);
  }
  for (let i = data.length - padLength; i < data.length; i++) {
    if (data[i] !== padLength) {
      throw new ValidationError('Invalid padding bytes');
    }
  }
  return data.slice(0, data.length - padLength);
}

function assertAesKey(key: Uint8Array): void {
  if (key.length !== 16 && key.length !== 32) {
    throw new ValidationError(
      `Invalid AES key length: expected 16 or 32 bytes, got ${key.length}`
    );
  }
}

/**
 * AES-CBC over block-aligned input (no padding applied here).
 * Key size selects AES-128 or AES-256.
 */
export function aesCbcEncrypt(plaintext: Uint8Array, key: Uint8Array, iv: Uint8Array): Uint8Array {
  assertAesKey(key);
  assertLength('IV', iv, AES_BLOCK_SIZE);
  if (plaintext.length % AES_BLOCK_SIZE !== 0) {
    throw new ValidationError(`Plaintext is not block aligned: ${plaintext.length} bytes`);
  }
  return cbc(key, iv, { disablePadding: true }).encrypt(plaintext);
}

export function aesCbcDecrypt(ciphertext: Uint8Array, key: Uint8Array, iv: Uint8Array): Uint8Array {
  assertAesKey(key);
  assertLength('IV', iv, AES_BLOCK_SIZE);
  if (ciphertext.length === 0 || ciphertext.length % AES_BLOCK_SIZE !== 0) {
    throw new ValidationError(`Ciphertext is not block aligned: ${ciphertext.length} bytes`);
  }
  return cbc(key, iv, { disablePadding: true }).decrypt(ciphertext);
}
