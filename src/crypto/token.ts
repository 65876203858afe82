import { AuthenticationError, ValidationError, assertLength } from '../errors.js';
import {
  AES_BLOCK_SIZE,
  aesCbcDecrypt,
  aesCbcEncrypt,
  hmacSha256,
  pkcs7Pad,
  pkcs7Unpad,
} from './primitives.js';
import { concatBytes, constantTimeEqual, secureRandomBytes } from './utils.js';

/**
 * IV size in bytes
 */
export const TOKEN_IV_SIZE = AES_BLOCK_SIZE;

/**
 * HMAC-SHA256 tag size in bytes
 */
export const TOKEN_HMAC_SIZE = 32;

/**
 * Bytes a token adds on top of the padded ciphertext
 */
export const TOKEN_OVERHEAD = TOKEN_IV_SIZE + TOKEN_HMAC_SIZE;

/**
 * Key halves for one token key
 */
export interface TokenKeys {
  signingKey: Uint8Array;
  encryptionKey: Uint8Array;
}

/**
 * Split a 32-byte (AES-128) or 64-byte (AES-256) token key.
 * The signing half comes first.
 */
export function splitTokenKey(key: Uint8Array): TokenKeys {
  if (key.length !== 32 && key.length !== 64) {
    throw new ValidationError(
      `Invalid token key length: expected 32 or 64 bytes, got ${key.length}`
    );
  }
  const half = key.length / 2;
  return {
    signingKey: key.slice(0, half),
    encryptionKey: key.slice(half),
  };
}

/**
 * Encrypt and authenticate
 *
 * Layout: [iv (16)][AES-CBC ciphertext (16n)][HMAC-SHA256 (32)]
 *
 * @param iv - fixed IV for reproducible output; random when omitted
 */
export function encryptToken(plaintext: Uint8Array, key: Uint8Array, iv?: Uint8Array): Uint8Array {
  const { signingKey, encryptionKey } = splitTokenKey(key);
  const tokenIv = iv ?? secureRandomBytes(TOKEN_IV_SIZE);
  assertLength('IV', tokenIv, TOKEN_IV_SIZE);

  const ciphertext = aesCbcEncrypt(pkcs7Pad(plaintext), encryptionKey, tokenIv);
  const signedParts = concatBytes(tokenIv, ciphertext);
  return concatBytes(signedParts, hmacSha256(signingKey, signedParts));
}

/**
 * Check the trailing HMAC without decrypting
 */
export function verifyTokenHmac(token: Uint8Array, key: Uint8Array): boolean {
  const { signingKey } = splitTokenKey(key);
  if (token.length <= TOKEN_HMAC_SIZE) {
    return false;
  }
  const signedParts = token.subarray(0, token.length - TOKEN_HMAC_SIZE);
  const received = token.subarray(token.length - TOKEN_HMAC_SIZE);
  return constantTimeEqual(hmacSha256(signingKey, signedParts), received);
}

/**
 * Verify then decrypt
 * @throws ValidationError if the token is too short to hold one block
 * @throws AuthenticationError if the HMAC does not match
 */
export function decryptToken(token: Uint8Array, key: Uint8Array): Uint8Array {
  const { encryptionKey } = splitTokenKey(key);
  if (token.length < TOKEN_OVERHEAD + AES_BLOCK_SIZE) {
    throw new ValidationError(
      `Token too short: expected at least ${TOKEN_OVERHEAD + AES_BLOCK_SIZE} bytes, got ${token.length}`
    );
  }
  if (!verifyTokenHmac(token, key)) {
    throw new AuthenticationError();
  }

  const iv = token.subarray(0, TOKEN_IV_SIZE);
  const ciphertext = token.subarray(TOKEN_IV_SIZE, token.length - TOKEN_HMAC_SIZE);
  return pkcs7Unpad(aesCbcDecrypt(ciphertext, encryptionKey, iv));
}

/**
 * A token key bound to one owner, such as a link
 */
export class Token {
  private readonly key: Uint8Array;

  constructor(key: Uint8Array) {
    splitTokenKey(key);
    this.key = key.slice();
  }

  /**
   * AES key size in bits
   */
  get keyBits(): 128 | 256 {
    return this.key.length === 64 ? 256 : 128;
  }

  encrypt(plaintext: Uint8Array, iv?: Uint8Array): Uint8Array {
    return encryptToken(plaintext, this.key, iv);
  }

  decrypt(token: Uint8Array): Uint8Array {
    return decryptToken(token, this.key);
  }

  verifyHmac(token: Uint8Array): boolean {
    return verifyTokenHmac(token, this.key);
  }

  /**
   * Overwrite the key material
   */
  wipe(): void {
    this.key.fill(0);
  }
}
