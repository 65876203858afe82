import { randomBytes } from '@noble/ciphers/webcrypto';
import { equalBytes } from '@noble/ciphers/utils';
import { ValidationError } from '../errors.js';

const textEncoder = new TextEncoder();

/**
 * Generate cryptographically secure random bytes
 */
export function secureRandomBytes(length: number): Uint8Array {
  return randomBytes(length);
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((acc, arr) => acc + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Convert hex string to Uint8Array
 */
export function hexToBytes(hex: string): Uint8Array {
  const cleanHex = hex.startsWith('0x') ? hex.slice(2) : hex;
  if (cleanHex.length % 2 !== 0) {
    throw new ValidationError('Invalid hex string length');
  }
  if (!/^[0-9a-fA-F]*$/.test(cleanHex)) {
    throw new ValidationError('Invalid hex string characters');
  }
  const bytes = new Uint8Array(cleanHex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(cleanHex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Convert Uint8Array to hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * UTF-8 encode a string
 */
export function utf8(text: string): Uint8Array {
  return textEncoder.encode(text);
}

/**
 * Compare two byte arrays without early exit on the first differing byte
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  return equalBytes(a, b);
}

/**
 * True when every byte is zero (an empty array counts as zero)
 */
export function isAllZero(bytes: Uint8Array): boolean {
  let acc = 0;
  for (const byte of bytes) {
    acc |= byte;
  }
  return acc === 0;
}

/**
 * Write a non-negative integer as `length` big-endian bytes
 */
export function uintToBytesBE(value: number, length: number): Uint8Array {
  if (!Number.isSafeInteger(value) || value < 0 || value >= 2 ** (8 * length)) {
    throw new ValidationError(`Value ${value} does not fit in ${length} bytes`);
  }
  const out = new Uint8Array(length);
  let remaining = value;
  for (let i = length - 1; i >= 0; i--) {
    out[i] = remaining % 256;
    remaining = Math.floor(remaining / 256);
  }
  return out;
}

/**
 * Read big-endian bytes as an unsigned integer
 */
export function bytesToUintBE(bytes: Uint8Array): number {
  let value = 0;
  for (const byte of bytes) {
    value = value * 256 + byte;
  }
  return value;
}
