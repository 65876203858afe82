import { ed25519, x25519 } from '@noble/curves/ed25519';
import { ValidationError, assertLength } from '../errors.js';
import { secureRandomBytes } from './utils.js';

/**
 * Size of every private seed, public key and shared secret on both curves
 */
export const KEY_SIZE = 32;

/**
 * Ed25519 signature size
 */
export const SIGNATURE_SIZE = 64;

/**
 * Raw keypair on one curve
 */
export interface KeyPair {
  privateKey: Uint8Array; // 32 bytes
  publicKey: Uint8Array;  // 32 bytes
}

/**
 * Create an X25519 keypair. The seed is kept as the private key and
 * clamped only when used.
 */
export function generateX25519KeyPair(seed?: Uint8Array): KeyPair {
  const privateKey = seed ? seed.slice() : secureRandomBytes(KEY_SIZE);
  assertLength('X25519 seed', privateKey, KEY_SIZE);
  return { privateKey, publicKey: x25519.getPublicKey(privateKey) };
}

/**
 * Create an Ed25519 keypair from a 32-byte seed
 */
export function generateEd25519KeyPair(seed?: Uint8Array): KeyPair {
  const privateKey = seed ? seed.slice() : secureRandomBytes(KEY_SIZE);
  assertLength('Ed25519 seed', privateKey, KEY_SIZE);
  return { privateKey, publicKey: ed25519.getPublicKey(privateKey) };
}

export function deriveX25519PublicKey(privateKey: Uint8Array): Uint8Array {
  assertLength('X25519 private key', privateKey, KEY_SIZE);
  return x25519.getPublicKey(privateKey);
}

export function deriveEd25519PublicKey(privateKey: Uint8Array): Uint8Array {
  assertLength('Ed25519 private key', privateKey, KEY_SIZE);
  return ed25519.getPublicKey(privateKey);
}

/**
 * X25519 Diffie-Hellman. Low-order peer keys that would give an all-zero
 * secret are rejected.
 */
export function exchange(privateKey: Uint8Array, peerPublicKey: Uint8Array): Uint8Array {
  assertLength('X25519 private key', privateKey, KEY_SIZE);
  assertLength('X25519 public key', peerPublicKey, KEY_SIZE);
  try {
    return x25519.getSharedSecret(privateKey, peerPublicKey);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Key exchange failed: ${detail}`);
  }
}

/**
 * Sign a message using ed25519
 */
export function sign(privateKey: Uint8Array, message: Uint8Array): Uint8Array {
  assertLength('Ed25519 private key', privateKey, KEY_SIZE);
  return ed25519.sign(message, privateKey);
}

/**
 * Verify an ed25519 signature
 */
export function verify(
  signature: Uint8Array,
  message: Uint8Array,
  publicKey: Uint8Array
): boolean {
  if (signature.length !== SIGNATURE_SIZE || publicKey.length !== KEY_SIZE) {
    return false;
  }
  try {
    return ed25519.verify(signature, message, publicKey);
  } catch {
    return false;
  }
}
