import debug from 'debug';
import { ValidationError, assertLength, invalid, type VerificationResult } from '../errors.js';
import { KEY_SIZE, SIGNATURE_SIZE, sign } from '../crypto/keys.js';
import { fullHash, hkdf } from '../crypto/primitives.js';
import { concatBytes, constantTimeEqual, hexToBytes, utf8 } from '../crypto/utils.js';
import { HEADER_MINSIZE, IFAC_FLAG, IFAC_MIN_SIZE } from '../codec/types.js';

const log = {
  verify: debug('meshwire:ifac:verify'),
};

/**
 * Protocol-wide HKDF salt for access code keys
 */
export const IFAC_SALT = hexToBytes('adf54d882c9a9b80771eb4995d702d4a3e733391b2a0f53f416d9f907e55cff8');

export const IFAC_KEY_LENGTH = 64;

/**
 * Result of stripping an access code from a received packet
 */
export type IfacUnmaskResult =
  | { valid: true; packet: Uint8Array }
  | { valid: false; reason: string };

function assertTagLength(tagLength: number): void {
  if (!Number.isInteger(tagLength) || tagLength < IFAC_MIN_SIZE || tagLength > SIGNATURE_SIZE) {
    throw new ValidationError(`Invalid IFAC size: ${tagLength}`);
  }
}

/**
 * Origin secret from a network name and/or passphrase:
 * SHA-256 over the concatenated SHA-256 of each part present
 */
export function ifacOrigin(netname?: string, netkey?: string): Uint8Array {
  const parts: Uint8Array[] = [];
  if (netname) {
    parts.push(fullHash(utf8(netname)));
  }
  if (netkey) {
    parts.push(fullHash(utf8(netkey)));
  }
  if (parts.length === 0) {
    throw new ValidationError('IFAC needs a network name or a network key');
  }
  return fullHash(concatBytes(...parts));
}

/**
 * 64-byte access code key: HKDF over the origin with the fixed salt
 */
export function deriveIfacKey(origin: Uint8Array): Uint8Array {
  return hkdf(IFAC_KEY_LENGTH, origin, IFAC_SALT, null);
}

/**
 * Tag: the last `tagLength` bytes of an Ed25519 signature over the packet,
 * signed with the second half of the key
 */
export function computeIfac(key: Uint8Array, packet: Uint8Array, tagLength: number): Uint8Array {
  assertLength('IFAC key', key, IFAC_KEY_LENGTH);
  assertTagLength(tagLength);
  const signature = sign(key.subarray(KEY_SIZE), packet);
  return signature.slice(SIGNATURE_SIZE - tagLength);
}

export function verifyIfac(key: Uint8Array, packet: Uint8Array, tag: Uint8Array): VerificationResult {
  if (tag.length < IFAC_MIN_SIZE || tag.length > SIGNATURE_SIZE) {
    return invalid(`Invalid IFAC size: ${tag.length}`);
  }
  if (!constantTimeEqual(computeIfac(key, packet, tag.length), tag)) {
    return invalid('Access code mismatch');
  }
  return { valid: true };
}

function ifacMask(key: Uint8Array, tag: Uint8Array, length: number): Uint8Array {
  return hkdf(length, tag, key, null);
}

/**
 * Add an access code to an outgoing packet: set the IFAC flag, insert the
 * tag after the two header bytes and mask everything but the tag
 */
export function applyIfac(raw: Uint8Array, key: Uint8Array, tagLength: number): Uint8Array {
  if (raw.length < HEADER_MINSIZE) {
    throw new ValidationError(`Packet too short: ${raw.length} < ${HEADER_MINSIZE}`);
  }
  const tag = computeIfac(key, raw, tagLength);
  const mask = ifacMask(key, tag, raw.length + tagLength);

  const masked = concatBytes(Uint8Array.of(raw[0] | IFAC_FLAG, raw[1]), tag, raw.subarray(2));
  for (let i = 0; i < masked.length; i++) {
    if (i === 0) {
      masked[i] = (masked[i] ^ mask[i]) | IFAC_FLAG;
    } else if (i === 1 || i > tagLength + 1) {
      masked[i] ^= mask[i];
    }
  }
  return masked;
}

/**
 * Reverse of {@link applyIfac}. Packets without the flag, or whose tag does
 * not verify, are rejected.
 */
export function removeIfac(masked: Uint8Array, key: Uint8Array, tagLength: number): IfacUnmaskResult {
  assertTagLength(tagLength);
  if (masked.length < HEADER_MINSIZE + tagLength) {
    return { valid: false, reason: `Packet too short for access code: ${masked.length}` };
  }
  if ((masked[0] & IFAC_FLAG) === 0) {
    return { valid: false, reason: 'Packet carries no access code' };
  }

  const tag = masked.slice(2, 2 + tagLength);
  const mask = ifacMask(key, tag, masked.length);
  const unmasked = masked.slice();
  for (let i = 0; i < unmasked.length; i++) {
    if (i <= 1 || i > tagLength + 1) {
      unmasked[i] ^= mask[i];
    }
  }

  const packet = concatBytes(Uint8Array.of(unmasked[0] & ~IFAC_FLAG & 0xff, unmasked[1]), unmasked.subarray(2 + tagLength));
  const result = verifyIfac(key, packet, tag);
  if (!result.valid) {
    log.verify(`dropped packet: ${result.reason}`);
    return result;
  }
  return { valid: true, packet };
}
