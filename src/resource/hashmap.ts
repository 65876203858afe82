import { ValidationError, assertLength, invalid, type VerificationResult } from '../errors.js';
import { HASH_LENGTH, TRUNCATED_HASH_LENGTH, fullHash, sha256 } from '../crypto/primitives.js';
import { bytesToHex, concatBytes, constantTimeEqual } from '../crypto/utils.js';

/**
 * Bytes per part in the hashmap
 */
export const MAPHASH_LEN = 4;

/**
 * Random salt for map hashes and the resource hash
 */
export const RANDOM_HASH_SIZE = 4;

/**
 * Map hash of one part: first 4 bytes of SHA-256(part + random hash)
 */
export function mapHash(part: Uint8Array, randomHash: Uint8Array): Uint8Array {
  return sha256(concatBytes(part, randomHash)).slice(0, MAPHASH_LEN);
}

/**
 * Concatenated map hashes, in part order
 */
export function buildHashmap(parts: Uint8Array[], randomHash: Uint8Array): Uint8Array {
  return concatBytes(...parts.map((part) => mapHash(part, randomHash)));
}

function assertHashmap(hashmap: Uint8Array): void {
  if (hashmap.length % MAPHASH_LEN !== 0) {
    throw new ValidationError(`Hashmap length ${hashmap.length} is not a multiple of ${MAPHASH_LEN}`);
  }
}

/**
 * Index of the first part whose map hash matches, scanning from `fromIndex`.
 * Returns -1 when absent.
 */
export function findPart(hashmap: Uint8Array, hash: Uint8Array, fromIndex = 0): number {
  assertHashmap(hashmap);
  assertLength('map hash', hash, MAPHASH_LEN);
  const count = hashmap.length / MAPHASH_LEN;
  for (let index = Math.max(0, fromIndex); index < count; index++) {
    const offset = index * MAPHASH_LEN;
    if (
      hashmap[offset] === hash[0] &&
      hashmap[offset + 1] === hash[1] &&
      hashmap[offset + 2] === hash[2] &&
      hashmap[offset + 3] === hash[3]
    ) {
      return index;
    }
  }
  return -1;
}

/**
 * Groups of part indexes sharing one map hash, keyed by the hash in hex
 */
export function hashmapCollisions(hashmap: Uint8Array): Map<string, number[]> {
  assertHashmap(hashmap);
  const seen = new Map<string, number[]>();
  for (let index = 0; index * MAPHASH_LEN < hashmap.length; index++) {
    const key = bytesToHex(hashmap.subarray(index * MAPHASH_LEN, (index + 1) * MAPHASH_LEN));
    const indexes = seen.get(key);
    if (indexes) {
      indexes.push(index);
    } else {
      seen.set(key, [index]);
    }
  }
  for (const [key, indexes] of seen) {
    if (indexes.length < 2) {
      seen.delete(key);
    }
  }
  return seen;
}

/**
 * Resource hash: full SHA-256 over data (with any metadata prefix) + random hash
 */
export function resourceHash(data: Uint8Array, randomHash: Uint8Array): Uint8Array {
  return fullHash(concatBytes(data, randomHash));
}

/**
 * Completion proof: SHA-256(data + resource hash) truncated to 16 bytes
 */
export function resourceProof(data: Uint8Array, hash: Uint8Array): Uint8Array {
  return fullHash(concatBytes(data, hash)).slice(0, TRUNCATED_HASH_LENGTH);
}

/**
 * Proof payload length: full resource hash + truncated proof
 */
export const RESOURCE_PROOF_PAYLOAD_LENGTH = HASH_LENGTH + TRUNCATED_HASH_LENGTH;

/**
 * Check a proof payload (resource hash + proof) against the sender's own
 * recomputation
 */
export function validateResourceProof(
  hash: Uint8Array,
  expectedProof: Uint8Array,
  payload: Uint8Array
): VerificationResult {
  if (payload.length !== RESOURCE_PROOF_PAYLOAD_LENGTH) {
    return invalid(`Invalid resource proof length: ${payload.length}`);
  }
  if (!constantTimeEqual(payload.subarray(0, HASH_LENGTH), hash)) {
    return invalid('Proof is for a different resource');
  }
  if (!constantTimeEqual(payload.subarray(HASH_LENGTH), expectedProof)) {
    return invalid('Resource proof mismatch');
  }
  return { valid: true };
}
