import { ValidationError, assertLength } from '../errors.js';
import { sha256, truncatedHash } from '../crypto/primitives.js';
import { bytesToHex, concatBytes, utf8 } from '../crypto/utils.js';
import { DESTINATION_HASH_LENGTH, DestinationType, NAME_HASH_LENGTH } from '../codec/types.js';
import type { Identity } from './identity.js';

/**
 * An addressable endpoint: identity plus application name and aspects
 */
export interface Destination {
  type: DestinationType;
  appName: string;
  aspects: string[];
  /** Absent for PLAIN destinations */
  identity?: Identity;
  /** `appName.aspect1.aspect2...` */
  name: string;
  nameHash: Uint8Array;        // 10 bytes
  hash: Uint8Array;            // 16 bytes
  hexHash: string;
}

/**
 * Join app name and aspects, rejecting components that contain dots
 */
export function expandName(appName: string, aspects: string[] = []): string {
  if (appName.length === 0) {
    throw new ValidationError('App name must not be empty');
  }
  for (const component of [appName, ...aspects]) {
    if (component.includes('.')) {
      throw new ValidationError(`Dots are not allowed in app names or aspects: "${component}"`);
    }
  }
  return [appName, ...aspects].join('.');
}

/**
 * First 10 bytes of SHA-256 over the expanded name
 */
export function computeNameHash(appName: string, aspects: string[] = []): Uint8Array {
  return sha256(utf8(expandName(appName, aspects))).slice(0, NAME_HASH_LENGTH);
}

/**
 * SHA-256(name_hash + identity_hash) truncated to 16 bytes.
 * Without an identity hash the name hash alone is hashed.
 */
export function computeDestinationHash(nameHash: Uint8Array, identityHash?: Uint8Array): Uint8Array {
  assertLength('name hash', nameHash, NAME_HASH_LENGTH);
  if (!identityHash) {
    return truncatedHash(nameHash);
  }
  assertLength('identity hash', identityHash, DESTINATION_HASH_LENGTH);
  return truncatedHash(concatBytes(nameHash, identityHash));
}

/**
 * Build a destination. SINGLE destinations need an identity; PLAIN ones must
 * not have one.
 */
export function createDestination(
  identity: Identity | undefined,
  appName: string,
  aspects: string[] = [],
  type: DestinationType = identity ? DestinationType.SINGLE : DestinationType.PLAIN
): Destination {
  if (type === DestinationType.PLAIN && identity) {
    throw new ValidationError('PLAIN destinations cannot hold an identity');
  }
  if (type !== DestinationType.PLAIN && !identity) {
    throw new ValidationError('Destination requires an identity');
  }

  const nameHash = computeNameHash(appName, aspects);
  const hash = computeDestinationHash(nameHash, identity?.hash);

  return {
    type,
    appName,
    aspects: [...aspects],
    identity,
    name: expandName(appName, aspects),
    nameHash,
    hash,
    hexHash: bytesToHex(hash),
  };
}
