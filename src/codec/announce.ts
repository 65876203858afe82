import debug from 'debug';
import { ValidationError, assertLength } from '../errors.js';
import { KEY_SIZE, SIGNATURE_SIZE, verify } from '../crypto/keys.js';
import {
  bytesToHex,
  bytesToUintBE,
  concatBytes,
  constantTimeEqual,
  isAllZero,
  secureRandomBytes,
  uintToBytesBE,
} from '../crypto/utils.js';
import { PUBLIC_KEY_SIZE, identityHashFromPublicKey } from '../identity/identity.js';
import { computeDestinationHash, type Destination } from '../identity/destination.js';
import { createPacket, packPacket } from './packet.js';
import { DESTINATION_HASH_LENGTH, NAME_HASH_LENGTH, PacketContext, PacketType } from './types.js';

const log = {
  verify: debug('meshwire:announce:verify'),
};

/**
 * random(5) + unix seconds(5)
 */
export const RANDOM_HASH_LENGTH = 10;

/**
 * Ratchet public key size
 */
export const RATCHET_SIZE = KEY_SIZE;

/**
 * Announce without ratchet and without app data
 */
export const ANNOUNCE_MIN_SIZE = PUBLIC_KEY_SIZE + NAME_HASH_LENGTH + RANDOM_HASH_LENGTH + SIGNATURE_SIZE;

/**
 * Length from which an announce is read with a ratchet when the caller
 * does not say
 */
export const ANNOUNCE_RATCHET_MIN_SIZE = ANNOUNCE_MIN_SIZE + RATCHET_SIZE;

const NAME_HASH_OFFSET = PUBLIC_KEY_SIZE;
const RANDOM_HASH_OFFSET = NAME_HASH_OFFSET + NAME_HASH_LENGTH;
const RATCHET_OFFSET = RANDOM_HASH_OFFSET + RANDOM_HASH_LENGTH;

/**
 * Announce payload fields
 */
export interface Announce {
  publicKey: Uint8Array;   // 64 bytes
  nameHash: Uint8Array;    // 10 bytes
  randomHash: Uint8Array;  // 10 bytes
  /** Present when the layout carries a ratchet slot, even an all-zero one */
  ratchet?: Uint8Array;    // 32 bytes
  signature: Uint8Array;   // 64 bytes
  appData: Uint8Array;
}

export interface UnpackAnnounceOptions {
  /**
   * Whether the payload carries a ratchet (the packet's context flag).
   * Inferred from the length when omitted.
   */
  hasRatchet?: boolean;
}

export interface AnnounceVerification {
  valid: boolean;
  signatureValid: boolean;
  /** Only set when destination hash validation was requested */
  destinationHashValid?: boolean;
  reason?: string;
}

/**
 * Build a random hash: 5 random bytes followed by 5 bytes of big-endian
 * unix time in seconds
 */
export function makeRandomHash(options: { random?: Uint8Array; timestamp?: number } = {}): Uint8Array {
  const random = options.random ?? secureRandomBytes(5);
  assertLength('random prefix', random, 5);
  const timestamp = options.timestamp ?? Math.floor(Date.now() / 1000);
  return concatBytes(random, uintToBytesBE(timestamp, 5));
}

/**
 * Emission time embedded in a random hash, in unix seconds
 */
export function randomHashTimestamp(randomHash: Uint8Array): number {
  assertLength('random hash', randomHash, RANDOM_HASH_LENGTH);
  return bytesToUintBE(randomHash.subarray(5));
}

/**
 * The ratchet an announce actually offers. An all-zero slot counts as none.
 */
export function effectiveRatchet(announce: Announce): Uint8Array | undefined {
  if (!announce.ratchet || isAllZero(announce.ratchet)) {
    return undefined;
  }
  return announce.ratchet;
}

function assertAnnounceFields(fields: Omit<Announce, 'signature'>): void {
  assertLength('public key', fields.publicKey, PUBLIC_KEY_SIZE);
  assertLength('name hash', fields.nameHash, NAME_HASH_LENGTH);
  assertLength('random hash', fields.randomHash, RANDOM_HASH_LENGTH);
  if (fields.ratchet) {
    assertLength('ratchet', fields.ratchet, RATCHET_SIZE);
  }
}

/**
 * Bytes covered by the announce signature:
 * destination hash, public key, name hash, random hash, ratchet, app data
 */
export function announceSignedData(
  destinationHash: Uint8Array,
  fields: Omit<Announce, 'signature'>
): Uint8Array {
  assertLength('destination hash', destinationHash, DESTINATION_HASH_LENGTH);
  assertAnnounceFields(fields);
  return concatBytes(
    destinationHash,
    fields.publicKey,
    fields.nameHash,
    fields.randomHash,
    fields.ratchet ?? new Uint8Array(0),
    fields.appData
  );
}

/**
 * Sign an announce with an identity that holds a private key
 */
export function signAnnounce(
  signer: { sign(message: Uint8Array): Uint8Array },
  destinationHash: Uint8Array,
  fields: Omit<Announce, 'signature'>
): Uint8Array {
  return signer.sign(announceSignedData(destinationHash, fields));
}

/**
 * Encode announce fields
 *
 * Layout:
 * [0-63]    public key
 * [64-73]   name hash
 * [74-83]   random hash
 * [84-115]  ratchet (only when present)
 * [..+64]   signature
 * [...]     app data
 */
export function packAnnounce(announce: Announce): Uint8Array {
  assertAnnounceFields(announce);
  assertLength('signature', announce.signature, SIGNATURE_SIZE);
  return concatBytes(
    announce.publicKey,
    announce.nameHash,
    announce.randomHash,
    announce.ratchet ?? new Uint8Array(0),
    announce.signature,
    announce.appData
  );
}

/**
 * Decode announce data. Without an explicit `hasRatchet`, anything of
 * ANNOUNCE_RATCHET_MIN_SIZE bytes or more is read with a ratchet slot.
 */
export function unpackAnnounce(data: Uint8Array, options: UnpackAnnounceOptions = {}): Announce {
  if (data.length < ANNOUNCE_MIN_SIZE) {
    throw new ValidationError(`Announce too short: ${data.length} < ${ANNOUNCE_MIN_SIZE}`);
  }
  const hasRatchet = options.hasRatchet ?? data.length >= ANNOUNCE_RATCHET_MIN_SIZE;
  if (hasRatchet && data.length < ANNOUNCE_RATCHET_MIN_SIZE) {
    throw new ValidationError(
      `Announce too short for a ratchet: ${data.length} < ${ANNOUNCE_RATCHET_MIN_SIZE}`
    );
  }

  const signatureOffset = hasRatchet ? RATCHET_OFFSET + RATCHET_SIZE : RATCHET_OFFSET;
  const appDataOffset = signatureOffset + SIGNATURE_SIZE;

  return {
    publicKey: data.slice(0, NAME_HASH_OFFSET),
    nameHash: data.slice(NAME_HASH_OFFSET, RANDOM_HASH_OFFSET),
    randomHash: data.slice(RANDOM_HASH_OFFSET, RATCHET_OFFSET),
    ratchet: hasRatchet ? data.slice(RATCHET_OFFSET, signatureOffset) : undefined,
    signature: data.slice(signatureOffset, appDataOffset),
    appData: data.slice(appDataOffset),
  };
}

/**
 * Check the signature and, unless disabled, that the destination hash
 * follows from the embedded public key and name hash
 */
export function verifyAnnounce(
  destinationHash: Uint8Array,
  announce: Announce,
  options: { validateDestinationHash?: boolean } = {}
): AnnounceVerification {
  let signedData: Uint8Array;
  try {
    signedData = announceSignedData(destinationHash, announce);
  } catch (error) {
    if (error instanceof ValidationError) {
      return { valid: false, signatureValid: false, reason: error.message };
    }
    throw error;
  }

  const signatureValid = verify(announce.signature, signedData, announce.publicKey.subarray(KEY_SIZE));
  const result: AnnounceVerification = { valid: signatureValid, signatureValid };
  if (!signatureValid) {
    result.reason = 'Invalid announce signature';
  }

  if (options.validateDestinationHash ?? true) {
    const identityHash = identityHashFromPublicKey(announce.publicKey);
    const expected = computeDestinationHash(announce.nameHash, identityHash);
    const destinationHashValid = constantTimeEqual(expected, destinationHash);
    result.destinationHashValid = destinationHashValid;
    if (!destinationHashValid) {
      result.valid = false;
      result.reason ??= 'Destination hash does not match public key and name hash';
    }
  }

  if (!result.valid) {
    log.verify(`announce for ${bytesToHex(destinationHash)} rejected: ${result.reason}`);
  }
  return result;
}

/**
 * Create and sign an announce for a destination whose identity holds
 * private keys
 */
export function createAnnounce(
  destination: Destination,
  options: { appData?: Uint8Array; ratchet?: Uint8Array; randomHash?: Uint8Array } = {}
): Announce {
  const identity = destination.identity;
  if (!identity) {
    throw new ValidationError('Only destinations with an identity can be announced');
  }
  const fields: Omit<Announce, 'signature'> = {
    publicKey: identity.publicKey,
    nameHash: destination.nameHash,
    randomHash: options.randomHash ?? makeRandomHash(),
    ratchet: options.ratchet,
    appData: options.appData ?? new Uint8Array(0),
  };
  return { ...fields, signature: signAnnounce(identity, destination.hash, fields) };
}

/**
 * Frame an announce as an ANNOUNCE packet. The context flag marks a ratchet.
 */
export function packAnnouncePacket(
  destination: Destination,
  announce: Announce,
  options: { pathResponse?: boolean } = {}
): Uint8Array {
  return packPacket(
    createPacket({
      destinationType: destination.type,
      packetType: PacketType.ANNOUNCE,
      contextFlag: announce.ratchet !== undefined,
      destinationHash: destination.hash,
      context: options.pathResponse ? PacketContext.PATH_RESPONSE : PacketContext.NONE,
      data: packAnnounce(announce),
    })
  );
}
