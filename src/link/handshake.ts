import debug from 'debug';
import { UnsupportedModeError, ValidationError, assertLength, invalid, type VerificationResult } from '../errors.js';
import { KEY_SIZE, SIGNATURE_SIZE, verify } from '../crypto/keys.js';
import { AES_BLOCK_SIZE, hkdf, truncatedHash } from '../crypto/primitives.js';
import { TOKEN_OVERHEAD } from '../crypto/token.js';
import { bytesToHex, concatBytes } from '../crypto/utils.js';
import { getHashablePart, unpackPacket } from '../codec/packet.js';
import { DESTINATION_HASH_LENGTH, HEADER_MINSIZE } from '../codec/types.js';

const log = {
  proof: debug('meshwire:link:proof'),
};

/**
 * Ephemeral x25519 public key + ephemeral ed25519 public key
 */
export const ECPUBSIZE = 2 * KEY_SIZE;

/**
 * Size of the MTU/mode signalling suffix
 */
export const LINK_MTU_SIZE = 3;

export const MTU_BYTEMASK = 0x1fffff;
export const MODE_BYTEMASK = 0xe0;

/**
 * Link encryption modes, carried in the top 3 bits of the signalling bytes
 */
export enum LinkMode {
  AES128_CBC = 0x00,
  AES256_CBC = 0x01,
  AES256_GCM = 0x02,
}

/**
 * Modes this implementation can derive keys for
 */
export const ENABLED_MODES: readonly LinkMode[] = [LinkMode.AES128_CBC, LinkMode.AES256_CBC];

export const DEFAULT_LINK_MODE = LinkMode.AES256_CBC;

/**
 * Signalling values decoded from 3 bytes
 */
export interface Signalling {
  mtu: number;
  mode: LinkMode;
}

/**
 * Per-link key material
 */
export interface LinkKeys {
  /** Full HKDF output, handed to the link token as-is */
  derivedKey: Uint8Array;
  encryptionKey: Uint8Array;
  signingKey: Uint8Array;
}

export interface LinkRequestData {
  x25519PublicKey: Uint8Array;
  ed25519PublicKey: Uint8Array;
  signalling?: Signalling;
}

export interface LinkProofData {
  signature: Uint8Array;
  x25519PublicKey: Uint8Array;
  signalling?: Signalling;
}

/**
 * Narrow a number to an enabled link mode
 */
export function assertSupportedMode(mode: number): LinkMode {
  for (const enabled of ENABLED_MODES) {
    if (enabled === mode) {
      return enabled;
    }
  }
  throw new UnsupportedModeError(mode);
}

/**
 * HKDF output length for a mode: 32 for AES-128, 64 for AES-256
 */
export function derivedKeyLength(mode: number): 32 | 64 {
  const supported = assertSupportedMode(mode);
  return supported === LinkMode.AES128_CBC ? 32 : 64;
}

/**
 * Link MDU for a given MTU
 */
export function linkMdu(mtu: number): number {
  return Math.floor((mtu - HEADER_MINSIZE - TOKEN_OVERHEAD) / AES_BLOCK_SIZE) * AES_BLOCK_SIZE - 1;
}

/**
 * Pack MTU and mode into 3 big-endian bytes: mode << 21 | mtu
 */
export function encodeSignalling(mtu: number, mode: number): Uint8Array {
  if (!Number.isInteger(mtu) || mtu < 0 || mtu > MTU_BYTEMASK) {
    throw new ValidationError(`Invalid MTU for signalling: ${mtu}`);
  }
  assertSupportedMode(mode);
  const value = (mtu & MTU_BYTEMASK) + (((mode << 5) & MODE_BYTEMASK) << 16);
  return Uint8Array.of((value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff);
}

export function parseSignalling(bytes: Uint8Array): Signalling {
  assertLength('signalling', bytes, LINK_MTU_SIZE);
  const mode = assertSupportedMode((bytes[0] & MODE_BYTEMASK) >> 5);
  const mtu = ((bytes[0] << 16) | (bytes[1] << 8) | bytes[2]) & MTU_BYTEMASK;
  return { mtu, mode };
}

/**
 * Link id: truncated hash of the request's hashable part, with anything
 * past the key pair (the signalling suffix) stripped so it does not change
 * the id
 */
export function linkIdFromPacket(raw: Uint8Array): Uint8Array {
  const packet = unpackPacket(raw);
  if (packet.data.length < ECPUBSIZE) {
    throw new ValidationError(`Link request data too short: ${packet.data.length} < ${ECPUBSIZE}`);
  }
  const hashable = getHashablePart(raw);
  const extra = packet.data.length - ECPUBSIZE;
  return truncatedHash(hashable.subarray(0, hashable.length - extra));
}

/**
 * HKDF over the ECDH secret, salted with the link id. Info is always empty.
 */
export function deriveLinkKey(
  sharedSecret: Uint8Array,
  linkId: Uint8Array,
  mode: number = DEFAULT_LINK_MODE
): LinkKeys {
  assertLength('link id', linkId, DESTINATION_HASH_LENGTH);
  const length = derivedKeyLength(mode);
  const derivedKey = hkdf(length, sharedSecret, linkId, null);
  return {
    derivedKey,
    encryptionKey: derivedKey.slice(0, length / 2),
    signingKey: derivedKey.slice(length / 2),
  };
}

/**
 * link id + receiver x25519 public + receiver ed25519 public + signalling
 */
export function linkProofSignedData(
  linkId: Uint8Array,
  receiverX25519PublicKey: Uint8Array,
  receiverEd25519PublicKey: Uint8Array,
  signalling: Uint8Array
): Uint8Array {
  assertLength('link id', linkId, DESTINATION_HASH_LENGTH);
  assertLength('receiver x25519 public key', receiverX25519PublicKey, KEY_SIZE);
  assertLength('receiver ed25519 public key', receiverEd25519PublicKey, KEY_SIZE);
  if (signalling.length !== 0 && signalling.length !== LINK_MTU_SIZE) {
    throw new ValidationError(`Invalid signalling length: ${signalling.length}`);
  }
  return concatBytes(linkId, receiverX25519PublicKey, receiverEd25519PublicKey, signalling);
}

/**
 * Sign a link proof with the receiving identity
 */
export function proveLink(
  signer: { sign(message: Uint8Array): Uint8Array; ed25519PublicKey: Uint8Array },
  linkId: Uint8Array,
  receiverX25519PublicKey: Uint8Array,
  signalling: Uint8Array
): Uint8Array {
  return signer.sign(
    linkProofSignedData(linkId, receiverX25519PublicKey, signer.ed25519PublicKey, signalling)
  );
}

export function verifyLinkProof(
  receiverEd25519PublicKey: Uint8Array,
  signature: Uint8Array,
  linkId: Uint8Array,
  receiverX25519PublicKey: Uint8Array,
  signalling: Uint8Array
): VerificationResult {
  let signedData: Uint8Array;
  try {
    signedData = linkProofSignedData(linkId, receiverX25519PublicKey, receiverEd25519PublicKey, signalling);
  } catch (error) {
    if (error instanceof ValidationError) {
      return invalid(error.message);
    }
    throw error;
  }
  if (!verify(signature, signedData, receiverEd25519PublicKey)) {
    log.proof(`invalid proof signature for link ${bytesToHex(linkId)}`);
    return invalid('Invalid link proof signature');
  }
  return { valid: true };
}

export function packLinkRequestData(
  x25519PublicKey: Uint8Array,
  ed25519PublicKey: Uint8Array,
  signalling?: Uint8Array
): Uint8Array {
  assertLength('x25519 public key', x25519PublicKey, KEY_SIZE);
  assertLength('ed25519 public key', ed25519PublicKey, KEY_SIZE);
  if (signalling) {
    assertLength('signalling', signalling, LINK_MTU_SIZE);
  }
  return concatBytes(x25519PublicKey, ed25519PublicKey, signalling ?? new Uint8Array(0));
}

/**
 * Split link request data; accepts 64 or 67 bytes
 */
export function parseLinkRequestData(data: Uint8Array): LinkRequestData {
  if (data.length !== ECPUBSIZE && data.length !== ECPUBSIZE + LINK_MTU_SIZE) {
    throw new ValidationError(
      `Invalid link request data length: expected ${ECPUBSIZE} or ${ECPUBSIZE + LINK_MTU_SIZE} bytes, got ${data.length}`
    );
  }
  return {
    x25519PublicKey: data.slice(0, KEY_SIZE),
    ed25519PublicKey: data.slice(KEY_SIZE, ECPUBSIZE),
    signalling: data.length > ECPUBSIZE ? parseSignalling(data.subarray(ECPUBSIZE)) : undefined,
  };
}

/**
 * [signature (64)][receiver x25519 public (32)][signalling (3, optional)]
 */
export function packLinkProofData(
  signature: Uint8Array,
  x25519PublicKey: Uint8Array,
  signalling?: Uint8Array
): Uint8Array {
  assertLength('signature', signature, SIGNATURE_SIZE);
  assertLength('x25519 public key', x25519PublicKey, KEY_SIZE);
  if (signalling) {
    assertLength('signalling', signalling, LINK_MTU_SIZE);
  }
  return concatBytes(signature, x25519PublicKey, signalling ?? new Uint8Array(0));
}

export function parseLinkProofData(data: Uint8Array): LinkProofData {
  const base = SIGNATURE_SIZE + KEY_SIZE;
  if (data.length !== base && data.length !== base + LINK_MTU_SIZE) {
    throw new ValidationError(
      `Invalid link proof length: expected ${base} or ${base + LINK_MTU_SIZE} bytes, got ${data.length}`
    );
  }
  return {
    signature: data.slice(0, SIGNATURE_SIZE),
    x25519PublicKey: data.slice(SIGNATURE_SIZE, base),
    signalling: data.length > base ? parseSignalling(data.subarray(base)) : undefined,
  };
}
