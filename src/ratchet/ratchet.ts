import { decode, encode } from '@msgpack/msgpack';
import debug from 'debug';
import { ValidationError, assertLength } from '../errors.js';
import { KEY_SIZE, deriveX25519PublicKey, generateX25519KeyPair } from '../crypto/keys.js';
import { sha256 } from '../crypto/primitives.js';
import { bytesToHex, isAllZero } from '../crypto/utils.js';
import { RATCHET_SIZE, unpackAnnounce, type UnpackAnnounceOptions } from '../codec/announce.js';
import { DESTINATION_HASH_LENGTH } from '../codec/types.js';
import { decryptWithPrivateKey, encryptForPublicKey } from '../identity/identity.js';

const log = {
  ring: debug('meshwire:ratchet:ring'),
};

export const RATCHET_ID_LENGTH = 10;

/**
 * Known ratchets older than this are discarded
 */
export const RATCHET_EXPIRY_MS = 30 * 24 * 60 * 60 * 1000;

/**
 * Private ratchets a destination keeps for decryption
 */
export const MAX_RATCHETS = 512;

/**
 * Ratchet found (or not) in an announce
 */
export type RatchetExtraction =
  | { present: false }
  | { present: true; ratchet: Uint8Array; ratchetId: Uint8Array };

/**
 * Persisted record of a peer's latest ratchet
 */
export interface RatchetRecord {
  ratchet: Uint8Array;
  /** Unix time in seconds, fractional */
  received: number;
}

/**
 * New ratchet private key (an X25519 seed)
 */
export function generateRatchet(seed?: Uint8Array): Uint8Array {
  return generateX25519KeyPair(seed).privateKey;
}

export function ratchetPublicKey(ratchetPrivate: Uint8Array): Uint8Array {
  return deriveX25519PublicKey(ratchetPrivate);
}

/**
 * First 10 bytes of SHA-256 over the ratchet public key
 */
export function ratchetId(ratchetPublic: Uint8Array): Uint8Array {
  assertLength('ratchet', ratchetPublic, RATCHET_SIZE);
  return sha256(ratchetPublic).slice(0, RATCHET_ID_LENGTH);
}

/**
 * Encrypt to a ratchet public key. The recipient's identity hash salts HKDF.
 */
export function ratchetEncrypt(
  plaintext: Uint8Array,
  ratchetPublic: Uint8Array,
  identityHash: Uint8Array,
  options: { ephemeralPrivateKey?: Uint8Array; iv?: Uint8Array } = {}
): Uint8Array {
  assertLength('ratchet', ratchetPublic, RATCHET_SIZE);
  assertLength('identity hash', identityHash, DESTINATION_HASH_LENGTH);
  return encryptForPublicKey(plaintext, ratchetPublic, identityHash, options);
}

/**
 * Try one or more ratchet private keys. Returns null if none decrypts.
 */
export function ratchetDecrypt(
  ciphertext: Uint8Array,
  ratchetPrivate: Uint8Array | Uint8Array[],
  identityHash: Uint8Array
): Uint8Array | null {
  assertLength('identity hash', identityHash, DESTINATION_HASH_LENGTH);
  const candidates = Array.isArray(ratchetPrivate) ? ratchetPrivate : [ratchetPrivate];
  for (const candidate of candidates) {
    assertLength('ratchet private key', candidate, KEY_SIZE);
    const plaintext = decryptWithPrivateKey(ciphertext, candidate, identityHash);
    if (plaintext) {
      return plaintext;
    }
  }
  return null;
}

/**
 * Pull the ratchet out of announce data. An all-zero slot means none.
 */
export function extractRatchet(announceData: Uint8Array, options: UnpackAnnounceOptions = {}): RatchetExtraction {
  const { ratchet } = unpackAnnounce(announceData, options);
  if (!ratchet || isAllZero(ratchet)) {
    return { present: false };
  }
  return { present: true, ratchet, ratchetId: ratchetId(ratchet) };
}

/**
 * msgpack {ratchet, received}; received is always a float
 */
export function packRatchetRecord(record: RatchetRecord): Uint8Array {
  assertLength('ratchet', record.ratchet, RATCHET_SIZE);
  return encode({ ratchet: record.ratchet, received: record.received }, { forceIntegerToFloat: true });
}

export function unpackRatchetRecord(bytes: Uint8Array): RatchetRecord {
  let decoded: unknown;
  try {
    decoded = decode(bytes);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Malformed ratchet record: ${detail}`);
  }
  if (typeof decoded !== 'object' || decoded === null || Array.isArray(decoded) || decoded instanceof Uint8Array) {
    throw new ValidationError('Malformed ratchet record: expected a map');
  }
  const fields = new Map<string, unknown>(Object.entries(decoded));
  const ratchet = fields.get('ratchet');
  const received = fields.get('received');
  if (!(ratchet instanceof Uint8Array) || ratchet.length !== RATCHET_SIZE || typeof received !== 'number') {
    throw new ValidationError('Malformed ratchet record: bad ratchet or timestamp');
  }
  return { ratchet, received };
}

/**
 * A destination's own private ratchets, newest first
 */
export class RatchetRing {
  private ratchets: Uint8Array[];
  private readonly maxRatchets: number;

  constructor(options: { maxRatchets?: number; ratchets?: Uint8Array[] } = {}) {
    this.maxRatchets = options.maxRatchets ?? MAX_RATCHETS;
    if (!Number.isInteger(this.maxRatchets) || this.maxRatchets < 1) {
      throw new ValidationError(`Invalid ratchet limit: ${this.maxRatchets}`);
    }
    this.ratchets = (options.ratchets ?? []).map((ratchet) => {
      assertLength('ratchet private key', ratchet, KEY_SIZE);
      return ratchet.slice();
    });
  }

  get size(): number {
    return this.ratchets.length;
  }

  /**
   * Public key of the newest ratchet, rotating first if the ring is empty
   */
  get currentPublicKey(): Uint8Array {
    if (this.ratchets.length === 0) {
      this.rotate();
    }
    return ratchetPublicKey(this.ratchets[0]);
  }

  /**
   * Private keys to try when decrypting, newest first
   */
  get privateKeys(): Uint8Array[] {
    return this.ratchets.map((ratchet) => ratchet.slice());
  }

  /**
   * Add a fresh ratchet and drop the oldest beyond the limit.
   * Returns the new public key.
   */
  rotate(seed?: Uint8Array): Uint8Array {
    const ratchet = generateRatchet(seed);
    this.ratchets.unshift(ratchet);
    while (this.ratchets.length > this.maxRatchets) {
      this.ratchets.pop()?.fill(0);
    }
    const publicKey = ratchetPublicKey(ratchet);
    log.ring(`rotated to ratchet ${bytesToHex(ratchetId(publicKey))}, ${this.ratchets.length} held`);
    return publicKey;
  }

  /**
   * Overwrite and forget every ratchet
   */
  clear(): void {
    for (const ratchet of this.ratchets) {
      ratchet.fill(0);
    }
    this.ratchets = [];
  }
}
