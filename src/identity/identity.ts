import debug from 'debug';
import { MeshwireError, ValidationError, assertLength } from '../errors.js';
import {
  KEY_SIZE,
  deriveEd25519PublicKey,
  deriveX25519PublicKey,
  exchange,
  generateEd25519KeyPair,
  generateX25519KeyPair,
  sign,
  verify,
} from '../crypto/keys.js';
import { hkdf, truncatedHash } from '../crypto/primitives.js';
import { TOKEN_OVERHEAD, decryptToken, encryptToken } from '../crypto/token.js';
import { bytesToHex, concatBytes, hexToBytes } from '../crypto/utils.js';

const log = {
  decrypt: debug('meshwire:identity:decrypt'),
};

/**
 * x25519 public key followed by ed25519 public key
 */
export const PUBLIC_KEY_SIZE = KEY_SIZE * 2;

/**
 * Length of the key handed to the token after ECDH + HKDF
 */
export const DERIVED_KEY_LENGTH = 64;

/**
 * Options for encrypting to a public key
 */
export interface EncryptOptions {
  /** Ratchet public key to use instead of the identity's X25519 key */
  ratchet?: Uint8Array;
  /** Fixed ephemeral X25519 private key, for reproducible output */
  ephemeralPrivateKey?: Uint8Array;
  /** Fixed token IV, for reproducible output */
  iv?: Uint8Array;
}

/**
 * Options for decrypting with an identity
 */
export interface DecryptOptions {
  /** Ratchet private keys to try before the identity key */
  ratchets?: Uint8Array[];
  /** Refuse to fall back to the identity key when no ratchet matches */
  enforceRatchets?: boolean;
}

/**
 * SHA-256 of the 64-byte public key, truncated to 16 bytes
 */
export function identityHashFromPublicKey(publicKey: Uint8Array): Uint8Array {
  assertLength('public key', publicKey, PUBLIC_KEY_SIZE);
  return truncatedHash(publicKey);
}

/**
 * Ephemeral ECDH to `targetPublicKey`, HKDF salted with `salt`, then token.
 * Output: [ephemeral public key (32)][token]
 */
export function encryptForPublicKey(
  plaintext: Uint8Array,
  targetPublicKey: Uint8Array,
  salt: Uint8Array,
  options: Omit<EncryptOptions, 'ratchet'> = {}
): Uint8Array {
  const ephemeral = generateX25519KeyPair(options.ephemeralPrivateKey);
  const sharedSecret = exchange(ephemeral.privateKey, targetPublicKey);
  const derivedKey = hkdf(DERIVED_KEY_LENGTH, sharedSecret, salt, null);
  return concatBytes(ephemeral.publicKey, encryptToken(plaintext, derivedKey, options.iv));
}

/**
 * Inverse of {@link encryptForPublicKey}. Returns null when the token does
 * not authenticate under this private key.
 */
export function decryptWithPrivateKey(
  ciphertext: Uint8Array,
  privateKey: Uint8Array,
  salt: Uint8Array
): Uint8Array | null {
  if (ciphertext.length <= KEY_SIZE + TOKEN_OVERHEAD) {
    log.decrypt(`ciphertext too short: ${ciphertext.length} bytes`);
    return null;
  }
  const peerPublicKey = ciphertext.subarray(0, KEY_SIZE);
  try {
    const sharedSecret = exchange(privateKey, peerPublicKey);
    const derivedKey = hkdf(DERIVED_KEY_LENGTH, sharedSecret, salt, null);
    return decryptToken(ciphertext.subarray(KEY_SIZE), derivedKey);
  } catch (error) {
    if (error instanceof MeshwireError) {
      return null;
    }
    throw error;
  }
}

function toBytes(value: Uint8Array | string): Uint8Array {
  return typeof value === 'string' ? hexToBytes(value) : value;
}

/**
 * An X25519 encryption key paired with an Ed25519 signing key
 */
export class Identity {
  /** x25519 public (32) + ed25519 public (32) */
  readonly publicKey: Uint8Array;
  /** Truncated hash of the public key (16 bytes) */
  readonly hash: Uint8Array;
  private readonly x25519Private: Uint8Array | null;
  private readonly ed25519Private: Uint8Array | null;

  private constructor(
    x25519Public: Uint8Array,
    ed25519Public: Uint8Array,
    x25519Private: Uint8Array | null,
    ed25519Private: Uint8Array | null
  ) {
    this.publicKey = concatBytes(x25519Public, ed25519Public);
    this.hash = identityHashFromPublicKey(this.publicKey);
    this.x25519Private = x25519Private;
    this.ed25519Private = ed25519Private;
  }

  /**
   * Fresh identity from the system CSPRNG
   */
  static generate(): Identity {
    return Identity.fromSeeds(generateX25519KeyPair().privateKey, generateEd25519KeyPair().privateKey);
  }

  /**
   * Deterministic identity from two 32-byte seeds
   */
  static fromSeeds(x25519Seed: Uint8Array, ed25519Seed: Uint8Array): Identity {
    const encryption = generateX25519KeyPair(x25519Seed);
    const signing = generateEd25519KeyPair(ed25519Seed);
    return new Identity(encryption.publicKey, signing.publicKey, encryption.privateKey, signing.privateKey);
  }

  /**
   * Load the 64-byte private record: x25519 private + ed25519 private
   */
  static fromPrivateKey(privateKey: Uint8Array | string): Identity {
    const bytes = toBytes(privateKey);
    assertLength('private key', bytes, KEY_SIZE * 2);
    return Identity.fromSeeds(bytes.slice(0, KEY_SIZE), bytes.slice(KEY_SIZE));
  }

  /**
   * Public-only identity, able to encrypt and validate but not decrypt or sign
   */
  static fromPublicKey(publicKey: Uint8Array | string): Identity {
    const bytes = toBytes(publicKey);
    assertLength('public key', bytes, PUBLIC_KEY_SIZE);
    return new Identity(bytes.slice(0, KEY_SIZE), bytes.slice(KEY_SIZE), null, null);
  }

  get x25519PublicKey(): Uint8Array {
    return this.publicKey.slice(0, KEY_SIZE);
  }

  get ed25519PublicKey(): Uint8Array {
    return this.publicKey.slice(KEY_SIZE);
  }

  get hexHash(): string {
    return bytesToHex(this.hash);
  }

  get hasPrivateKey(): boolean {
    return this.x25519Private !== null && this.ed25519Private !== null;
  }

  /**
   * The 64-byte private record
   */
  getPrivateKey(): Uint8Array {
    return concatBytes(this.requireX25519Private(), this.requireEd25519Private());
  }

  /**
   * Raw ed25519 seed, used where protocol proofs are signed directly
   */
  getSigningKey(): Uint8Array {
    return this.requireEd25519Private().slice();
  }

  /**
   * Encrypt to this identity, or to a ratchet it published
   */
  encrypt(plaintext: Uint8Array, options: EncryptOptions = {}): Uint8Array {
    const target = options.ratchet ?? this.x25519PublicKey;
    assertLength('ratchet', target, KEY_SIZE);
    return encryptForPublicKey(plaintext, target, this.hash, options);
  }

  /**
   * Try each ratchet, then the identity key unless ratchets are enforced.
   * Returns null if nothing decrypts.
   */
  decrypt(ciphertext: Uint8Array, options: DecryptOptions = {}): Uint8Array | null {
    const identityKey = this.requireX25519Private();

    for (const ratchet of options.ratchets ?? []) {
      const plaintext = decryptWithPrivateKey(ciphertext, ratchet, this.hash);
      if (plaintext) {
        return plaintext;
      }
    }

    if (options.enforceRatchets) {
      log.decrypt(`no ratchet matched for ${this.hexHash} and ratchets are enforced`);
      return null;
    }

    const plaintext = decryptWithPrivateKey(ciphertext, identityKey, this.hash);
    if (!plaintext) {
      log.decrypt(`decryption failed for ${this.hexHash}`);
    }
    return plaintext;
  }

  sign(message: Uint8Array): Uint8Array {
    return sign(this.requireEd25519Private(), message);
  }

  /**
   * Check a signature against this identity's ed25519 key
   */
  validate(signature: Uint8Array, message: Uint8Array): boolean {
    return verify(signature, message, this.ed25519PublicKey);
  }

  private requireX25519Private(): Uint8Array {
    if (!this.x25519Private) {
      throw new ValidationError('Identity holds no private key');
    }
    return this.x25519Private;
  }

  private requireEd25519Private(): Uint8Array {
    if (!this.ed25519Private) {
      throw new ValidationError('Identity holds no private key');
    }
    return this.ed25519Private;
  }
}

/**
 * Public halves re-derived from a private record, used to check loaded keys
 */
export function derivePublicKey(privateKey: Uint8Array): Uint8Array {
  assertLength('private key', privateKey, KEY_SIZE * 2);
  return concatBytes(
    deriveX25519PublicKey(privateKey.subarray(0, KEY_SIZE)),
    deriveEd25519PublicKey(privateKey.subarray(KEY_SIZE))
  );
}
