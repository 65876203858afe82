import { describe, it, expect } from 'vitest';
import {
  Identity,
  identityHashFromPublicKey,
  encryptForPublicKey,
  decryptWithPrivateKey,
  derivePublicKey,
  expandName,
  computeNameHash,
  computeDestinationHash,
  createDestination,
} from '../src/identity/index.js';
import { DestinationType } from '../src/codec/index.js';
import { bytesToHex, hexToBytes, truncatedHash, utf8, concatBytes } from '../src/crypto/index.js';
import { ValidationError } from '../src/errors.js';

const X25519_SEED = '77076d0a7318a57d3c16c17251b26645df4c2f87ebc0992ab177fba51db92c2a';
const X25519_PUBLIC = '8520f0098930a754748b7ddcb43ef75a0dbf3a0d26381af4eba4a98eaa9b4e6a';
const ED25519_SEED = '9d61b19deffd5a60ba844af492ec2cc44449c5697b326919703bac031cae7f60';
const ED25519_PUBLIC = 'd75a980182b10ab7d54bfed3c964073a0ee172f3daa62325af021a68f707511a';
const EPHEMERAL_SEED = '5dab087e624a8a4b79e17f8b83800ee66f3bb1292618b6fd1c2f8b27ff88e0eb';
const EPHEMERAL_PUBLIC = 'de9edb7d7b7dc1b4d35b61c2ece435373f8343c85b78674dadfc7e146f882b4f';

describe('Identity', () => {
  describe('construction', () => {
    it('should lay out the public key as x25519 then ed25519', () => {
      const identity = Identity.fromSeeds(hexToBytes(X25519_SEED), hexToBytes(ED25519_SEED));
      expect(bytesToHex(identity.publicKey)).toBe(X25519_PUBLIC + ED25519_PUBLIC);
      expect(bytesToHex(identity.x25519PublicKey)).toBe(X25519_PUBLIC);
      expect(bytesToHex(identity.ed25519PublicKey)).toBe(ED25519_PUBLIC);
    });

    it('should hash the public key to 16 bytes', () => {
      const identity = Identity.fromSeeds(hexToBytes(X25519_SEED), hexToBytes(ED25519_SEED));
      expect(identity.hash.length).toBe(16);
      expect(identity.hexHash).toBe(bytesToHex(truncatedHash(identity.publicKey)));
      expect(bytesToHex(identityHashFromPublicKey(identity.publicKey))).toBe(identity.hexHash);
    });

    it('should be deterministic for all-zero seeds', () => {
      const a = Identity.fromSeeds(new Uint8Array(32), new Uint8Array(32));
      const b = Identity.fromSeeds(new Uint8Array(32), new Uint8Array(32));
      expect(a.hexHash).toBe(b.hexHash);
      expect(bytesToHex(a.publicKey)).toBe(bytesToHex(b.publicKey));
    });

    it('should round-trip the 64-byte private record', () => {
      const identity = Identity.generate();
      const restored = Identity.fromPrivateKey(identity.getPrivateKey());
      expect(restored.hexHash).toBe(identity.hexHash);
      expect(Identity.fromPrivateKey(bytesToHex(identity.getPrivateKey())).hexHash).toBe(identity.hexHash);
    });

    it('should store private seeds in x25519, ed25519 order', () => {
      const identity = Identity.fromSeeds(hexToBytes(X25519_SEED), hexToBytes(ED25519_SEED));
      expect(bytesToHex(identity.getPrivateKey())).toBe(X25519_SEED + ED25519_SEED);
      expect(bytesToHex(identity.getSigningKey())).toBe(ED25519_SEED);
      expect(bytesToHex(derivePublicKey(identity.getPrivateKey()))).toBe(X25519_PUBLIC + ED25519_PUBLIC);
    });

    it('should build public-only identities', () => {
      const identity = Identity.fromPublicKey(X25519_PUBLIC + ED25519_PUBLIC);
      expect(identity.hasPrivateKey).toBe(false);
      expect(() => identity.getPrivateKey()).toThrow('Identity holds no private key');
      expect(() => identity.sign(utf8('x'))).toThrow(ValidationError);
    });

    it('should reject wrong key sizes', () => {
      expect(() => Identity.fromPrivateKey(new Uint8Array(32))).toThrow(
        'Invalid private key length: expected 64 bytes, got 32'
      );
      expect(() => Identity.fromPublicKey(new Uint8Array(63))).toThrow(
        'Invalid public key length: expected 64 bytes, got 63'
      );
    });
  });

  describe('encrypt / decrypt', () => {
    it('should decrypt what was encrypted to it', () => {
      const identity = Identity.generate();
      const publicOnly = Identity.fromPublicKey(identity.publicKey);
      const ciphertext = publicOnly.encrypt(utf8('Hello, identity!'));
      expect(new TextDecoder().decode(identity.decrypt(ciphertext) ?? new Uint8Array(0))).toBe('Hello, identity!');
    });

    it('should prefix the ephemeral public key and add token overhead', () => {
      const identity = Identity.generate();
      const ciphertext = identity.encrypt(utf8('hello'), { ephemeralPrivateKey: hexToBytes(EPHEMERAL_SEED) });
      expect(ciphertext.length).toBe(32 + 64);
      expect(bytesToHex(ciphertext.subarray(0, 32))).toBe(EPHEMERAL_PUBLIC);
    });

    it('should be reproducible with a fixed ephemeral key and IV', () => {
      const identity = Identity.generate();
      const options = { ephemeralPrivateKey: hexToBytes(EPHEMERAL_SEED), iv: new Uint8Array(16).fill(1) };
      expect(bytesToHex(identity.encrypt(utf8('same'), options))).toBe(
        bytesToHex(identity.encrypt(utf8('same'), options))
      );
    });

    it('should return null for a different identity', () => {
      const alice = Identity.generate();
      const eve = Identity.generate();
      expect(eve.decrypt(alice.encrypt(utf8('private')))).toBeNull();
    });

    it('should return null for a tampered or truncated ciphertext', () => {
      const identity = Identity.generate();
      const ciphertext = identity.encrypt(utf8('private'));
      ciphertext[40] ^= 0xff;
      expect(identity.decrypt(ciphertext)).toBeNull();
      expect(identity.decrypt(new Uint8Array(80))).toBeNull();
    });

    it('should try ratchets before the identity key', () => {
      const identity = Identity.generate();
      const ratchetPrivate = new Uint8Array(32).fill(0x42);
      const ratchetPublic = Identity.fromSeeds(ratchetPrivate, new Uint8Array(32)).x25519PublicKey;
      const ciphertext = identity.encrypt(utf8('ratcheted'), { ratchet: ratchetPublic });

      expect(identity.decrypt(ciphertext)).toBeNull();
      expect(bytesToHex(identity.decrypt(ciphertext, { ratchets: [ratchetPrivate] }) ?? new Uint8Array(0))).toBe(
        bytesToHex(utf8('ratcheted'))
      );
    });

    it('should refuse the identity key when ratchets are enforced', () => {
      const identity = Identity.generate();
      const ciphertext = identity.encrypt(utf8('plain identity'));
      expect(identity.decrypt(ciphertext, { ratchets: [], enforceRatchets: true })).toBeNull();
      expect(identity.decrypt(ciphertext, { ratchets: [] })).not.toBeNull();
    });

    it('should salt the key derivation with the given salt', () => {
      const target = Identity.generate();
      const ciphertext = encryptForPublicKey(utf8('salted'), target.x25519PublicKey, utf8('salt-a'));
      const privateKey = target.getPrivateKey().subarray(0, 32);
      expect(decryptWithPrivateKey(ciphertext, privateKey, utf8('salt-b'))).toBeNull();
      expect(bytesToHex(decryptWithPrivateKey(ciphertext, privateKey, utf8('salt-a')) ?? new Uint8Array(0))).toBe(
        bytesToHex(utf8('salted'))
      );
    });
  });

  describe('sign / validate', () => {
    it('should validate its own signatures', () => {
      const identity = Identity.generate();
      const signature = identity.sign(utf8('announce me'));
      expect(signature.length).toBe(64);
      expect(Identity.fromPublicKey(identity.publicKey).validate(signature, utf8('announce me'))).toBe(true);
      expect(identity.validate(signature, utf8('announce you'))).toBe(false);
    });
  });
});

describe('Destination', () => {
  describe('expandName', () => {
    it('should join app name and aspects with dots', () => {
      expect(expandName('app', ['a', 'b'])).toBe('app.a.b');
      expect(expandName('test')).toBe('test');
    });

    it('should reject dots inside components', () => {
      expect(() => expandName('my.app')).toThrow('Dots are not allowed');
      expect(() => expandName('app', ['x.y'])).toThrow(ValidationError);
      expect(() => expandName('')).toThrow('App name must not be empty');
    });
  });

  describe('computeNameHash', () => {
    it('should take the first 10 bytes of SHA-256 over the name', () => {
      // SHA-256("test") = 9f86d081884c7d659a2feaa0c55ad015...
      expect(bytesToHex(computeNameHash('test'))).toBe('9f86d081884c7d659a2f');
    });
  });

  describe('computeDestinationHash', () => {
    it('should hash name hash followed by identity hash', () => {
      const identity = Identity.fromSeeds(new Uint8Array(32), new Uint8Array(32));
      const nameHash = computeNameHash('test');
      expect(bytesToHex(computeDestinationHash(nameHash, identity.hash))).toBe(
        bytesToHex(truncatedHash(concatBytes(nameHash, identity.hash)))
      );
    });

    it('should hash the name hash alone without an identity', () => {
      const nameHash = computeNameHash('test');
      expect(bytesToHex(computeDestinationHash(nameHash))).toBe(bytesToHex(truncatedHash(nameHash)));
    });
  });

  describe('createDestination', () => {
    it('should build a SINGLE destination for an identity', () => {
      const identity = Identity.generate();
      const destination = createDestination(identity, 'meshtest', ['inbox']);
      expect(destination.type).toBe(DestinationType.SINGLE);
      expect(destination.name).toBe('meshtest.inbox');
      expect(destination.hash.length).toBe(16);
      expect(destination.hexHash).toBe(
        bytesToHex(computeDestinationHash(computeNameHash('meshtest', ['inbox']), identity.hash))
      );
    });

    it('should give distinct identities distinct destinations', () => {
      const a = createDestination(Identity.generate(), 'meshtest');
      const b = createDestination(Identity.generate(), 'meshtest');
      expect(a.hexHash).not.toBe(b.hexHash);
    });

    it('should build PLAIN destinations without an identity', () => {
      const destination = createDestination(undefined, 'broadcast');
      expect(destination.type).toBe(DestinationType.PLAIN);
      expect(destination.identity).toBeUndefined();
    });

    it('should refuse mismatched identity and type', () => {
      expect(() => createDestination(Identity.generate(), 'x', [], DestinationType.PLAIN)).toThrow(
        'PLAIN destinations cannot hold an identity'
      );
      expect(() => createDestination(undefined, 'x', [], DestinationType.SINGLE)).toThrow(
        'Destination requires an identity'
      );
    });
  });
});
