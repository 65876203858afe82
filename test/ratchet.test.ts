import { describe, it, expect } from 'vitest';
import {
  RATCHET_EXPIRY_MS,
  generateRatchet,
  ratchetPublicKey,
  ratchetId,
  ratchetEncrypt,
  ratchetDecrypt,
  extractRatchet,
  packRatchetRecord,
  unpackRatchetRecord,
  RatchetRing,
} from '../src/ratchet/index.js';
import { createAnnounce, packAnnounce } from '../src/codec/index.js';
import { Identity, createDestination } from '../src/identity/index.js';
import { bytesToHex, hexToBytes, sha256, utf8 } from '../src/crypto/index.js';
import { ValidationError } from '../src/errors.js';

const SEED = '77076d0a7318a57d3c16c17251b26645df4c2f87ebc0992ab177fba51db92c2a';
const SEED_PUBLIC = '8520f0098930a754748b7ddcb43ef75a0dbf3a0d26381af4eba4a98eaa9b4e6a';

describe('Ratchets', () => {
  describe('keys', () => {
    it('should treat a ratchet as an X25519 private key', () => {
      expect(bytesToHex(generateRatchet(hexToBytes(SEED)))).toBe(SEED);
      expect(bytesToHex(ratchetPublicKey(hexToBytes(SEED)))).toBe(SEED_PUBLIC);
      expect(generateRatchet().length).toBe(32);
    });

    it('should identify a ratchet by 10 bytes of its public key hash', () => {
      const publicKey = hexToBytes(SEED_PUBLIC);
      expect(bytesToHex(ratchetId(publicKey))).toBe(bytesToHex(sha256(publicKey).subarray(0, 10)));
      expect(() => ratchetId(new Uint8Array(16))).toThrow('Invalid ratchet length: expected 32 bytes, got 16');
    });
  });

  describe('ratchetEncrypt / ratchetDecrypt', () => {
    const identity = Identity.generate();

    it('should decrypt with the matching ratchet', () => {
      const ratchet = generateRatchet();
      const ciphertext = ratchetEncrypt(utf8('forward secret'), ratchetPublicKey(ratchet), identity.hash);
      expect(new TextDecoder().decode(ratchetDecrypt(ciphertext, ratchet, identity.hash) ?? new Uint8Array(0))).toBe(
        'forward secret'
      );
    });

    it('should try every ratchet in the list', () => {
      const ratchets = [generateRatchet(), generateRatchet(), generateRatchet()];
      const ciphertext = ratchetEncrypt(utf8('third'), ratchetPublicKey(ratchets[2]), identity.hash);
      expect(bytesToHex(ratchetDecrypt(ciphertext, ratchets, identity.hash) ?? new Uint8Array(0))).toBe(
        bytesToHex(utf8('third'))
      );
    });

    it('should return null when no ratchet matches', () => {
      const ciphertext = ratchetEncrypt(utf8('lost'), ratchetPublicKey(generateRatchet()), identity.hash);
      expect(ratchetDecrypt(ciphertext, [generateRatchet()], identity.hash)).toBeNull();
      expect(ratchetDecrypt(ciphertext, [], identity.hash)).toBeNull();
    });

    it('should bind the ciphertext to the identity hash', () => {
      const ratchet = generateRatchet();
      const ciphertext = ratchetEncrypt(utf8('bound'), ratchetPublicKey(ratchet), identity.hash);
      expect(ratchetDecrypt(ciphertext, ratchet, new Uint8Array(16))).toBeNull();
    });

    it('should interoperate with identity decryption', () => {
      const ratchet = generateRatchet();
      const ciphertext = ratchetEncrypt(utf8('via identity'), ratchetPublicKey(ratchet), identity.hash);
      expect(bytesToHex(identity.decrypt(ciphertext, { ratchets: [ratchet] }) ?? new Uint8Array(0))).toBe(
        bytesToHex(utf8('via identity'))
      );
    });
  });

  describe('extractRatchet', () => {
    const owner = Identity.generate();
    const destination = createDestination(owner, 'meshtest', ['ratchet']);

    it('should find the ratchet in announce data', () => {
      const publicKey = ratchetPublicKey(generateRatchet());
      const extraction = extractRatchet(packAnnounce(createAnnounce(destination, { ratchet: publicKey })));
      expect(extraction.present).toBe(true);
      if (extraction.present) {
        expect(bytesToHex(extraction.ratchet)).toBe(bytesToHex(publicKey));
        expect(bytesToHex(extraction.ratchetId)).toBe(bytesToHex(ratchetId(publicKey)));
      }
    });

    it('should report absence for announces without a ratchet', () => {
      expect(extractRatchet(packAnnounce(createAnnounce(destination)))).toEqual({ present: false });
    });

    it('should report absence for an all-zero slot', () => {
      const data = packAnnounce(createAnnounce(destination, { ratchet: new Uint8Array(32) }));
      expect(extractRatchet(data, { hasRatchet: true })).toEqual({ present: false });
    });
  });

  describe('ratchet records', () => {
    it('should encode a msgpack map with a float timestamp', () => {
      const ratchet = new Uint8Array(32).fill(0x5a);
      const packed = packRatchetRecord({ ratchet, received: 1700000000 });
      expect(packed[0]).toBe(0x82);

      const record = unpackRatchetRecord(packed);
      expect(bytesToHex(record.ratchet)).toBe(bytesToHex(ratchet));
      expect(record.received).toBe(1700000000);
    });

    it('should keep fractional timestamps', () => {
      const record = unpackRatchetRecord(packRatchetRecord({ ratchet: new Uint8Array(32), received: 1700000000.5 }));
      expect(record.received).toBe(1700000000.5);
    });

    it('should reject malformed records', () => {
      expect(() => unpackRatchetRecord(Uint8Array.of(0x90))).toThrow('expected a map');
      expect(() => unpackRatchetRecord(Uint8Array.of(0x80))).toThrow('bad ratchet or timestamp');
      expect(() => packRatchetRecord({ ratchet: new Uint8Array(31), received: 1 })).toThrow(ValidationError);
    });

    it('should expire after thirty days', () => {
      expect(RATCHET_EXPIRY_MS).toBe(2592000000);
    });
  });

  describe('RatchetRing', () => {
    it('should hold ratchets newest first', () => {
      const ring = new RatchetRing();
      const first = ring.rotate(new Uint8Array(32).fill(1));
      const second = ring.rotate(new Uint8Array(32).fill(2));

      expect(ring.size).toBe(2);
      expect(bytesToHex(ring.currentPublicKey)).toBe(bytesToHex(second));
      expect(ring.privateKeys.map(bytesToHex)).toEqual(['02'.repeat(32), '01'.repeat(32)]);
      expect(bytesToHex(first)).toBe(bytesToHex(ratchetPublicKey(new Uint8Array(32).fill(1))));
    });

    it('should drop the oldest ratchet past the limit', () => {
      const ring = new RatchetRing({ maxRatchets: 2 });
      ring.rotate(new Uint8Array(32).fill(1));
      ring.rotate(new Uint8Array(32).fill(2));
      ring.rotate(new Uint8Array(32).fill(3));
      expect(ring.privateKeys.map(bytesToHex)).toEqual(['03'.repeat(32), '02'.repeat(32)]);
    });

    it('should rotate on first use when empty', () => {
      const ring = new RatchetRing();
      expect(ring.currentPublicKey.length).toBe(32);
      expect(ring.size).toBe(1);
    });

    it('should hand out copies of its keys', () => {
      const ring = new RatchetRing({ ratchets: [new Uint8Array(32).fill(7)] });
      ring.privateKeys[0].fill(0);
      expect(bytesToHex(ring.privateKeys[0])).toBe('07'.repeat(32));
    });

    it('should forget everything on clear', () => {
      const ring = new RatchetRing();
      ring.rotate();
      ring.clear();
      expect(ring.size).toBe(0);
    });

    it('should reject a bad limit', () => {
      expect(() => new RatchetRing({ maxRatchets: 0 })).toThrow('Invalid ratchet limit: 0');
    });
  });
});
