import { describe, it, expect } from 'vitest';
import {
  IFAC_SALT,
  IFAC_KEY_LENGTH,
  ifacOrigin,
  deriveIfacKey,
  computeIfac,
  verifyIfac,
  applyIfac,
  removeIfac,
} from '../src/ifac/index.js';
import { DestinationType, PacketType, createPacket, packPacket } from '../src/codec/index.js';
import { bytesToHex, concatBytes, fullHash, hkdf, sign, utf8 } from '../src/crypto/index.js';

const KEY = deriveIfacKey(ifacOrigin('testnet', 'test-secret'));

const RAW = packPacket(
  createPacket({
    destinationType: DestinationType.SINGLE,
    packetType: PacketType.DATA,
    destinationHash: new Uint8Array(16).fill(0x42),
    data: utf8('behind the access code'),
  })
);

describe('Interface Access Codes', () => {
  describe('key derivation', () => {
    it('should hash the hashes of name and passphrase', () => {
      expect(bytesToHex(ifacOrigin('testnet', 'test-secret'))).toBe(
        bytesToHex(fullHash(concatBytes(fullHash(utf8('testnet')), fullHash(utf8('test-secret')))))
      );
      expect(bytesToHex(ifacOrigin(undefined, 'test-secret'))).toBe(
        bytesToHex(fullHash(fullHash(utf8('test-secret'))))
      );
    });

    it('should need a name or a passphrase', () => {
      expect(() => ifacOrigin()).toThrow('IFAC needs a network name or a network key');
    });

    it('should expand the origin with the fixed salt', () => {
      const origin = ifacOrigin('testnet');
      expect(IFAC_SALT.length).toBe(32);
      expect(KEY.length).toBe(IFAC_KEY_LENGTH);
      expect(bytesToHex(deriveIfacKey(origin))).toBe(bytesToHex(hkdf(64, origin, IFAC_SALT)));
    });
  });

  describe('computeIfac', () => {
    it('should take the tail of a signature by the second key half', () => {
      const signature = sign(KEY.subarray(32), RAW);
      expect(bytesToHex(computeIfac(KEY, RAW, 16))).toBe(bytesToHex(signature.subarray(48)));
      expect(bytesToHex(computeIfac(KEY, RAW, 8))).toBe(bytesToHex(signature.subarray(56)));
    });

    it('should reject tag sizes outside 1..64', () => {
      expect(() => computeIfac(KEY, RAW, 0)).toThrow('Invalid IFAC size: 0');
      expect(() => computeIfac(KEY, RAW, 65)).toThrow('Invalid IFAC size: 65');
    });
  });

  describe('verifyIfac', () => {
    it('should accept the matching tag and reject others', () => {
      const tag = computeIfac(KEY, RAW, 16);
      expect(verifyIfac(KEY, RAW, tag)).toEqual({ valid: true });
      expect(verifyIfac(KEY, concatBytes(RAW, utf8('!')), tag)).toEqual({
        valid: false,
        reason: 'Access code mismatch',
      });
    });
  });

  describe('applyIfac / removeIfac', () => {
    it('should insert the tag after the header bytes and set the flag', () => {
      const masked = applyIfac(RAW, KEY, 16);
      expect(masked.length).toBe(RAW.length + 16);
      expect(masked[0] & 0x80).toBe(0x80);
      expect(bytesToHex(masked.subarray(2, 18))).toBe(bytesToHex(computeIfac(KEY, RAW, 16)));
    });

    it('should mask everything but the tag', () => {
      const masked = applyIfac(RAW, KEY, 16);
      const tag = masked.subarray(2, 18);
      const mask = hkdf(masked.length, tag, KEY);
      expect(masked[1]).toBe(RAW[1] ^ mask[1]);
      expect(masked[18]).toBe(RAW[2] ^ mask[18]);
      expect(masked[masked.length - 1]).toBe(RAW[RAW.length - 1] ^ mask[masked.length - 1]);
    });

    it('should restore the original packet', () => {
      const result = removeIfac(applyIfac(RAW, KEY, 16), KEY, 16);
      expect(result.valid).toBe(true);
      if (result.valid) {
        expect(bytesToHex(result.packet)).toBe(bytesToHex(RAW));
      }
    });

    it('should work with short tags', () => {
      const result = removeIfac(applyIfac(RAW, KEY, 1), KEY, 1);
      expect(result.valid).toBe(true);
    });

    it('should reject packets from another network', () => {
      const otherKey = deriveIfacKey(ifacOrigin('testnet', 'other-secret'));
      expect(removeIfac(applyIfac(RAW, otherKey, 16), KEY, 16)).toEqual({
        valid: false,
        reason: 'Access code mismatch',
      });
    });

    it('should reject a modified payload', () => {
      const masked = applyIfac(RAW, KEY, 16);
      masked[masked.length - 1] ^= 0x01;
      expect(removeIfac(masked, KEY, 16).valid).toBe(false);
    });

    it('should reject packets without the flag', () => {
      expect(removeIfac(concatBytes(RAW, new Uint8Array(16)), KEY, 16)).toEqual({
        valid: false,
        reason: 'Packet carries no access code',
      });
    });

    it('should reject packets too short to hold the tag', () => {
      expect(removeIfac(new Uint8Array(20), KEY, 16)).toEqual({
        valid: false,
        reason: 'Packet too short for access code: 20',
      });
    });
  });
});
