import { describe, it, expect } from 'vitest';
import {
  Link,
  LinkMode,
  LinkStatus,
  ECPUBSIZE,
  LINK_MTU_SIZE,
  encodeSignalling,
  parseSignalling,
  linkMdu,
  derivedKeyLength,
  deriveLinkKey,
  linkIdFromPacket,
  linkProofSignedData,
  proveLink,
  verifyLinkProof,
  packLinkRequestData,
  parseLinkRequestData,
  packLinkProofData,
  parseLinkProofData,
  requestPathHash,
  packRtt,
  unpackRtt,
  packLinkRequest,
  unpackLinkRequest,
  packLinkResponse,
  unpackLinkResponse,
} from '../src/link/index.js';
import {
  DestinationType,
  PacketContext,
  PacketType,
  createPacket,
  packPacket,
  unpackPacket,
  packetHash,
} from '../src/codec/index.js';
import { Identity, createDestination } from '../src/identity/index.js';
import {
  bytesToHex,
  concatBytes,
  hexToBytes,
  generateEd25519KeyPair,
  generateX25519KeyPair,
  hkdf,
  truncatedHash,
  utf8,
} from '../src/crypto/index.js';
import { UnsupportedModeError, ValidationError } from '../src/errors.js';

function handshake(mode: LinkMode = LinkMode.AES256_CBC, responderMtu?: number) {
  const owner = Identity.generate();
  const destination = createDestination(owner, 'meshtest', ['link']);
  const { link: initiator, packet: request } = Link.initiate(destination.hash, { mode });
  const { link: responder, packet: proof } = Link.accept(owner, request, { mtu: responderMtu });
  return { owner, destination, initiator, responder, request, proof };
}

function establish(mode: LinkMode = LinkMode.AES256_CBC) {
  const state = handshake(mode);
  const { result, rttPacket } = state.initiator.complete(state.proof, Identity.fromPublicKey(state.owner.publicKey));
  expect(result.valid).toBe(true);
  if (!rttPacket) {
    throw new Error('handshake produced no RTT packet');
  }
  state.responder.receiveRtt(rttPacket);
  return state;
}

describe('Link Handshake', () => {
  describe('signalling', () => {
    it('should encode MTU 500 with AES-256 as 0x2001f4', () => {
      expect(bytesToHex(encodeSignalling(500, LinkMode.AES256_CBC))).toBe('2001f4');
    });

    it('should encode MTU 1500 with AES-256 as 0x2005dc', () => {
      expect(bytesToHex(encodeSignalling(1500, LinkMode.AES256_CBC))).toBe('2005dc');
    });

    it('should encode AES-128 with a zero mode field', () => {
      expect(bytesToHex(encodeSignalling(500, LinkMode.AES128_CBC))).toBe('0001f4');
    });

    it('should decode MTU and mode', () => {
      expect(parseSignalling(hexToBytes('2005dc'))).toEqual({ mtu: 1500, mode: LinkMode.AES256_CBC });
    });

    it('should reject disabled modes', () => {
      expect(() => encodeSignalling(500, LinkMode.AES256_GCM)).toThrow(UnsupportedModeError);
      expect(() => parseSignalling(hexToBytes('4001f4'))).toThrow('Unsupported link mode: 2');
      expect(() => encodeSignalling(500, 7)).toThrow(UnsupportedModeError);
    });

    it('should reject MTUs wider than 21 bits', () => {
      expect(() => encodeSignalling(0x200000, LinkMode.AES256_CBC)).toThrow('Invalid MTU for signalling');
    });
  });

  describe('sizes', () => {
    it('should compute the link MDU', () => {
      expect(linkMdu(500)).toBe(431);
    });

    it('should derive 32 bytes for AES-128 and 64 for AES-256', () => {
      expect(derivedKeyLength(LinkMode.AES128_CBC)).toBe(32);
      expect(derivedKeyLength(LinkMode.AES256_CBC)).toBe(64);
      expect(() => derivedKeyLength(LinkMode.AES256_GCM)).toThrow(UnsupportedModeError);
    });
  });

  describe('deriveLinkKey', () => {
    it('should salt HKDF with the link id and split the output in halves', () => {
      const shared = new Uint8Array(32).fill(0x11);
      const linkId = new Uint8Array(16).fill(0x22);
      const keys = deriveLinkKey(shared, linkId, LinkMode.AES256_CBC);
      const expected = hkdf(64, shared, linkId);
      expect(bytesToHex(keys.derivedKey)).toBe(bytesToHex(expected));
      expect(bytesToHex(keys.encryptionKey)).toBe(bytesToHex(expected.subarray(0, 32)));
      expect(bytesToHex(keys.signingKey)).toBe(bytesToHex(expected.subarray(32)));
    });

    it('should derive 16-byte halves for AES-128', () => {
      const keys = deriveLinkKey(new Uint8Array(32).fill(1), new Uint8Array(16).fill(2), LinkMode.AES128_CBC);
      expect(keys.derivedKey.length).toBe(32);
      expect(keys.encryptionKey.length).toBe(16);
      expect(keys.signingKey.length).toBe(16);
    });
  });

  describe('linkIdFromPacket', () => {
    const encryption = generateX25519KeyPair(new Uint8Array(32).fill(3));
    const signing = generateEd25519KeyPair(new Uint8Array(32).fill(4));
    const destinationHash = new Uint8Array(16).fill(5);

    function request(signalling?: Uint8Array): Uint8Array {
      return packPacket(
        createPacket({
          destinationType: DestinationType.SINGLE,
          packetType: PacketType.LINKREQUEST,
          destinationHash,
          data: packLinkRequestData(encryption.publicKey, signing.publicKey, signalling),
        })
      );
    }

    it('should ignore the signalling suffix', () => {
      const plain = request();
      const signalled = request(encodeSignalling(500, LinkMode.AES256_CBC));
      expect(signalled.length).toBe(19 + ECPUBSIZE + LINK_MTU_SIZE);
      expect(bytesToHex(linkIdFromPacket(signalled))).toBe(bytesToHex(linkIdFromPacket(plain)));
    });

    it('should hash the hashable part of the request', () => {
      const raw = request();
      expect(bytesToHex(linkIdFromPacket(raw))).toBe(bytesToHex(packetHash(raw)));
      expect(bytesToHex(linkIdFromPacket(raw))).toBe(
        bytesToHex(truncatedHash(Uint8Array.of(raw[0] & 0x0f, ...raw.subarray(2))))
      );
    });

    it('should strip any bytes past the key pair', () => {
      const keys = packLinkRequestData(encryption.publicKey, signing.publicKey);
      const extended = packPacket(
        createPacket({
          destinationType: DestinationType.SINGLE,
          packetType: PacketType.LINKREQUEST,
          destinationHash,
          data: concatBytes(keys, new Uint8Array(6).fill(0xee)),
        })
      );
      expect(extended.length).toBe(19 + 70);
      expect(bytesToHex(linkIdFromPacket(extended))).toBe(bytesToHex(linkIdFromPacket(request())));
    });

    it('should reject request data shorter than the key pair', () => {
      const raw = packPacket(
        createPacket({
          destinationType: DestinationType.SINGLE,
          packetType: PacketType.LINKREQUEST,
          destinationHash,
          data: new Uint8Array(63),
        })
      );
      expect(() => linkIdFromPacket(raw)).toThrow('Link request data too short: 63 < 64');
    });
  });

  describe('request and proof data', () => {
    it('should split request data with and without signalling', () => {
      const x = new Uint8Array(32).fill(1);
      const ed = new Uint8Array(32).fill(2);
      const parsed = parseLinkRequestData(packLinkRequestData(x, ed, encodeSignalling(400, LinkMode.AES128_CBC)));
      expect(bytesToHex(parsed.x25519PublicKey)).toBe(bytesToHex(x));
      expect(bytesToHex(parsed.ed25519PublicKey)).toBe(bytesToHex(ed));
      expect(parsed.signalling).toEqual({ mtu: 400, mode: LinkMode.AES128_CBC });
      expect(parseLinkRequestData(packLinkRequestData(x, ed)).signalling).toBeUndefined();
    });

    it('should split proof data', () => {
      const signature = new Uint8Array(64).fill(9);
      const x = new Uint8Array(32).fill(8);
      const data = packLinkProofData(signature, x, encodeSignalling(500, LinkMode.AES256_CBC));
      expect(data.length).toBe(99);
      const parsed = parseLinkProofData(data);
      expect(bytesToHex(parsed.signature)).toBe(bytesToHex(signature));
      expect(bytesToHex(parsed.x25519PublicKey)).toBe(bytesToHex(x));
      expect(parsed.signalling).toEqual({ mtu: 500, mode: LinkMode.AES256_CBC });
      expect(() => parseLinkProofData(new Uint8Array(97))).toThrow('Invalid link proof length');
    });
  });

  describe('link proof', () => {
    it('should sign link id, receiver keys and signalling', () => {
      const owner = Identity.generate();
      const linkId = new Uint8Array(16).fill(7);
      const x = new Uint8Array(32).fill(6);
      const signalling = encodeSignalling(500, LinkMode.AES256_CBC);
      const signature = proveLink(owner, linkId, x, signalling);

      expect(owner.validate(signature, linkProofSignedData(linkId, x, owner.ed25519PublicKey, signalling))).toBe(true);
      expect(verifyLinkProof(owner.ed25519PublicKey, signature, linkId, x, signalling)).toEqual({ valid: true });
      expect(verifyLinkProof(owner.ed25519PublicKey, signature, linkId, x, new Uint8Array(0))).toEqual({
        valid: false,
        reason: 'Invalid link proof signature',
      });
    });
  });
});

describe('Link', () => {
  describe('handshake', () => {
    it('should build a LINKREQUEST with signalling', () => {
      const { initiator, request, destination } = handshake();
      const packet = unpackPacket(request);
      expect(packet.packetType).toBe(PacketType.LINKREQUEST);
      expect(bytesToHex(packet.destinationHash)).toBe(destination.hexHash);
      expect(packet.data.length).toBe(ECPUBSIZE + LINK_MTU_SIZE);
      expect(initiator.status).toBe(LinkStatus.PENDING);
      expect(initiator.hexId).toBe(bytesToHex(linkIdFromPacket(request)));
    });

    it('should answer with an LRPROOF addressed to the link id', () => {
      const { initiator, responder, proof } = handshake();
      const packet = unpackPacket(proof);
      expect(packet.destinationType).toBe(DestinationType.LINK);
      expect(packet.packetType).toBe(PacketType.PROOF);
      expect(packet.context).toBe(PacketContext.LRPROOF);
      expect(bytesToHex(packet.destinationHash)).toBe(initiator.hexId);
      expect(responder.hexId).toBe(initiator.hexId);
      expect(responder.status).toBe(LinkStatus.HANDSHAKE);
    });

    it('should derive the same keys on both ends', () => {
      const { initiator, responder } = establish();
      expect(initiator.status).toBe(LinkStatus.ACTIVE);
      expect(responder.status).toBe(LinkStatus.ACTIVE);
      expect(bytesToHex(initiator.derivedKeys?.derivedKey ?? new Uint8Array(0))).toBe(
        bytesToHex(responder.derivedKeys?.derivedKey ?? new Uint8Array(1))
      );
      expect(initiator.derivedKeys?.derivedKey.length).toBe(64);
    });

    it('should share the measured RTT with the responder', () => {
      const { initiator, responder } = establish();
      expect(initiator.rtt).not.toBeNull();
      expect(responder.rtt).toBe(initiator.rtt);
    });

    it('should negotiate AES-128', () => {
      const { initiator, responder } = establish(LinkMode.AES128_CBC);
      expect(responder.mode).toBe(LinkMode.AES128_CBC);
      expect(initiator.derivedKeys?.derivedKey.length).toBe(32);
    });

    it('should adopt the MTU the responder confirms', () => {
      const { initiator, proof, owner } = handshake(LinkMode.AES256_CBC, 400);
      expect(initiator.mtu).toBe(500);
      initiator.complete(proof, owner);
      expect(initiator.mtu).toBe(400);
      expect(initiator.mdu).toBe(linkMdu(400));
    });

    it('should refuse a disabled mode', () => {
      expect(() => Link.initiate(new Uint8Array(16), { mode: LinkMode.AES256_GCM })).toThrow(UnsupportedModeError);
    });

    it('should reject a proof signed by another identity', () => {
      const { initiator, proof } = handshake();
      const { result, rttPacket } = initiator.complete(proof, Identity.generate());
      expect(result).toEqual({ valid: false, reason: 'Invalid link proof signature' });
      expect(rttPacket).toBeUndefined();
      expect(initiator.status).toBe(LinkStatus.PENDING);
    });

    it('should reject a proof for another link', () => {
      const first = handshake();
      const second = handshake();
      const { result } = first.initiator.complete(second.proof, first.owner);
      expect(result).toEqual({ valid: false, reason: 'Packet is not a proof for this link' });
    });

    it('should only complete once', () => {
      const { initiator, proof, owner } = establish();
      expect(initiator.complete(proof, owner).result).toEqual({
        valid: false,
        reason: 'Link is not awaiting a proof',
      });
    });
  });

  describe('data', () => {
    it('should carry payloads both ways', () => {
      const { initiator, responder } = establish();
      const message = responder.unpackData(initiator.packData(utf8('ping')));
      expect(message.context).toBe(PacketContext.NONE);
      expect(new TextDecoder().decode(message.plaintext)).toBe('ping');
      expect(new TextDecoder().decode(initiator.unpackData(responder.packData(utf8('pong'))).plaintext)).toBe('pong');
    });

    it('should refuse payloads larger than the MDU', () => {
      const { initiator } = establish();
      expect(() => initiator.packData(new Uint8Array(432))).toThrow('Link payload too large: 432 > 431');
    });

    it('should refuse to encrypt before keys exist', () => {
      const { initiator } = handshake();
      expect(() => initiator.encrypt(utf8('early'))).toThrow(ValidationError);
    });

    it('should not decrypt traffic from another link', () => {
      const a = establish();
      const b = establish();
      expect(() => b.responder.unpackData(a.initiator.packData(utf8('x')))).toThrow(
        'Packet is not addressed to this link'
      );
    });
  });

  describe('requests', () => {
    it('should use the request packet hash as the request id', () => {
      const { initiator, responder } = establish();
      const { requestId, packet } = initiator.request('/status', utf8('q'));
      const received = responder.receiveRequest(packet);

      expect(bytesToHex(received.requestId)).toBe(bytesToHex(requestId));
      expect(bytesToHex(received.request.pathHash)).toBe(bytesToHex(requestPathHash('/status')));
      expect(new TextDecoder().decode(received.request.data ?? new Uint8Array(0))).toBe('q');

      const response = initiator.receiveResponse(responder.respond(received.requestId, utf8('ok')));
      expect(bytesToHex(response.requestId)).toBe(bytesToHex(requestId));
      expect(new TextDecoder().decode(response.data ?? new Uint8Array(0))).toBe('ok');
    });

    it('should reject a response where a request is expected', () => {
      const { initiator, responder } = establish();
      const response = responder.respond(new Uint8Array(16), null);
      expect(() => initiator.receiveRequest(response)).toThrow('Expected a request, got context 10');
    });
  });

  describe('close', () => {
    it('should tear down both ends', () => {
      const { initiator, responder } = establish();
      const packet = initiator.close();
      expect(packet).not.toBeNull();
      expect(initiator.status).toBe(LinkStatus.CLOSED);
      expect(initiator.derivedKeys).toBeNull();

      expect(responder.receiveClose(packet ?? new Uint8Array(0))).toBe(true);
      expect(responder.status).toBe(LinkStatus.CLOSED);
      expect(initiator.close()).toBeNull();
    });

    it('should close a pending link without a packet', () => {
      const { initiator } = handshake();
      expect(initiator.close()).toBeNull();
      expect(initiator.status).toBe(LinkStatus.CLOSED);
    });
  });
});

describe('Link messages', () => {
  it('should encode RTT as a msgpack float64', () => {
    const packed = packRtt(0.25);
    expect(bytesToHex(packed)).toBe('cb3fd0000000000000');
    expect(unpackRtt(packed)).toBe(0.25);
  });

  it('should encode whole-second RTTs as floats too', () => {
    expect(bytesToHex(packRtt(1))).toBe('cb3ff0000000000000');
  });

  it('should encode requests as [timestamp, path hash, data]', () => {
    const pathHash = requestPathHash('/x');
    const packed = packLinkRequest({ timestamp: 1700000000, pathHash, data: null });
    expect(packed[0]).toBe(0x93);
    const decoded = unpackLinkRequest(packed);
    expect(decoded.timestamp).toBe(1700000000);
    expect(bytesToHex(decoded.pathHash)).toBe(bytesToHex(pathHash));
    expect(decoded.data).toBeNull();
  });

  it('should encode responses as [request id, data]', () => {
    const requestId = new Uint8Array(16).fill(3);
    const packed = packLinkResponse({ requestId, data: Uint8Array.of(1) });
    expect(packed[0]).toBe(0x92);
    const decoded = unpackLinkResponse(packed);
    expect(bytesToHex(decoded.requestId)).toBe(bytesToHex(requestId));
    expect(bytesToHex(decoded.data ?? new Uint8Array(0))).toBe('01');
  });

  it('should reject malformed bodies', () => {
    expect(() => unpackLinkRequest(packRtt(1))).toThrow('Malformed link request');
    expect(() => unpackRtt(Uint8Array.of(0xc1))).toThrow('Malformed RTT');
  });
});
