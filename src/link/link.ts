import debug from 'debug';
import { ValidationError, invalid, type VerificationResult } from '../errors.js';
import { exchange, generateEd25519KeyPair, generateX25519KeyPair, type KeyPair } from '../crypto/keys.js';
import { Token } from '../crypto/token.js';
import { bytesToHex, constantTimeEqual } from '../crypto/utils.js';
import { createPacket, packPacket, packetHash, unpackPacket } from '../codec/packet.js';
import { DestinationType, MTU, PacketContext, PacketType, type Packet } from '../codec/types.js';
import type { Identity } from '../identity/identity.js';
import {
  DEFAULT_LINK_MODE,
  LinkMode,
  assertSupportedMode,
  deriveLinkKey,
  encodeSignalling,
  linkIdFromPacket,
  linkMdu,
  packLinkProofData,
  packLinkRequestData,
  parseLinkProofData,
  parseLinkRequestData,
  proveLink,
  verifyLinkProof,
  type LinkKeys,
  type LinkProofData,
} from './handshake.js';
import {
  packLinkRequest,
  packLinkResponse,
  packRtt,
  requestPathHash,
  unpackLinkRequest,
  unpackLinkResponse,
  unpackRtt,
  type LinkRequest,
  type LinkResponse,
} from './messages.js';

const log = {
  state: debug('meshwire:link:state'),
};

export enum LinkStatus {
  PENDING = 0x00,
  HANDSHAKE = 0x01,
  ACTIVE = 0x02,
  CLOSED = 0x04,
}

export interface LinkOptions {
  /** Link MTU to signal; defaults to the physical MTU */
  mtu?: number;
  mode?: LinkMode;
  /** Fixed ephemeral x25519 seed, for reproducible handshakes */
  ephemeralX25519?: Uint8Array;
  /** Fixed ephemeral ed25519 seed (initiator only) */
  ephemeralEd25519?: Uint8Array;
}

/**
 * A decrypted packet received over a link
 */
export interface LinkMessage {
  context: PacketContext;
  plaintext: Uint8Array;
}

/**
 * One end of an encrypted session between two peers.
 * Each link owns its derived keys; nothing is shared between links.
 */
export class Link {
  readonly linkId: Uint8Array;
  readonly destinationHash: Uint8Array;
  readonly initiator: boolean;
  readonly mode: LinkMode;
  /** Round-trip time of the handshake in seconds, once known */
  rtt: number | null = null;
  private state: LinkStatus;
  private linkMtu: number;
  private readonly ephemeral: KeyPair;
  private readonly requestedAt: number;
  private token: Token | null = null;
  private keys: LinkKeys | null = null;

  private constructor(params: {
    linkId: Uint8Array;
    destinationHash: Uint8Array;
    initiator: boolean;
    mode: LinkMode;
    mtu: number;
    ephemeral: KeyPair;
    state: LinkStatus;
  }) {
    this.linkId = params.linkId;
    this.destinationHash = params.destinationHash;
    this.initiator = params.initiator;
    this.mode = params.mode;
    this.linkMtu = params.mtu;
    this.ephemeral = params.ephemeral;
    this.state = params.state;
    this.requestedAt = Date.now();
  }

  /**
   * Start a link to a destination. Returns the LINKREQUEST packet to send.
   */
  static initiate(destinationHash: Uint8Array, options: LinkOptions = {}): { link: Link; packet: Uint8Array } {
    const mode = assertSupportedMode(options.mode ?? DEFAULT_LINK_MODE);
    const mtu = options.mtu ?? MTU;
    const encryption = generateX25519KeyPair(options.ephemeralX25519);
    const signing = generateEd25519KeyPair(options.ephemeralEd25519);

    const packet = packPacket(
      createPacket({
        destinationType: DestinationType.SINGLE,
        packetType: PacketType.LINKREQUEST,
        destinationHash,
        data: packLinkRequestData(encryption.publicKey, signing.publicKey, encodeSignalling(mtu, mode)),
      })
    );

    const link = new Link({
      linkId: linkIdFromPacket(packet),
      destinationHash,
      initiator: true,
      mode,
      mtu,
      ephemeral: encryption,
      state: LinkStatus.PENDING,
    });
    log.state(`initiated link ${link.hexId}`);
    return { link, packet };
  }

  /**
   * Answer a LINKREQUEST addressed to `owner`. Returns the LRPROOF packet.
   */
  static accept(
    owner: Identity,
    requestPacket: Uint8Array,
    options: Pick<LinkOptions, 'mtu' | 'ephemeralX25519'> = {}
  ): { link: Link; packet: Uint8Array } {
    const request = unpackPacket(requestPacket);
    if (request.packetType !== PacketType.LINKREQUEST) {
      throw new ValidationError(`Expected a link request, got packet type ${request.packetType}`);
    }
    const requestData = parseLinkRequestData(request.data);
    const mode = requestData.signalling?.mode ?? DEFAULT_LINK_MODE;
    const requestedMtu = requestData.signalling?.mtu ?? MTU;
    const mtu = Math.min(requestedMtu, options.mtu ?? requestedMtu);

    const linkId = linkIdFromPacket(requestPacket);
    const encryption = generateX25519KeyPair(options.ephemeralX25519);
    const link = new Link({
      linkId,
      destinationHash: request.destinationHash,
      initiator: false,
      mode,
      mtu,
      ephemeral: encryption,
      state: LinkStatus.HANDSHAKE,
    });
    link.establish(exchange(encryption.privateKey, requestData.x25519PublicKey));

    const signalling = requestData.signalling ? encodeSignalling(mtu, mode) : new Uint8Array(0);
    const signature = proveLink(owner, linkId, encryption.publicKey, signalling);
    const packet = packPacket(
      createPacket({
        destinationType: DestinationType.LINK,
        packetType: PacketType.PROOF,
        destinationHash: linkId,
        context: PacketContext.LRPROOF,
        data: packLinkProofData(
          signature,
          encryption.publicKey,
          signalling.length > 0 ? signalling : undefined
        ),
      })
    );
    log.state(`accepted link ${link.hexId}`);
    return { link, packet };
  }

  get status(): LinkStatus {
    return this.state;
  }

  /**
   * Signalled MTU; the initiator adopts the value confirmed in the proof
   */
  get mtu(): number {
    return this.linkMtu;
  }

  get hexId(): string {
    return bytesToHex(this.linkId);
  }

  /**
   * Largest plaintext that fits one encrypted link packet
   */
  get mdu(): number {
    return linkMdu(this.mtu);
  }

  /**
   * Key material, available once the handshake has derived it
   */
  get derivedKeys(): LinkKeys | null {
    return this.keys;
  }

  /**
   * Verify the responder's proof and activate the link. On success the
   * returned RTT packet should be sent to finish the handshake.
   */
  complete(
    proofPacket: Uint8Array,
    peer: Identity
  ): { result: VerificationResult; rttPacket?: Uint8Array } {
    if (!this.initiator || this.state !== LinkStatus.PENDING) {
      return { result: invalid('Link is not awaiting a proof') };
    }

    let packet: Packet;
    let proof: LinkProofData;
    try {
      packet = unpackPacket(proofPacket);
      proof = parseLinkProofData(packet.data);
    } catch (error) {
      if (error instanceof ValidationError) {
        return { result: invalid(error.message) };
      }
      throw error;
    }
    if (packet.context !== PacketContext.LRPROOF || !constantTimeEqual(packet.destinationHash, this.linkId)) {
      return { result: invalid('Packet is not a proof for this link') };
    }
    if (proof.signalling && proof.signalling.mode !== this.mode) {
      return { result: invalid(`Proof signals mode ${proof.signalling.mode}, requested ${this.mode}`) };
    }

    const signalling = proof.signalling
      ? encodeSignalling(proof.signalling.mtu, proof.signalling.mode)
      : new Uint8Array(0);
    const result = verifyLinkProof(
      peer.ed25519PublicKey,
      proof.signature,
      this.linkId,
      proof.x25519PublicKey,
      signalling
    );
    if (!result.valid) {
      return { result };
    }

    this.establish(exchange(this.ephemeral.privateKey, proof.x25519PublicKey));
    if (proof.signalling) {
      this.linkMtu = proof.signalling.mtu;
    }
    this.rtt = (Date.now() - this.requestedAt) / 1000;
    this.state = LinkStatus.ACTIVE;
    log.state(`link ${this.hexId} active, rtt ${this.rtt}s`);

    return { result, rttPacket: this.packData(packRtt(this.rtt), PacketContext.LRRTT) };
  }

  /**
   * Responder side: take the initiator's RTT packet and activate the link
   */
  receiveRtt(rttPacket: Uint8Array): number {
    if (this.initiator || this.state !== LinkStatus.HANDSHAKE) {
      throw new ValidationError('Link is not awaiting an RTT packet');
    }
    const message = this.unpackData(rttPacket);
    if (message.context !== PacketContext.LRRTT) {
      throw new ValidationError(`Expected an RTT packet, got context ${message.context}`);
    }
    const rtt = unpackRtt(message.plaintext);
    this.rtt = rtt;
    this.state = LinkStatus.ACTIVE;
    log.state(`link ${this.hexId} active, rtt ${rtt}s`);
    return rtt;
  }

  encrypt(plaintext: Uint8Array): Uint8Array {
    return this.requireToken().encrypt(plaintext);
  }

  decrypt(token: Uint8Array): Uint8Array {
    return this.requireToken().decrypt(token);
  }

  /**
   * Encrypt and frame a DATA packet addressed to this link
   */
  packData(plaintext: Uint8Array, context: PacketContext = PacketContext.NONE): Uint8Array {
    if (plaintext.length > this.mdu) {
      throw new ValidationError(`Link payload too large: ${plaintext.length} > ${this.mdu}`);
    }
    return packPacket(
      createPacket({
        destinationType: DestinationType.LINK,
        packetType: PacketType.DATA,
        destinationHash: this.linkId,
        context,
        data: this.encrypt(plaintext),
      })
    );
  }

  /**
   * Unframe and decrypt a packet addressed to this link
   */
  unpackData(raw: Uint8Array): LinkMessage {
    const packet = unpackPacket(raw);
    if (!constantTimeEqual(packet.destinationHash, this.linkId)) {
      throw new ValidationError('Packet is not addressed to this link');
    }
    return { context: packet.context, plaintext: this.decrypt(packet.data) };
  }

  /**
   * Build a request packet. The request id is the hash of that packet.
   */
  request(path: string, data: Uint8Array | null = null): { requestId: Uint8Array; packet: Uint8Array } {
    const body: LinkRequest = {
      timestamp: Date.now() / 1000,
      pathHash: requestPathHash(path),
      data,
    };
    const packet = this.packData(packLinkRequest(body), PacketContext.REQUEST);
    return { requestId: packetHash(packet), packet };
  }

  /**
   * Decode a REQUEST packet; the id to answer with is its packet hash
   */
  receiveRequest(raw: Uint8Array): { requestId: Uint8Array; request: LinkRequest } {
    const message = this.unpackData(raw);
    if (message.context !== PacketContext.REQUEST) {
      throw new ValidationError(`Expected a request, got context ${message.context}`);
    }
    return { requestId: packetHash(raw), request: unpackLinkRequest(message.plaintext) };
  }

  respond(requestId: Uint8Array, data: Uint8Array | null): Uint8Array {
    return this.packData(packLinkResponse({ requestId, data }), PacketContext.RESPONSE);
  }

  receiveResponse(raw: Uint8Array): LinkResponse {
    const message = this.unpackData(raw);
    if (message.context !== PacketContext.RESPONSE) {
      throw new ValidationError(`Expected a response, got context ${message.context}`);
    }
    return unpackLinkResponse(message.plaintext);
  }

  /**
   * Tear down: returns the LINKCLOSE packet (when keys exist) and wipes them
   */
  close(): Uint8Array | null {
    if (this.state === LinkStatus.CLOSED) {
      return null;
    }
    const packet = this.token ? this.packData(this.linkId, PacketContext.LINKCLOSE) : null;
    this.teardown();
    return packet;
  }

  /**
   * Handle a LINKCLOSE packet from the peer
   */
  receiveClose(raw: Uint8Array): boolean {
    const message = this.unpackData(raw);
    if (message.context !== PacketContext.LINKCLOSE || !constantTimeEqual(message.plaintext, this.linkId)) {
      return false;
    }
    this.teardown();
    return true;
  }

  private establish(sharedSecret: Uint8Array): void {
    this.keys = deriveLinkKey(sharedSecret, this.linkId, this.mode);
    this.token = new Token(this.keys.derivedKey);
  }

  private teardown(): void {
    this.token?.wipe();
    this.token = null;
    if (this.keys) {
      this.keys.derivedKey.fill(0);
      this.keys.encryptionKey.fill(0);
      this.keys.signingKey.fill(0);
      this.keys = null;
    }
    this.state = LinkStatus.CLOSED;
    log.state(`link ${this.hexId} closed`);
  }

  private requireToken(): Token {
    if (!this.token) {
      throw new ValidationError(`Link ${this.hexId} has no keys yet`);
    }
    return this.token;
  }
}
