import debug from 'debug';
import { MeshwireError, ValidationError, type VerificationResult } from './errors.js';
import { bytesToHex, hexToBytes } from './crypto/utils.js';
import {
  DestinationType,
  PacketContext,
  PacketType,
  createPacket,
  packPacket,
  unpackPacket,
  createAnnounce,
  effectiveRatchet,
  packAnnouncePacket,
  unpackAnnounce,
  verifyAnnounce,
  provePacket,
  packProofPacket,
  validatePacketProof,
  type Announce,
  type Packet,
} from './codec/index.js';
import { Identity, createDestination, type Destination } from './identity/index.js';
import { Link, type LinkMessage } from './link/index.js';
import { RatchetRing, ratchetId } from './ratchet/index.js';
import { applyIfac, deriveIfacKey, ifacOrigin, removeIfac } from './ifac/index.js';
import { SQLiteRatchetStorage, type RatchetStorageAdapter } from './storage/index.js';
import {
  DEFAULT_SESSION_CONFIG,
  type AnnounceReceipt,
  type ReceivedData,
  type SessionConfig,
} from './types.js';

const log = {
  announce: debug('meshwire:session:announce'),
  data: debug('meshwire:session:data'),
  link: debug('meshwire:session:link'),
};

/**
 * A destination this session can announce and receive for
 */
interface LocalDestination {
  destination: Destination;
  ratchets: RatchetRing | null;
}

/**
 * What we learned about a remote destination from its announce
 */
interface KnownDestination {
  identity: Identity;
  appData: Uint8Array;
}

/**
 * Caller-owned state for one identity: its destinations, what it has
 * learned from announces, its links and its access code.
 * Create one per identity; call close() when done.
 */
export class Session {
  readonly identity: Identity;
  private storage: RatchetStorageAdapter;
  private readonly ratchetConfig: Required<NonNullable<SessionConfig['ratchets']>>;
  private readonly linkMode: SessionConfig['linkMode'];
  private readonly mtu: number;
  private readonly ifacKey: Uint8Array | null;
  private readonly ifacSize: number;
  private destinations: Map<string, LocalDestination> = new Map();
  private known: Map<string, KnownDestination> = new Map();
  private links: Map<string, Link> = new Map();
  private closed = false;

  constructor(config: SessionConfig = {}) {
    this.identity = config.privateKey ? Identity.fromPrivateKey(config.privateKey) : Identity.generate();
    this.storage = config.storage ?? new SQLiteRatchetStorage(config.dbPath ?? DEFAULT_SESSION_CONFIG.dbPath);
    const ratchets = config.ratchets ?? {};
    const defaults = DEFAULT_SESSION_CONFIG.ratchets;
    this.ratchetConfig = {
      enabled: ratchets.enabled ?? defaults.enabled,
      expiryMs: ratchets.expiryMs ?? defaults.expiryMs,
      maxRatchets: ratchets.maxRatchets ?? defaults.maxRatchets,
      enforce: ratchets.enforce ?? defaults.enforce,
    };
    this.linkMode = config.linkMode ?? DEFAULT_SESSION_CONFIG.linkMode;
    this.mtu = config.mtu ?? DEFAULT_SESSION_CONFIG.mtu;

    if (config.ifac) {
      this.ifacKey = deriveIfacKey(ifacOrigin(config.ifac.netname, config.ifac.netkey));
      this.ifacSize = config.ifac.size ?? DEFAULT_SESSION_CONFIG.ifacSize;
    } else {
      this.ifacKey = null;
      this.ifacSize = 0;
    }
  }

  /**
   * Register an inbound SINGLE destination owned by this session's identity
   */
  registerDestination(appName: string, aspects: string[] = []): Destination {
    this.assertOpen();
    const destination = createDestination(this.identity, appName, aspects);
    if (!this.destinations.has(destination.hexHash)) {
      this.destinations.set(destination.hexHash, {
        destination,
        ratchets: this.ratchetConfig.enabled
          ? new RatchetRing({ maxRatchets: this.ratchetConfig.maxRatchets })
          : null,
      });
    }
    return destination;
  }

  getDestination(hexHash: string): Destination | null {
    return this.destinations.get(hexHash)?.destination ?? null;
  }

  /**
   * Identity learned from a valid announce
   */
  recall(destinationHash: string | Uint8Array): Identity | null {
    const key = typeof destinationHash === 'string' ? destinationHash : bytesToHex(destinationHash);
    return this.known.get(key)?.identity ?? null;
  }

  /**
   * Build an announce packet, rotating the destination's ratchet first
   */
  announce(destination: Destination, options: { appData?: Uint8Array; pathResponse?: boolean } = {}): Uint8Array {
    this.assertOpen();
    const local = this.destinations.get(destination.hexHash);
    if (!local) {
      throw new ValidationError(`Destination ${destination.hexHash} is not registered with this session`);
    }
    const ratchet = local.ratchets?.rotate();
    const announce = createAnnounce(local.destination, { appData: options.appData, ratchet });
    log.announce(`announcing ${destination.hexHash}${ratchet ? ' with ratchet' : ''}`);
    return this.outbound(packAnnouncePacket(local.destination, announce, options));
  }

  /**
   * Validate an inbound announce and remember the identity and ratchet
   */
  async receiveAnnounce(raw: Uint8Array): Promise<AnnounceReceipt> {
    this.assertOpen();
    const packet = this.inbound(raw);
    if (!packet.valid) {
      return { valid: false, destinationHash: '', reason: packet.reason };
    }
    const { value } = packet;
    const destinationHash = bytesToHex(value.destinationHash);
    if (value.packetType !== PacketType.ANNOUNCE) {
      return { valid: false, destinationHash, reason: `Not an announce: packet type ${value.packetType}` };
    }

    let announce: Announce;
    try {
      announce = unpackAnnounce(value.data, { hasRatchet: value.contextFlag });
    } catch (error) {
      if (error instanceof ValidationError) {
        return { valid: false, destinationHash, reason: error.message };
      }
      throw error;
    }

    const verification = verifyAnnounce(value.destinationHash, announce);
    if (!verification.valid) {
      return { valid: false, destinationHash, reason: verification.reason };
    }

    const identity = Identity.fromPublicKey(announce.publicKey);
    this.known.set(destinationHash, { identity, appData: announce.appData });

    const receipt: AnnounceReceipt = { valid: true, destinationHash, identity, appData: announce.appData };
    const ratchet = effectiveRatchet(announce);
    if (ratchet) {
      await this.storage.saveRatchet(destinationHash, { ratchet, received: Date.now() / 1000 });
      receipt.ratchetId = bytesToHex(ratchetId(ratchet));
    }
    log.announce(`learned ${destinationHash}${receipt.ratchetId ? ` ratchet ${receipt.ratchetId}` : ''}`);
    return receipt;
  }

  /**
   * Encrypt a DATA packet to a known destination, using its latest
   * unexpired ratchet when there is one
   */
  async encryptTo(destinationHash: string | Uint8Array, plaintext: Uint8Array): Promise<Uint8Array> {
    this.assertOpen();
    const hexHash = typeof destinationHash === 'string' ? destinationHash : bytesToHex(destinationHash);
    const identity = this.recall(hexHash);
    if (!identity) {
      throw new ValidationError(`Unknown destination ${hexHash}; receive its announce first`);
    }

    const record = await this.storage.getRatchet(hexHash);
    let ratchet: Uint8Array | undefined;
    if (record) {
      if (Date.now() - record.received * 1000 < this.ratchetConfig.expiryMs) {
        ratchet = record.ratchet;
      } else {
        await this.storage.deleteRatchet(hexHash);
      }
    }

    const packet = packPacket(
      createPacket({
        destinationType: DestinationType.SINGLE,
        packetType: PacketType.DATA,
        destinationHash: hexToBytes(hexHash),
        data: identity.encrypt(plaintext, { ratchet }),
      })
    );
    log.data(`encrypted ${plaintext.length} bytes to ${hexHash}${ratchet ? ' via ratchet' : ''}`);
    return this.outbound(packet);
  }

  /**
   * Decrypt a DATA packet addressed to one of our destinations.
   * Returns null when it is not for us or does not decrypt.
   */
  decrypt(raw: Uint8Array): ReceivedData | null {
    this.assertOpen();
    const packet = this.inbound(raw);
    if (!packet.valid || packet.value.packetType !== PacketType.DATA) {
      return null;
    }
    const destinationHash = bytesToHex(packet.value.destinationHash);
    const local = this.destinations.get(destinationHash);
    if (!local) {
      return null;
    }

    const plaintext = this.identity.decrypt(packet.value.data, {
      ratchets: local.ratchets?.privateKeys,
      enforceRatchets: this.ratchetConfig.enforce,
    });
    if (!plaintext) {
      log.data(`could not decrypt packet for ${destinationHash}`);
      return null;
    }
    return { destinationHash, plaintext };
  }

  /**
   * Explicit delivery proof for a packet we received
   */
  prove(raw: Uint8Array): Uint8Array {
    this.assertOpen();
    const packet = this.inbound(raw);
    if (!packet.valid) {
      throw new ValidationError(packet.reason);
    }
    const plain = packPacket(packet.value);
    return this.outbound(packProofPacket(plain, provePacket(this.identity, plain)));
  }

  /**
   * Check a delivery proof for a packet we sent to a known destination
   */
  validateProof(sent: Uint8Array, proofRaw: Uint8Array): VerificationResult {
    this.assertOpen();
    const packet = this.inbound(sent);
    if (!packet.valid) {
      return packet;
    }
    const proof = this.inbound(proofRaw);
    if (!proof.valid) {
      return proof;
    }
    if (proof.value.packetType !== PacketType.PROOF) {
      return { valid: false, reason: `Not a proof: packet type ${proof.value.packetType}` };
    }
    const identity = this.recall(packet.value.destinationHash);
    if (!identity) {
      return { valid: false, reason: 'Destination identity unknown' };
    }
    return validatePacketProof(identity, packPacket(packet.value), proof.value.data);
  }

  /**
   * Start a link to a known destination
   */
  openLink(destinationHash: string | Uint8Array): { link: Link; packet: Uint8Array } {
    this.assertOpen();
    const hexHash = typeof destinationHash === 'string' ? destinationHash : bytesToHex(destinationHash);
    if (!this.recall(hexHash)) {
      throw new ValidationError(`Unknown destination ${hexHash}; receive its announce first`);
    }
    const { link, packet } = Link.initiate(hexToBytes(hexHash), { mode: this.linkMode, mtu: this.mtu });
    this.links.set(link.hexId, link);
    log.link(`opening link ${link.hexId} to ${hexHash}`);
    return { link, packet: this.outbound(packet) };
  }

  /**
   * Answer a link request for one of our destinations
   */
  acceptLink(raw: Uint8Array): { link: Link; packet: Uint8Array } {
    this.assertOpen();
    const packet = this.inbound(raw);
    if (!packet.valid) {
      throw new ValidationError(packet.reason);
    }
    const destinationHash = bytesToHex(packet.value.destinationHash);
    if (!this.destinations.has(destinationHash)) {
      throw new ValidationError(`Link request for unknown destination ${destinationHash}`);
    }
    const accepted = Link.accept(this.identity, packPacket(packet.value), { mtu: this.mtu });
    this.links.set(accepted.link.hexId, accepted.link);
    log.link(`accepted link ${accepted.link.hexId} for ${destinationHash}`);
    return { link: accepted.link, packet: this.outbound(accepted.packet) };
  }

  /**
   * Verify a link proof against the announced identity of the destination
   */
  completeLink(raw: Uint8Array): { result: VerificationResult; rttPacket?: Uint8Array } {
    this.assertOpen();
    const packet = this.inbound(raw);
    if (!packet.valid) {
      return { result: packet };
    }
    const link = this.links.get(bytesToHex(packet.value.destinationHash));
    if (!link) {
      return { result: { valid: false, reason: 'No pending link for this proof' } };
    }
    const peer = this.recall(link.destinationHash);
    if (!peer) {
      return { result: { valid: false, reason: 'Destination identity unknown' } };
    }
    const { result, rttPacket } = link.complete(packPacket(packet.value), peer);
    return { result, rttPacket: rttPacket ? this.outbound(rttPacket) : undefined };
  }

  getLink(linkId: string | Uint8Array): Link | null {
    return this.links.get(typeof linkId === 'string' ? linkId : bytesToHex(linkId)) ?? null;
  }

  /**
   * Encrypt a payload over an established link
   */
  sendOverLink(linkId: string | Uint8Array, plaintext: Uint8Array, context: PacketContext = PacketContext.NONE): Uint8Array {
    this.assertOpen();
    return this.outbound(this.requireLink(linkId).packData(plaintext, context));
  }

  /**
   * Route an inbound link packet to its link. RTT and close packets are
   * handled here; everything else is returned decrypted. Packets that fail
   * authentication or arrive out of state yield null.
   */
  receiveOverLink(raw: Uint8Array): LinkMessage | null {
    this.assertOpen();
    const packet = this.inbound(raw);
    if (!packet.valid || packet.value.destinationType !== DestinationType.LINK) {
      return null;
    }
    const link = this.links.get(bytesToHex(packet.value.destinationHash));
    if (!link) {
      return null;
    }
    const plain = packPacket(packet.value);
    try {
      if (packet.value.context === PacketContext.LRRTT) {
        link.receiveRtt(plain);
        return null;
      }
      if (packet.value.context === PacketContext.LINKCLOSE) {
        if (link.receiveClose(plain)) {
          this.links.delete(link.hexId);
        }
        return null;
      }
      return link.unpackData(plain);
    } catch (error) {
      if (error instanceof MeshwireError) {
        log.link(`dropped packet on link ${link.hexId}: ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  /**
   * Close a link; returns the LINKCLOSE packet to send, if any
   */
  closeLink(linkId: string | Uint8Array): Uint8Array | null {
    const link = this.requireLink(linkId);
    this.links.delete(link.hexId);
    const packet = link.close();
    return packet ? this.outbound(packet) : null;
  }

  /**
   * Drop stored ratchets past the expiry window
   */
  async pruneRatchets(now: number = Date.now()): Promise<number> {
    this.assertOpen();
    return this.storage.pruneRatchets((now - this.ratchetConfig.expiryMs) / 1000);
  }

  /**
   * Close every link, wipe ratchets and release storage
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const link of this.links.values()) {
      link.close();
    }
    this.links.clear();
    for (const local of this.destinations.values()) {
      local.ratchets?.clear();
    }
    this.destinations.clear();
    this.known.clear();
    await this.storage.close();
  }

  /**
   * Add the access code to an outgoing packet when one is configured
   */
  private outbound(raw: Uint8Array): Uint8Array {
    return this.ifacKey ? applyIfac(raw, this.ifacKey, this.ifacSize) : raw;
  }

  /**
   * Strip and check the access code, then unpack
   */
  private inbound(raw: Uint8Array): { valid: true; value: Packet } | { valid: false; reason: string } {
    let plain = raw;
    if (this.ifacKey) {
      const unmasked = removeIfac(raw, this.ifacKey, this.ifacSize);
      if (!unmasked.valid) {
        return unmasked;
      }
      plain = unmasked.packet;
    }
    try {
      return { valid: true, value: unpackPacket(plain) };
    } catch (error) {
      if (error instanceof ValidationError) {
        return { valid: false, reason: error.message };
      }
      throw error;
    }
  }

  private requireLink(linkId: string | Uint8Array): Link {
    const link = this.getLink(linkId);
    if (!link) {
      throw new ValidationError(`Unknown link ${typeof linkId === 'string' ? linkId : bytesToHex(linkId)}`);
    }
    return link;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ValidationError('Session is closed');
    }
  }
}
