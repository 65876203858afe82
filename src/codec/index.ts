export {
  MTU,
  HEADER_MINSIZE,
  HEADER_MAXSIZE,
  IFAC_MIN_SIZE,
  IFAC_FLAG,
  DESTINATION_HASH_LENGTH,
  NAME_HASH_LENGTH,
  HeaderType,
  TransportType,
  DestinationType,
  PacketType,
  PacketContext,
  type PacketFlags,
  type Packet,
  type PacketInit,
} from './types.js';

export {
  computeFlags,
  parseFlags,
  createPacket,
  packPacket,
  unpackPacket,
  getHashablePart,
  packetHash,
  fullPacketHash,
} from './packet.js';

export {
  RANDOM_HASH_LENGTH,
  RATCHET_SIZE,
  ANNOUNCE_MIN_SIZE,
  ANNOUNCE_RATCHET_MIN_SIZE,
  type Announce,
  type UnpackAnnounceOptions,
  type AnnounceVerification,
  makeRandomHash,
  randomHashTimestamp,
  effectiveRatchet,
  announceSignedData,
  signAnnounce,
  packAnnounce,
  unpackAnnounce,
  verifyAnnounce,
  createAnnounce,
  packAnnouncePacket,
} from './announce.js';

export {
  EXPLICIT_PROOF_LENGTH,
  IMPLICIT_PROOF_LENGTH,
  provePacket,
  validatePacketProof,
  packProofPacket,
} from './proof.js';
