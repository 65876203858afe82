import { ValidationError, assertLength } from '../errors.js';
import { fullHash, truncatedHash } from '../crypto/primitives.js';
import { concatBytes } from '../crypto/utils.js';
import {
  DESTINATION_HASH_LENGTH,
  HEADER_MAXSIZE,
  HEADER_MINSIZE,
  HeaderType,
  IFAC_FLAG,
  PacketContext,
  TransportType,
  type Packet,
  type PacketFlags,
  type PacketInit,
} from './types.js';

/**
 * Pack the flags byte
 *
 * Bit layout:
 * [7]    IFAC flag (never set here)
 * [6]    header type (0 = HEADER_1, 1 = HEADER_2)
 * [5]    context flag
 * [4]    transport type
 * [3-2]  destination type
 * [1-0]  packet type
 */
export function computeFlags(flags: PacketFlags): number {
  if (flags.headerType !== HeaderType.HEADER_1 && flags.headerType !== HeaderType.HEADER_2) {
    throw new ValidationError(`Invalid header type: ${flags.headerType}`);
  }
  if (flags.transportType < 0 || flags.transportType > 1) {
    // Only one bit is available on the wire
    throw new ValidationError(`Transport type does not fit in the flags byte: ${flags.transportType}`);
  }
  if (flags.destinationType < 0 || flags.destinationType > 3) {
    throw new ValidationError(`Invalid destination type: ${flags.destinationType}`);
  }
  if (flags.packetType < 0 || flags.packetType > 3) {
    throw new ValidationError(`Invalid packet type: ${flags.packetType}`);
  }

  return (
    (flags.headerType << 6) |
    ((flags.contextFlag ? 1 : 0) << 5) |
    (flags.transportType << 4) |
    (flags.destinationType << 2) |
    flags.packetType
  );
}

/**
 * Unpack the flags byte (the IFAC bit is ignored)
 */
export function parseFlags(byte: number): PacketFlags {
  if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
    throw new ValidationError(`Invalid flags byte: ${byte}`);
  }
  return {
    headerType: (byte & 0x40) === 0 ? HeaderType.HEADER_1 : HeaderType.HEADER_2,
    contextFlag: (byte & 0x20) !== 0,
    transportType: (byte >> 4) & 0x01,
    destinationType: (byte >> 2) & 0x03,
    packetType: byte & 0x03,
  };
}

function assertByte(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new ValidationError(`Invalid ${name}: ${value} is not a byte`);
  }
}

/**
 * Fill in routing defaults: HEADER_1, broadcast, no hops, context NONE
 */
export function createPacket(init: PacketInit): Packet {
  return {
    headerType: init.headerType ?? (init.transportId ? HeaderType.HEADER_2 : HeaderType.HEADER_1),
    contextFlag: init.contextFlag ?? false,
    transportType: init.transportType ?? (init.transportId ? TransportType.TRANSPORT : TransportType.BROADCAST),
    destinationType: init.destinationType,
    packetType: init.packetType,
    hops: init.hops ?? 0,
    transportId: init.transportId,
    destinationHash: init.destinationHash,
    context: init.context ?? PacketContext.NONE,
    data: init.data,
  };
}

/**
 * Encode a packet to its raw wire form
 *
 * HEADER_1: [flags][hops][destination (16)][context][data]
 * HEADER_2: [flags][hops][transport_id (16)][destination (16)][context][data]
 */
export function packPacket(packet: Packet): Uint8Array {
  const flags = computeFlags(packet);
  assertByte('hop count', packet.hops);
  assertByte('context', packet.context);
  assertLength('destination hash', packet.destinationHash, DESTINATION_HASH_LENGTH);

  let header: Uint8Array;
  if (packet.headerType === HeaderType.HEADER_2) {
    if (!packet.transportId) {
      throw new ValidationError('HEADER_2 packet requires a transport id');
    }
    assertLength('transport id', packet.transportId, DESTINATION_HASH_LENGTH);

    header = new Uint8Array(HEADER_MAXSIZE);
    header[0] = flags;
    header[1] = packet.hops;
    header.set(packet.transportId, 2);
    header.set(packet.destinationHash, 18);
    header[34] = packet.context;
  } else {
    header = new Uint8Array(HEADER_MINSIZE);
    header[0] = flags;
    header[1] = packet.hops;
    header.set(packet.destinationHash, 2);
    header[18] = packet.context;
  }

  return concatBytes(header, packet.data);
}

/**
 * Decode a raw packet. Packets still carrying an access code must be
 * unmasked first.
 */
export function unpackPacket(raw: Uint8Array): Packet {
  if (raw.length < HEADER_MINSIZE) {
    throw new ValidationError(`Packet too short: ${raw.length} < ${HEADER_MINSIZE}`);
  }
  if ((raw[0] & IFAC_FLAG) !== 0) {
    throw new ValidationError('Packet carries an interface access code');
  }

  const flags = parseFlags(raw[0]);
  const hops = raw[1];

  if (flags.headerType === HeaderType.HEADER_2) {
    if (raw.length < HEADER_MAXSIZE) {
      throw new ValidationError(`HEADER_2 packet too short: ${raw.length} < ${HEADER_MAXSIZE}`);
    }
    return {
      ...flags,
      hops,
      transportId: raw.slice(2, 18),
      destinationHash: raw.slice(18, 34),
      context: raw[34],
      data: raw.slice(HEADER_MAXSIZE),
    };
  }

  return {
    ...flags,
    hops,
    destinationHash: raw.slice(2, 18),
    context: raw[18],
    data: raw.slice(HEADER_MINSIZE),
  };
}

/**
 * The bytes a packet hash covers: the low nibble of the flags followed by
 * everything after the hops byte and any transport id
 */
export function getHashablePart(raw: Uint8Array): Uint8Array {
  if (raw.length < HEADER_MINSIZE) {
    throw new ValidationError(`Packet too short: ${raw.length} < ${HEADER_MINSIZE}`);
  }
  const headerType = (raw[0] & 0x40) === 0 ? HeaderType.HEADER_1 : HeaderType.HEADER_2;
  const offset = headerType === HeaderType.HEADER_2 ? 2 + DESTINATION_HASH_LENGTH : 2;
  if (headerType === HeaderType.HEADER_2 && raw.length < HEADER_MAXSIZE) {
    throw new ValidationError(`HEADER_2 packet too short: ${raw.length} < ${HEADER_MAXSIZE}`);
  }
  return concatBytes(Uint8Array.of(raw[0] & 0x0f), raw.subarray(offset));
}

/**
 * Truncated packet hash (16 bytes)
 */
export function packetHash(raw: Uint8Array): Uint8Array {
  return truncatedHash(getHashablePart(raw));
}

/**
 * Full 32-byte packet hash
 */
export function fullPacketHash(raw: Uint8Array): Uint8Array {
  return fullHash(getHashablePart(raw));
}
