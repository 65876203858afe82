/**
 * Default physical MTU
 */
export const MTU = 500;

/**
 * HEADER_1 size: flags(1) + hops(1) + destination(16) + context(1)
 */
export const HEADER_MINSIZE = 19;

/**
 * HEADER_2 size: adds transport_id(16)
 */
export const HEADER_MAXSIZE = 35;

/**
 * Smallest IFAC tag a network may configure
 */
export const IFAC_MIN_SIZE = 1;

/**
 * Truncated hash length in bytes
 */
export const DESTINATION_HASH_LENGTH = 16;

/**
 * Name hash length in bytes
 */
export const NAME_HASH_LENGTH = 10;

/**
 * Flag bit marking a packet that carries an interface access code
 */
export const IFAC_FLAG = 0x80;

/**
 * Header layout, as stored in bit 6 of the flags byte
 */
export enum HeaderType {
  HEADER_1 = 0x00, // flags, hops, destination, context
  HEADER_2 = 0x01, // flags, hops, transport_id, destination, context
}

export enum TransportType {
  BROADCAST = 0x00,
  TRANSPORT = 0x01,
  RELAY = 0x02,
  TUNNEL = 0x03,
}

export enum DestinationType {
  SINGLE = 0x00,
  GROUP = 0x01,
  PLAIN = 0x02,
  LINK = 0x03,
}

export enum PacketType {
  DATA = 0x00,
  ANNOUNCE = 0x01,
  LINKREQUEST = 0x02,
  PROOF = 0x03,
}

/**
 * Packet context byte
 */
export enum PacketContext {
  NONE = 0x00,
  RESOURCE = 0x01,        // Packet is part of a resource
  RESOURCE_ADV = 0x02,    // Resource advertisement
  RESOURCE_REQ = 0x03,    // Resource part request
  RESOURCE_HMU = 0x04,    // Resource hashmap update
  RESOURCE_PRF = 0x05,    // Resource proof
  RESOURCE_ICL = 0x06,    // Resource initiator cancel
  RESOURCE_RCL = 0x07,    // Resource receiver cancel
  CACHE_REQUEST = 0x08,
  REQUEST = 0x09,
  RESPONSE = 0x0a,
  PATH_RESPONSE = 0x0b,
  COMMAND = 0x0c,
  COMMAND_STATUS = 0x0d,
  CHANNEL = 0x0e,
  KEEPALIVE = 0xfa,
  LINKIDENTIFY = 0xfb,
  LINKCLOSE = 0xfc,
  LINKPROOF = 0xfd,
  LRRTT = 0xfe,
  LRPROOF = 0xff,
}

/**
 * Decoded flags byte
 */
export interface PacketFlags {
  headerType: HeaderType;
  contextFlag: boolean;
  transportType: TransportType;
  destinationType: DestinationType;
  packetType: PacketType;
}

/**
 * Every field of a framed packet
 */
export interface Packet extends PacketFlags {
  hops: number;
  transportId?: Uint8Array;    // 16 bytes, HEADER_2 only
  destinationHash: Uint8Array; // 16 bytes
  context: PacketContext;
  data: Uint8Array;
}

/**
 * Packet fields where the routing defaults may be left out
 */
export interface PacketInit {
  headerType?: HeaderType;
  contextFlag?: boolean;
  transportType?: TransportType;
  destinationType: DestinationType;
  packetType: PacketType;
  hops?: number;
  transportId?: Uint8Array;
  destinationHash: Uint8Array;
  context?: PacketContext;
  data: Uint8Array;
}
