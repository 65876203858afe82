import { decode, encode } from '@msgpack/msgpack';
import { ValidationError } from '../errors.js';
import { MTU } from '../codec/types.js';
import { linkMdu } from '../link/handshake.js';
import { MAPHASH_LEN } from './hashmap.js';

/**
 * msgpack framing overhead of an advertisement without its hashmap
 */
export const ADVERTISEMENT_OVERHEAD = 134;

/**
 * Map hashes that fit one advertisement at the default MTU
 */
export const HASHMAP_MAX_LEN = Math.floor((linkMdu(MTU) - ADVERTISEMENT_OVERHEAD) / MAPHASH_LEN);

/**
 * Advertisement flag bits, low to high
 */
export interface ResourceFlags {
  encrypted: boolean;   // 0x01
  compressed: boolean;  // 0x02
  split: boolean;       // 0x04
  isRequest: boolean;   // 0x08
  isResponse: boolean;  // 0x10
  hasMetadata: boolean; // 0x20
}

/**
 * Resource advertisement
 */
export interface ResourceAdvertisement {
  /** t: bytes on the wire */
  transferSize: number;
  /** d: bytes after decryption and decompression */
  dataSize: number;
  /** n */
  numParts: number;
  /** h */
  hash: Uint8Array;
  /** r */
  randomHash: Uint8Array;
  /** o: hash of the first segment of a split resource */
  originalHash?: Uint8Array;
  /** i: 1-based */
  segmentIndex: number;
  /** l */
  totalSegments: number;
  /** q */
  requestId?: Uint8Array;
  /** f */
  flags: ResourceFlags;
  /** m: the full hashmap when packing, the carried segment after unpacking */
  hashmap: Uint8Array;
}

const FLAG_BITS: ReadonlyArray<[keyof ResourceFlags, number]> = [
  ['encrypted', 0x01],
  ['compressed', 0x02],
  ['split', 0x04],
  ['isRequest', 0x08],
  ['isResponse', 0x10],
  ['hasMetadata', 0x20],
];

export function encodeResourceFlags(flags: ResourceFlags): number {
  let value = 0;
  for (const [name, bit] of FLAG_BITS) {
    if (flags[name]) {
      value |= bit;
    }
  }
  return value;
}

export function decodeResourceFlags(value: number): ResourceFlags {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new ValidationError(`Invalid resource flags: ${value}`);
  }
  return {
    encrypted: (value & 0x01) !== 0,
    compressed: (value & 0x02) !== 0,
    split: (value & 0x04) !== 0,
    isRequest: (value & 0x08) !== 0,
    isResponse: (value & 0x10) !== 0,
    hasMetadata: (value & 0x20) !== 0,
  };
}

/**
 * Number of advertisement-sized hashmap segments a resource needs
 */
export function hashmapSegmentCount(numParts: number, maxLen: number = HASHMAP_MAX_LEN): number {
  return Math.max(1, Math.ceil(numParts / maxLen));
}

/**
 * Slice one segment out of a full hashmap
 */
export function hashmapSegment(hashmap: Uint8Array, segment: number, maxLen: number = HASHMAP_MAX_LEN): Uint8Array {
  const start = segment * maxLen * MAPHASH_LEN;
  return hashmap.slice(start, Math.min(start + maxLen * MAPHASH_LEN, hashmap.length));
}

/**
 * Encode as a msgpack map with keys in the order t,d,n,h,r,o,i,l,q,f,m.
 * Only the requested hashmap segment is included.
 */
export function packAdvertisement(
  advertisement: ResourceAdvertisement,
  segment = 0,
  maxLen: number = HASHMAP_MAX_LEN
): Uint8Array {
  if (!Number.isInteger(segment) || segment < 0 || segment >= hashmapSegmentCount(advertisement.numParts, maxLen)) {
    throw new ValidationError(`Invalid hashmap segment: ${segment}`);
  }
  return encode({
    t: advertisement.transferSize,
    d: advertisement.dataSize,
    n: advertisement.numParts,
    h: advertisement.hash,
    r: advertisement.randomHash,
    o: advertisement.originalHash ?? null,
    i: advertisement.segmentIndex,
    l: advertisement.totalSegments,
    q: advertisement.requestId ?? null,
    f: encodeResourceFlags(advertisement.flags),
    m: hashmapSegment(advertisement.hashmap, segment, maxLen),
  });
}

function readInteger(fields: Map<string, unknown>, key: string, fallback?: number): number {
  const value = fields.get(key);
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ValidationError(`Malformed advertisement: "${key}" must be a non-negative integer`);
  }
  return value;
}

function readBytes(fields: Map<string, unknown>, key: string): Uint8Array {
  const value = fields.get(key);
  if (!(value instanceof Uint8Array)) {
    throw new ValidationError(`Malformed advertisement: "${key}" must be bytes`);
  }
  return value;
}

function readOptionalBytes(fields: Map<string, unknown>, key: string): Uint8Array | undefined {
  const value = fields.get(key);
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!(value instanceof Uint8Array)) {
    throw new ValidationError(`Malformed advertisement: "${key}" must be bytes or nil`);
  }
  return value;
}

/**
 * Decode an advertisement. Unknown keys are ignored.
 */
export function unpackAdvertisement(bytes: Uint8Array): ResourceAdvertisement {
  let decoded: unknown;
  try {
    decoded = decode(bytes);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Malformed advertisement: ${detail}`);
  }
  if (typeof decoded !== 'object' || decoded === null || Array.isArray(decoded) || decoded instanceof Uint8Array) {
    throw new ValidationError('Malformed advertisement: expected a map');
  }
  const fields = new Map<string, unknown>(Object.entries(decoded));

  const hashmap = readBytes(fields, 'm');
  if (hashmap.length % MAPHASH_LEN !== 0) {
    throw new ValidationError(`Malformed advertisement: hashmap length ${hashmap.length}`);
  }

  return {
    transferSize: readInteger(fields, 't'),
    dataSize: readInteger(fields, 'd'),
    numParts: readInteger(fields, 'n'),
    hash: readBytes(fields, 'h'),
    randomHash: readBytes(fields, 'r'),
    originalHash: readOptionalBytes(fields, 'o'),
    segmentIndex: readInteger(fields, 'i', 1),
    totalSegments: readInteger(fields, 'l', 1),
    requestId: readOptionalBytes(fields, 'q'),
    flags: decodeResourceFlags(readInteger(fields, 'f')),
    hashmap,
  };
}
