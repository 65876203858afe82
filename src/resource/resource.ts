import debug from 'debug';
import { ValidationError, assertLength, type VerificationResult } from '../errors.js';
import {
  bytesToHex,
  bytesToUintBE,
  concatBytes,
  constantTimeEqual,
  secureRandomBytes,
  uintToBytesBE,
} from '../crypto/utils.js';
import { HEADER_MAXSIZE, IFAC_MIN_SIZE, MTU } from '../codec/types.js';
import { type ResourceAdvertisement, type ResourceFlags } from './advertisement.js';
import {
  MAPHASH_LEN,
  RANDOM_HASH_SIZE,
  buildHashmap,
  findPart,
  hashmapCollisions,
  mapHash,
  resourceHash,
  resourceProof,
  validateResourceProof,
} from './hashmap.js';

const log = {
  sender: debug('meshwire:resource:sender'),
  receiver: debug('meshwire:resource:receiver'),
};

/**
 * Parts requested per round trip
 */
export const WINDOW = 4;

/**
 * Largest single-segment resource
 */
export const MAX_EFFICIENT_SIZE = 1024 * 1024 - 1;

/**
 * Part payload size at the default MTU
 */
export const SDU = MTU - HEADER_MAXSIZE - IFAC_MIN_SIZE;

/**
 * Largest metadata block the 3-byte length prefix can describe
 */
export const METADATA_MAX_SIZE = 16 * 1024 * 1024 - 1;

const METADATA_PREFIX_SIZE = 3;

/**
 * Attempts at a collision-free random hash before giving up
 */
const MAX_HASHMAP_ATTEMPTS = 8;

export enum ResourceStatus {
  NONE = 0x00,
  QUEUED = 0x01,
  ADVERTISED = 0x02,
  TRANSFERRING = 0x03,
  AWAITING_PROOF = 0x04,
  ASSEMBLING = 0x05,
  COMPLETE = 0x06,
  FAILED = 0x07,
  CORRUPT = 0x08,
}

export interface ResourceOptions {
  /** Part size; defaults to SDU */
  sdu?: number;
  /** Fixed random hash, for reproducible output */
  randomHash?: Uint8Array;
  /** Fixed stream prefix, for reproducible output */
  randomPrefix?: Uint8Array;
  /** Transforms the data before splitting, usually a link's encrypt */
  encrypt?: (data: Uint8Array) => Uint8Array;
  /** Used only when its output is shorter than its input */
  compress?: (data: Uint8Array) => Uint8Array;
  /** Sent ahead of the data behind a 3-byte length */
  metadata?: Uint8Array;
  isRequest?: boolean;
  isResponse?: boolean;
  requestId?: Uint8Array;
  /** Position of this resource in a split transfer, 1-based */
  segmentIndex?: number;
  totalSegments?: number;
  originalHash?: Uint8Array;
}

/**
 * Sender side of a resource transfer
 */
export interface OutgoingResource {
  hash: Uint8Array;
  randomHash: Uint8Array;
  parts: Uint8Array[];
  hashmap: Uint8Array;
  advertisement: ResourceAdvertisement;
  /** Proof the receiver must return once assembled */
  expectedProof: Uint8Array;
}

export interface AssemblerOptions {
  /** Reverses the sender's encrypt, usually a link's decrypt */
  decrypt?: (data: Uint8Array) => Uint8Array;
  /** Required when the advertisement is flagged compressed */
  decompress?: (data: Uint8Array) => Uint8Array;
}

function splitParts(data: Uint8Array, sdu: number): Uint8Array[] {
  const parts: Uint8Array[] = [];
  for (let offset = 0; offset < data.length; offset += sdu) {
    parts.push(data.slice(offset, Math.min(offset + sdu, data.length)));
  }
  if (parts.length === 0) {
    parts.push(new Uint8Array(0));
  }
  return parts;
}

/**
 * True when two parts with different contents share a map hash.
 * Identical parts sharing one are harmless.
 */
function hasTrueCollision(parts: Uint8Array[], hashmap: Uint8Array): boolean {
  for (const indexes of hashmapCollisions(hashmap).values()) {
    const first = parts[indexes[0]];
    if (indexes.some((index) => !constantTimeEqual(parts[index], first))) {
      return true;
    }
  }
  return false;
}

/**
 * Metadata length prefix + metadata + data
 */
function withMetadata(data: Uint8Array, metadata: Uint8Array): Uint8Array {
  if (metadata.length > METADATA_MAX_SIZE) {
    throw new ValidationError(`Resource metadata too large: ${metadata.length} > ${METADATA_MAX_SIZE}`);
  }
  return concatBytes(uintToBytesBE(metadata.length, METADATA_PREFIX_SIZE), metadata, data);
}

function splitMetadata(payload: Uint8Array): { metadata: Uint8Array; data: Uint8Array } {
  if (payload.length < METADATA_PREFIX_SIZE) {
    throw new ValidationError(`Resource too short for metadata: ${payload.length}`);
  }
  const size = bytesToUintBE(payload.subarray(0, METADATA_PREFIX_SIZE));
  if (METADATA_PREFIX_SIZE + size > payload.length) {
    throw new ValidationError(`Resource metadata overruns the data: ${size}`);
  }
  return {
    metadata: payload.slice(METADATA_PREFIX_SIZE, METADATA_PREFIX_SIZE + size),
    data: payload.slice(METADATA_PREFIX_SIZE + size),
  };
}

/**
 * Split data into parts, build the hashmap and advertisement.
 * The stream is random prefix + content, where content is the metadata
 * framed data, compressed when that makes it shorter.
 */
export function createResource(data: Uint8Array, options: ResourceOptions = {}): OutgoingResource {
  const payload = options.metadata ? withMetadata(data, options.metadata) : data;
  if (payload.length > MAX_EFFICIENT_SIZE) {
    throw new ValidationError(`Resource too large for one segment: ${payload.length} > ${MAX_EFFICIENT_SIZE}`);
  }
  const sdu = options.sdu ?? SDU;
  if (!Number.isInteger(sdu) || sdu < 1) {
    throw new ValidationError(`Invalid SDU: ${sdu}`);
  }
  if (options.randomHash) {
    assertLength('random hash', options.randomHash, RANDOM_HASH_SIZE);
  }
  if (options.randomPrefix) {
    assertLength('random prefix', options.randomPrefix, RANDOM_HASH_SIZE);
  }

  const packed = options.compress ? options.compress(payload) : payload;
  const compressed = packed.length < payload.length;
  const prefixed = concatBytes(
    options.randomPrefix ?? secureRandomBytes(RANDOM_HASH_SIZE),
    compressed ? packed : payload
  );
  const transfer = options.encrypt ? options.encrypt(prefixed) : prefixed;
  const parts = splitParts(transfer, sdu);

  let randomHash = options.randomHash ?? secureRandomBytes(RANDOM_HASH_SIZE);
  let hashmap = buildHashmap(parts, randomHash);
  for (let attempt = 1; hasTrueCollision(parts, hashmap); attempt++) {
    if (options.randomHash || attempt >= MAX_HASHMAP_ATTEMPTS) {
      throw new ValidationError('Hashmap collision between distinct parts');
    }
    log.sender(`hashmap collision with random hash ${bytesToHex(randomHash)}, regenerating`);
    randomHash = secureRandomBytes(RANDOM_HASH_SIZE);
    hashmap = buildHashmap(parts, randomHash);
  }

  const hash = resourceHash(payload, randomHash);
  const totalSegments = options.totalSegments ?? 1;
  const flags: ResourceFlags = {
    encrypted: options.encrypt !== undefined,
    compressed,
    split: totalSegments > 1,
    isRequest: options.isRequest ?? false,
    isResponse: options.isResponse ?? false,
    hasMetadata: options.metadata !== undefined,
  };

  log.sender(
    `resource ${bytesToHex(hash)}: ${payload.length} bytes in ${parts.length} parts${compressed ? ', compressed' : ''}`
  );
  return {
    hash,
    randomHash,
    parts,
    hashmap,
    expectedProof: resourceProof(payload, hash),
    advertisement: {
      transferSize: transfer.length,
      dataSize: payload.length,
      numParts: parts.length,
      hash,
      randomHash,
      originalHash: options.originalHash ?? hash,
      segmentIndex: options.segmentIndex ?? 1,
      totalSegments,
      requestId: options.requestId,
      flags,
      hashmap,
    },
  };
}

/**
 * Sender side check of the receiver's completion proof
 */
export function validateProof(resource: OutgoingResource, payload: Uint8Array): VerificationResult {
  return validateResourceProof(resource.hash, resource.expectedProof, payload);
}

/**
 * Receiver side: collects parts by map hash and rebuilds the data.
 * Owned by a single link; not safe to share.
 */
export class ResourceAssembler {
  readonly advertisement: ResourceAdvertisement;
  private hashmap: Uint8Array;
  private readonly parts: Array<Uint8Array | null>;
  private receivedCount = 0;
  private state: ResourceStatus = ResourceStatus.TRANSFERRING;
  private data: Uint8Array | null = null;
  private payload: Uint8Array | null = null;
  private metadataBytes: Uint8Array | null = null;
  private readonly options: AssemblerOptions;

  constructor(advertisement: ResourceAdvertisement, options: AssemblerOptions = {}) {
    if (advertisement.flags.compressed && !options.decompress) {
      throw new ValidationError('Compressed resource needs a decompressor');
    }
    if (advertisement.flags.encrypted && !options.decrypt) {
      throw new ValidationError('Encrypted resource needs a decryptor');
    }
    if (advertisement.hashmap.length / MAPHASH_LEN > advertisement.numParts) {
      throw new ValidationError('Hashmap lists more parts than advertised');
    }
    this.advertisement = advertisement;
    this.hashmap = advertisement.hashmap.slice();
    this.parts = new Array<Uint8Array | null>(advertisement.numParts).fill(null);
    this.options = options;
  }

  get status(): ResourceStatus {
    return this.state;
  }

  get received(): number {
    return this.receivedCount;
  }

  get progress(): number {
    return this.advertisement.numParts === 0 ? 1 : this.receivedCount / this.advertisement.numParts;
  }

  /**
   * Metadata sent with the resource, once assembled
   */
  get metadata(): Uint8Array | null {
    return this.metadataBytes;
  }

  get isComplete(): boolean {
    return this.receivedCount === this.advertisement.numParts;
  }

  /**
   * Append map hashes from a hashmap update
   */
  extendHashmap(segment: Uint8Array): void {
    if (segment.length % MAPHASH_LEN !== 0) {
      throw new ValidationError(`Hashmap segment length ${segment.length} is not a multiple of ${MAPHASH_LEN}`);
    }
    if ((this.hashmap.length + segment.length) / MAPHASH_LEN > this.advertisement.numParts) {
      throw new ValidationError('Hashmap update exceeds advertised part count');
    }
    this.hashmap = concatBytes(this.hashmap, segment);
  }

  /**
   * Store a part. Returns false for unknown or duplicate parts.
   */
  receivePart(part: Uint8Array): boolean {
    if (this.state !== ResourceStatus.TRANSFERRING) {
      return false;
    }
    const hash = mapHash(part, this.advertisement.randomHash);
    let index = findPart(this.hashmap, hash);
    while (index >= 0) {
      const existing = this.parts[index];
      if (existing === null) {
        this.parts[index] = part.slice();
        this.receivedCount++;
        return true;
      }
      if (!constantTimeEqual(existing, part)) {
        log.receiver(`map hash ${bytesToHex(hash)} collides between distinct parts at index ${index}`);
      }
      index = findPart(this.hashmap, hash, index + 1);
    }
    return false;
  }

  /**
   * Map hashes of the next missing parts we know about, for a part request
   */
  missingMapHashes(limit: number = WINDOW): Uint8Array[] {
    const missing: Uint8Array[] = [];
    const known = this.hashmap.length / MAPHASH_LEN;
    for (let index = 0; index < known && missing.length < limit; index++) {
      if (this.parts[index] === null) {
        missing.push(this.hashmap.slice(index * MAPHASH_LEN, (index + 1) * MAPHASH_LEN));
      }
    }
    return missing;
  }

  /**
   * Join, decrypt, strip the random prefix and decompress the parts, check
   * the resource hash, then split off any metadata
   * @throws ValidationError when parts are missing or the hash does not match
   */
  assemble(): Uint8Array {
    if (this.data) {
      return this.data;
    }
    if (!this.isComplete) {
      throw new ValidationError(`Resource incomplete: ${this.receivedCount}/${this.advertisement.numParts} parts`);
    }
    this.state = ResourceStatus.ASSEMBLING;

    const stream = concatBytes(...this.parts.filter((part): part is Uint8Array => part !== null));
    try {
      const decrypted = this.options.decrypt ? this.options.decrypt(stream) : stream;
      if (decrypted.length < RANDOM_HASH_SIZE) {
        throw new ValidationError(`Resource stream too short: ${decrypted.length}`);
      }
      const content = decrypted.slice(RANDOM_HASH_SIZE);
      const payload = this.options.decompress && this.advertisement.flags.compressed
        ? this.options.decompress(content)
        : content;

      if (!constantTimeEqual(resourceHash(payload, this.advertisement.randomHash), this.advertisement.hash)) {
        log.receiver(`resource ${bytesToHex(this.advertisement.hash)} failed hash check`);
        throw new ValidationError('Resource hash mismatch');
      }

      if (this.advertisement.flags.hasMetadata) {
        const { metadata, data } = splitMetadata(payload);
        this.metadataBytes = metadata;
        this.data = data;
      } else {
        this.data = payload;
      }
      this.payload = payload;
    } catch (error) {
      this.state = ResourceStatus.CORRUPT;
      throw error;
    }

    this.state = ResourceStatus.COMPLETE;
    return this.data;
  }

  /**
   * Completion proof payload: resource hash + proof over the data with its
   * metadata
   */
  proof(): Uint8Array {
    this.assemble();
    if (!this.payload) {
      throw new ValidationError('Resource not assembled');
    }
    return concatBytes(this.advertisement.hash, resourceProof(this.payload, this.advertisement.hash));
  }
}
