import { decode, encode } from '@msgpack/msgpack';
import { ValidationError, assertLength } from '../errors.js';
import { truncatedHash } from '../crypto/primitives.js';
import { utf8 } from '../crypto/utils.js';
import { DESTINATION_HASH_LENGTH } from '../codec/types.js';

/**
 * Timestamps and RTTs travel as msgpack float64
 */
const FLOAT_OPTIONS = { forceIntegerToFloat: true } as const;

export interface LinkRequest {
  /** Unix time in seconds */
  timestamp: number;
  pathHash: Uint8Array;
  data: Uint8Array | null;
}

export interface LinkResponse {
  requestId: Uint8Array;
  data: Uint8Array | null;
}

function decodeOrThrow(bytes: Uint8Array, what: string): unknown {
  try {
    return decode(bytes);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Malformed ${what}: ${detail}`);
  }
}

function asBytesOrNull(value: unknown, what: string): Uint8Array | null {
  if (value === null || value instanceof Uint8Array) {
    return value;
  }
  throw new ValidationError(`Malformed ${what}: expected bytes or nil`);
}

/**
 * Truncated hash of a request path
 */
export function requestPathHash(path: string): Uint8Array {
  return truncatedHash(utf8(path));
}

export function packRtt(rtt: number): Uint8Array {
  if (!Number.isFinite(rtt) || rtt < 0) {
    throw new ValidationError(`Invalid RTT: ${rtt}`);
  }
  return encode(rtt, FLOAT_OPTIONS);
}

export function unpackRtt(bytes: Uint8Array): number {
  const value = decodeOrThrow(bytes, 'RTT');
  if (typeof value !== 'number') {
    throw new ValidationError('Malformed RTT: expected a number');
  }
  return value;
}

/**
 * msgpack [timestamp, path_hash, data]
 */
export function packLinkRequest(request: LinkRequest): Uint8Array {
  assertLength('path hash', request.pathHash, DESTINATION_HASH_LENGTH);
  return encode([request.timestamp, request.pathHash, request.data], FLOAT_OPTIONS);
}

export function unpackLinkRequest(bytes: Uint8Array): LinkRequest {
  const value = decodeOrThrow(bytes, 'link request');
  if (!Array.isArray(value) || value.length !== 3) {
    throw new ValidationError('Malformed link request: expected a 3-element array');
  }
  const [timestamp, pathHash, data] = value;
  if (typeof timestamp !== 'number' || !(pathHash instanceof Uint8Array)) {
    throw new ValidationError('Malformed link request: bad timestamp or path hash');
  }
  return { timestamp, pathHash, data: asBytesOrNull(data, 'link request') };
}

/**
 * msgpack [request_id, data]
 */
export function packLinkResponse(response: LinkResponse): Uint8Array {
  assertLength('request id', response.requestId, DESTINATION_HASH_LENGTH);
  return encode([response.requestId, response.data]);
}

export function unpackLinkResponse(bytes: Uint8Array): LinkResponse {
  const value = decodeOrThrow(bytes, 'link response');
  if (!Array.isArray(value) || value.length !== 2) {
    throw new ValidationError('Malformed link response: expected a 2-element array');
  }
  const [requestId, data] = value;
  if (!(requestId instanceof Uint8Array)) {
    throw new ValidationError('Malformed link response: bad request id');
  }
  return { requestId, data: asBytesOrNull(data, 'link response') };
}
