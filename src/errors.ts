/**
 * Error codes carried by every error this package throws
 */
export type ErrorCode = 'VALIDATION' | 'UNSUPPORTED_MODE' | 'AUTHENTICATION';

/**
 * Base class for errors thrown by the wire layer
 */
export class MeshwireError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Malformed or out-of-range input: wrong lengths, missing fields, bad framing
 */
export class ValidationError extends MeshwireError {
  constructor(message: string, code: ErrorCode = 'VALIDATION') {
    super(code, message);
  }
}

/**
 * Unknown or disabled cipher/mode selector
 */
export class UnsupportedModeError extends ValidationError {
  readonly mode: number;

  constructor(mode: number) {
    super(`Unsupported link mode: ${mode}`, 'UNSUPPORTED_MODE');
    this.mode = mode;
  }
}

/**
 * HMAC mismatch while decrypting a token
 */
export class AuthenticationError extends MeshwireError {
  constructor(message = 'Token HMAC verification failed') {
    super('AUTHENTICATION', message);
  }
}

/**
 * Outcome of a verification that may legitimately fail
 */
export type VerificationResult =
  | { valid: true }
  | { valid: false; reason: string };

/**
 * Shorthand for a failed verification
 */
export function invalid(reason: string): VerificationResult {
  return { valid: false, reason };
}

/**
 * Throw a ValidationError unless `bytes` has exactly `expected` bytes
 */
export function assertLength(name: string, bytes: Uint8Array, expected: number): void {
  if (bytes.length !== expected) {
    throw new ValidationError(
      `Invalid ${name} length: expected ${expected} bytes, got ${bytes.length}`
    );
  }
}
