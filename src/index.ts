// Session
export { Session } from './session.js';

// Types
export {
  DEFAULT_SESSION_CONFIG,
  type SessionConfig,
  type RatchetConfig,
  type IfacConfig,
  type AnnounceReceipt,
  type ReceivedData,
} from './types.js';

// Errors
export {
  MeshwireError,
  ValidationError,
  UnsupportedModeError,
  AuthenticationError,
  invalid,
  type ErrorCode,
  type VerificationResult,
} from './errors.js';

// Crypto
export * from './crypto/index.js';

// Wire formats
export * from './codec/index.js';

// Identities and destinations
export * from './identity/index.js';

// Links
export * from './link/index.js';

// Resources
export * from './resource/index.js';

// Ratchets
export * from './ratchet/index.js';

// Access codes
export * from './ifac/index.js';

// Storage
export * from './storage/index.js';
