import type { Identity } from './identity/identity.js';
import { DEFAULT_LINK_MODE, type LinkMode } from './link/handshake.js';
import { RATCHET_EXPIRY_MS, MAX_RATCHETS } from './ratchet/ratchet.js';
import { MTU } from './codec/types.js';
import type { RatchetStorageAdapter } from './storage/adapter.js';

/**
 * Ratchet behaviour for a session
 */
export interface RatchetConfig {
  /** Publish a fresh ratchet with every announce */
  enabled?: boolean;
  /** Known ratchets older than this are not used (ms) */
  expiryMs?: number;
  /** Private ratchets kept per destination */
  maxRatchets?: number;
  /** Refuse inbound packets not encrypted to one of our ratchets */
  enforce?: boolean;
}

/**
 * Interface access code settings
 */
export interface IfacConfig {
  /** Network name */
  netname?: string;
  /** Network passphrase */
  netkey?: string;
  /** Tag length in bytes */
  size?: number;
}

/**
 * Configuration for Session
 */
export interface SessionConfig {
  /** 64-byte identity private key (hex string or Uint8Array); generated if absent */
  privateKey?: string | Uint8Array;
  /** Known-ratchet storage (defaults to SQLite) */
  storage?: RatchetStorageAdapter;
  /** Database path for SQLite storage (ignored if storage is provided) */
  dbPath?: string;
  /** Mode requested for outgoing links */
  linkMode?: LinkMode;
  /** MTU signalled for outgoing links */
  mtu?: number;
  ratchets?: RatchetConfig;
  /** Enables access codes on every packet the session sends or receives */
  ifac?: IfacConfig;
}

export const DEFAULT_SESSION_CONFIG = {
  dbPath: ':memory:',
  linkMode: DEFAULT_LINK_MODE,
  mtu: MTU,
  ratchets: {
    enabled: true,
    expiryMs: RATCHET_EXPIRY_MS,
    maxRatchets: MAX_RATCHETS,
    enforce: false,
  },
  ifacSize: 16,
} as const;

/**
 * Outcome of processing an inbound announce
 */
export interface AnnounceReceipt {
  valid: boolean;
  /** Hex destination hash */
  destinationHash: string;
  identity?: Identity;
  appData?: Uint8Array;
  /** Hex id of the ratchet the announce carried */
  ratchetId?: string;
  reason?: string;
}

/**
 * A decrypted inbound packet
 */
export interface ReceivedData {
  /** Hex destination hash */
  destinationHash: string;
  plaintext: Uint8Array;
}
