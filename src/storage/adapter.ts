import type { RatchetRecord } from '../ratchet/ratchet.js';

/**
 * A peer's latest ratchet as stored
 */
export interface KnownRatchet extends RatchetRecord {
  destinationHash: string; // hex
}

/**
 * Query options for listing known ratchets
 */
export interface ListRatchetsOptions {
  /** Only ratchets received after this unix time (seconds) */
  since?: number;
  /** Maximum number of records to return */
  limit?: number;
}

/**
 * Persistence for ratchets learned from announces.
 * Implementations can use SQLite or any other backend.
 */
export interface RatchetStorageAdapter {
  /**
   * Remember a ratchet. An older record never replaces a newer one.
   * Returns whether the record was stored.
   */
  saveRatchet(destinationHash: string, record: RatchetRecord): Promise<boolean>;

  /**
   * Latest ratchet for a destination
   */
  getRatchet(destinationHash: string): Promise<RatchetRecord | null>;

  listRatchets(options?: ListRatchetsOptions): Promise<KnownRatchet[]>;

  deleteRatchet(destinationHash: string): Promise<boolean>;

  /**
   * Drop every ratchet received before `olderThan` (unix seconds).
   * Returns the number removed.
   */
  pruneRatchets(olderThan: number): Promise<number>;

  /**
   * Close the storage connection
   */
  close(): Promise<void>;
}
