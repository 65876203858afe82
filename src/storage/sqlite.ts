import Database from 'better-sqlite3';
import debug from 'debug';
import { packRatchetRecord, unpackRatchetRecord, type RatchetRecord } from '../ratchet/ratchet.js';
import type { KnownRatchet, ListRatchetsOptions, RatchetStorageAdapter } from './adapter.js';

const log = {
  prune: debug('meshwire:storage:prune'),
};

interface RatchetRow {
  destination_hash: string;
  record: Buffer;
}

/**
 * SQLite storage for known ratchets. Each row holds the msgpack ratchet
 * record; `received` is duplicated into a column for ordering and pruning.
 */
export class SQLiteRatchetStorage implements RatchetStorageAdapter {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:') {
    this.db = new Database(dbPath);
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS known_ratchets (
        destination_hash  TEXT PRIMARY KEY,
        record            BLOB NOT NULL,
        received          REAL NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_ratchet_received
        ON known_ratchets (received);
    `);
  }

  async saveRatchet(destinationHash: string, record: RatchetRecord): Promise<boolean> {
    const stmt = this.db.prepare<[string, Buffer, number]>(`
      INSERT INTO known_ratchets (destination_hash, record, received)
      VALUES (?, ?, ?)
      ON CONFLICT (destination_hash) DO UPDATE
        SET record = excluded.record, received = excluded.received
        WHERE excluded.received >= known_ratchets.received
    `);

    const result = stmt.run(destinationHash, Buffer.from(packRatchetRecord(record)), record.received);
    return result.changes > 0;
  }

  async getRatchet(destinationHash: string): Promise<RatchetRecord | null> {
    const stmt = this.db.prepare<[string], RatchetRow>(`
      SELECT destination_hash, record
      FROM known_ratchets
      WHERE destination_hash = ?
    `);

    const row = stmt.get(destinationHash);
    if (!row) {
      return null;
    }
    return unpackRatchetRecord(new Uint8Array(row.record));
  }

  async listRatchets(options: ListRatchetsOptions = {}): Promise<KnownRatchet[]> {
    const conditions: string[] = [];
    const params: number[] = [];

    if (options.since !== undefined) {
      conditions.push('received > ?');
      params.push(options.since);
    }

    const whereClause = conditions.length > 0
      ? `WHERE ${conditions.join(' AND ')}`
      : '';
    const limitClause = options.limit ? `LIMIT ${Math.floor(options.limit)}` : '';

    const stmt = this.db.prepare<number[], RatchetRow>(`
      SELECT destination_hash, record
      FROM known_ratchets
      ${whereClause}
      ORDER BY received DESC
      ${limitClause}
    `);

    return stmt.all(...params).map((row) => ({
      destinationHash: row.destination_hash,
      ...unpackRatchetRecord(new Uint8Array(row.record)),
    }));
  }

  async deleteRatchet(destinationHash: string): Promise<boolean> {
    const stmt = this.db.prepare<[string]>('DELETE FROM known_ratchets WHERE destination_hash = ?');
    return stmt.run(destinationHash).changes > 0;
  }

  async pruneRatchets(olderThan: number): Promise<number> {
    const stmt = this.db.prepare<[number]>('DELETE FROM known_ratchets WHERE received < ?');
    const removed = stmt.run(olderThan).changes;
    if (removed > 0) {
      log.prune(`removed ${removed} expired ratchets`);
    }
    return removed;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
