export type {
  KnownRatchet,
  ListRatchetsOptions,
  RatchetStorageAdapter,
} from './adapter.js';

export { SQLiteRatchetStorage } from './sqlite.js';
