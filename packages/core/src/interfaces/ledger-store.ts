import type { LedgerFilter, UploadLedgerEntry } from '../types/index.js';

/**
 * LedgerStore
 * Durable fingerprint → entry map. Implementations must make put() durable
 * before resolving; the duplicate tracker relies on it for crash recovery.
 */
export interface LedgerStore {
  get(fingerprint: string): Promise<UploadLedgerEntry | null>;

  /** Insert or replace the entry for entry.fingerprint */
  put(entry: UploadLedgerEntry): Promise<void>;

  list(filter?: LedgerFilter): Promise<UploadLedgerEntry[]>;
}
