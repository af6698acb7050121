import type { LedgerStore } from "../interfaces/ledger-store.js";
import type { LedgerFilter, UploadLedgerEntry } from "../types/index.js";

/**
 * InMemoryLedgerStore
 * Simple in-memory implementation of LedgerStore for testing and local development.
 * Not durable: entries are lost with the process.
 */
export class InMemoryLedgerStore implements LedgerStore {
  private entries = new Map<string, UploadLedgerEntry>();

  constructor(initial: UploadLedgerEntry[] = []) {
    for (const entry of initial) {
      this.entries.set(entry.fingerprint, { ...entry });
    }
  }

  async get(fingerprint: string): Promise<UploadLedgerEntry | null> {
    const entry = this.entries.get(fingerprint);
    return entry ? { ...entry } : null;
  }

  async put(entry: UploadLedgerEntry): Promise<void> {
    this.entries.set(entry.fingerprint, { ...entry });
  }

  async list(filter: LedgerFilter = {}): Promise<UploadLedgerEntry[]> {
    return [...this.entries.values()]
      .filter((e) => filter.status === undefined || e.status === filter.status)
      .filter((e) => filter.sourceId === undefined || e.sourceId === filter.sourceId)
      .map((e) => ({ ...e }));
  }

  /**
   * Clear all entries (useful for testing)
   */
  clear(): void {
    this.entries.clear();
  }
}
