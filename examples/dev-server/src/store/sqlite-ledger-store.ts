import Database from 'better-sqlite3';
import { and, eq, sql, type SQL } from 'drizzle-orm';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { LedgerFilter, LedgerStore, UploadLedgerEntry } from '@spedisci/core';
import { uploadLedger, type LedgerRow } from './schema.js';

function toEntry(row: LedgerRow): UploadLedgerEntry {
  return {
    fingerprint: row.fingerprint,
    status: row.status,
    attempts: row.attempts,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    ...(row.reason !== null && { reason: row.reason }),
    ...(row.shipmentNumber !== null && { shipmentNumber: row.shipmentNumber }),
    ...(row.reference !== null && { reference: row.reference }),
    ...(row.sourceId !== null && { sourceId: row.sourceId }),
    ...(row.ordinal !== null && { ordinal: row.ordinal }),
    ...(row.runId !== null && { runId: row.runId }),
  };
}

function toRow(entry: UploadLedgerEntry): LedgerRow {
  return {
    fingerprint: entry.fingerprint,
    status: entry.status,
    reason: entry.reason ?? null,
    shipmentNumber: entry.shipmentNumber ?? null,
    reference: entry.reference ?? null,
    sourceId: entry.sourceId ?? null,
    ordinal: entry.ordinal ?? null,
    attempts: entry.attempts,
    runId: entry.runId ?? null,
    createdAt: entry.createdAt,
    updatedAt: entry.updatedAt,
  };
}

/**
 * LedgerStore on SQLite.
 * Writes are synchronous, so an entry is on disk before put() resolves.
 */
export class SqliteLedgerStore implements LedgerStore {
  private readonly db: Database.Database;
  private readonly client: BetterSQLite3Database;

  constructor(path = ':memory:') {
    this.db = new Database(path);
    this.db.pragma('journal_mode = WAL');
    this.client = drizzle(this.db);
    this.ensureTables();
  }

  private ensureTables() {
    // Dev server only: no migrations, create the table when missing
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS upload_ledger (
        fingerprint TEXT PRIMARY KEY,
        status TEXT NOT NULL,
        reason TEXT,
        shipment_number TEXT,
        reference TEXT,
        source_id TEXT,
        ordinal TEXT,
        attempts INTEGER NOT NULL DEFAULT 0,
        run_id TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS upload_ledger_status ON upload_ledger (status);
    `);
  }

  async get(fingerprint: string): Promise<UploadLedgerEntry | null> {
    const row = this.client.select().from(uploadLedger).where(eq(uploadLedger.fingerprint, fingerprint)).get();
    return row ? toEntry(row) : null;
  }

  async put(entry: UploadLedgerEntry): Promise<void> {
    const row = toRow(entry);
    this.client
      .insert(uploadLedger)
      .values(row)
      .onConflictDoUpdate({ target: uploadLedger.fingerprint, set: row })
      .run();
  }

  /** Entries in first-insert order */
  async list(filter: LedgerFilter = {}): Promise<UploadLedgerEntry[]> {
    const conditions: SQL[] = [];
    if (filter.status !== undefined) conditions.push(eq(uploadLedger.status, filter.status));
    if (filter.sourceId !== undefined) conditions.push(eq(uploadLedger.sourceId, filter.sourceId));

    const rows = this.client
      .select()
      .from(uploadLedger)
      .where(and(...conditions))
      .orderBy(sql`rowid`)
      .all();
    return rows.map(toEntry);
  }

  close(): void {
    this.db.close();
  }
}
