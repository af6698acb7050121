import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const uploadLedger = sqliteTable('upload_ledger', {
  fingerprint: text('fingerprint').primaryKey(),
  status: text('status', { enum: ['PENDING', 'SUBMITTED', 'CONFIRMED', 'FAILED'] }).notNull(),
  reason: text('reason'),
  shipmentNumber: text('shipment_number'),
  reference: text('reference'),
  sourceId: text('source_id'),
  ordinal: text('ordinal'),
  attempts: integer('attempts').notNull().default(0),
  runId: text('run_id'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
});

export type LedgerRow = typeof uploadLedger.$inferSelect;
