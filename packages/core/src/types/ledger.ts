export const LedgerStatuses = {
  PENDING: "PENDING",
  SUBMITTED: "SUBMITTED",
  CONFIRMED: "CONFIRMED",
  FAILED: "FAILED",
} as const;

export type LedgerStatus = (typeof LedgerStatuses)[keyof typeof LedgerStatuses];

/**
 * UploadLedgerEntry
 * Durable submission state of one fingerprint. Entries are never deleted.
 */
export interface UploadLedgerEntry {
  fingerprint: string;
  status: LedgerStatus;

  /** Failure reason, set when status is FAILED */
  reason?: string;

  /** Carrier-assigned shipment number once known */
  shipmentNumber?: string;

  /** Reference (Bda) sent with the last submission */
  reference?: string;

  sourceId?: string;
  ordinal?: string;

  /** Number of submissions issued for this fingerprint */
  attempts: number;

  /** Run that last touched the entry */
  runId?: string;

  /** ISO-8601 timestamps */
  createdAt: string;
  updatedAt: string;
}

export interface LedgerFilter {
  status?: LedgerStatus;
  sourceId?: string;
}
