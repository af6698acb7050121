import type { AdapterContext } from '../interfaces/adapter-context.js';
import type { CarrierAdapter } from '../interfaces/carrier-adapter.js';
import type { LedgerStore } from '../interfaces/ledger-store.js';
import type { Logger } from '../interfaces/logger.js';
import {
  LedgerStatuses,
  type LedgerFilter,
  type LedgerStatus,
  type UploadLedgerEntry,
} from '../types/ledger.js';
import { errorToLog } from '../utils/logging.js';

export type AdmitDecision =
  | { decision: 'ADMIT'; entry: UploadLedgerEntry }
  | { decision: 'SKIP'; previousStatus: LedgerStatus | 'IN_FLIGHT'; entry?: UploadLedgerEntry };

export interface AdmitInput {
  fingerprint: string;
  sourceId?: string;
  ordinal?: string;
}

export interface DuplicateTrackerOptions {
  runId?: string;
  logger?: Logger;
  now?: () => Date;
}

export interface ReconcileSummary {
  confirmed: number;
  failed: number;
  unresolved: number;
}

export type StatusCounts = Record<LedgerStatus, number>;

export interface LedgerStats {
  total: number;
  byStatus: StatusCounts;
  bySource: Record<string, StatusCounts>;
}

/** Reason recorded when the carrier has no trace of a submitted record */
export const NOT_FOUND_AT_CARRIER = 'NOT_FOUND_AT_CARRIER';

function emptyCounts(): StatusCounts {
  return { PENDING: 0, SUBMITTED: 0, CONFIRMED: 0, FAILED: 0 };
}

/**
 * DuplicateTracker
 *
 * Sole owner of the upload ledger. Decides whether a fingerprint may be
 * uploaded and records every state transition:
 *
 *   (none | PENDING | FAILED) --admit--> PENDING --markSubmitted--> SUBMITTED
 *   SUBMITTED --confirm--> CONFIRMED
 *   PENDING | SUBMITTED --fail--> FAILED
 *
 * Decisions are taken against an in-memory copy of the ledger without
 * yielding, so concurrent admits of one fingerprint cannot both succeed.
 * Writes go through a single queue and reach the store in call order.
 */
export class DuplicateTracker {
  private readonly entries = new Map<string, UploadLedgerEntry>();
  private readonly claimed = new Set<string>();
  private writes: Promise<void> = Promise.resolve();
  private ready?: Promise<void>;
  private readonly now: () => Date;

  constructor(
    private readonly store: LedgerStore,
    private readonly opts: DuplicateTrackerOptions = {}
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  /**
   * Load the ledger. Called implicitly by admit().
   */
  open(): Promise<void> {
    this.ready ??= this.store.list().then((entries) => {
      for (const entry of entries) this.entries.set(entry.fingerprint, entry);
    });
    return this.ready;
  }

  async admit(input: AdmitInput): Promise<AdmitDecision> {
    await this.open();

    // Nothing below may await before the claim is taken
    const previous = this.entries.get(input.fingerprint);
    if (this.claimed.has(input.fingerprint)) {
      return { decision: 'SKIP', previousStatus: 'IN_FLIGHT', entry: previous && { ...previous } };
    }
    if (previous && (previous.status === LedgerStatuses.CONFIRMED || previous.status === LedgerStatuses.SUBMITTED)) {
      return { decision: 'SKIP', previousStatus: previous.status, entry: { ...previous } };
    }

    this.claimed.add(input.fingerprint);
    const timestamp = this.now().toISOString();
    const entry: UploadLedgerEntry = {
      fingerprint: input.fingerprint,
      status: LedgerStatuses.PENDING,
      attempts: previous?.attempts ?? 0,
      createdAt: previous?.createdAt ?? timestamp,
      updatedAt: timestamp,
      ...(input.sourceId !== undefined && { sourceId: input.sourceId }),
      ...(input.ordinal !== undefined && { ordinal: input.ordinal }),
      ...(this.opts.runId !== undefined && { runId: this.opts.runId }),
    };
    this.entries.set(entry.fingerprint, entry);
    await this.enqueue(entry);
    return { decision: 'ADMIT', entry: { ...entry } };
  }

  /**
   * Record that the entry is about to be sent. Must resolve before the
   * network call so a crash leaves a SUBMITTED entry to reconcile.
   */
  markSubmitted(fingerprint: string, reference: string): Promise<void> {
    const current = this.require(fingerprint);
    return this.transition(fingerprint, {
      status: LedgerStatuses.SUBMITTED,
      reference,
      attempts: current.attempts + 1,
      reason: undefined,
    });
  }

  confirm(fingerprint: string, shipmentNumber?: string): Promise<void> {
    this.claimed.delete(fingerprint);
    return this.transition(fingerprint, {
      status: LedgerStatuses.CONFIRMED,
      reason: undefined,
      ...(shipmentNumber !== undefined && { shipmentNumber }),
    });
  }

  fail(fingerprint: string, reason: string): Promise<void> {
    this.claimed.delete(fingerprint);
    return this.transition(fingerprint, { status: LedgerStatuses.FAILED, reason });
  }

  /**
   * Give up the claim without changing the entry, e.g. on cancellation.
   * A PENDING entry stays admissible; a SUBMITTED one awaits reconciliation.
   */
  release(fingerprint: string): void {
    this.claimed.delete(fingerprint);
  }

  get(fingerprint: string): UploadLedgerEntry | undefined {
    const entry = this.entries.get(fingerprint);
    return entry && { ...entry };
  }

  isClaimed(fingerprint: string): boolean {
    return this.claimed.has(fingerprint);
  }

  /** Wait until every queued write reached the store */
  flush(): Promise<void> {
    return this.writes;
  }

  async list(filter?: LedgerFilter): Promise<UploadLedgerEntry[]> {
    await this.open();
    await this.flush();
    return this.store.list(filter);
  }

  async stats(): Promise<LedgerStats> {
    const entries = await this.list();
    const stats: LedgerStats = { total: entries.length, byStatus: emptyCounts(), bySource: {} };
    for (const entry of entries) {
      stats.byStatus[entry.status]++;
      const source = entry.sourceId ?? '';
      stats.bySource[source] ??= emptyCounts();
      stats.bySource[source][entry.status]++;
    }
    return stats;
  }

  /**
   * Resolve SUBMITTED entries left by an interrupted run through the carrier
   * status query: found → CONFIRMED, not found → FAILED (admissible again),
   * query failure → left SUBMITTED.
   */
  async reconcile(carrier: CarrierAdapter, ctx: AdapterContext = {}): Promise<ReconcileSummary> {
    await this.open();
    const summary: ReconcileSummary = { confirmed: 0, failed: 0, unresolved: 0 };
    const stale = [...this.entries.values()].filter(
      (e) => e.status === LedgerStatuses.SUBMITTED && !this.claimed.has(e.fingerprint)
    );

    for (const entry of stale) {
      if (!entry.reference) {
        summary.unresolved++;
        continue;
      }
      try {
        const status = await carrier.queryStatus(
          { reference: entry.reference, ...(entry.shipmentNumber !== undefined && { shipmentNumber: entry.shipmentNumber }) },
          { ...ctx, operationName: 'queryStatus' }
        );
        if (status.state === 'FOUND') {
          await this.confirm(entry.fingerprint, status.shipmentNumber);
          summary.confirmed++;
        } else {
          await this.fail(entry.fingerprint, NOT_FOUND_AT_CARRIER);
          summary.failed++;
        }
      } catch (err) {
        this.opts.logger?.warn('Ledger reconciliation: status query failed', {
          fingerprint: entry.fingerprint,
          error: errorToLog(err),
        });
        summary.unresolved++;
      }
    }

    if (stale.length > 0) {
      this.opts.logger?.info('Ledger reconciliation finished', { ...summary });
    }
    return summary;
  }

  private require(fingerprint: string): UploadLedgerEntry {
    const entry = this.entries.get(fingerprint);
    if (!entry) {
      throw new Error(`No ledger entry for ${fingerprint}; admit() it first`);
    }
    return entry;
  }

  private transition(fingerprint: string, patch: Partial<UploadLedgerEntry>): Promise<void> {
    const next: UploadLedgerEntry = {
      ...this.require(fingerprint),
      ...patch,
      updatedAt: this.now().toISOString(),
      ...(this.opts.runId !== undefined && { runId: this.opts.runId }),
    };
    this.entries.set(fingerprint, next);
    return this.enqueue(next);
  }

  private enqueue(entry: UploadLedgerEntry): Promise<void> {
    const snapshot = { ...entry };
    const write = this.writes.then(() => this.store.put(snapshot));
    // Keep the queue going after a failed write; the caller gets the rejection
    this.writes = write.catch(() => undefined);
    return write;
  }
}
