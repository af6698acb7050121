import pLimit from 'p-limit';
import { CARRIER_TIMEOUT_MS, MAX_BATCH_SIZE } from '../constants.js';
import { CarrierError, isTransientError, retryAfterOf } from '../errors/index.js';
import type { AdapterContext } from '../interfaces/adapter-context.js';
import { Capabilities } from '../interfaces/capabilities.js';
import type {
  CarrierAdapter,
  ShipmentSubmissionResult,
  SubmitShipmentsResponse,
} from '../interfaces/carrier-adapter.js';
import { NOT_FOUND_AT_CARRIER, type DuplicateTracker } from '../ledger/duplicate-tracker.js';
import { FailureKinds } from '../types/failures.js';
import type { PreparedShipment } from '../types/shipment.js';
import { errorToLog } from '../utils/logging.js';
import { computeBackoffMs, DEFAULT_RETRY_POLICY, sleep, type RetryPolicy, type Sleep } from '../utils/retry.js';
import { withTimeout } from '../utils/timeout.js';

/**
 * Final state of one uploaded record
 * - CONFIRMED: the carrier holds the record (answered or found by status query)
 * - FAILED: rejected by the carrier, or the carrier stayed unavailable
 * - UNRESOLVED: outcome unknown; the ledger keeps it SUBMITTED for the next run
 * - CANCELLED: not sent because the run was cancelled; admissible on a later run
 */
export type RecordOutcome =
  | { status: 'CONFIRMED'; fingerprint: string; reference: string; shipmentNumber?: string; label?: string }
  | {
      status: 'FAILED';
      fingerprint: string;
      reference: string;
      kind: typeof FailureKinds.CARRIER_REJECTED | typeof FailureKinds.CARRIER_UNAVAILABLE;
      message: string;
      errorCode?: string;
    }
  | { status: 'UNRESOLVED'; fingerprint: string; reference: string; message: string }
  | { status: 'CANCELLED'; fingerprint: string; reference: string };

export interface UploadReport {
  /** Batches dispatched to the carrier */
  batches: number;
  /** One outcome per record, in input order */
  outcomes: RecordOutcome[];
  confirmed: number;
  rejected: number;
  unavailable: number;
  unresolved: number;
  cancelled: number;
}

export interface BatchUploaderOptions {
  carrier: CarrierAdapter;
  tracker: DuplicateTracker;
  ctx?: AdapterContext;

  /** Defaults to the smaller of the carrier's maxBatchSize and 400 */
  batchSize?: number;

  /** Batches in flight at once. Default: 1 */
  batchConcurrency?: number;

  retry?: Partial<RetryPolicy>;

  /** Deadline of one submitShipments call */
  timeoutMs?: number;

  signal?: AbortSignal;
  generatePdf?: boolean;
  useTestApi?: boolean;

  /** Injected for tests */
  random?: () => number;
  sleep?: Sleep;
}

/**
 * Split items into consecutive chunks of at most size, order preserved
 */
export function partition<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Errors raised before anything reached the carrier: a malformed request or
 * refused credentials. Any other failure may come after the carrier stored
 * the batch.
 */
function refusedBeforeSending(error: unknown): boolean {
  return error instanceof CarrierError && (error.category === 'Validation' || error.category === 'Auth');
}

/**
 * BatchUploader
 *
 * Sends admitted records to the carrier in bounded batches and commits every
 * outcome to the ledger. A batch-level failure never resends or fails blindly:
 * records without an answer are looked up through the status query first.
 * Those the carrier does not know are submitted again after a transient
 * failure, and failed after any other.
 */
export class BatchUploader {
  private readonly policy: RetryPolicy;
  private readonly batchSize: number;
  private readonly wait: Sleep;

  constructor(private readonly opts: BatchUploaderOptions) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...opts.retry };
    this.batchSize = opts.batchSize ?? Math.min(opts.carrier.maxBatchSize, MAX_BATCH_SIZE);
    this.wait = opts.sleep ?? sleep;
    if (this.batchSize > opts.carrier.maxBatchSize) {
      throw new RangeError(`Batch size ${this.batchSize} exceeds the carrier limit of ${opts.carrier.maxBatchSize}`);
    }
  }

  async upload(records: readonly PreparedShipment[]): Promise<UploadReport> {
    const batches = partition(records, this.batchSize);
    const limit = pLimit(Math.max(1, this.opts.batchConcurrency ?? 1));
    let dispatched = 0;

    const perBatch = await Promise.all(
      batches.map((batch, index) =>
        limit(async (): Promise<RecordOutcome[]> => {
          if (this.opts.signal?.aborted) {
            return this.cancel(batch);
          }
          dispatched++;
          return this.uploadBatch(batch, index + 1, batches.length);
        })
      )
    );

    const outcomes = perBatch.flat();
    const report: UploadReport = {
      batches: dispatched,
      outcomes,
      confirmed: 0,
      rejected: 0,
      unavailable: 0,
      unresolved: 0,
      cancelled: 0,
    };
    for (const outcome of outcomes) {
      if (outcome.status === 'CONFIRMED') report.confirmed++;
      else if (outcome.status === 'UNRESOLVED') report.unresolved++;
      else if (outcome.status === 'CANCELLED') report.cancelled++;
      else if (outcome.kind === FailureKinds.CARRIER_REJECTED) report.rejected++;
      else report.unavailable++;
    }
    await this.opts.tracker.flush();
    return report;
  }

  private cancel(batch: PreparedShipment[]): RecordOutcome[] {
    return batch.map((item) => {
      this.opts.tracker.release(item.fingerprint);
      return { status: 'CANCELLED', fingerprint: item.fingerprint, reference: item.record.reference };
    });
  }

  private async uploadBatch(batch: PreparedShipment[], number: number, of: number): Promise<RecordOutcome[]> {
    const { carrier, tracker } = this.opts;
    const logger = this.opts.ctx?.logger;
    const outcomes = new Map<string, RecordOutcome>();
    let pending = batch;

    for (let attempt = 1; pending.length > 0; attempt++) {
      logger?.info('Submitting batch', { batch: number, of, attempt, records: pending.length });
      // The SUBMITTED marks must be durable before anything leaves the process
      await Promise.all(pending.map((item) => tracker.markSubmitted(item.fingerprint, item.record.reference)));

      let response: SubmitShipmentsResponse | undefined;
      let lastError: unknown;
      try {
        response = await withTimeout(
          carrier.submitShipments(
            {
              shipments: pending.map((item) => item.record),
              options: {
                ...(this.opts.generatePdf !== undefined && { generatePdf: this.opts.generatePdf }),
                ...(this.opts.useTestApi !== undefined && { useTestApi: this.opts.useTestApi }),
              },
            },
            this.callContext('submitShipments')
          ),
          this.opts.timeoutMs ?? CARRIER_TIMEOUT_MS,
          'submitShipments'
        );
      } catch (err) {
        if (refusedBeforeSending(err)) {
          await this.failAll(pending, FailureKinds.CARRIER_REJECTED, err, outcomes);
          break;
        }
        lastError = err;
      }

      let unknown = pending;
      if (response) {
        unknown = await this.applyResults(pending, response.results, outcomes);
        if (unknown.length === 0) break;
        lastError = new CarrierError(`No answer for ${unknown.length} of ${pending.length} records`, 'Transient');
      }

      logger?.warn('Batch outcome incomplete, checking carrier status', {
        batch: number,
        attempt,
        unknown: unknown.length,
        error: errorToLog(lastError),
      });
      pending = await this.reconcile(unknown, lastError, outcomes);
      if (pending.length === 0) break;

      if (!isTransientError(lastError)) {
        // Absent at the carrier and not worth another attempt
        await this.failAll(pending, FailureKinds.CARRIER_REJECTED, lastError, outcomes);
        break;
      }

      if (attempt >= this.policy.maxAttempts) {
        await this.failAll(pending, FailureKinds.CARRIER_UNAVAILABLE, lastError, outcomes);
        break;
      }
      if (this.opts.signal?.aborted) {
        await this.cancelUnsent(pending, outcomes);
        break;
      }

      const delayMs = computeBackoffMs(attempt, this.policy, this.opts.random, retryAfterOf(lastError));
      logger?.info('Retrying batch', { batch: number, attempt: attempt + 1, records: pending.length, delayMs });
      await this.wait(delayMs, this.opts.signal);
      // The wait ends early on abort
      if (this.opts.signal?.aborted) {
        await this.cancelUnsent(pending, outcomes);
        break;
      }
    }

    const ordered: RecordOutcome[] = [];
    for (const item of batch) {
      const outcome = outcomes.get(item.fingerprint);
      if (outcome) ordered.push(outcome);
    }
    return ordered;
  }

  /**
   * Commit answered records; return those the carrier did not answer for
   */
  private async applyResults(
    pending: PreparedShipment[],
    results: ShipmentSubmissionResult[],
    outcomes: Map<string, RecordOutcome>
  ): Promise<PreparedShipment[]> {
    // Each result answers for one record; records sharing a reference take them in order
    const byReference = new Map<string, ShipmentSubmissionResult[]>();
    for (const result of results) {
      const queue = byReference.get(result.reference);
      if (queue) queue.push(result);
      else byReference.set(result.reference, [result]);
    }
    const unknown: PreparedShipment[] = [];
    const commits: Promise<void>[] = [];

    for (const item of pending) {
      const reference = item.record.reference;
      const result = byReference.get(reference)?.shift();
      if (!result) {
        unknown.push(item);
      } else if (result.status === 'created') {
        commits.push(this.opts.tracker.confirm(item.fingerprint, result.shipmentNumber));
        outcomes.set(item.fingerprint, {
          status: 'CONFIRMED',
          fingerprint: item.fingerprint,
          reference,
          ...(result.shipmentNumber !== undefined && { shipmentNumber: result.shipmentNumber }),
          ...(result.label !== undefined && { label: result.label }),
        });
      } else {
        const message = result.errorMessage ?? 'Rejected by carrier';
        commits.push(this.opts.tracker.fail(item.fingerprint, message));
        outcomes.set(item.fingerprint, {
          status: 'FAILED',
          fingerprint: item.fingerprint,
          reference,
          kind: FailureKinds.CARRIER_REJECTED,
          message,
          ...(result.errorCode !== undefined && { errorCode: result.errorCode }),
        });
      }
    }
    await Promise.all(commits);
    return unknown;
  }

  /**
   * Look up records with an unknown outcome.
   * Found → CONFIRMED. Not found → returned for resubmission.
   * Query failure → UNRESOLVED, left SUBMITTED for the next run.
   */
  private async reconcile(
    unknown: PreparedShipment[],
    cause: unknown,
    outcomes: Map<string, RecordOutcome>
  ): Promise<PreparedShipment[]> {
    const { carrier, tracker } = this.opts;
    const resend: PreparedShipment[] = [];

    if (!carrier.capabilities.includes(Capabilities.QUERY_STATUS)) {
      for (const item of unknown) this.markUnresolved(item, cause, outcomes);
      return resend;
    }

    for (const item of unknown) {
      try {
        const status = await withTimeout(
          carrier.queryStatus({ reference: item.record.reference }, this.callContext('queryStatus')),
          this.opts.timeoutMs ?? CARRIER_TIMEOUT_MS,
          'queryStatus'
        );
        if (status.state === 'FOUND') {
          await tracker.confirm(item.fingerprint, status.shipmentNumber);
          outcomes.set(item.fingerprint, {
            status: 'CONFIRMED',
            fingerprint: item.fingerprint,
            reference: item.record.reference,
            ...(status.shipmentNumber !== undefined && { shipmentNumber: status.shipmentNumber }),
          });
        } else {
          resend.push(item);
        }
      } catch (err) {
        this.markUnresolved(item, err, outcomes);
      }
    }
    return resend;
  }

  /**
   * Records known to be absent at the carrier stay admissible on a later run
   */
  private async cancelUnsent(items: PreparedShipment[], outcomes: Map<string, RecordOutcome>): Promise<void> {
    await Promise.all(items.map((item) => this.opts.tracker.fail(item.fingerprint, NOT_FOUND_AT_CARRIER)));
    for (const item of items) {
      outcomes.set(item.fingerprint, { status: 'CANCELLED', fingerprint: item.fingerprint, reference: item.record.reference });
    }
  }

  private markUnresolved(item: PreparedShipment, cause: unknown, outcomes: Map<string, RecordOutcome>): void {
    this.opts.tracker.release(item.fingerprint);
    outcomes.set(item.fingerprint, {
      status: 'UNRESOLVED',
      fingerprint: item.fingerprint,
      reference: item.record.reference,
      message: cause instanceof Error ? cause.message : 'Outcome unknown',
    });
  }

  private async failAll(
    items: PreparedShipment[],
    kind: typeof FailureKinds.CARRIER_REJECTED | typeof FailureKinds.CARRIER_UNAVAILABLE,
    cause: unknown,
    outcomes: Map<string, RecordOutcome>
  ): Promise<void> {
    const message = cause instanceof Error ? cause.message : String(cause);
    const errorCode = cause instanceof CarrierError ? cause.carrierCode : undefined;
    this.opts.ctx?.logger?.error('Batch failed', { kind, records: items.length, error: errorToLog(cause) });
    await Promise.all(items.map((item) => this.opts.tracker.fail(item.fingerprint, message)));
    for (const item of items) {
      outcomes.set(item.fingerprint, {
        status: 'FAILED',
        fingerprint: item.fingerprint,
        reference: item.record.reference,
        kind,
        message,
        ...(errorCode !== undefined && { errorCode }),
      });
    }
  }

  private callContext(operationName: string): AdapterContext {
    return {
      ...this.opts.ctx,
      operationName,
      timeoutMs: this.opts.timeoutMs ?? CARRIER_TIMEOUT_MS,
      ...(this.opts.signal !== undefined && { signal: this.opts.signal }),
    };
  }
}
