import { randomUUID } from 'node:crypto';
import pLimit from 'p-limit';
import { abbreviateAddress } from '../address/abbreviator.js';
import { AddressNormalizer, type NormalizationResult } from '../address/normalizer.js';
import { GEOCODE_CONCURRENCY } from '../constants.js';
import { ValidationError } from '../errors/index.js';
import type { AdapterContext } from '../interfaces/adapter-context.js';
import { Capabilities } from '../interfaces/capabilities.js';
import type { CarrierAdapter, ConfirmOpenShipmentsResponse } from '../interfaces/carrier-adapter.js';
import type { GeocodingAdapter } from '../interfaces/geocoding-adapter.js';
import type { LedgerStore } from '../interfaces/ledger-store.js';
import {
  detectLayout,
  missingAddressColumns,
  resolveColumns,
  toInputRow,
  type SourceRecord,
} from '../layout/detect-layout.js';
import { DuplicateTracker, type ReconcileSummary } from '../ledger/duplicate-tracker.js';
import { fingerprintOf } from '../shipments/fingerprint.js';
import { ShipmentRecordBuilder, type RecordBuilderOptions } from '../shipments/record-builder.js';
import { ReferenceGenerator } from '../shipments/reference.js';
import { FailureKinds, type FailureKind } from '../types/failures.js';
import type { InputRow } from '../types/input-row.js';
import type { LayoutKind } from '../types/layout.js';
import type { LedgerStatus } from '../types/ledger.js';
import type { PreparedShipment } from '../types/shipment.js';
import { computeBackoffMs, DEFAULT_RETRY_POLICY, sleep, type RetryPolicy, type Sleep } from '../utils/retry.js';
import { closeWorkDay } from './close-work-day.js';
import { BatchUploader, type RecordOutcome } from './upload-batches.js';

/**
 * One spreadsheet, already parsed into header-keyed records
 */
export interface PipelineSource {
  /** File name; identifies the source in the ledger */
  fileName: string;
  headers: readonly string[];
  records: readonly SourceRecord[];

  /** Skip detection and use this layout */
  layout?: LayoutKind;
}

export interface PipelineOptions extends Omit<RecordBuilderOptions, 'references'> {
  geocoder: GeocodingAdapter;
  carrier: CarrierAdapter;
  ledger: LedgerStore;

  /** Logger, HTTP client and logging options for every collaborator call */
  ctx?: AdapterContext;

  runId?: string;
  now?: () => Date;

  geocodeConcurrency?: number;
  geocodeTimeoutMs?: number;
  minConfidence?: number;

  batchSize?: number;
  batchConcurrency?: number;
  carrierTimeoutMs?: number;

  /** Applies to provider and carrier retries */
  retry?: Partial<RetryPolicy>;

  generatePdf?: boolean;
  useTestApi?: boolean;

  /** Confirm open shipments once every batch is done */
  closeWorkDay?: boolean;
  site?: string;

  signal?: AbortSignal;
  random?: () => number;
  sleep?: Sleep;
}

export type RowStatus = 'CONFIRMED' | 'FAILED' | 'SKIPPED' | 'UNRESOLVED' | 'CANCELLED';

export interface RowReport {
  ordinal: string;
  status: RowStatus;
  kind?: FailureKind;
  message?: string;
  /** Operator hint for data-quality failures */
  suggestion?: string;
  reference?: string;
  shipmentNumber?: string;
  /** Ledger status that caused a SKIPPED row */
  previousStatus?: LedgerStatus | 'IN_FLIGHT';
}

export interface PipelineSummary {
  runId: string;
  sourceId: string;
  layout: LayoutKind;
  rows: number;
  confirmed: number;
  skipped: number;
  failed: number;
  unresolved: number;
  cancelled: number;
  failures: Partial<Record<FailureKind, number>>;
  /** Packages of the records confirmed by this run */
  totalPackages: number;
  batches: number;
  reconciled: ReconcileSummary;
  closeWorkDay?: ConfirmOpenShipmentsResponse;
  /** One entry per source row, in source order */
  rowReports: RowReport[];
  /** 1 when any row ended FAILED or UNRESOLVED */
  exitCode: 0 | 1;
}

/**
 * Run one source through the whole pipeline:
 * detect layout → normalize (bounded pool) → abbreviate → build → fingerprint
 * → reconcile ledger → admit → upload → optional close work day.
 *
 * Rows are independent: a row failing at any step never stops the others.
 * Throws only when the source itself cannot be processed, or when closing
 * the work day fails.
 */
export async function runShipmentPipeline(source: PipelineSource, opts: PipelineOptions): Promise<PipelineSummary> {
  const ctx = opts.ctx ?? {};
  const logger = ctx.logger;
  const now = opts.now ?? (() => new Date());
  const runId = opts.runId ?? randomUUID();
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...opts.retry };
  const wait = opts.sleep ?? sleep;

  const layout = source.layout ?? detectLayout({ fileName: source.fileName, headers: source.headers });
  if (!layout) {
    throw new ValidationError(`Unrecognized layout for ${source.fileName}`, { headers: [...source.headers] });
  }
  const mapping = resolveColumns(layout, source.headers);
  const missing = missingAddressColumns(mapping);
  if (missing.length > 0) {
    throw new ValidationError(`${source.fileName} lacks address columns: ${missing.join(', ')}`, { missing });
  }

  logger?.info('Pipeline run started', { runId, source: source.fileName, layout, rows: source.records.length });

  const rows = source.records.map((record, index) => toInputRow(layout, mapping, record, index));
  const reports = new Map<number, RowReport>();

  // Normalize
  const normalizer = new AddressNormalizer({
    geocoder: opts.geocoder,
    ctx,
    ...(opts.geocodeTimeoutMs !== undefined && { timeoutMs: opts.geocodeTimeoutMs }),
    ...(opts.minConfidence !== undefined && { minConfidence: opts.minConfidence }),
  });
  const limit = pLimit(Math.max(1, opts.geocodeConcurrency ?? GEOCODE_CONCURRENCY));
  const normalized = await Promise.all(
    rows.map((row) =>
      limit(async (): Promise<NormalizationResult | undefined> => {
        if (opts.signal?.aborted) return undefined;
        for (let attempt = 1; ; attempt++) {
          const result = await normalizer.normalize(row);
          if (result.ok || !result.retryable || attempt >= policy.maxAttempts || opts.signal?.aborted) {
            return result;
          }
          await wait(computeBackoffMs(attempt, policy, opts.random), opts.signal);
        }
      })
    )
  );

  // Build
  const builder = new ShipmentRecordBuilder({
    ...(opts.requirePhone !== undefined && { requirePhone: opts.requirePhone }),
    ...(opts.portType !== undefined && { portType: opts.portType }),
    ...(opts.pdfFormat !== undefined && { pdfFormat: opts.pdfFormat }),
    ...(opts.cashOnDelivery !== undefined && { cashOnDelivery: opts.cashOnDelivery }),
    references: new ReferenceGenerator(now()),
  });
  const built: Array<{ index: number; item: PreparedShipment }> = [];

  rows.forEach((row, index) => {
    const result = normalized[index];
    if (!result) {
      reports.set(index, { ordinal: row.ordinal, status: 'CANCELLED' });
      return;
    }
    if (!result.ok) {
      reports.set(index, {
        ordinal: row.ordinal,
        status: result.retryable ? 'UNRESOLVED' : 'FAILED',
        kind: result.kind,
        message: result.message,
        ...(result.suggestion !== undefined && { suggestion: result.suggestion }),
      });
      return;
    }
    const record = builder.build(row, layout, abbreviateAddress(result.value));
    if (!record.ok) {
      reports.set(index, { ordinal: row.ordinal, status: 'FAILED', kind: record.kind, message: record.message });
      return;
    }
    built.push({
      index,
      item: { fingerprint: fingerprintFor(source.fileName, row), sourceId: source.fileName, ordinal: row.ordinal, record: record.value },
    });
  });

  // Reconcile leftovers of interrupted runs before admitting anything
  const tracker = new DuplicateTracker(opts.ledger, { runId, now, ...(logger !== undefined && { logger }) });
  await tracker.open();
  const reconciled: ReconcileSummary = opts.carrier.capabilities.includes(Capabilities.QUERY_STATUS)
    ? await tracker.reconcile(opts.carrier, ctx)
    : { confirmed: 0, failed: 0, unresolved: 0 };

  // Admit, in source order
  const admitted: Array<{ index: number; item: PreparedShipment }> = [];
  for (const entry of built) {
    const decision = await tracker.admit({
      fingerprint: entry.item.fingerprint,
      sourceId: entry.item.sourceId,
      ordinal: entry.item.ordinal,
    });
    if (decision.decision === 'ADMIT') {
      admitted.push(entry);
      continue;
    }
    const base = { ordinal: entry.item.ordinal, reference: decision.entry?.reference ?? entry.item.record.reference };
    if (decision.previousStatus === 'SUBMITTED') {
      reports.set(entry.index, {
        ...base,
        status: 'UNRESOLVED',
        kind: FailureKinds.UNRESOLVED,
        message: 'Submitted by an earlier run, outcome still unknown',
      });
    } else {
      reports.set(entry.index, {
        ...base,
        status: 'SKIPPED',
        previousStatus: decision.previousStatus,
        ...(decision.entry?.shipmentNumber !== undefined && { shipmentNumber: decision.entry.shipmentNumber }),
      });
    }
  }

  // Upload
  const uploader = new BatchUploader({
    carrier: opts.carrier,
    tracker,
    ctx,
    ...(opts.batchSize !== undefined && { batchSize: opts.batchSize }),
    ...(opts.batchConcurrency !== undefined && { batchConcurrency: opts.batchConcurrency }),
    ...(opts.carrierTimeoutMs !== undefined && { timeoutMs: opts.carrierTimeoutMs }),
    ...(opts.signal !== undefined && { signal: opts.signal }),
    ...(opts.generatePdf !== undefined && { generatePdf: opts.generatePdf }),
    ...(opts.useTestApi !== undefined && { useTestApi: opts.useTestApi }),
    ...(opts.random !== undefined && { random: opts.random }),
    ...(opts.sleep !== undefined && { sleep: opts.sleep }),
    retry: policy,
  });
  const upload = await uploader.upload(admitted.map((entry) => entry.item));

  const byFingerprint = new Map(upload.outcomes.map((o) => [o.fingerprint, o]));
  let totalPackages = 0;
  for (const { index, item } of admitted) {
    const outcome = byFingerprint.get(item.fingerprint);
    if (!outcome) continue;
    if (outcome.status === 'CONFIRMED') totalPackages += item.record.packageCount;
    reports.set(index, rowReportOf(item.ordinal, outcome));
  }

  let closed: ConfirmOpenShipmentsResponse | undefined;
  if (opts.closeWorkDay && !opts.signal?.aborted) {
    closed = await closeWorkDay(
      opts.carrier,
      { ...(opts.site !== undefined && { site: opts.site }) },
      { ...ctx, ...(opts.carrierTimeoutMs !== undefined && { timeoutMs: opts.carrierTimeoutMs }) }
    );
  }

  const rowReports = rows.map((row, index): RowReport => reports.get(index) ?? { ordinal: row.ordinal, status: 'CANCELLED' });
  const summary = summarize(rowReports, {
    runId,
    sourceId: source.fileName,
    layout,
    totalPackages,
    batches: upload.batches,
    reconciled,
    ...(closed !== undefined && { closeWorkDay: closed }),
  });

  logger?.info('Pipeline run finished', {
    runId,
    rows: summary.rows,
    confirmed: summary.confirmed,
    skipped: summary.skipped,
    failed: summary.failed,
    unresolved: summary.unresolved,
    cancelled: summary.cancelled,
    batches: summary.batches,
    failures: summary.failures,
  });
  return summary;
}

function fingerprintFor(sourceId: string, row: InputRow): string {
  return fingerprintOf({
    sourceId,
    ordinal: row.ordinal,
    ...(row.reference !== undefined && { reference: row.reference }),
    companyName: row.companyName,
    address: row.address,
    postalCode: row.postalCode,
  });
}

function rowReportOf(ordinal: string, outcome: RecordOutcome): RowReport {
  const base = { ordinal, reference: outcome.reference };
  switch (outcome.status) {
    case 'CONFIRMED':
      return {
        ...base,
        status: 'CONFIRMED',
        ...(outcome.shipmentNumber !== undefined && { shipmentNumber: outcome.shipmentNumber }),
      };
    case 'FAILED':
      return { ...base, status: 'FAILED', kind: outcome.kind, message: outcome.message };
    case 'UNRESOLVED':
      return { ...base, status: 'UNRESOLVED', kind: FailureKinds.UNRESOLVED, message: outcome.message };
    case 'CANCELLED':
      return { ...base, status: 'CANCELLED' };
  }
}

function summarize(
  rowReports: RowReport[],
  fields: Pick<PipelineSummary, 'runId' | 'sourceId' | 'layout' | 'totalPackages' | 'batches' | 'reconciled' | 'closeWorkDay'>
): PipelineSummary {
  const count = (status: RowStatus) => rowReports.filter((r) => r.status === status).length;
  const failures: Partial<Record<FailureKind, number>> = {};
  for (const report of rowReports) {
    if (report.kind) failures[report.kind] = (failures[report.kind] ?? 0) + 1;
  }
  const failed = count('FAILED');
  const unresolved = count('UNRESOLVED');
  return {
    ...fields,
    rows: rowReports.length,
    confirmed: count('CONFIRMED'),
    skipped: count('SKIPPED'),
    failed,
    unresolved,
    cancelled: count('CANCELLED'),
    failures,
    rowReports,
    exitCode: failed + unresolved > 0 ? 1 : 0,
  };
}
