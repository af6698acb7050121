import { describe, it, expect } from 'vitest';
import { BatchUploader, partition } from '../upload-batches.js';
import { CarrierError } from '../../errors/index.js';
import type { AdapterContext } from '../../interfaces/adapter-context.js';
import type {
  ShipmentSubmissionResult,
  SubmitShipmentsRequest,
  SubmitShipmentsResponse,
} from '../../interfaces/carrier-adapter.js';
import { DuplicateTracker } from '../../ledger/duplicate-tracker.js';
import { InMemoryLedgerStore } from '../../stores/in-memory.js';
import { SimulatedCarrier } from '../../testing/index.js';
import { summarizeSubmission } from '../../types/responses.js';
import type { PreparedShipment, ShipmentRecord } from '../../types/index.js';
import type { Sleep } from '../../utils/retry.js';

function record(reference: string): ShipmentRecord {
  return {
    recipientName: 'Bar Sport',
    address: 'Via Roma, 1',
    locality: 'Milano',
    province: 'MI',
    postalCode: '20121',
    packageCount: 2,
    weightKg: 3,
    portType: 'F',
    packageType: '0',
    shipmentType: 'N',
    notes: '1',
    reference,
    pdfFormat: 'A6',
  };
}

function prepared(count: number): PreparedShipment[] {
  return Array.from({ length: count }, (_, i) => ({
    fingerprint: `fp-${i + 1}`,
    sourceId: 'negozi_NEW',
    ordinal: String(i + 1),
    record: record(`R${i + 1}`),
  }));
}

async function setup(count: number, carrier = new SimulatedCarrier()) {
  const store = new InMemoryLedgerStore();
  const tracker = new DuplicateTracker(store);
  const items = prepared(count);
  for (const item of items) {
    await tracker.admit({ fingerprint: item.fingerprint, sourceId: item.sourceId, ordinal: item.ordinal });
  }
  const delays: number[] = [];
  const sleep: Sleep = async (ms) => {
    delays.push(ms);
  };
  return { store, tracker, items, carrier, delays, sleep };
}

describe('partition', () => {
  it('keeps order and caps chunk size', () => {
    expect(partition([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(partition([], 400)).toEqual([]);
  });

  it('rejects a non-positive size', () => {
    expect(() => partition([1], 0)).toThrow(RangeError);
  });
});

describe('BatchUploader', () => {
  it('splits 1000 records into batches of 400, 400 and 200 in order', async () => {
    const { tracker, items, carrier, sleep } = await setup(1000);
    const uploader = new BatchUploader({ carrier, tracker, sleep });

    const report = await uploader.upload(items);

    expect(carrier.submitted.map((batch) => batch.length)).toEqual([400, 400, 200]);
    expect(carrier.submitted.flat().map((r) => r.reference)).toEqual(items.map((i) => i.record.reference));
    expect(report.batches).toBe(3);
    expect(report.confirmed).toBe(1000);
    expect(report.outcomes[999]).toEqual({
      status: 'CONFIRMED',
      fingerprint: 'fp-1000',
      reference: 'R1000',
      shipmentNumber: '600001000',
    });
  });

  it('confirms answered records and records the shipment number', async () => {
    const { store, tracker, items, carrier, sleep } = await setup(2);
    await new BatchUploader({ carrier, tracker, sleep }).upload(items);

    expect(await store.get('fp-1')).toMatchObject({
      status: 'CONFIRMED',
      reference: 'R1',
      shipmentNumber: '600000001',
      attempts: 1,
    });
    expect(tracker.isClaimed('fp-1')).toBe(false);
  });

  it('looks up unanswered records instead of resending them', async () => {
    const { store, tracker, items, carrier, delays, sleep } = await setup(4);
    carrier.plan('partial');

    const report = await new BatchUploader({ carrier, tracker, sleep }).upload(items);

    expect(report.confirmed).toBe(4);
    expect(carrier.submitted).toHaveLength(1);
    expect(carrier.statusQueries.map((q) => q.reference)).toEqual(['R3', 'R4']);
    expect(delays).toEqual([]);
    expect(await store.get('fp-4')).toMatchObject({ status: 'CONFIRMED', shipmentNumber: '600000004' });
  });

  it('confirms records accepted before the connection dropped', async () => {
    const { tracker, items, carrier, delays, sleep } = await setup(3);
    carrier.plan('fail-after');

    const report = await new BatchUploader({ carrier, tracker, sleep }).upload(items);

    expect(report.confirmed).toBe(3);
    expect(carrier.submitted).toHaveLength(1);
    expect([...carrier.acceptCount.values()]).toEqual([1, 1, 1]);
    expect(delays).toEqual([]);
  });

  it('resends records unknown to the carrier after a backoff', async () => {
    const { store, tracker, items, carrier, delays, sleep } = await setup(3);
    carrier.plan('fail-before');

    const report = await new BatchUploader({ carrier, tracker, sleep, random: () => 0 }).upload(items);

    expect(report.confirmed).toBe(3);
    expect(carrier.submitted).toHaveLength(2);
    expect(delays).toEqual([2000]);
    expect(await store.get('fp-2')).toMatchObject({ status: 'CONFIRMED', attempts: 2 });
  });

  it('resends only the records the carrier does not have', async () => {
    const { tracker, items, carrier, sleep } = await setup(3);
    carrier.accepted.set('R2', '600000999');
    carrier.plan('fail-before');

    const report = await new BatchUploader({ carrier, tracker, sleep, random: () => 0 }).upload(items);

    expect(carrier.submitted[1]?.map((r) => r.reference)).toEqual(['R1', 'R3']);
    expect(report.outcomes.map((o) => o.status)).toEqual(['CONFIRMED', 'CONFIRMED', 'CONFIRMED']);
    expect(report.outcomes[1]).toMatchObject({ reference: 'R2', shipmentNumber: '600000999' });
  });

  it('gives up with CARRIER_UNAVAILABLE after the last attempt', async () => {
    const { store, tracker, items, carrier, delays, sleep } = await setup(2);
    carrier.plan('fail-before', 'fail-before', 'fail-before');

    const report = await new BatchUploader({ carrier, tracker, sleep, random: () => 0 }).upload(items);

    expect(delays).toEqual([2000, 4000]);
    expect(report.unavailable).toBe(2);
    expect(report.outcomes[0]).toEqual({
      status: 'FAILED',
      fingerprint: 'fp-1',
      reference: 'R1',
      kind: 'CARRIER_UNAVAILABLE',
      message: 'Service unavailable',
      errorCode: 'HTTP_503',
    });
    expect(await store.get('fp-1')).toMatchObject({ status: 'FAILED', reason: 'Service unavailable', attempts: 3 });
  });

  it('waits at least as long as the carrier asks', async () => {
    class RateLimitedCarrier extends SimulatedCarrier {
      private calls = 0;
      override async submitShipments(req: SubmitShipmentsRequest, ctx: AdapterContext): Promise<SubmitShipmentsResponse> {
        if (this.calls++ === 0) {
          throw new CarrierError('Too many requests', 'RateLimit', { retryAfterMs: 10_000 });
        }
        return super.submitShipments(req, ctx);
      }
    }
    const { tracker, items, carrier, delays, sleep } = await setup(1, new RateLimitedCarrier());

    await new BatchUploader({ carrier, tracker, sleep, random: () => 0 }).upload(items);

    expect(delays).toEqual([10_000]);
  });

  it('fails the whole batch on an authentication error without retrying', async () => {
    const { store, tracker, items, carrier, delays, sleep } = await setup(2);
    carrier.plan('auth');

    const report = await new BatchUploader({ carrier, tracker, sleep }).upload(items);

    expect(report.rejected).toBe(2);
    expect(report.outcomes[1]).toMatchObject({ kind: 'CARRIER_REJECTED', message: 'Invalid credentials', errorCode: 'HTTP_401' });
    expect(carrier.submitted).toHaveLength(1);
    expect(carrier.statusQueries).toEqual([]);
    expect(delays).toEqual([]);
    expect((await store.get('fp-2'))?.status).toBe('FAILED');
  });

  it('gives each record sharing a reference its own answer', async () => {
    class NumberingCarrier extends SimulatedCarrier {
      override async submitShipments(req: SubmitShipmentsRequest): Promise<SubmitShipmentsResponse> {
        this.submitted.push(req.shipments);
        return summarizeSubmission(
          req.shipments.map((s, i): ShipmentSubmissionResult => ({ reference: s.reference, status: 'created', shipmentNumber: `N${i + 1}` }))
        );
      }
    }
    const { store, tracker, items, carrier, sleep } = await setup(2, new NumberingCarrier());
    const shared = items.map((item) => ({ ...item, record: { ...item.record, reference: 'PO-77' } }));

    const report = await new BatchUploader({ carrier, tracker, sleep }).upload(shared);

    expect(report.outcomes.map((o) => (o.status === 'CONFIRMED' ? o.shipmentNumber : o.status))).toEqual(['N1', 'N2']);
    expect(await store.get('fp-2')).toMatchObject({ status: 'CONFIRMED', shipmentNumber: 'N2' });
  });

  it('checks carrier status before failing a batch on a permanent error', async () => {
    class AcceptThenFailCarrier extends SimulatedCarrier {
      override async submitShipments(req: SubmitShipmentsRequest, ctx: AdapterContext): Promise<SubmitShipmentsResponse> {
        await super.submitShipments(req, ctx);
        throw new CarrierError('GLS Italy error: Risposta non parsabile', 'Permanent', { carrierCode: 'SERVICE_ERROR' });
      }
    }
    const { store, tracker, items, carrier, delays, sleep } = await setup(2, new AcceptThenFailCarrier());

    const report = await new BatchUploader({ carrier, tracker, sleep }).upload(items);

    expect(report.confirmed).toBe(2);
    expect(carrier.submitted).toHaveLength(1);
    expect(carrier.statusQueries.map((q) => q.reference)).toEqual(['R1', 'R2']);
    expect([...carrier.acceptCount.values()]).toEqual([1, 1]);
    expect(delays).toEqual([]);
    expect(await store.get('fp-1')).toMatchObject({ status: 'CONFIRMED', shipmentNumber: '600000001' });
  });

  it('fails records the carrier does not hold after a permanent error, without resending', async () => {
    class RefusingCarrier extends SimulatedCarrier {
      override async submitShipments(req: SubmitShipmentsRequest): Promise<SubmitShipmentsResponse> {
        this.submitted.push(req.shipments);
        throw new CarrierError('GLS Italy error: Contratto non valido', 'Permanent', { carrierCode: 'SERVICE_ERROR' });
      }
    }
    const { store, tracker, items, carrier, delays, sleep } = await setup(2, new RefusingCarrier());

    const report = await new BatchUploader({ carrier, tracker, sleep }).upload(items);

    expect(report.rejected).toBe(2);
    expect(report.outcomes[0]).toEqual({
      status: 'FAILED',
      fingerprint: 'fp-1',
      reference: 'R1',
      kind: 'CARRIER_REJECTED',
      message: 'GLS Italy error: Contratto non valido',
      errorCode: 'SERVICE_ERROR',
    });
    expect(carrier.statusQueries.map((q) => q.reference)).toEqual(['R1', 'R2']);
    expect(carrier.submitted).toHaveLength(1);
    expect(delays).toEqual([]);
    expect((await store.get('fp-1'))?.status).toBe('FAILED');
  });

  it('fails rejected records with the carrier message and keeps the rest', async () => {
    const { store, tracker, items, carrier, sleep } = await setup(3);
    carrier.reject('R2', 'Bda già presente');

    const report = await new BatchUploader({ carrier, tracker, sleep }).upload(items);

    expect(report.confirmed).toBe(2);
    expect(report.rejected).toBe(1);
    expect(report.outcomes[1]).toEqual({
      status: 'FAILED',
      fingerprint: 'fp-2',
      reference: 'R2',
      kind: 'CARRIER_REJECTED',
      message: 'Bda già presente',
      errorCode: 'OTHER',
    });
    expect(await store.get('fp-2')).toMatchObject({ status: 'FAILED', reason: 'Bda già presente' });
    expect(carrier.submitted).toHaveLength(1);
  });

  it('leaves records SUBMITTED when their outcome cannot be established', async () => {
    const { store, tracker, items, carrier, sleep } = await setup(2);
    carrier.plan('fail-before');
    carrier.statusUnavailable = true;

    const report = await new BatchUploader({ carrier, tracker, sleep }).upload(items);

    expect(report.unresolved).toBe(2);
    expect(report.outcomes[0]).toEqual({
      status: 'UNRESOLVED',
      fingerprint: 'fp-1',
      reference: 'R1',
      message: 'Status service unavailable',
    });
    expect((await store.get('fp-1'))?.status).toBe('SUBMITTED');
    expect(tracker.isClaimed('fp-1')).toBe(false);
    expect(carrier.submitted).toHaveLength(1);
  });

  it('releases every record when cancelled before dispatch', async () => {
    const { store, tracker, items, carrier, sleep } = await setup(3);
    const controller = new AbortController();
    controller.abort();

    const report = await new BatchUploader({ carrier, tracker, sleep, signal: controller.signal }).upload(items);

    expect(report.batches).toBe(0);
    expect(report.cancelled).toBe(3);
    expect(carrier.submitted).toEqual([]);
    expect((await store.get('fp-1'))?.status).toBe('PENDING');
    expect(tracker.isClaimed('fp-1')).toBe(false);
  });

  it('does not resend a batch when cancelled during the backoff', async () => {
    const { store, tracker, items, carrier } = await setup(2);
    carrier.plan('fail-before');
    const controller = new AbortController();
    const abortingSleep: Sleep = async () => {
      controller.abort();
    };

    const report = await new BatchUploader({
      carrier,
      tracker,
      sleep: abortingSleep,
      random: () => 0,
      signal: controller.signal,
    }).upload(items);

    expect(carrier.submitted).toHaveLength(1);
    expect(report.confirmed).toBe(0);
    expect(report.cancelled).toBe(2);
    expect(report.outcomes[0]).toEqual({ status: 'CANCELLED', fingerprint: 'fp-1', reference: 'R1' });
    expect(await store.get('fp-1')).toMatchObject({ status: 'FAILED', reason: 'NOT_FOUND_AT_CARRIER' });
  });

  it('keeps input order with concurrent batches', async () => {
    const { tracker, items, carrier, sleep } = await setup(5);

    const report = await new BatchUploader({ carrier, tracker, sleep, batchSize: 2, batchConcurrency: 2 }).upload(items);

    expect(report.batches).toBe(3);
    expect(report.outcomes.map((o) => o.reference)).toEqual(['R1', 'R2', 'R3', 'R4', 'R5']);
  });

  it('refuses a batch size above the carrier limit', async () => {
    const { tracker } = await setup(0);
    expect(() => new BatchUploader({ carrier: new SimulatedCarrier(10), tracker, batchSize: 11 })).toThrow(
      'Batch size 11 exceeds the carrier limit of 10'
    );
  });
});
