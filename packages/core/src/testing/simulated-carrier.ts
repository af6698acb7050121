import { CarrierError } from '../errors/index.js';
import type { AdapterContext } from '../interfaces/adapter-context.js';
import { Capabilities, type Capability } from '../interfaces/capabilities.js';
import type {
  CarrierAdapter,
  ConfirmOpenShipmentsRequest,
  ConfirmOpenShipmentsResponse,
  ShipmentStatus,
  ShipmentSubmissionResult,
  StatusQuery,
  SubmitShipmentsRequest,
  SubmitShipmentsResponse,
} from '../interfaces/carrier-adapter.js';
import { summarizeSubmission } from '../types/responses.js';
import type { ShipmentRecord } from '../types/shipment.js';

/**
 * Scripted outcome of one submitShipments call.
 * - "ok": answer for every record
 * - "fail-before": throw a transient error without accepting anything
 * - "fail-after": accept every record, then lose the answer
 * - "partial": accept every record, answer only for the first half
 * - "auth": throw an authentication error
 */
export type BatchScript = 'ok' | 'fail-before' | 'fail-after' | 'partial' | 'auth';

/**
 * In-process label service.
 * Keeps every accepted record by reference so status queries and
 * duplicate checks behave like the remote service.
 */
export class SimulatedCarrier implements CarrierAdapter {
  readonly id = 'simulated';
  readonly displayName = 'Simulated label service';
  readonly capabilities: Capability[] = [
    Capabilities.SUBMIT_SHIPMENTS,
    Capabilities.QUERY_STATUS,
    Capabilities.CONFIRM_OPEN_SHIPMENTS,
  ];

  /** Reference → shipment number */
  readonly accepted = new Map<string, string>();

  /** How many times each reference was accepted */
  readonly acceptCount = new Map<string, number>();

  readonly submitted: ShipmentRecord[][] = [];
  readonly statusQueries: StatusQuery[] = [];
  closedWorkDays = 0;
  statusUnavailable = false;

  private readonly script: BatchScript[] = [];
  private readonly rejections = new Map<string, string>();
  private sequence = 0;

  constructor(readonly maxBatchSize: number = 400) {}

  /** Queue outcomes for the next submitShipments calls; unscripted calls are "ok" */
  plan(...outcomes: BatchScript[]): this {
    this.script.push(...outcomes);
    return this;
  }

  /** Reject a reference with a business error */
  reject(reference: string, message: string): this {
    this.rejections.set(reference, message);
    return this;
  }

  async submitShipments(req: SubmitShipmentsRequest, _ctx: AdapterContext): Promise<SubmitShipmentsResponse> {
    if (req.shipments.length > this.maxBatchSize) {
      throw new CarrierError(`Batch of ${req.shipments.length} exceeds ${this.maxBatchSize}`, 'Validation');
    }
    this.submitted.push(req.shipments);
    const step = this.script.shift() ?? 'ok';

    if (step === 'auth') throw new CarrierError('Invalid credentials', 'Auth', { carrierCode: 'HTTP_401' });
    if (step === 'fail-before') throw new CarrierError('Service unavailable', 'Transient', { carrierCode: 'HTTP_503' });

    const results = req.shipments.map((s) => this.accept(s));

    if (step === 'fail-after') throw new CarrierError('Connection reset', 'Transient');
    if (step === 'partial') return summarizeSubmission(results.slice(0, Math.ceil(results.length / 2)));
    return summarizeSubmission(results);
  }

  async queryStatus(req: StatusQuery, _ctx: AdapterContext): Promise<ShipmentStatus> {
    this.statusQueries.push(req);
    if (this.statusUnavailable) {
      throw new CarrierError('Status service unavailable', 'Transient');
    }
    const shipmentNumber = this.accepted.get(req.reference);
    return shipmentNumber
      ? { state: 'FOUND', shipmentNumber, carrierState: 'IN ATTESA DI CHIUSURA' }
      : { state: 'NOT_FOUND' };
  }

  async confirmOpenShipments(_req: ConfirmOpenShipmentsRequest, _ctx: AdapterContext): Promise<ConfirmOpenShipmentsResponse> {
    this.closedWorkDays++;
    return { confirmed: true, message: `${this.accepted.size} shipments confirmed` };
  }

  private accept(record: ShipmentRecord): ShipmentSubmissionResult {
    const rejection = this.rejections.get(record.reference);
    if (rejection) {
      return { reference: record.reference, status: 'failed', errorMessage: rejection, errorCode: 'OTHER' };
    }
    const shipmentNumber = this.accepted.get(record.reference) ?? String(600_000_000 + ++this.sequence);
    this.accepted.set(record.reference, shipmentNumber);
    this.acceptCount.set(record.reference, (this.acceptCount.get(record.reference) ?? 0) + 1);
    return { reference: record.reference, status: 'created', shipmentNumber };
  }
}
