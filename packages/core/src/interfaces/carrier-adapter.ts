import type { Capability } from './capabilities.js';
import type { AdapterContext } from './adapter-context.js';
import type { ShipmentRecord } from '../types/index.js';

/**
 * Request options
 * Per-call options that adapters can use to modify behavior
 */
export interface RequestOptions {
  /**
   * Use the carrier's test endpoint instead of production
   * Default: false
   */
  useTestApi?: boolean;
}

export interface SubmitShipmentsRequest {
  /**
   * Records to submit in one call, at most the adapter's maxBatchSize
   */
  shipments: ShipmentRecord[];

  options?: RequestOptions & {
    /** Ask the carrier to return a PDF label per record */
    generatePdf?: boolean;
  };
}

/**
 * Outcome of one record of a submitted batch
 */
export interface ShipmentSubmissionResult {
  /** Reference (Bda) of the record this result belongs to */
  reference: string;

  status: "created" | "failed";

  /** Carrier-assigned shipment number, present when created */
  shipmentNumber?: string;

  /** Carrier message, present when failed */
  errorMessage?: string;

  /** Coarse classification of the carrier message, e.g. "DUPLICATE_REFERENCE" */
  errorCode?: string;

  /** Base64 PDF label when requested */
  label?: string;

  raw?: unknown;
}

/**
 * Response from batch submission
 * One result per submitted record the carrier answered for.
 * Records the carrier did not answer for are absent; callers must treat them as unknown.
 */
export interface SubmitShipmentsResponse {
  results: ShipmentSubmissionResult[];
  successCount: number;
  failureCount: number;
  totalCount: number;
  allSucceeded: boolean;
  allFailed: boolean;
  someFailed: boolean;

  /** Human-readable summary, e.g. "Mixed results: 3 succeeded, 1 failed" */
  summary: string;

  rawCarrierResponse?: unknown;
}

export interface ConfirmOpenShipmentsRequest {
  /** Carrier site (sede) whose open shipments are confirmed; defaults to the adapter's */
  site?: string;
  options?: RequestOptions;
}

export interface ConfirmOpenShipmentsResponse {
  confirmed: boolean;
  message?: string;
  raw?: unknown;
}

export interface StatusQuery {
  /** Reference (Bda) the record was submitted with */
  reference: string;
  shipmentNumber?: string;
  options?: RequestOptions;
}

export interface ShipmentStatus {
  state: "FOUND" | "NOT_FOUND";
  shipmentNumber?: string;

  /** Carrier's own state text, e.g. "IN ATTESA DI CHIUSURA" */
  carrierState?: string;

  raw?: unknown;
}

/**
 * CarrierAdapter interface
 * The contract a label service must implement
 */
export interface CarrierAdapter {
  /**
   * Unique identifier for this carrier, e.g. "it-gls"
   */
  readonly id: string;

  readonly displayName?: string;

  readonly capabilities: Capability[];

  /** Largest batch accepted by submitShipments */
  readonly maxBatchSize: number;

  /**
   * Submit a batch of shipment records
   * Capability: SUBMIT_SHIPMENTS
   *
   * Throws CarrierError when the batch as a whole fails; per-record
   * rejections come back as failed results.
   */
  submitShipments(
    req: SubmitShipmentsRequest,
    ctx: AdapterContext
  ): Promise<SubmitShipmentsResponse>;

  /**
   * Look up a previously submitted record
   * Capability: QUERY_STATUS
   */
  queryStatus(
    req: StatusQuery,
    ctx: AdapterContext
  ): Promise<ShipmentStatus>;

  /**
   * Confirm every open shipment of a site ("close work day")
   * Capability: CONFIRM_OPEN_SHIPMENTS
   */
  confirmOpenShipments?(
    req: ConfirmOpenShipmentsRequest,
    ctx: AdapterContext
  ): Promise<ConfirmOpenShipmentsResponse>;
}
