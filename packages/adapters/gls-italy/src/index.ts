/**
 * GLS Italy adapter
 *
 * Talks to the GLS Italy label service (ilswebservice.asmx) through
 * form POSTs carrying XML documents.
 *
 * Capabilities:
 * - SUBMIT_SHIPMENTS: AddParcel, up to 400 parcels per call
 * - CONFIRM_OPEN_SHIPMENTS: CloseWorkDay for a site
 * - QUERY_STATUS: lookup in the ListSped listing, by Bda or shipment number
 * - GENERATE_PDF: base64 labels returned by AddParcel on request
 * - TEST_MODE_SUPPORTED: only when a test endpoint is configured
 */

import type {
  AdapterContext,
  Capability,
  CarrierAdapter,
  ConfirmOpenShipmentsRequest,
  ConfirmOpenShipmentsResponse,
  RequestOptions,
  ShipmentStatus,
  StatusQuery,
  SubmitShipmentsRequest,
  SubmitShipmentsResponse,
} from '@spedisci/core';
import { Capabilities, CarrierError } from '@spedisci/core';
import {
  confirmOpenShipments as confirmOpenShipmentsImpl,
  listShipments as listShipmentsImpl,
  queryStatus as queryStatusImpl,
  submitShipments as submitShipmentsImpl,
} from './capabilities/index.js';
import type { GLSCredentials, GLSItalyConfig, GLSListedShipment } from './types/index.js';
import { createResolveBaseUrl, GLS_ITALY_ENDPOINT, GLS_MAX_PARCELS_PER_CALL } from './utils/endpoint.js';
import { formatIssues, safeValidateGLSCredentials } from './validation/index.js';

export interface GlsItalyAdapterOptions {
  /** Production endpoint, defaults to the public label service */
  baseUrl?: string;

  /** Test endpoint used when a request sets useTestApi */
  testBaseUrl?: string;
}

export class GlsItalyAdapter implements CarrierAdapter {
  readonly id = 'it-gls';
  readonly displayName = 'GLS Italy';
  readonly capabilities: Capability[];
  readonly maxBatchSize = GLS_MAX_PARCELS_PER_CALL;

  private readonly config: GLSItalyConfig;

  constructor(credentials: GLSCredentials, opts: GlsItalyAdapterOptions = {}) {
    const validated = safeValidateGLSCredentials(credentials);
    if (!validated.success) {
      throw new CarrierError(`Invalid GLS Italy credentials: ${formatIssues(validated.error)}`, 'Validation');
    }

    this.config = {
      credentials: validated.data,
      resolveBaseUrl: createResolveBaseUrl(opts.baseUrl ?? GLS_ITALY_ENDPOINT, opts.testBaseUrl),
    };
    this.capabilities = [
      Capabilities.SUBMIT_SHIPMENTS,
      Capabilities.CONFIRM_OPEN_SHIPMENTS,
      Capabilities.QUERY_STATUS,
      Capabilities.GENERATE_PDF,
      ...(opts.testBaseUrl ? [Capabilities.TEST_MODE_SUPPORTED] : []),
    ];
  }

  submitShipments(req: SubmitShipmentsRequest, ctx: AdapterContext): Promise<SubmitShipmentsResponse> {
    return submitShipmentsImpl(req, ctx, this.config);
  }

  confirmOpenShipments(req: ConfirmOpenShipmentsRequest, ctx: AdapterContext): Promise<ConfirmOpenShipmentsResponse> {
    return confirmOpenShipmentsImpl(req, ctx, this.config);
  }

  queryStatus(req: StatusQuery, ctx: AdapterContext): Promise<ShipmentStatus> {
    return queryStatusImpl(req, ctx, this.config);
  }

  /**
   * Shipments currently listed for the account
   */
  listShipments(ctx: AdapterContext, options?: RequestOptions): Promise<GLSListedShipment[]> {
    return listShipmentsImpl(ctx, this.config, options);
  }
}

export type { GLSCredentials, GLSParcel, GLSListedShipment, GLSParcelResult } from './types/index.js';
export { GLS_ITALY_ENDPOINT, GLS_MAX_PARCELS_PER_CALL } from './utils/endpoint.js';
export { translateGLSError, classifyRejection } from './utils/errors.js';
export type { GLSRejectionCode } from './utils/errors.js';
export { GLSCredentialsSchema, GLSParcelSchema, safeValidateGLSCredentials, safeValidateGLSParcel } from './validation/index.js';
export * from './mappers/index.js';
