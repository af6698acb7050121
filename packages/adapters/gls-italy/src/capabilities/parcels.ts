/**
 * GLS Italy: AddParcel
 * Submits up to 400 records in one call and maps the answer per record.
 */

import type {
  AdapterContext,
  ShipmentSubmissionResult,
  SubmitShipmentsRequest,
  SubmitShipmentsResponse,
} from '@spedisci/core';
import { CarrierError, errorToLog, safeLog, summarizeSubmission, truncateString } from '@spedisci/core';
import { buildAddParcelXml, mapAddParcelResponse, mapRecordToGLSParcel } from '../mappers/parcels.js';
import { findElements, parseServiceXml, textContent } from '../mappers/xml.js';
import type { GLSItalyConfig, GLSParcel } from '../types/index.js';
import { GLS_MAX_PARCELS_PER_CALL } from '../utils/endpoint.js';
import { serviceMessageError, translateGLSError } from '../utils/errors.js';
import { formRequestConfig, requireHttp } from '../utils/http.js';
import { formatIssues, safeValidateGLSParcel } from '../validation/index.js';

export async function submitShipments(
  req: SubmitShipmentsRequest,
  ctx: AdapterContext,
  config: GLSItalyConfig,
): Promise<SubmitShipmentsResponse> {
  try {
    if (req.shipments.length > GLS_MAX_PARCELS_PER_CALL) {
      throw new CarrierError(
        `GLS Italy accepts at most ${GLS_MAX_PARCELS_PER_CALL} parcels per call, got ${req.shipments.length}`,
        'Validation',
      );
    }
    const http = requireHttp(ctx);

    if (req.shipments.length === 0) {
      return summarizeSubmission([]);
    }

    const baseUrl = config.resolveBaseUrl(req.options);

    // Records the service would refuse never leave the process
    const invalid: ShipmentSubmissionResult[] = [];
    const parcels: GLSParcel[] = [];
    for (const record of req.shipments) {
      const parcel = mapRecordToGLSParcel(record, config.credentials.contractCode);
      const validated = safeValidateGLSParcel(parcel);
      if (validated.success) {
        parcels.push(parcel);
      } else {
        invalid.push({
          reference: record.reference,
          status: 'failed',
          errorMessage: `Invalid fields: ${formatIssues(validated.error)}`,
          errorCode: 'INVALID_FIELD',
        });
      }
    }

    if (invalid.length > 0) {
      safeLog(ctx.logger, 'warn', 'GLS Italy: Records failed field validation', {
        count: invalid.length,
        references: invalid.map((r) => r.reference),
      }, ctx, []);
    }
    if (parcels.length === 0) {
      return summarizeSubmission(invalid);
    }

    const generatePdf = req.options?.generatePdf ?? false;
    safeLog(ctx.logger, 'debug', 'GLS Italy: Submitting parcels', {
      count: parcels.length,
      testMode: req.options?.useTestApi ?? false,
      generatePdf,
    }, ctx, []);

    const xml = buildAddParcelXml(config.credentials, parcels, generatePdf);
    const httpResponse = await http.post<string>(
      `${baseUrl}/AddParcel`,
      new URLSearchParams({ XMLInfoParcel: xml }),
      formRequestConfig(ctx),
    );

    const document = parseServiceXml(httpResponse.body);
    if (findElements(document, 'parcel').length === 0) {
      throw serviceMessageError(textContent(document) || 'Risposta non parsabile', truncateString(String(httpResponse.body)));
    }

    const response = summarizeSubmission(
      [...invalid, ...mapAddParcelResponse(document, parcels.map((p) => p.Bda))],
      truncateString(String(httpResponse.body), 2000),
    );

    safeLog(ctx.logger, 'info', 'GLS Italy: Parcel submission finished', {
      count: response.totalCount,
      summary: response.summary,
      successCount: response.successCount,
      failureCount: response.failureCount,
    }, ctx, []);

    return response;
  } catch (error) {
    safeLog(ctx.logger, 'error', 'GLS Italy: Error submitting parcels', {
      error: errorToLog(error),
    }, ctx, []);
    throw translateGLSError(error);
  }
}
