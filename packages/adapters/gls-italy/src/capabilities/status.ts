/**
 * GLS Italy: ListSped
 * Lists the shipments of the account; status lookups search this list.
 */

import type { AdapterContext, RequestOptions, ShipmentStatus, StatusQuery } from '@spedisci/core';
import { errorToLog, safeLog } from '@spedisci/core';
import { buildListSpedForm, mapListSpedResponse } from '../mappers/parcels.js';
import { findElements, findText, parseServiceXml, textContent } from '../mappers/xml.js';
import type { GLSItalyConfig, GLSListedShipment } from '../types/index.js';
import { serviceMessageError, translateGLSError } from '../utils/errors.js';
import { formRequestConfig, requireHttp } from '../utils/http.js';

/**
 * Status lookups run once per unknown record; they are silent unless asked otherwise
 */
const SILENT_BY_DEFAULT = ['queryStatus'];

export async function listShipments(
  ctx: AdapterContext,
  config: GLSItalyConfig,
  options?: RequestOptions,
): Promise<GLSListedShipment[]> {
  const http = requireHttp(ctx);
  const baseUrl = config.resolveBaseUrl(options);

  const httpResponse = await http.post<string>(
    `${baseUrl}/ListSped`,
    buildListSpedForm(config.credentials),
    formRequestConfig(ctx),
  );

  const document = parseServiceXml(httpResponse.body);
  if (findElements(document, 'spedizione').length === 0) {
    // An empty list still comes back as an element; bare text or an Errore is a refusal
    const refusal = typeof document === 'string' ? document : findText(document, ['errore', 'error', 'errormessage']);
    if (refusal !== undefined && refusal !== '') {
      throw serviceMessageError(refusal, textContent(document));
    }
  }
  return mapListSpedResponse(document);
}

export async function queryStatus(
  req: StatusQuery,
  ctx: AdapterContext,
  config: GLSItalyConfig,
): Promise<ShipmentStatus> {
  try {
    const shipments = await listShipments(ctx, config, req.options);
    const match = shipments.find(
      (s) => s.bda === req.reference || (req.shipmentNumber !== undefined && s.numeroSpedizione === req.shipmentNumber),
    );

    safeLog(ctx.logger, 'debug', 'GLS Italy: Status lookup', {
      reference: req.reference,
      listed: shipments.length,
      found: match !== undefined,
    }, ctx, SILENT_BY_DEFAULT);

    if (!match) return { state: 'NOT_FOUND' };
    return {
      state: 'FOUND',
      ...(match.numeroSpedizione !== undefined && { shipmentNumber: match.numeroSpedizione }),
      ...(match.stato !== undefined && { carrierState: match.stato }),
      raw: match.fields,
    };
  } catch (error) {
    safeLog(ctx.logger, 'error', 'GLS Italy: Error querying status', {
      reference: req.reference,
      error: errorToLog(error),
    }, ctx, []);
    throw translateGLSError(error);
  }
}
