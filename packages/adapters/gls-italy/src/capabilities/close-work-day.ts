/**
 * GLS Italy: CloseWorkDay
 * Confirms every open shipment of a site so it enters the pickup flow.
 */

import type { AdapterContext, ConfirmOpenShipmentsRequest, ConfirmOpenShipmentsResponse } from '@spedisci/core';
import { errorToLog, safeLog, truncateString } from '@spedisci/core';
import { buildCloseWorkDayXml } from '../mappers/parcels.js';
import { findText, parseServiceXml, textContent } from '../mappers/xml.js';
import type { GLSItalyConfig } from '../types/index.js';
import { translateGLSError } from '../utils/errors.js';
import { formRequestConfig, requireHttp } from '../utils/http.js';

export async function confirmOpenShipments(
  req: ConfirmOpenShipmentsRequest,
  ctx: AdapterContext,
  config: GLSItalyConfig,
): Promise<ConfirmOpenShipmentsResponse> {
  try {
    const http = requireHttp(ctx);
    const baseUrl = config.resolveBaseUrl(req.options);
    const site = req.site ?? config.credentials.site;

    const httpResponse = await http.post<string>(
      `${baseUrl}/CloseWorkDay`,
      new URLSearchParams({ _xmlRequest: buildCloseWorkDayXml(config.credentials, site) }),
      formRequestConfig(ctx),
    );

    const document = parseServiceXml(httpResponse.body);
    const esito = findText(document, ['esito', 'result']);
    const errore = findText(document, ['errore', 'error', 'errormessage']);
    const confirmed = esito?.toUpperCase() === 'OK';
    const message = errore ?? esito ?? (textContent(document) || undefined);

    safeLog(ctx.logger, confirmed ? 'info' : 'warn', 'GLS Italy: CloseWorkDay answered', {
      site,
      confirmed,
      message,
    }, ctx, []);

    return {
      confirmed,
      ...(message !== undefined && { message }),
      raw: truncateString(String(httpResponse.body), 2000),
    };
  } catch (error) {
    safeLog(ctx.logger, 'error', 'GLS Italy: Error closing work day', { error: errorToLog(error) }, ctx, []);
    throw translateGLSError(error);
  }
}
