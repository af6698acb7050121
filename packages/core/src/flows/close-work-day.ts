import { CARRIER_TIMEOUT_MS } from '../constants.js';
import { CarrierError } from '../errors/index.js';
import type { AdapterContext } from '../interfaces/adapter-context.js';
import { Capabilities } from '../interfaces/capabilities.js';
import type {
  CarrierAdapter,
  ConfirmOpenShipmentsRequest,
  ConfirmOpenShipmentsResponse,
} from '../interfaces/carrier-adapter.js';
import { errorToLog } from '../utils/logging.js';
import { withTimeout } from '../utils/timeout.js';

/**
 * Confirm every open shipment of a site ("chiusura giornata").
 *
 * Explicit step, run once after all batches of a run: the carrier only
 * collects parcels whose shipments were confirmed.
 */
export async function closeWorkDay(
  carrier: CarrierAdapter,
  req: ConfirmOpenShipmentsRequest = {},
  ctx: AdapterContext = {}
): Promise<ConfirmOpenShipmentsResponse> {
  if (!carrier.capabilities.includes(Capabilities.CONFIRM_OPEN_SHIPMENTS) || !carrier.confirmOpenShipments) {
    throw new CarrierError(`Carrier ${carrier.id} cannot confirm open shipments`, 'Permanent');
  }

  const timeoutMs = ctx.timeoutMs ?? CARRIER_TIMEOUT_MS;
  const callCtx: AdapterContext = { ...ctx, operationName: 'confirmOpenShipments', timeoutMs };

  ctx.logger?.info('Closing work day', { carrier: carrier.id, site: req.site });
  try {
    const res = await withTimeout(carrier.confirmOpenShipments(req, callCtx), timeoutMs, 'confirmOpenShipments');
    ctx.logger?.info('Work day closed', { carrier: carrier.id, confirmed: res.confirmed, message: res.message });
    return res;
  } catch (err) {
    ctx.logger?.error('Closing work day failed', { carrier: carrier.id, error: errorToLog(err) });
    throw err;
  }
}
