import 'dotenv/config';
import { GlsItalyAdapter } from '@spedisci/adapters-gls-italy';
import { GoogleGeocodingAdapter } from '@spedisci/adapters-google-geocoding';
import type { CarrierAdapter, GeocodingAdapter } from '@spedisci/core';
import { FakeGeocoder, SimulatedCarrier } from '@spedisci/core/testing';
import pino from 'pino';
import { buildServer, type AppDeps } from './app.js';
import { loadConfig, type DevServerConfig } from './config.js';
import { makeHttpClient } from './http-client.js';
import { SqliteLedgerStore } from './store/sqlite-ledger-store.js';

function collaborators(config: DevServerConfig): { carrier: CarrierAdapter; geocoder: GeocodingAdapter } {
  if (config.simulated || !config.gls || !config.googleApiKey) {
    return { carrier: new SimulatedCarrier(), geocoder: new FakeGeocoder() };
  }
  return {
    carrier: new GlsItalyAdapter(config.gls.credentials, {
      ...(config.gls.baseUrl !== undefined && { baseUrl: config.gls.baseUrl }),
      ...(config.gls.testBaseUrl !== undefined && { testBaseUrl: config.gls.testBaseUrl }),
    }),
    geocoder: new GoogleGeocodingAdapter({ apiKey: config.googleApiKey }),
  };
}

const start = async () => {
  const config = loadConfig();
  const logger = pino({ level: config.logLevel });
  const ledger = new SqliteLedgerStore(config.ledgerPath);

  const deps: AppDeps = {
    ...collaborators(config),
    ledger,
    http: makeHttpClient({ logger, timeoutMs: config.httpTimeoutMs, debug: config.logLevel === 'debug' }),
    pipelineDefaults: {
      geocodeTimeoutMs: config.geocodeTimeoutMs,
      carrierTimeoutMs: config.httpTimeoutMs,
      geocodeConcurrency: config.geocodeConcurrency,
      retry: config.retry,
      requirePhone: config.requirePhone,
    },
  };

  const fastify = await buildServer(deps, { logger, docs: true });
  fastify.addHook('onClose', async () => ledger.close());

  try {
    await fastify.listen({ port: config.port, host: config.host });
    fastify.log.info({ carrier: deps.carrier.id, geocoder: deps.geocoder.id, ledger: config.ledgerPath }, 'Dev server ready');
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

start().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
