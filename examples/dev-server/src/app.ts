import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import FastifyCors from '@fastify/cors';
import swaggerPlugin from '@fastify/swagger';
import swaggerUiPlugin from '@fastify/swagger-ui';
import type { CarrierAdapter, GeocodingAdapter, HttpClient, LedgerStore, PipelineOptions } from '@spedisci/core';
import { registerCloseWorkDayRoute, registerLedgerRoutes, registerRunRoutes } from './routes/index.js';

export interface AppDeps {
  carrier: CarrierAdapter;
  geocoder: GeocodingAdapter;
  ledger: LedgerStore;

  /** Shared by every adapter call; omitted when the collaborators run in process */
  http?: HttpClient;

  /** Tunables applied to every run before the request's own options */
  pipelineDefaults?: Partial<Omit<PipelineOptions, 'carrier' | 'geocoder' | 'ledger' | 'ctx'>>;
}

export interface BuildServerOptions {
  logger?: FastifyServerOptions['logger'];

  /** Serve the OpenAPI document and Swagger UI under /docs */
  docs?: boolean;
}

export async function buildServer(deps: AppDeps, opts: BuildServerOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: opts.logger ?? true });
  await fastify.register(FastifyCors, { origin: true });

  // Swagger must be registered before the routes so it sees them
  if (opts.docs) {
    await fastify.register(swaggerPlugin, {
      openapi: {
        info: { title: 'Spedisci Dev Server', description: 'Shipment pipeline over HTTP', version: '0.1.0' },
      },
    });
    await fastify.register(swaggerUiPlugin, {
      routePrefix: '/docs',
      uiConfig: { docExpansion: 'list', deepLinking: false },
    });
  }

  fastify.get('/health', {
    schema: {
      description: 'Health check',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
            carrier: { type: 'string' },
            geocoder: { type: 'string' },
            ts: { type: 'string' },
          },
        },
      },
    },
  }, async () => ({
    status: 'ok',
    carrier: deps.carrier.id,
    geocoder: deps.geocoder.id,
    ts: new Date().toISOString(),
  }));

  await registerRunRoutes(fastify, deps);
  await registerLedgerRoutes(fastify, deps);
  await registerCloseWorkDayRoute(fastify, deps);

  return fastify;
}
