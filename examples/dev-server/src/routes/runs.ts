/**
 * POST /runs
 * Runs one parsed spreadsheet through the shipment pipeline.
 */

import type { FastifyInstance } from 'fastify';
import { runShipmentPipeline, type LayoutKind, type PipelineOptions } from '@spedisci/core';
import { wrapPinoLogger } from '../http-client.js';
import type { AppDeps } from '../app.js';
import { ERROR_RESPONSE_SCHEMA, sendError } from './common.js';

interface RunBody {
  fileName: string;
  headers: string[];
  records: Record<string, unknown>[];
  layout?: LayoutKind;
  options?: {
    generatePdf?: boolean;
    useTestApi?: boolean;
    closeWorkDay?: boolean;
    site?: string;
    batchSize?: number;
    requirePhone?: boolean;
  };
}

const RUN_BODY_SCHEMA = {
  type: 'object',
  required: ['fileName', 'headers', 'records'],
  properties: {
    fileName: { type: 'string', minLength: 1, description: 'Source file name, e.g. "negozi_2026.xlsx"' },
    headers: { type: 'array', items: { type: 'string' }, minItems: 1 },
    records: {
      type: 'array',
      items: { type: 'object', additionalProperties: true },
      description: 'Rows keyed by header, as read from the sheet',
    },
    layout: { type: 'string', enum: ['OLD', 'NEW', 'AGENCY'] },
    options: {
      type: 'object',
      properties: {
        generatePdf: { type: 'boolean' },
        useTestApi: { type: 'boolean' },
        closeWorkDay: { type: 'boolean' },
        site: { type: 'string' },
        batchSize: { type: 'integer', minimum: 1 },
        requirePhone: { type: 'boolean' },
      },
    },
  },
  examples: [
    {
      fileName: 'negozi_2026.xlsx',
      headers: ['PROGRESSIVO', 'RAGIONE SOCIALE', 'Indirizzo', 'Comune', 'CAP', 'Provincia', 'CELLULARE'],
      records: [
        {
          PROGRESSIVO: 1,
          'RAGIONE SOCIALE': 'Negozio Centro',
          Indirizzo: 'Via Roma 12',
          Comune: 'Milano',
          CAP: '20121',
          Provincia: 'MI',
          CELLULARE: '333 1234567',
        },
      ],
    },
  ],
};

export async function registerRunRoutes(fastify: FastifyInstance, deps: AppDeps) {
  // One run at a time: each run owns the ledger while it uploads
  let running = false;

  fastify.post<{ Body: RunBody }>('/runs', {
    schema: {
      description: 'Normalize, deduplicate and upload the rows of one source',
      tags: ['Runs'],
      body: RUN_BODY_SCHEMA,
      response: {
        400: ERROR_RESPONSE_SCHEMA,
        409: ERROR_RESPONSE_SCHEMA,
        500: ERROR_RESPONSE_SCHEMA,
      },
    },
  }, async (request, reply) => {
    if (running) {
      return reply.status(409).send({ message: 'A run is already in progress', category: 'Conflict' });
    }
    running = true;

    const { fileName, headers, records, layout, options = {} } = request.body;
    const opts: PipelineOptions = {
      ...deps.pipelineDefaults,
      carrier: deps.carrier,
      geocoder: deps.geocoder,
      ledger: deps.ledger,
      ctx: { ...(deps.http && { http: deps.http }), logger: wrapPinoLogger(request.log) },
      ...(options.generatePdf !== undefined && { generatePdf: options.generatePdf }),
      ...(options.useTestApi !== undefined && { useTestApi: options.useTestApi }),
      ...(options.closeWorkDay !== undefined && { closeWorkDay: options.closeWorkDay }),
      ...(options.site !== undefined && { site: options.site }),
      ...(options.batchSize !== undefined && { batchSize: options.batchSize }),
      ...(options.requirePhone !== undefined && { requirePhone: options.requirePhone }),
    };

    try {
      const summary = await runShipmentPipeline({ fileName, headers, records, ...(layout !== undefined && { layout }) }, opts);
      return reply.status(summary.exitCode === 0 ? 200 : 207).send(summary);
    } catch (error) {
      request.log.error({ err: error }, 'Run failed');
      return sendError(reply, error);
    } finally {
      running = false;
    }
  });
}
