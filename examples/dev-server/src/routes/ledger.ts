/**
 * Ledger inspection
 * GET /ledger?status=&sourceId=
 * GET /ledger/stats
 */

import type { FastifyInstance } from 'fastify';
import { DuplicateTracker, type LedgerStatus } from '@spedisci/core';
import type { AppDeps } from '../app.js';
import { LEDGER_ENTRY_SCHEMA, LEDGER_STATUSES } from './common.js';

interface LedgerQuery {
  status?: LedgerStatus;
  sourceId?: string;
}

const COUNTS_SCHEMA = {
  type: 'object',
  properties: Object.fromEntries(LEDGER_STATUSES.map((s) => [s, { type: 'integer' }])),
};

export async function registerLedgerRoutes(fastify: FastifyInstance, deps: AppDeps) {
  fastify.get<{ Querystring: LedgerQuery }>('/ledger', {
    schema: {
      description: 'List ledger entries, optionally filtered',
      tags: ['Ledger'],
      querystring: {
        type: 'object',
        properties: {
          status: { type: 'string', enum: LEDGER_STATUSES },
          sourceId: { type: 'string' },
        },
      },
      response: {
        200: {
          type: 'object',
          properties: {
            count: { type: 'integer' },
            entries: { type: 'array', items: LEDGER_ENTRY_SCHEMA },
          },
        },
      },
    },
  }, async (request) => {
    const { status, sourceId } = request.query;
    const entries = await deps.ledger.list({
      ...(status !== undefined && { status }),
      ...(sourceId !== undefined && { sourceId }),
    });
    return { count: entries.length, entries };
  });

  fastify.get('/ledger/stats', {
    schema: {
      description: 'Ledger entries counted by status and by source',
      tags: ['Ledger'],
      response: {
        200: {
          type: 'object',
          properties: {
            total: { type: 'integer' },
            byStatus: COUNTS_SCHEMA,
            bySource: { type: 'object', additionalProperties: COUNTS_SCHEMA },
          },
        },
      },
    },
  }, async () => new DuplicateTracker(deps.ledger).stats());
}
