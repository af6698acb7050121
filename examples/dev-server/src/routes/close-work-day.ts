/**
 * POST /close-work-day
 * Confirms the open shipments of a site.
 */

import type { FastifyInstance } from 'fastify';
import { closeWorkDay } from '@spedisci/core';
import { wrapPinoLogger } from '../http-client.js';
import type { AppDeps } from '../app.js';
import { ERROR_RESPONSE_SCHEMA, sendError } from './common.js';

interface CloseWorkDayBody {
  site?: string;
  useTestApi?: boolean;
}

export async function registerCloseWorkDayRoute(fastify: FastifyInstance, deps: AppDeps) {
  fastify.post<{ Body: CloseWorkDayBody }>('/close-work-day', {
    schema: {
      description: 'Confirm every open shipment of a site',
      tags: ['Carrier'],
      body: {
        type: 'object',
        properties: {
          site: { type: 'string', pattern: '^[A-Z]{2}$' },
          useTestApi: { type: 'boolean' },
        },
      },
      response: {
        200: {
          type: 'object',
          properties: {
            confirmed: { type: 'boolean' },
            message: { type: 'string' },
          },
        },
        400: ERROR_RESPONSE_SCHEMA,
        500: ERROR_RESPONSE_SCHEMA,
      },
    },
  }, async (request, reply) => {
    const { site, useTestApi } = request.body ?? {};
    try {
      const response = await closeWorkDay(
        deps.carrier,
        {
          ...(site !== undefined && { site }),
          ...(useTestApi !== undefined && { options: { useTestApi } }),
        },
        { ...(deps.http && { http: deps.http }), logger: wrapPinoLogger(request.log) },
      );
      return reply.send(response);
    } catch (error) {
      return sendError(reply, error);
    }
  });
}
