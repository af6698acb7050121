/**
 * Shared route schemas and error replies
 */

import type { FastifyReply } from 'fastify';
import { CarrierError, GeocodingError, ValidationError, type ErrorCategory } from '@spedisci/core';

export const LEDGER_STATUSES = ['PENDING', 'SUBMITTED', 'CONFIRMED', 'FAILED'] as const;

export const ERROR_RESPONSE_SCHEMA = {
  type: 'object',
  properties: {
    message: { type: 'string' },
    category: { type: 'string' },
    carrierCode: { type: 'string' },
  },
};

export const LEDGER_ENTRY_SCHEMA = {
  type: 'object',
  properties: {
    fingerprint: { type: 'string' },
    status: { type: 'string', enum: LEDGER_STATUSES },
    reason: { type: 'string' },
    shipmentNumber: { type: 'string' },
    reference: { type: 'string' },
    sourceId: { type: 'string' },
    ordinal: { type: 'string' },
    attempts: { type: 'integer' },
    runId: { type: 'string' },
    createdAt: { type: 'string' },
    updatedAt: { type: 'string' },
  },
};

const CATEGORY_STATUS: Record<ErrorCategory, number> = {
  Validation: 400,
  Auth: 401,
  RateLimit: 429,
  Permanent: 502,
  Transient: 503,
};

/**
 * Reply for an error thrown by a flow: typed errors keep their category,
 * anything else is a 500
 */
export function sendError(reply: FastifyReply, error: unknown) {
  if (error instanceof ValidationError) {
    return reply.status(400).send({ message: error.message, category: 'Validation' });
  }
  if (error instanceof CarrierError || error instanceof GeocodingError) {
    return reply.status(CATEGORY_STATUS[error.category]).send({
      message: error.message,
      category: error.category,
      ...(error instanceof CarrierError && error.carrierCode !== undefined && { carrierCode: error.carrierCode }),
    });
  }
  return reply.status(500).send({
    message: error instanceof Error ? error.message : String(error),
    category: 'Internal',
  });
}
