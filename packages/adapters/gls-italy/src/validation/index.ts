/**
 * GLS Italy validation schemas
 *
 * Zod schemas for the adapter credentials, the outgoing <Parcel> field
 * catalog and the parsed answers of the label service.
 */

import { z } from 'zod';
import type { GLSCredentials, GLSParcel, GLSParcelResult } from '../types/index.js';

export const GLSCredentialsSchema = z.object({
  site: z.string().regex(/^[A-Z]{2}$/, 'Site must be a two-letter GLS branch code'),
  customerCode: z.string().regex(/^\d+$/, 'Customer code must be numeric'),
  password: z.string().min(1),
  contractCode: z.string().regex(/^\d+$/, 'Contract code must be numeric'),
});

export function safeValidateGLSCredentials(credentials: unknown) {
  return GLSCredentialsSchema.safeParse(credentials);
}

export function validateGLSCredentials(credentials: unknown): GLSCredentials {
  return GLSCredentialsSchema.parse(credentials);
}

const decimal = z.string().regex(/^\d+\.\d{2}$/);

/**
 * Field catalog of one <Parcel>
 * Lengths are the service maxima; anything longer is refused server side with a generic error.
 */
export const GLSParcelSchema = z.object({
  CodiceContrattoGls: z.string().regex(/^\d+$/),
  RagioneSociale: z.string().min(1).max(35),
  Indirizzo: z.string().min(1).max(35),
  Localita: z.string().min(1).max(30),
  Zipcode: z.string().regex(/^\d{5}$/, 'Zipcode must be 5 digits'),
  Provincia: z.string().regex(/^[A-Z]{2}$/, 'Provincia must be 2 uppercase letters'),
  Bda: z.string().min(1).max(30),
  Colli: z.string().regex(/^[1-9]\d*$/, 'Colli must be a positive integer'),
  PesoReale: decimal,
  TipoPorto: z.enum(['F', 'A']),
  TipoCollo: z.string().min(1),
  TipoSpedizione: z.string().min(1),
  FormatoPdf: z.enum(['A6', 'A5']),
  Note: z.string().max(40).optional(),
  Cellulare: z.string().regex(/^\+?\d{6,16}$/).optional(),
  Email: z.email().optional(),
  ModalitaIncasso: z.enum(['CONT', 'AC', 'AS']).optional(),
  ImportoContrassegno: decimal.optional(),
}) satisfies z.ZodType<GLSParcel>;

export function safeValidateGLSParcel(parcel: unknown) {
  return GLSParcelSchema.safeParse(parcel);
}

const optionalText = z.string().optional();

/**
 * One <Parcel> of the AddParcel answer after key folding
 */
export const GLSParcelResultSchema = z.object({
  bda: optionalText,
  numeroSpedizione: optionalText,
  esito: optionalText,
  errore: optionalText,
  pdf: optionalText,
}) satisfies z.ZodType<GLSParcelResult>;

export function safeValidateGLSParcelResult(result: unknown) {
  return GLSParcelResultSchema.safeParse(result);
}

/**
 * Human-readable list of issues, e.g. "Zipcode: Zipcode must be 5 digits"
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`).join('; ');
}
