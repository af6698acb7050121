import { createHash } from 'node:crypto';

export interface FingerprintInput {
  /** Identity of the source, e.g. the sheet's file name */
  sourceId: string;
  ordinal: string;

  /** Reference carried by the source row; generated references are not part of the key */
  reference?: string;

  companyName: string;
  address: string;
  postalCode: string;
}

function canonical(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Stable deduplication key of a source row.
 * Built from the row as typed, so a provider returning a different
 * normalization on a later run still maps to the same key.
 */
export function fingerprintOf(input: FingerprintInput): string {
  const digest = createHash('sha256')
    .update([input.companyName, input.address, input.postalCode].map(canonical).join('|'))
    .digest('hex')
    .slice(0, 16);
  const reference = input.reference ? canonical(input.reference) : '';
  return `${input.sourceId.trim()}:${input.ordinal.trim()}:${reference}:${digest}`;
}
