import type { InputRow } from '../types/input-row.js';
import { LayoutKinds, type LayoutDefaults, type LayoutKind, type SourceSignature } from '../types/layout.js';

/**
 * Logical fields an InputRow is assembled from
 */
export type ColumnField =
  | 'address'
  | 'city'
  | 'postalCode'
  | 'province'
  | 'companyName'
  | 'ordinal'
  | 'landlinePhone'
  | 'mobilePhone'
  | 'email'
  | 'instructions'
  | 'reference'
  | 'packageCount'
  | 'weightKg';

/** Logical field → header actually found in the source */
export type ColumnMapping = Partial<Record<ColumnField, string>>;

/** A record already parsed from a sheet, keyed by header */
export type SourceRecord = Readonly<Record<string, unknown>>;

const ADDRESS_FIELDS: readonly ColumnField[] = ['address', 'city', 'postalCode', 'province'];

/**
 * Expected headers per layout. null marks a field the layout never carries.
 */
export const LAYOUT_COLUMNS: Readonly<Record<LayoutKind, Readonly<Record<ColumnField, string | null>>>> = {
  OLD: {
    address: 'Indirizzo',
    city: 'Località',
    postalCode: 'Cap',
    province: 'Provincia',
    companyName: 'Ragione sociale negozio',
    ordinal: 'Unnamed: 0',
    landlinePhone: 'Telefono',
    mobilePhone: 'Cellulare',
    email: 'E-Mail',
    instructions: 'Centro comm.le / Indicazioni',
    reference: 'Bda',
    packageCount: null,
    weightKg: null,
  },
  NEW: {
    address: 'Indirizzo',
    city: 'Comune',
    postalCode: 'CAP',
    province: 'Provincia',
    companyName: 'RAGIONE SOCIALE',
    ordinal: 'PROGRESSIVO',
    landlinePhone: 'TELEFONO',
    mobilePhone: 'CELLULARE',
    email: 'MAIL PEC',
    instructions: 'PRESSO CC',
    reference: 'BDA',
    packageCount: null,
    weightKg: null,
  },
  AGENCY: {
    address: 'Indirizzo',
    city: 'Città',
    postalCode: 'CAP',
    province: 'Provincia',
    companyName: 'RAGIONE SOCIALE',
    ordinal: 'Unnamed: 0',
    landlinePhone: null,
    mobilePhone: 'Cellulare',
    email: 'E-mail',
    instructions: 'NOTE X CONSEGNE',
    reference: 'BDA',
    packageCount: 'Colli',
    weightKg: 'Peso',
  },
};

const AGENCY_MARKERS = ['area', 'n° point serviti'];

const LAYOUT_DEFAULTS: Readonly<Record<LayoutKind, LayoutDefaults | null>> = {
  OLD: { packageCount: 1, weightKg: 3 },
  NEW: { packageCount: 2, weightKg: 3 },
  AGENCY: null,
};

/**
 * Classify a source from its header row, falling back to tokens in its file name.
 * Returns null when neither signal is recognized.
 */
export function detectLayout(signature: SourceSignature): LayoutKind | null {
  const headers = new Set((signature.headers ?? []).map((h) => h.trim().toLowerCase()));

  if (AGENCY_MARKERS.some((m) => headers.has(m))) return LayoutKinds.AGENCY;
  if (headers.has('layout')) return LayoutKinds.OLD;
  if (headers.has('location negozio')) return LayoutKinds.NEW;

  const name = (signature.fileName ?? '').toUpperCase();
  // AGENZ first: "AGENZIE_NEW_2024.xlsx" is an agency file
  if (name.includes('AGENZ') || name.includes('AGENCY')) return LayoutKinds.AGENCY;
  if (name.includes('OLD')) return LayoutKinds.OLD;
  if (name.includes('NEW')) return LayoutKinds.NEW;

  return null;
}

/**
 * Package count and weight applied to every row of a layout.
 * AGENCY has none: both values must come from the row.
 */
export function layoutDefaults(kind: LayoutKind): LayoutDefaults | null {
  const defaults = LAYOUT_DEFAULTS[kind];
  return defaults ? { ...defaults } : null;
}

/**
 * Match a layout's expected headers against the headers of a source:
 * exact (case-insensitive) first, then containment either way.
 */
export function resolveColumns(kind: LayoutKind, headers: readonly string[]): ColumnMapping {
  const byLower = new Map<string, string>();
  for (const header of headers) {
    const key = header.trim().toLowerCase();
    if (key && !byLower.has(key)) byLower.set(key, header);
  }

  const mapping: ColumnMapping = {};
  const expected = LAYOUT_COLUMNS[kind];
  for (const field of Object.keys(expected).filter(isColumnField)) {
    const wanted = expected[field]?.toLowerCase();
    if (!wanted) continue;
    const exact = byLower.get(wanted);
    if (exact !== undefined) {
      mapping[field] = exact;
      continue;
    }
    for (const [lower, header] of byLower) {
      if (lower.includes(wanted) || wanted.includes(lower)) {
        mapping[field] = header;
        break;
      }
    }
  }
  return mapping;
}

function isColumnField(key: string): key is ColumnField {
  return key in LAYOUT_COLUMNS.OLD;
}

/**
 * Address columns a mapping could not resolve. A source missing any of them
 * cannot be processed.
 */
export function missingAddressColumns(mapping: ColumnMapping): ColumnField[] {
  return ADDRESS_FIELDS.filter((field) => mapping[field] === undefined);
}

export function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : '';
  if (typeof value === 'string' || typeof value === 'boolean') return String(value).trim();
  return '';
}

function cellNumber(value: unknown): number | undefined {
  const text = cellText(value).replace(',', '.');
  if (!text) return undefined;
  const n = Number(text);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

/**
 * Turn a parsed record into an InputRow.
 * `index` is the zero-based position of the record; it becomes the ordinal
 * when the source has no progressive-number column.
 */
export function toInputRow(
  kind: LayoutKind,
  mapping: ColumnMapping,
  record: SourceRecord,
  index: number
): InputRow {
  const read = (field: ColumnField): string => {
    const header = mapping[field];
    return header === undefined ? '' : cellText(record[header]);
  };
  const optional = (field: ColumnField): string | undefined => read(field) || undefined;

  const used = new Set(Object.values(mapping));
  const extra: Record<string, string> = {};
  for (const [header, value] of Object.entries(record)) {
    const text = cellText(value);
    if (!used.has(header) && text) extra[header] = text;
  }

  const manual = kind === LayoutKinds.AGENCY;
  const packageHeader = mapping.packageCount;
  const weightHeader = mapping.weightKg;

  return {
    ordinal: read('ordinal') || String(index + 1),
    companyName: read('companyName'),
    address: read('address'),
    city: read('city'),
    postalCode: read('postalCode'),
    province: read('province'),
    mobilePhone: optional('mobilePhone'),
    landlinePhone: optional('landlinePhone'),
    email: optional('email'),
    instructions: optional('instructions'),
    reference: optional('reference'),
    packageCount: manual && packageHeader !== undefined ? cellNumber(record[packageHeader]) : undefined,
    weightKg: manual && weightHeader !== undefined ? cellNumber(record[weightHeader]) : undefined,
    extra: Object.keys(extra).length > 0 ? extra : undefined,
  };
}
