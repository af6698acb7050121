import { GeocodingError, isTransientError, TimeoutError } from '../errors/index.js';
import type { AdapterContext } from '../interfaces/adapter-context.js';
import type { GeocodeCandidate, GeocodeRequest, GeocodingAdapter } from '../interfaces/geocoding-adapter.js';
import { GEOCODE_TIMEOUT_MS, MIN_GEOCODE_CONFIDENCE } from '../constants.js';
import type { AddressQuery, NormalizedAddress } from '../types/address.js';
import {
  FailureKinds,
  type GenericAddressCode,
  type NormalizationFailure,
  type NormalizationFailureKind,
  type StepResult,
} from '../types/failures.js';
import { errorToLog } from '../utils/logging.js';
import { safeLog } from '../utils/logging-helpers.js';
import { withTimeout } from '../utils/timeout.js';
import { suggestionFor } from './suggestions.js';

export type NormalizationResult = StepResult<NormalizedAddress, NormalizationFailure>;

export interface AddressNormalizerOptions {
  geocoder: GeocodingAdapter;

  /** HTTP client, logger and logging options handed to the geocoder */
  ctx?: AdapterContext;

  timeoutMs?: number;

  /** Candidates scored below this are AMBIGUOUS */
  minConfidence?: number;
}

const CITY_PREFIXES = ['comune di ', "citta' di ", 'citta di '];

const CONTRADA_PATTERN = /(?<![\p{L}\p{N}])(?:contrada|c\.da|localit[aà]|loc\.)/iu;
const STATE_ROAD_PATTERN = /(?<![\p{L}\p{N}])(?:strada\s+statale|strada\s+provinciale|s\.s\.|s\.p\.)/iu;
const SNC_PATTERN = /(?<![\p{L}\p{N}])snc(?![\p{L}\p{N}])/iu;

/**
 * Clean spreadsheet artefacts from a postal code: a trailing ".0" left by
 * numeric cells, and leading zeros lost by them ("187" → "00187").
 * Returns null when the result is not 5 digits.
 */
export function cleanPostalCode(raw: string): string | null {
  const code = raw.trim().replace(/\.0+$/, '').replace(/\s+/g, '');
  if (/^\d{3,4}$/.test(code)) return code.padStart(5, '0');
  return /^\d{5}$/.test(code) ? code : null;
}

/**
 * Case, accent and "Comune di" insensitive form of a municipality name
 */
export function normalizeCityName(city: string): string {
  let name = city
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
  for (const prefix of CITY_PREFIXES) {
    if (name.startsWith(prefix)) name = name.slice(prefix.length);
  }
  return name;
}

/**
 * Postal codes of one municipality share their first three digits
 */
function sameMunicipalityArea(a: string, b: string): boolean {
  return a.slice(0, 3) === b.slice(0, 3);
}

function genericAddressCode(requested: string, candidate: GeocodeCandidate): GenericAddressCode | null {
  const approximate = candidate.precision === 'APPROXIMATE';
  if (CONTRADA_PATTERN.test(requested) && (!candidate.route || approximate)) return 'CONTRADA';
  if (STATE_ROAD_PATTERN.test(requested) && !candidate.streetNumber) return 'STRADA_STATALE';
  if (SNC_PATTERN.test(requested)) return 'SNC';
  if (!candidate.route) return 'NO_ROUTE';
  return null;
}

function failure(
  kind: NormalizationFailureKind,
  message: string,
  detail?: GenericAddressCode | string
): NormalizationFailure {
  const code = kind === FailureKinds.GENERIC_ADDRESS && isGenericCode(detail) ? detail : undefined;
  return {
    ok: false,
    kind,
    message,
    suggestion: suggestionFor(kind, code),
    ...(detail !== undefined && { detail }),
    retryable: kind === FailureKinds.PROVIDER_UNAVAILABLE,
  };
}

function isGenericCode(value: string | undefined): value is GenericAddressCode {
  return value === 'CONTRADA' || value === 'STRADA_STATALE' || value === 'SNC' || value === 'NO_ROUTE';
}

/**
 * AddressNormalizer
 *
 * Validates a typed address against the geocoding provider and turns the best
 * candidate into a NormalizedAddress. One provider call per distinct address
 * per run: identical requests share a cached promise.
 */
export class AddressNormalizer {
  private readonly cache = new Map<string, Promise<GeocodeCandidate>>();
  private readonly minConfidence: number;
  private readonly timeoutMs: number;

  constructor(private readonly opts: AddressNormalizerOptions) {
    this.minConfidence = opts.minConfidence ?? MIN_GEOCODE_CONFIDENCE;
    this.timeoutMs = opts.timeoutMs ?? GEOCODE_TIMEOUT_MS;
  }

  /** Number of distinct addresses looked up so far */
  get lookups(): number {
    return this.cache.size;
  }

  async normalize(query: AddressQuery): Promise<NormalizationResult> {
    const postalCode = cleanPostalCode(query.postalCode);
    if (!postalCode) {
      return failure(FailureKinds.INVALID_ZIP, `Invalid postal code "${query.postalCode}"`);
    }

    const request: GeocodeRequest = {
      address: query.address.trim(),
      postalCode,
      city: query.city.trim(),
      province: query.province.trim().toUpperCase(),
      country: 'IT',
    };

    let candidate: GeocodeCandidate;
    try {
      candidate = await this.lookup(request);
    } catch (err) {
      return this.providerFailure(err);
    }

    return this.interpret(request, candidate);
  }

  private lookup(request: GeocodeRequest): Promise<GeocodeCandidate> {
    const key = [request.address, request.postalCode, request.city, request.province]
      .map((part) => part.toLowerCase().replace(/\s+/g, ' '))
      .join('|');
    const cached = this.cache.get(key);
    if (cached) return cached;

    const ctx: AdapterContext = { ...this.opts.ctx, operationName: 'geocode', timeoutMs: this.timeoutMs };
    const pending = withTimeout(this.opts.geocoder.geocode(request, ctx), this.timeoutMs, 'geocode');
    this.cache.set(key, pending);
    // A provider outage must not stick to the address for the rest of the run
    void pending.catch(() => this.cache.delete(key));
    return pending;
  }

  private providerFailure(err: unknown): NormalizationFailure {
    if (!(err instanceof GeocodingError) && !(err instanceof TimeoutError)) throw err;

    safeLog(this.opts.ctx?.logger, 'warn', 'Geocoding provider failure', { error: errorToLog(err) }, this.opts.ctx ?? {}, []);
    const status = err instanceof GeocodingError ? err.providerStatus : undefined;
    if (isTransientError(err)) {
      return failure(FailureKinds.PROVIDER_UNAVAILABLE, err.message, status);
    }
    return failure(FailureKinds.PROVIDER_REJECTED, err.message, status);
  }

  private interpret(request: GeocodeRequest, candidate: GeocodeCandidate): NormalizationResult {
    if (candidate.status === 'ZERO_RESULTS' || candidate.resultCount === 0) {
      return failure(FailureKinds.NOT_FOUND, `No results for "${request.address}, ${request.city}"`, 'ZERO_RESULTS');
    }

    const locality = candidate.locality?.trim() || request.city;
    if (normalizeCityName(locality) !== normalizeCityName(request.city)) {
      return failure(
        FailureKinds.LOCALITY_MISMATCH,
        `Municipality differs: expected "${request.city}", found "${locality}"`,
        locality
      );
    }

    const candidatePostalCode = candidate.postalCode ? cleanPostalCode(candidate.postalCode) : null;
    if (candidatePostalCode && !sameMunicipalityArea(candidatePostalCode, request.postalCode)) {
      return failure(
        FailureKinds.LOCALITY_MISMATCH,
        `Postal code ${request.postalCode} does not belong to ${locality} (${candidatePostalCode})`,
        candidatePostalCode
      );
    }

    const generic = genericAddressCode(request.address, candidate);
    if (generic) {
      return failure(FailureKinds.GENERIC_ADDRESS, `Generic address "${request.address}"`, generic);
    }

    if (candidate.ambiguous || candidate.confidence < this.minConfidence) {
      return failure(
        FailureKinds.AMBIGUOUS,
        `Ambiguous match for "${request.address}" (confidence ${candidate.confidence.toFixed(2)})`
      );
    }

    const province = [candidate.province, request.province]
      .map((p) => p?.trim().toUpperCase() ?? '')
      .find((p) => /^[A-Z]{2}$/.test(p));
    if (!province) {
      return failure(FailureKinds.INVALID_PROVINCE, `Invalid province "${request.province}"`);
    }

    const route = candidate.route ?? '';
    const street = candidate.streetNumber ? `${route}, ${candidate.streetNumber}` : route;
    return {
      ok: true,
      value: {
        street,
        locality,
        province,
        postalCode: candidatePostalCode ?? request.postalCode,
        confidence: candidate.confidence,
        ambiguous: candidate.ambiguous,
        ...(candidate.formattedAddress ? { formattedAddress: candidate.formattedAddress } : {}),
      },
    };
  }
}
