/**
 * Pipeline tunables. Every value can be overridden per run through options.
 */

/** Carrier field maxima (GLS Italy label service) */
export const MAX_RECIPIENT_LENGTH = 35;
export const MAX_STREET_LENGTH = 35;
export const MAX_LOCALITY_LENGTH = 30;
export const MAX_NOTES_LENGTH = 40;

/** Largest batch the label service accepts in one AddParcel call */
export const MAX_BATCH_SIZE = 400;

export const RETRY_MAX_ATTEMPTS = 3;
export const RETRY_BASE_DELAY_MS = 2_000;
export const RETRY_JITTER_MS = 500;

export const GEOCODE_TIMEOUT_MS = 10_000;
export const CARRIER_TIMEOUT_MS = 60_000;
export const GEOCODE_CONCURRENCY = 4;

/**
 * Candidates scored below this are treated as ambiguous.
 * A range-interpolated match (0.8) passes, a bare locality centroid (0.3) does not.
 */
export const MIN_GEOCODE_CONFIDENCE = 0.5;

/** Only some contracts make the contact number mandatory */
export const PHONE_REQUIRED = false;

export const NOTES_SEPARATOR = '-';
