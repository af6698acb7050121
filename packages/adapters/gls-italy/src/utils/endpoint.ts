import { CarrierError } from '@spedisci/core';

export const GLS_ITALY_ENDPOINT = 'https://labelservice.gls-italy.com/ilswebservice.asmx';

/** Parcels accepted by one AddParcel call */
export const GLS_MAX_PARCELS_PER_CALL = 400;

/**
 * Resolver bound to the production and (optional) test endpoints.
 * Asking for the test endpoint when none is configured is a caller error.
 */
export function createResolveBaseUrl(prodBaseUrl: string, testBaseUrl?: string) {
  return (opts?: { useTestApi?: boolean }): string => {
    if (!opts?.useTestApi) return prodBaseUrl;
    if (!testBaseUrl) {
      throw new CarrierError('No test endpoint configured for GLS Italy', 'Validation');
    }
    return testBaseUrl;
  };
}

export type ResolveBaseUrl = ReturnType<typeof createResolveBaseUrl>;
