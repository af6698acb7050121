import type { GeocodeCandidate, LocationPrecision } from '@spedisci/core';
import type { GoogleAddressComponent, GoogleGeocodeResponse } from '../validation/index.js';

/**
 * Confidence of a single unambiguous result, by geometry precision
 */
export const PRECISION_CONFIDENCE: Record<LocationPrecision, number> = {
  ROOFTOP: 1,
  RANGE_INTERPOLATED: 0.8,
  GEOMETRIC_CENTER: 0.6,
  APPROXIMATE: 0.3,
};

/** Applied when the provider matched only part of the query */
export const PARTIAL_MATCH_FACTOR = 0.75;

function component(
  components: GoogleAddressComponent[],
  type: string,
  form: 'long_name' | 'short_name' = 'long_name',
): string | undefined {
  return components.find((c) => c.types.includes(type))?.[form];
}

/**
 * Best candidate of an OK or ZERO_RESULTS answer.
 * The first result is the provider's best match; further results only make it ambiguous.
 */
export function mapGeocodeResponse(response: GoogleGeocodeResponse): GeocodeCandidate {
  const [best] = response.results;
  if (!best) {
    return { status: 'ZERO_RESULTS', confidence: 0, ambiguous: false, resultCount: 0 };
  }

  const components = best.address_components;
  const precision = best.geometry?.location_type ?? 'APPROXIMATE';
  const partial = best.partial_match === true;
  const confidence = Math.round(PRECISION_CONFIDENCE[precision] * (partial ? PARTIAL_MATCH_FACTOR : 1) * 100) / 100;

  const route = component(components, 'route');
  const streetNumber = component(components, 'street_number');
  const locality =
    component(components, 'locality')
    ?? component(components, 'administrative_area_level_3')
    ?? component(components, 'postal_town');
  const province = component(components, 'administrative_area_level_2', 'short_name');
  const postalCode = component(components, 'postal_code');

  return {
    status: 'OK',
    ...(route !== undefined && { route }),
    ...(streetNumber !== undefined && { streetNumber }),
    ...(locality !== undefined && { locality }),
    ...(province !== undefined && { province }),
    ...(postalCode !== undefined && { postalCode }),
    precision,
    confidence,
    ambiguous: partial || response.results.length > 1,
    resultCount: response.results.length,
    ...(best.formatted_address !== undefined && { formattedAddress: best.formatted_address }),
  };
}
