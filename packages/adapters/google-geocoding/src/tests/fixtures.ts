import type { GoogleGeocodeResult } from '../validation/index.js';

export function viaRoma(overrides: Partial<GoogleGeocodeResult> = {}): GoogleGeocodeResult {
  return {
    address_components: [
      { long_name: '12', short_name: '12', types: ['street_number'] },
      { long_name: 'Via Roma', short_name: 'Via Roma', types: ['route'] },
      { long_name: 'Milano', short_name: 'Milano', types: ['locality', 'political'] },
      { long_name: 'Città Metropolitana di Milano', short_name: 'MI', types: ['administrative_area_level_2', 'political'] },
      { long_name: 'Lombardia', short_name: 'Lombardia', types: ['administrative_area_level_1', 'political'] },
      { long_name: 'Italia', short_name: 'IT', types: ['country', 'political'] },
      { long_name: '20121', short_name: '20121', types: ['postal_code'] },
    ],
    formatted_address: 'Via Roma, 12, 20121 Milano MI, Italia',
    geometry: { location_type: 'ROOFTOP' },
    types: ['street_address'],
    ...overrides,
  };
}
