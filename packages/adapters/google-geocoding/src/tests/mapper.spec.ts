import { describe, it, expect } from 'vitest';
import { mapGeocodeResponse } from '../mappers/candidate.js';
import { viaRoma } from './fixtures.js';

describe('mapGeocodeResponse', () => {
  it('maps the components of the best result', () => {
    expect(mapGeocodeResponse({ status: 'OK', results: [viaRoma()] })).toEqual({
      status: 'OK',
      route: 'Via Roma',
      streetNumber: '12',
      locality: 'Milano',
      province: 'MI',
      postalCode: '20121',
      precision: 'ROOFTOP',
      confidence: 1,
      ambiguous: false,
      resultCount: 1,
      formattedAddress: 'Via Roma, 12, 20121 Milano MI, Italia',
    });
  });

  it.each([
    ['RANGE_INTERPOLATED', 0.8],
    ['GEOMETRIC_CENTER', 0.6],
    ['APPROXIMATE', 0.3],
  ] as const)('scores %s at %s', (locationType, confidence) => {
    const candidate = mapGeocodeResponse({ status: 'OK', results: [viaRoma({ geometry: { location_type: locationType } })] });
    expect(candidate.confidence).toBe(confidence);
  });

  it('lowers confidence and flags a partial match', () => {
    const candidate = mapGeocodeResponse({
      status: 'OK',
      results: [viaRoma({ partial_match: true, geometry: { location_type: 'RANGE_INTERPOLATED' } })],
    });
    expect(candidate.confidence).toBe(0.6);
    expect(candidate.ambiguous).toBe(true);
  });

  it('flags competing results', () => {
    const candidate = mapGeocodeResponse({ status: 'OK', results: [viaRoma(), viaRoma()] });
    expect(candidate.ambiguous).toBe(true);
    expect(candidate.resultCount).toBe(2);
  });

  it('falls back to the municipality when there is no locality', () => {
    const components = viaRoma().address_components.map((c) =>
      c.types.includes('locality') ? { ...c, types: ['administrative_area_level_3', 'political'] } : c,
    );
    const candidate = mapGeocodeResponse({ status: 'OK', results: [viaRoma({ address_components: components })] });
    expect(candidate.locality).toBe('Milano');
  });

  it('answers ZERO_RESULTS with no candidate data', () => {
    expect(mapGeocodeResponse({ status: 'ZERO_RESULTS', results: [] })).toEqual({
      status: 'ZERO_RESULTS',
      confidence: 0,
      ambiguous: false,
      resultCount: 0,
    });
  });
});
