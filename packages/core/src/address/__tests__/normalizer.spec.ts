import { describe, it, expect } from 'vitest';
import { AddressNormalizer, cleanPostalCode, normalizeCityName } from '../normalizer.js';
import { FakeGeocoder, rooftopMatch } from '../../testing/index.js';
import { GeocodingError } from '../../errors/index.js';
import type { AddressQuery } from '../../types/index.js';
import type { GeocodeCandidate } from '../../interfaces/index.js';

const query = (overrides: Partial<AddressQuery> = {}): AddressQuery => ({
  address: 'via roma 12',
  city: 'Milano',
  postalCode: '20121',
  province: 'mi',
  ...overrides,
});

function setup(geocoder = new FakeGeocoder(), timeoutMs = 1000) {
  return { geocoder, normalizer: new AddressNormalizer({ geocoder, timeoutMs }) };
}

describe('cleanPostalCode', () => {
  it('removes spreadsheet artefacts', () => {
    expect(cleanPostalCode('20121.0')).toBe('20121');
    expect(cleanPostalCode('187')).toBe('00187');
    expect(cleanPostalCode(' 0187 ')).toBe('00187');
  });

  it('rejects anything that is not 5 digits', () => {
    expect(cleanPostalCode('2012A')).toBeNull();
    expect(cleanPostalCode('201210')).toBeNull();
    expect(cleanPostalCode('')).toBeNull();
  });
});

describe('normalizeCityName', () => {
  it('ignores case, accents and municipality prefixes', () => {
    expect(normalizeCityName('Comune di Cantù')).toBe('cantu');
    expect(normalizeCityName("  CITTA' DI  Castello ")).toBe('castello');
  });
});

const GENERIC_CASES: Array<[string, Partial<GeocodeCandidate>, string, string]> = [
  ['Contrada Pianelle', { route: undefined, streetNumber: undefined, precision: 'APPROXIMATE' }, 'CONTRADA', 'Verificare indirizzo catastale'],
  ['Strada Statale 36 km 12', { route: 'Strada Statale 36', streetNumber: undefined }, 'STRADA_STATALE', 'Cercare via del centro commerciale o riferimento più specifico'],
  ['Via Verdi snc', { route: 'Via Verdi', streetNumber: undefined }, 'SNC', 'Aggiungere numero civico se possibile'],
  ['centro storico', { route: undefined, streetNumber: undefined, precision: 'GEOMETRIC_CENTER' }, 'NO_ROUTE', 'Indirizzo generico, manca via/civico'],
];

describe('AddressNormalizer', () => {
  it('returns the canonical address of a rooftop match', async () => {
    const { normalizer } = setup();
    const result = await normalizer.normalize(query());

    expect(result).toEqual({
      ok: true,
      value: {
        street: 'Via Roma, 12',
        locality: 'Milano',
        province: 'MI',
        postalCode: '20121',
        confidence: 1,
        ambiguous: false,
      },
    });
  });

  it('fails INVALID_ZIP without calling the provider', async () => {
    const { geocoder, normalizer } = setup();
    const result = await normalizer.normalize(query({ postalCode: '2012A' }));

    expect(result).toEqual({
      ok: false,
      kind: 'INVALID_ZIP',
      message: 'Invalid postal code "2012A"',
      suggestion: 'Correggere il CAP: servono 5 cifre',
      retryable: false,
    });
    expect(geocoder.calls).toHaveLength(0);
  });

  it('sends the cleaned postal code', async () => {
    const { geocoder, normalizer } = setup();
    const result = await normalizer.normalize(query({ city: 'Roma', postalCode: '187.0', province: 'RM' }));

    expect(geocoder.calls[0]).toMatchObject({ postalCode: '00187', province: 'RM', country: 'IT' });
    expect(result.ok && result.value.postalCode).toBe('00187');
  });

  it('maps zero results to NOT_FOUND', async () => {
    const geocoder = new FakeGeocoder().answer('via inesistente 1', {
      status: 'ZERO_RESULTS',
      confidence: 0,
      ambiguous: false,
      resultCount: 0,
    });
    const { normalizer } = setup(geocoder);
    const result = await normalizer.normalize(query({ address: 'via inesistente 1' }));

    expect(result).toMatchObject({
      ok: false,
      kind: 'NOT_FOUND',
      detail: 'ZERO_RESULTS',
      suggestion: 'Verifica ortografia indirizzo',
      retryable: false,
    });
  });

  it('fails LOCALITY_MISMATCH when the municipality differs', async () => {
    const geocoder = new FakeGeocoder().answer('via roma 12', (req) => rooftopMatch(req, { locality: 'Sesto San Giovanni' }));
    const { normalizer } = setup(geocoder);
    const result = await normalizer.normalize(query());

    expect(result).toMatchObject({
      ok: false,
      kind: 'LOCALITY_MISMATCH',
      message: 'Municipality differs: expected "Milano", found "Sesto San Giovanni"',
      detail: 'Sesto San Giovanni',
      suggestion: 'Verificare comune corretto',
    });
  });

  it('accepts the same municipality written differently', async () => {
    const geocoder = new FakeGeocoder().answer('via roma 12', (req) => rooftopMatch(req, { locality: 'Cantù', postalCode: '22063' }));
    const { normalizer } = setup(geocoder);
    const result = await normalizer.normalize(query({ city: 'Comune di Cantu', postalCode: '22063', province: 'CO' }));

    expect(result.ok && result.value.locality).toBe('Cantù');
  });

  it('fails LOCALITY_MISMATCH when the postal code belongs elsewhere', async () => {
    const geocoder = new FakeGeocoder().answer('via roma 12', (req) => rooftopMatch(req, { postalCode: '10121' }));
    const { normalizer } = setup(geocoder);
    const result = await normalizer.normalize(query());

    expect(result).toMatchObject({ ok: false, kind: 'LOCALITY_MISMATCH', detail: '10121' });
  });

  it('takes the provider postal code within the same municipality', async () => {
    const geocoder = new FakeGeocoder().answer('via roma 12', (req) => rooftopMatch(req, { postalCode: '20122' }));
    const { normalizer } = setup(geocoder);
    const result = await normalizer.normalize(query());

    expect(result.ok && result.value.postalCode).toBe('20122');
  });

  it.each(GENERIC_CASES)('flags "%s" as a generic address', async (address, overrides, detail, suggestion) => {
    const geocoder = new FakeGeocoder().answer(address, (req) => rooftopMatch(req, overrides));
    const { normalizer } = setup(geocoder);
    const result = await normalizer.normalize(query({ address }));

    expect(result).toMatchObject({ ok: false, kind: 'GENERIC_ADDRESS', detail, suggestion, retryable: false });
  });

  it('fails AMBIGUOUS below the confidence threshold or on partial matches', async () => {
    const geocoder = new FakeGeocoder()
      .answer('via roma 12', (req) => rooftopMatch(req, { confidence: 0.3, precision: 'APPROXIMATE' }))
      .answer('via roma 14', (req) => rooftopMatch(req, { ambiguous: true, confidence: 0.9 }));
    const { normalizer } = setup(geocoder);

    expect(await normalizer.normalize(query())).toMatchObject({
      ok: false,
      kind: 'AMBIGUOUS',
      message: 'Ambiguous match for "via roma 12" (confidence 0.30)',
    });
    expect(await normalizer.normalize(query({ address: 'via roma 14' }))).toMatchObject({ ok: false, kind: 'AMBIGUOUS' });
  });

  it('fails INVALID_PROVINCE without a two-letter province', async () => {
    const geocoder = new FakeGeocoder().answer('via roma 12', (req) => rooftopMatch(req, { province: undefined }));
    const { normalizer } = setup(geocoder);
    const result = await normalizer.normalize(query({ province: 'Milano' }));

    expect(result).toMatchObject({ ok: false, kind: 'INVALID_PROVINCE' });
  });

  it('prefers the provider province over the typed one', async () => {
    const geocoder = new FakeGeocoder().answer('via roma 12', (req) => rooftopMatch(req, { province: 'MI' }));
    const { normalizer } = setup(geocoder);
    const result = await normalizer.normalize(query({ province: 'Milano' }));

    expect(result.ok && result.value.province).toBe('MI');
  });

  it('maps rate limits to a retryable PROVIDER_UNAVAILABLE', async () => {
    const geocoder = new FakeGeocoder().answer(
      'via roma 12',
      new GeocodingError('Query limit exceeded', 'RateLimit', { providerStatus: 'OVER_QUERY_LIMIT' })
    );
    const { normalizer } = setup(geocoder);

    expect(await normalizer.normalize(query())).toEqual({
      ok: false,
      kind: 'PROVIDER_UNAVAILABLE',
      message: 'Query limit exceeded',
      suggestion: 'Servizio di geocodifica non disponibile, riprovare più tardi',
      detail: 'OVER_QUERY_LIMIT',
      retryable: true,
    });
  });

  it('maps denied requests to PROVIDER_REJECTED', async () => {
    const geocoder = new FakeGeocoder().answer(
      'via roma 12',
      new GeocodingError('Request denied', 'Auth', { providerStatus: 'REQUEST_DENIED' })
    );
    const { normalizer } = setup(geocoder);

    expect(await normalizer.normalize(query())).toMatchObject({
      ok: false,
      kind: 'PROVIDER_REJECTED',
      detail: 'REQUEST_DENIED',
      retryable: false,
    });
  });

  it('treats a provider timeout as unavailable', async () => {
    const geocoder = new FakeGeocoder().answer('via roma 12', () => new Promise<GeocodeCandidate>(() => {}));
    const { normalizer } = setup(geocoder, 5);

    expect(await normalizer.normalize(query())).toMatchObject({
      ok: false,
      kind: 'PROVIDER_UNAVAILABLE',
      message: 'geocode timed out after 5ms',
      retryable: true,
    });
  });

  it('propagates unexpected errors', async () => {
    const geocoder = new FakeGeocoder().answer('via roma 12', new Error('boom'));
    const { normalizer } = setup(geocoder);

    await expect(normalizer.normalize(query())).rejects.toThrow('boom');
  });

  it('calls the provider once per distinct address', async () => {
    const { geocoder, normalizer } = setup();
    await Promise.all([
      normalizer.normalize(query()),
      normalizer.normalize(query({ address: '  Via  Roma 12' })),
      normalizer.normalize(query({ address: 'via roma 14' })),
    ]);

    expect(geocoder.calls).toHaveLength(2);
    expect(normalizer.lookups).toBe(2);
  });

  it('does not cache provider failures', async () => {
    let calls = 0;
    const geocoder = new FakeGeocoder().answer('via roma 12', (req) => {
      calls++;
      if (calls === 1) throw new GeocodingError('Unavailable', 'Transient');
      return rooftopMatch(req);
    });
    const { normalizer } = setup(geocoder);

    expect((await normalizer.normalize(query())).ok).toBe(false);
    expect((await normalizer.normalize(query())).ok).toBe(true);
    expect(calls).toBe(2);
  });
});
