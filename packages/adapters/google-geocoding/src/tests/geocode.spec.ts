import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import nock from 'nock';
import { createAxiosHttpClient, GeocodingError } from '@spedisci/core';
import { GoogleGeocodingAdapter, formatQuery } from '../index.js';
import { viaRoma } from './fixtures.js';

const REQUEST = { address: 'Via Roma 12', postalCode: '20121', city: 'Milano', province: 'MI' };
const QUERY = {
  address: 'Via Roma 12, 20121 Milano MI',
  components: 'country:IT',
  language: 'it',
  region: 'it',
  key: 'test-key',
};

describe('GoogleGeocodingAdapter', () => {
  const adapter = new GoogleGeocodingAdapter({ apiKey: 'test-key' });
  const http = createAxiosHttpClient();

  beforeAll(() => nock.disableNetConnect());
  afterEach(() => nock.cleanAll());
  afterAll(() => nock.enableNetConnect());

  it('formats the one-line query', () => {
    expect(formatQuery(REQUEST)).toBe('Via Roma 12, 20121 Milano MI');
    expect(formatQuery({ ...REQUEST, province: ' ' })).toBe('Via Roma 12, 20121 Milano');
  });

  it('returns the scored candidate', async () => {
    nock('https://maps.googleapis.com')
      .get('/maps/api/geocode/json')
      .query(QUERY)
      .reply(200, { status: 'OK', results: [viaRoma()] });

    const candidate = await adapter.geocode(REQUEST, { http });

    expect(candidate).toMatchObject({ status: 'OK', route: 'Via Roma', streetNumber: '12', province: 'MI', confidence: 1 });
  });

  it('returns ZERO_RESULTS as a candidate', async () => {
    nock('https://maps.googleapis.com').get('/maps/api/geocode/json').query(true).reply(200, { status: 'ZERO_RESULTS', results: [] });

    const candidate = await adapter.geocode(REQUEST, { http });

    expect(candidate.status).toBe('ZERO_RESULTS');
    expect(candidate.resultCount).toBe(0);
  });

  it.each([
    ['OVER_QUERY_LIMIT', 'RateLimit'],
    ['REQUEST_DENIED', 'Auth'],
    ['INVALID_REQUEST', 'Validation'],
    ['UNKNOWN_ERROR', 'Transient'],
  ])('maps %s to %s', async (status, category) => {
    nock('https://maps.googleapis.com').get('/maps/api/geocode/json').query(true).reply(200, { status, results: [] });

    const error = await adapter.geocode(REQUEST, { http }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GeocodingError);
    expect(error).toMatchObject({ category, providerStatus: status });
  });

  it('treats server errors as transient', async () => {
    nock('https://maps.googleapis.com').get('/maps/api/geocode/json').query(true).reply(503, 'unavailable');

    await expect(adapter.geocode(REQUEST, { http })).rejects.toMatchObject({
      category: 'Transient',
      providerStatus: 'HTTP_503',
    });
  });

  it('rejects a malformed answer', async () => {
    nock('https://maps.googleapis.com').get('/maps/api/geocode/json').query(true).reply(200, { results: 'nope' });

    await expect(adapter.geocode(REQUEST, { http })).rejects.toMatchObject({
      category: 'Permanent',
      message: 'Unexpected Google geocoding response',
    });
  });

  it('requires an HTTP client and an API key', async () => {
    await expect(adapter.geocode(REQUEST, {})).rejects.toThrow('HTTP client not provided in context');
    expect(() => new GoogleGeocodingAdapter({ apiKey: '' })).toThrow('Invalid Google geocoding options: apiKey is required');
  });
});
