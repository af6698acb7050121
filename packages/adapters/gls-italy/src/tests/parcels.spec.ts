import { describe, it, expect, vi } from 'vitest';
import type { AdapterContext, Logger } from '@spedisci/core';
import { CarrierError, HttpError } from '@spedisci/core';
import { GlsItalyAdapter, GLS_ITALY_ENDPOINT } from '../index.js';
import { asmx, credentials, MockHttpClient, record } from './mock-http.js';

function okAnswer(form: URLSearchParams): string {
  const xml = form.get('XMLInfoParcel') ?? '';
  const references = [...xml.matchAll(/<Bda>([^<]+)<\/Bda>/g)].map((m) => m[1]);
  const parcels = references
    .map((ref, i) => `<Parcel><Bda>${ref}</Bda><NumeroSpedizione>MI${i + 1}</NumeroSpedizione><Esito>OK</Esito></Parcel>`)
    .join('');
  return asmx(`<InfoLabel>${parcels}</InfoLabel>`);
}

function logger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('GlsItalyAdapter submitShipments', () => {
  const adapter = new GlsItalyAdapter(credentials);

  it('declares its capabilities and batch limit', () => {
    expect(adapter.id).toBe('it-gls');
    expect(adapter.maxBatchSize).toBe(400);
    expect(adapter.capabilities).toEqual(['SUBMIT_SHIPMENTS', 'CONFIRM_OPEN_SHIPMENTS', 'QUERY_STATUS', 'GENERATE_PDF']);
  });

  it('posts one AddParcel form and maps every answer', async () => {
    const http = new MockHttpClient(({ form }) => okAnswer(form));
    const ctx: AdapterContext = { http, timeoutMs: 5000 };

    const response = await adapter.submitShipments({ shipments: [record('R1'), record('R2')] }, ctx);

    expect(http.calls).toHaveLength(1);
    expect(http.calls[0]?.url).toBe(`${GLS_ITALY_ENDPOINT}/AddParcel`);
    expect(http.calls[0]?.config).toMatchObject({ responseType: 'text', timeout: 5000 });
    expect(response.summary).toBe('All 2 shipments created successfully');
    expect(response.results.map((r) => [r.reference, r.shipmentNumber])).toEqual([
      ['R1', 'MI1'],
      ['R2', 'MI2'],
    ]);
  });

  it('keeps invalid records out of the request', async () => {
    const http = new MockHttpClient(({ form }) => okAnswer(form));

    const response = await adapter.submitShipments(
      { shipments: [record('R1'), record('R2', { province: 'Milano' })] },
      { http },
    );

    const sent = http.calls[0]?.form.get('XMLInfoParcel') ?? '';
    expect(sent).toContain('<Bda>R1</Bda>');
    expect(sent).not.toContain('<Bda>R2</Bda>');
    expect(response.results).toEqual([
      {
        reference: 'R2',
        status: 'failed',
        errorMessage: 'Invalid fields: Provincia: Provincia must be 2 uppercase letters',
        errorCode: 'INVALID_FIELD',
      },
      {
        reference: 'R1',
        status: 'created',
        shipmentNumber: 'MI1',
        raw: { bda: 'R1', numerospedizione: 'MI1', esito: 'OK' },
      },
    ]);
  });

  it('makes no call when every record is invalid', async () => {
    const http = new MockHttpClient(() => '');
    const response = await adapter.submitShipments({ shipments: [record('R1', { postalCode: 'ABCDE' })] }, { http });
    expect(http.calls).toHaveLength(0);
    expect(response.allFailed).toBe(true);
  });

  it('requests PDF labels when asked', async () => {
    const http = new MockHttpClient(() =>
      asmx('<InfoLabel><Parcel><Bda>R1</Bda><NumeroSpedizione>MI9</NumeroSpedizione><Esito>OK</Esito><PdfLabel>JVBERi0=</PdfLabel></Parcel></InfoLabel>'),
    );

    const response = await adapter.submitShipments({ shipments: [record('R1')], options: { generatePdf: true } }, { http });

    expect(http.calls[0]?.form.get('XMLInfoParcel')).toContain('<GeneraPdf>1</GeneraPdf>');
    expect(response.results[0]?.label).toBe('JVBERi0=');
  });

  it('turns a refusal in place of the parcel list into an auth error', async () => {
    const http = new MockHttpClient(() => 'Password errata');
    const log = logger();

    const error = await adapter.submitShipments({ shipments: [record('R1')] }, { http, logger: log }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CarrierError);
    expect(error).toMatchObject({ category: 'Auth', message: 'GLS Italy rejected the credentials: Password errata' });
    expect(log.error).toHaveBeenCalledTimes(1);
  });

  it('classifies transport failures', async () => {
    const unavailable = new MockHttpClient(() => {
      throw new HttpError('Request failed with status code 503', {
        status: 503,
        response: { status: 503, statusText: 'Service Unavailable', data: '' },
      });
    });
    await expect(adapter.submitShipments({ shipments: [record('R1')] }, { http: unavailable })).rejects.toMatchObject({
      category: 'Transient',
      carrierCode: 'HTTP_503',
    });

    const throttled = new MockHttpClient(() => {
      throw new HttpError('Request failed with status code 429', {
        status: 429,
        response: { status: 429, statusText: 'Too Many Requests', data: '', headers: { 'retry-after': '7' } },
      });
    });
    await expect(adapter.submitShipments({ shipments: [record('R1')] }, { http: throttled })).rejects.toMatchObject({
      category: 'RateLimit',
      retryAfterMs: 7000,
    });
  });

  it('rejects batches above the service limit', async () => {
    const http = new MockHttpClient(() => '');
    const shipments = Array.from({ length: 401 }, (_, i) => record(`R${i}`));
    await expect(adapter.submitShipments({ shipments }, { http })).rejects.toMatchObject({ category: 'Validation' });
    expect(http.calls).toHaveLength(0);
  });

  it('requires an HTTP client', async () => {
    await expect(adapter.submitShipments({ shipments: [record('R1')] }, {})).rejects.toThrow(
      'HTTP client not provided in context',
    );
  });

  it('routes test calls to the configured test endpoint only', async () => {
    const http = new MockHttpClient(({ form }) => okAnswer(form));
    await expect(
      adapter.submitShipments({ shipments: [record('R1')], options: { useTestApi: true } }, { http }),
    ).rejects.toThrow('No test endpoint configured for GLS Italy');

    const testable = new GlsItalyAdapter(credentials, { testBaseUrl: 'https://gls.test/ilswebservice.asmx' });
    await testable.submitShipments({ shipments: [record('R1')], options: { useTestApi: true } }, { http });
    expect(http.calls.at(-1)?.url).toBe('https://gls.test/ilswebservice.asmx/AddParcel');
    expect(testable.capabilities).toContain('TEST_MODE_SUPPORTED');
  });

  it('refuses malformed credentials', () => {
    expect(() => new GlsItalyAdapter({ ...credentials, site: 'milano' })).toThrow(
      'Invalid GLS Italy credentials: site: Site must be a two-letter GLS branch code',
    );
  });
});
