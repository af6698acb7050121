import { describe, it, expect } from 'vitest';
import { GlsItalyAdapter, GLS_ITALY_ENDPOINT } from '../index.js';
import { asmx, credentials, MockHttpClient } from './mock-http.js';

describe('GlsItalyAdapter confirmOpenShipments', () => {
  const adapter = new GlsItalyAdapter(credentials);

  it('closes the work day of the configured site', async () => {
    const http = new MockHttpClient(() => asmx('<CloseWorkDayResult><Esito>OK</Esito></CloseWorkDayResult>'));

    const response = await adapter.confirmOpenShipments({}, { http });

    expect(http.calls[0]?.url).toBe(`${GLS_ITALY_ENDPOINT}/CloseWorkDay`);
    expect(http.calls[0]?.form.get('_xmlRequest')).toContain('<SedeGls>MI</SedeGls>');
    expect(response.confirmed).toBe(true);
    expect(response.message).toBe('OK');
  });

  it('uses the requested site', async () => {
    const http = new MockHttpClient(() => asmx('<CloseWorkDayResult><Esito>OK</Esito></CloseWorkDayResult>'));
    await adapter.confirmOpenShipments({ site: 'RM' }, { http });
    expect(http.calls[0]?.form.get('_xmlRequest')).toContain('<SedeGls>RM</SedeGls>');
  });

  it('reports a refusal without throwing', async () => {
    const http = new MockHttpClient(() =>
      asmx('<CloseWorkDayResult><Esito>KO</Esito><Errore>Nessuna spedizione da chiudere</Errore></CloseWorkDayResult>'),
    );
    const response = await adapter.confirmOpenShipments({}, { http });
    expect(response.confirmed).toBe(false);
    expect(response.message).toBe('Nessuna spedizione da chiudere');
  });
});
