import type { GenericAddressCode, NormalizationFailureKind } from '../types/failures.js';

/**
 * Operator hints shown next to a failed row, in the language of the sheets.
 */
const KIND_SUGGESTIONS: Record<NormalizationFailureKind, string> = {
  INVALID_ZIP: 'Correggere il CAP: servono 5 cifre',
  LOCALITY_MISMATCH: 'Verificare comune corretto',
  NOT_FOUND: 'Verifica ortografia indirizzo',
  AMBIGUOUS: 'Indirizzo ambiguo, specificare via e civico',
  GENERIC_ADDRESS: 'Indirizzo generico, manca via/civico',
  INVALID_PROVINCE: 'Indicare la sigla della provincia (2 lettere)',
  PROVIDER_UNAVAILABLE: 'Servizio di geocodifica non disponibile, riprovare più tardi',
  PROVIDER_REJECTED: 'API key non valida o servizio non abilitato',
};

const GENERIC_SUGGESTIONS: Record<GenericAddressCode, string> = {
  CONTRADA: 'Verificare indirizzo catastale',
  STRADA_STATALE: 'Cercare via del centro commerciale o riferimento più specifico',
  SNC: 'Aggiungere numero civico se possibile',
  NO_ROUTE: 'Indirizzo generico, manca via/civico',
};

export function suggestionFor(kind: NormalizationFailureKind, detail?: GenericAddressCode): string {
  if (kind === 'GENERIC_ADDRESS' && detail) return GENERIC_SUGGESTIONS[detail];
  return KIND_SUGGESTIONS[kind];
}
