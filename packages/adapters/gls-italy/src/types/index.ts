/**
 * GLS Italy label service types
 * Element names follow the web service field catalog.
 */

export interface GLSCredentials {
  /** Two-letter GLS branch ("sede") */
  site: string;
  customerCode: string;
  password: string;
  contractCode: string;
}

/**
 * One <Parcel> element of AddParcel's XMLInfoParcel
 */
export interface GLSParcel {
  CodiceContrattoGls: string;
  RagioneSociale: string;
  Indirizzo: string;
  Localita: string;
  Zipcode: string;
  Provincia: string;
  Bda: string;
  Colli: string;
  PesoReale: string;
  TipoPorto: string;
  TipoCollo: string;
  TipoSpedizione: string;
  FormatoPdf: string;
  Note?: string;
  Cellulare?: string;
  Email?: string;
  ModalitaIncasso?: string;
  ImportoContrassegno?: string;
}

/**
 * One <Parcel> of the AddParcel answer, aliases already folded
 */
export interface GLSParcelResult {
  bda?: string;
  numeroSpedizione?: string;
  esito?: string;
  errore?: string;
  pdf?: string;
}

/**
 * One shipment listed by ListSped
 */
export interface GLSListedShipment {
  bda?: string;
  numeroSpedizione?: string;
  stato?: string;
  /** Every element of the entry, as sent */
  fields: Record<string, string>;
}

/**
 * Adapter configuration shared by every capability
 */
export interface GLSItalyConfig {
  credentials: GLSCredentials;
  resolveBaseUrl: (opts?: { useTestApi?: boolean }) => string;
}
