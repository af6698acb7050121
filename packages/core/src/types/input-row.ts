/**
 * InputRow
 * One shipment row as read from a source sheet. Immutable once read.
 */
export interface InputRow {
  /** Progressive number of the row in the source ("progressivo") */
  readonly ordinal: string;

  /** Recipient company name ("ragione sociale") */
  readonly companyName: string;

  /** Street address as typed by the operator */
  readonly address: string;

  readonly city: string;

  /** Postal code as read; may still carry spreadsheet artefacts such as "20121.0" */
  readonly postalCode: string;

  readonly province: string;

  readonly mobilePhone?: string;

  readonly landlinePhone?: string;

  readonly email?: string;

  /** Delivery instructions ("presso CC", "note x consegne") */
  readonly instructions?: string;

  /** Customer reference carried by the source, used as Bda when present */
  readonly reference?: string;

  /** Manually supplied package count (AGENCY sources) */
  readonly packageCount?: number;

  /** Manually supplied weight in kg (AGENCY sources) */
  readonly weightKg?: number;

  /** Columns with no dedicated field, keyed by header */
  readonly extra?: Readonly<Record<string, string>>;
}
