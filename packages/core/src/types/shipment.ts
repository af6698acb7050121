/**
 * Carrier contract codes.
 * These values are fixed by the label service field catalog.
 */
export const PortTypes = {
  /** Carriage paid by sender */
  FRANCO: "F",
  /** Carriage paid by recipient */
  ASSEGNATO: "A",
} as const;

export type PortType = (typeof PortTypes)[keyof typeof PortTypes];

export const PackageTypes = {
  STANDARD: "0",
} as const;

export type PackageType = (typeof PackageTypes)[keyof typeof PackageTypes];

export const ShipmentTypes = {
  NATIONAL: "N",
} as const;

export type ShipmentType = (typeof ShipmentTypes)[keyof typeof ShipmentTypes];

export const CashOnDeliveryTypes = {
  CASH: "CONT",
  BANK_DRAFT: "AC",
  CHEQUE: "AS",
} as const;

export type CashOnDeliveryType = (typeof CashOnDeliveryTypes)[keyof typeof CashOnDeliveryTypes];

export const PdfFormats = {
  A6: "A6",
  A5: "A5",
} as const;

export type PdfFormat = (typeof PdfFormats)[keyof typeof PdfFormats];

/**
 * ShipmentRecord
 * Carrier-bound record; every string already fits its field maximum.
 */
export interface ShipmentRecord {
  recipientName: string;
  address: string;
  locality: string;
  province: string;
  postalCode: string;
  packageCount: number;
  weightKg: number;
  portType: PortType;
  packageType: PackageType;
  shipmentType: ShipmentType;
  notes: string;
  phone?: string;
  email?: string;

  /** Customer reference ("Bda") */
  reference: string;

  pdfFormat: PdfFormat;

  cashOnDelivery?: {
    type: CashOnDeliveryType;
    amount: number;
  };
}

/**
 * A record ready for upload together with its deduplication key.
 * The fingerprint never leaves the process.
 */
export interface PreparedShipment {
  fingerprint: string;
  sourceId: string;
  ordinal: string;
  record: ShipmentRecord;
}
