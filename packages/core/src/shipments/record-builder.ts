import { abbreviate, fitToLength } from '../address/abbreviator.js';
import { layoutDefaults } from '../layout/detect-layout.js';
import { MAX_NOTES_LENGTH, MAX_RECIPIENT_LENGTH, NOTES_SEPARATOR, PHONE_REQUIRED } from '../constants.js';
import type { AbbreviatedAddress } from '../types/address.js';
import { FailureKinds, type BuildFailure, type StepResult } from '../types/failures.js';
import type { InputRow } from '../types/input-row.js';
import type { LayoutKind } from '../types/layout.js';
import {
  PackageTypes,
  PdfFormats,
  PortTypes,
  ShipmentTypes,
  type CashOnDeliveryType,
  type PdfFormat,
  type PortType,
  type ShipmentRecord,
} from '../types/shipment.js';
import { ReferenceGenerator } from './reference.js';

export type BuildResult = StepResult<ShipmentRecord, BuildFailure>;

export interface RecordBuilderOptions {
  /** Fail rows without any phone number with NO_PHONE */
  requirePhone?: boolean;

  /** Shared by every row of a run */
  references?: ReferenceGenerator;

  portType?: PortType;
  pdfFormat?: PdfFormat;

  /** Cash on delivery applied to every record */
  cashOnDelivery?: { type: CashOnDeliveryType; amount: number };
}

/**
 * Strip separators and the Italian country prefix: "+39 333 123 4567" → "3331234567"
 */
export function normalizePhone(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const digits = raw.replace(/[\s./()-]/g, '').replace(/^(?:\+39|0039)/, '');
  return digits || undefined;
}

/**
 * Notes field: ordinal, phone and instructions joined by "-", empty parts
 * omitted, fitted to the field maximum.
 */
export function buildNotes(
  ordinal: string,
  phone: string | undefined,
  instructions: string | undefined,
  maxLength: number = MAX_NOTES_LENGTH
): string {
  const parts = [ordinal, phone, instructions?.replace(/\s+/g, ' ')]
    .map((p) => p?.trim() ?? '')
    .filter((p) => p.length > 0);
  return abbreviate(parts.join(NOTES_SEPARATOR), maxLength);
}

function positive(value: number | undefined, integer: boolean): number | undefined {
  if (value === undefined || !Number.isFinite(value) || value <= 0) return undefined;
  if (integer && !Number.isInteger(value)) return undefined;
  return value;
}

/**
 * ShipmentRecordBuilder
 *
 * Maps a validated row and its abbreviated address to a carrier record.
 * Pure apart from the run's reference registry: a source reference
 * may be used by one row only.
 */
export class ShipmentRecordBuilder {
  private readonly references: ReferenceGenerator;

  constructor(private readonly opts: RecordBuilderOptions = {}) {
    this.references = opts.references ?? new ReferenceGenerator();
  }

  build(row: InputRow, layout: LayoutKind, address: AbbreviatedAddress): BuildResult {
    const recipientName = fitToLength(row.companyName.replace(/\s+/g, ' ').trim(), MAX_RECIPIENT_LENGTH);
    if (!recipientName) {
      return { ok: false, kind: FailureKinds.MISSING_RECIPIENT, message: `Row ${row.ordinal} has no recipient name` };
    }

    const parcel = this.parcelAttributes(row, layout);
    if (!parcel.ok) return parcel;

    const phone = normalizePhone(row.mobilePhone) ?? normalizePhone(row.landlinePhone);
    if (!phone && (this.opts.requirePhone ?? PHONE_REQUIRED)) {
      return { ok: false, kind: FailureKinds.NO_PHONE, message: `Row ${row.ordinal} has no phone number` };
    }

    const sourceReference = row.reference?.trim();
    if (sourceReference && !this.references.claim(sourceReference)) {
      return {
        ok: false,
        kind: FailureKinds.DUPLICATE_REFERENCE,
        message: `Row ${row.ordinal} repeats reference ${sourceReference}`,
      };
    }

    const email = row.email?.trim();
    const record: ShipmentRecord = {
      recipientName,
      address: address.street,
      locality: address.locality,
      province: address.province,
      postalCode: address.postalCode,
      packageCount: parcel.value.packageCount,
      weightKg: parcel.value.weightKg,
      portType: this.opts.portType ?? PortTypes.FRANCO,
      packageType: PackageTypes.STANDARD,
      shipmentType: ShipmentTypes.NATIONAL,
      notes: buildNotes(row.ordinal, phone, row.instructions),
      reference: sourceReference || this.references.next(row.ordinal),
      pdfFormat: this.opts.pdfFormat ?? PdfFormats.A6,
      ...(phone ? { phone } : {}),
      ...(email ? { email } : {}),
      ...(this.opts.cashOnDelivery ? { cashOnDelivery: { ...this.opts.cashOnDelivery } } : {}),
    };
    return { ok: true, value: record };
  }

  private parcelAttributes(
    row: InputRow,
    layout: LayoutKind
  ): StepResult<{ packageCount: number; weightKg: number }, BuildFailure> {
    const defaults = layoutDefaults(layout);
    if (defaults) return { ok: true, value: defaults };

    const packageCount = positive(row.packageCount, true);
    const weightKg = positive(row.weightKg, false);
    if (packageCount !== undefined && weightKg !== undefined) {
      return { ok: true, value: { packageCount, weightKg } };
    }

    const fields = [
      ...(packageCount === undefined ? ['packageCount'] : []),
      ...(weightKg === undefined ? ['weightKg'] : []),
    ];
    return {
      ok: false,
      kind: FailureKinds.MISSING_MANUAL_FIELD,
      message: `Row ${row.ordinal} needs ${fields.join(' and ')} for a ${layout} source`,
      fields,
    };
  }
}
