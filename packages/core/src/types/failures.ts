/**
 * Per-row failure kinds.
 *
 * Data-quality kinds are terminal for the row and need manual correction.
 * PROVIDER_UNAVAILABLE, CARRIER_UNAVAILABLE and UNRESOLVED may succeed on a later run.
 */
export const FailureKinds = {
  INVALID_ZIP: "INVALID_ZIP",
  LOCALITY_MISMATCH: "LOCALITY_MISMATCH",
  NOT_FOUND: "NOT_FOUND",
  AMBIGUOUS: "AMBIGUOUS",
  GENERIC_ADDRESS: "GENERIC_ADDRESS",
  INVALID_PROVINCE: "INVALID_PROVINCE",
  PROVIDER_UNAVAILABLE: "PROVIDER_UNAVAILABLE",
  PROVIDER_REJECTED: "PROVIDER_REJECTED",
  MISSING_MANUAL_FIELD: "MISSING_MANUAL_FIELD",
  NO_PHONE: "NO_PHONE",
  MISSING_RECIPIENT: "MISSING_RECIPIENT",
  DUPLICATE_REFERENCE: "DUPLICATE_REFERENCE",
  CARRIER_REJECTED: "CARRIER_REJECTED",
  CARRIER_UNAVAILABLE: "CARRIER_UNAVAILABLE",
  UNRESOLVED: "UNRESOLVED",
} as const;

export type FailureKind = (typeof FailureKinds)[keyof typeof FailureKinds];

export type NormalizationFailureKind =
  | typeof FailureKinds.INVALID_ZIP
  | typeof FailureKinds.LOCALITY_MISMATCH
  | typeof FailureKinds.NOT_FOUND
  | typeof FailureKinds.AMBIGUOUS
  | typeof FailureKinds.GENERIC_ADDRESS
  | typeof FailureKinds.INVALID_PROVINCE
  | typeof FailureKinds.PROVIDER_UNAVAILABLE
  | typeof FailureKinds.PROVIDER_REJECTED;

export type BuildFailureKind =
  | typeof FailureKinds.MISSING_MANUAL_FIELD
  | typeof FailureKinds.NO_PHONE
  | typeof FailureKinds.MISSING_RECIPIENT
  | typeof FailureKinds.DUPLICATE_REFERENCE;

/**
 * Detail codes for GENERIC_ADDRESS
 */
export type GenericAddressCode = "CONTRADA" | "STRADA_STATALE" | "SNC" | "NO_ROUTE";

export interface NormalizationFailure {
  ok: false;
  kind: NormalizationFailureKind;
  message: string;
  /** Operator hint shown next to the failed row */
  suggestion?: string;
  detail?: GenericAddressCode | string;
  /** Only PROVIDER_UNAVAILABLE is retryable */
  retryable: boolean;
}

export interface BuildFailure {
  ok: false;
  kind: BuildFailureKind;
  message: string;
  /** Missing field names for MISSING_MANUAL_FIELD */
  fields?: string[];
}

/**
 * Result type used by the pure pipeline steps
 */
export type StepResult<T, F> = { ok: true; value: T } | F;
