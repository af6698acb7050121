/**
 * Address as requested by an input row
 */
export interface AddressQuery {
  address: string;
  city: string;
  postalCode: string;
  province: string;
}

/**
 * NormalizedAddress
 * Canonical address produced by the normalizer.
 * postalCode is always 5 digits and province 2 uppercase letters.
 */
export interface NormalizedAddress {
  /** Route and street number, e.g. "Via Roma, 12" */
  street: string;

  /** Municipality */
  locality: string;

  province: string;

  postalCode: string;

  /** Provider confidence in [0, 1] */
  confidence: number;

  ambiguous: boolean;

  /** Provider's one-line rendering, kept for reports */
  formattedAddress?: string;
}

/**
 * NormalizedAddress whose street and locality fit the carrier field maxima
 */
export interface AbbreviatedAddress extends NormalizedAddress {
  /** Whether any field had to be shortened */
  abbreviated: boolean;
}
