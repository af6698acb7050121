/**
 * Source layout of a spreadsheet.
 * Derived once per source and constant for all of its rows.
 */
export const LayoutKinds = {
  OLD: "OLD",
  NEW: "NEW",
  AGENCY: "AGENCY",
} as const;

export type LayoutKind = (typeof LayoutKinds)[keyof typeof LayoutKinds];

/**
 * Package attributes applied to every row of a layout
 */
export interface LayoutDefaults {
  packageCount: number;
  weightKg: number;
}

/**
 * Signals available for classifying a source
 */
export interface SourceSignature {
  /** File name (with or without extension) */
  fileName?: string;

  /** Header cells as read from the sheet */
  headers?: readonly string[];
}
