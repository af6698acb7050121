/**
 * Capability enum
 * Declares which label service operations an adapter supports
 */
export const Capabilities = {
  SUBMIT_SHIPMENTS: "SUBMIT_SHIPMENTS",
  CONFIRM_OPEN_SHIPMENTS: "CONFIRM_OPEN_SHIPMENTS",
  QUERY_STATUS: "QUERY_STATUS",
  GENERATE_PDF: "GENERATE_PDF",
  TEST_MODE_SUPPORTED: "TEST_MODE_SUPPORTED",
} as const;

export type Capability = (typeof Capabilities)[keyof typeof Capabilities];
