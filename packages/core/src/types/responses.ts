import type { ShipmentSubmissionResult, SubmitShipmentsResponse } from '../interfaces/carrier-adapter.js';

/**
 * Build a SubmitShipmentsResponse from per-record results.
 *
 * - "All 5 shipments created successfully"
 * - "Mixed results: 3 succeeded, 2 failed"
 * - "All 4 shipments failed"
 */
export function summarizeSubmission(
  results: ShipmentSubmissionResult[],
  rawCarrierResponse?: unknown
): SubmitShipmentsResponse {
  const successCount = results.filter((r) => r.status === 'created').length;
  const failureCount = results.filter((r) => r.status === 'failed').length;
  const totalCount = results.length;

  let summary: string;
  if (totalCount === 0) {
    summary = 'No shipments to process';
  } else if (failureCount === 0) {
    summary = `All ${totalCount} shipments created successfully`;
  } else if (successCount === 0) {
    summary = `All ${totalCount} shipments failed`;
  } else {
    summary = `Mixed results: ${successCount} succeeded, ${failureCount} failed`;
  }

  return {
    results,
    successCount,
    failureCount,
    totalCount,
    allSucceeded: failureCount === 0 && totalCount > 0,
    allFailed: successCount === 0 && totalCount > 0,
    someFailed: successCount > 0 && failureCount > 0,
    summary,
    ...(rawCarrierResponse !== undefined && { rawCarrierResponse }),
  };
}

/**
 * HTTP status for a batch outcome
 *
 * - 200: every record succeeded
 * - 207: mixed results
 * - 400: every record failed
 */
export function getHttpStatusForBatchResponse(response: SubmitShipmentsResponse): 200 | 207 | 400 {
  if (response.allSucceeded) {
    return 200;
  } else if (response.allFailed) {
    return 400;
  }
  return 207;
}
