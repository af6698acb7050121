export { DuplicateTracker, NOT_FOUND_AT_CARRIER } from './duplicate-tracker.js';
export type {
  AdmitDecision,
  AdmitInput,
  DuplicateTrackerOptions,
  LedgerStats,
  ReconcileSummary,
  StatusCounts,
} from './duplicate-tracker.js';
