export { registerRunRoutes } from './runs.js';
export { registerLedgerRoutes } from './ledger.js';
export { registerCloseWorkDayRoute } from './close-work-day.js';
