export * from './layout.js';
export * from './input-row.js';
export * from './address.js';
export * from './shipment.js';
export * from './ledger.js';
export * from './failures.js';
export * from './responses.js';
