export * from './adapter-context.js';
export * from './capabilities.js';
export * from './carrier-adapter.js';
export * from './geocoding-adapter.js';
export * from './http-client.js';
export * from './ledger-store.js';
export * from './logger.js';
