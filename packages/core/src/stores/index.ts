export { InMemoryLedgerStore } from './in-memory.js';
