export { ShipmentRecordBuilder, buildNotes, normalizePhone } from './record-builder.js';
export type { BuildResult, RecordBuilderOptions } from './record-builder.js';
export { ReferenceGenerator, runStamp } from './reference.js';
export { fingerprintOf } from './fingerprint.js';
export type { FingerprintInput } from './fingerprint.js';
