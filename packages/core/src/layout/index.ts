export {
  detectLayout,
  layoutDefaults,
  resolveColumns,
  missingAddressColumns,
  toInputRow,
  cellText,
  LAYOUT_COLUMNS,
} from './detect-layout.js';
export type { ColumnField, ColumnMapping, SourceRecord } from './detect-layout.js';
