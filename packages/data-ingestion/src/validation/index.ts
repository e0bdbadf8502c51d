// Validation pipeline components
// Cell cleaning, record validation, deduplication and foreign key checks

export {
  default as CellCleaner,
  cleanText,
  cleanDecimal,
  cleanInteger,
  cleanDate,
  cleanValue,
  toCanonicalText,
  isDecimalOutOfRange,
  DECIMAL_RANGE
} from './CellCleaner';
export type { RawCell } from './CellCleaner';
export {
  default as RecordValidator,
  normalizeColumnName,
  buildHeaderIndex,
  isEmptyRow
} from './RecordValidator';
export type { HeaderIndex, RowValidationSummary } from './RecordValidator';
export { default as DeduplicationEngine } from './DeduplicationEngine';
export type { DeduplicationResult } from './DeduplicationEngine';
export { default as ForeignKeyCache } from './ForeignKeyCache';
export type { ForeignKeyCacheStats } from './ForeignKeyCache';
export { validateForeignKeys } from './ForeignKeyValidator';
export type { ForeignKeyValidationResult } from './ForeignKeyValidator';
