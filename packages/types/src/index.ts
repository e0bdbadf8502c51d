// Core domain types shared by the store, the sync engine and the CLI

// Column type tags understood by the cell cleaner
export const ColumnType = {
  TEXT: 'text' as const,
  DECIMAL: 'decimal' as const,
  INTEGER: 'integer' as const,
  DATE: 'date' as const
} as const;

export type ColumnType = typeof ColumnType[keyof typeof ColumnType];

export const COLUMN_TYPES: readonly ColumnType[] = [
  ColumnType.TEXT,
  ColumnType.DECIMAL,
  ColumnType.INTEGER,
  ColumnType.DATE
];

/**
 * Static declaration of one target table.
 * A foreign key column references the column of the same name in the referenced table.
 */
export interface TableSchema {
  name: string;
  sheet?: string;
  columns: string[];
  required: string[];
  types: Record<string, ColumnType>;
  foreignKeys?: Record<string, string>;
  primaryKey?: string;
}

// Typed value produced by the cell cleaner; dates are ISO calendar strings
export type CleanedValue = string | number;

export type CleanedRecord = Record<string, CleanedValue>;

export interface RawRow {
  // 1-based row number in the source; the header is row 1
  position: number;
  cells: readonly string[];
}

export interface SourcedRecord {
  position: number;
  values: CleanedRecord;
}

export interface ValidationError {
  position: number;
  column: string;
  message: string;
  value?: string | null;
}

export interface ValidationWarning {
  position: number;
  column: string;
  message: string;
  value?: CleanedValue | string | null;
}

export type RecordValidationResult =
  | { is_valid: true; record: CleanedRecord; warnings: ValidationWarning[] }
  | { is_valid: false; errors: ValidationError[]; warnings: ValidationWarning[] };

export interface SyncStatistics {
  rowsRead: number;
  emptyRows: number;
  validRows: number;
  invalidRows: number;
  duplicatesRemoved: number;
  fkRejected: number;
  inserted: number;
  insertErrors: number;
}

export interface LoadStats {
  inserted: number;
  insertErrors: number;
  batches: number;
  failedBatches: number;
  cleared: boolean;
  failedRecords: CleanedRecord[];
}

export type TableSyncStatus = 'completed' | 'partial' | 'skipped' | 'failed';

export type SyncStep =
  | 'reading'
  | 'validating'
  | 'deduplicating'
  | 'foreign_keys'
  | 'loading'
  | 'completed';

export interface TableSyncReport {
  table: string;
  sheet: string;
  status: TableSyncStatus;
  stats: SyncStatistics;
  validationErrors: ValidationError[];
  fkErrors: ValidationError[];
  warnings: ValidationWarning[];
  skippedReason?: string;
  error?: string;
  durationMs: number;
}

export interface SyncRunTotals extends SyncStatistics {
  failedTables: number;
  errors: number;
}

export interface SyncRunReport {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  dryRun: boolean;
  tables: TableSyncReport[];
  totals: SyncRunTotals;
}

export interface SheetContents {
  headers: string[];
  rows: string[][];
}

// Boundary collaborator: the spreadsheet being replicated
export interface SourceReader {
  listRows(sheetName: string): Promise<SheetContents>;
  listSheets?(): Promise<string[]>;
}

// Boundary collaborator: the relational store receiving the records
export interface StoreClient {
  clearTable(table: string): Promise<void>;
  insertBatch(table: string, records: CleanedRecord[]): Promise<void>;
  selectColumn(table: string, column: string): Promise<unknown[]>;
  ping?(table: string): Promise<void>;
}

export type KeyLookup = (table: string, column: string) => Promise<Set<string>>;

export const emptyStatistics = (): SyncStatistics => ({
  rowsRead: 0,
  emptyRows: 0,
  validRows: 0,
  invalidRows: 0,
  duplicatesRemoved: 0,
  fkRejected: 0,
  inserted: 0,
  insertErrors: 0
});
