import {
  ColumnType,
  RawRow,
  RecordValidationResult,
  SourcedRecord,
  TableSchema,
  ValidationError,
  ValidationWarning,
  CleanedRecord
} from '@sheetreplica/types';
import { CellCleaner, isDecimalOutOfRange, DECIMAL_RANGE } from './CellCleaner';

/**
 * Header/column name normalization applied once on both sides before an exact match.
 * Case, surrounding/inner whitespace and underscores are ignored.
 */
export function normalizeColumnName(name: string): string {
  return name.trim().toLowerCase().replace(/[\s_]+/g, '');
}

export interface HeaderIndex {
  positions: Map<string, number>;
  duplicates: string[];
}

/**
 * Map normalized header names to cell positions. The first occurrence of a name wins.
 */
export function buildHeaderIndex(headers: readonly string[]): HeaderIndex {
  const positions = new Map<string, number>();
  const duplicates: string[] = [];

  headers.forEach((header, index) => {
    const key = normalizeColumnName(header);
    if (!key) return;
    if (positions.has(key)) {
      duplicates.push(header);
      return;
    }
    positions.set(key, index);
  });

  return { positions, duplicates };
}

export function isEmptyRow(row: RawRow): boolean {
  return !row.cells.some((cell) => cell !== null && cell !== undefined && String(cell).trim() !== '');
}

export interface RowValidationSummary {
  records: SourcedRecord[];
  errors: ValidationError[];
  warnings: ValidationWarning[];
  emptyRows: number;
  invalidRows: number;
}

/**
 * Applies a table schema and the cell cleaner to raw rows.
 * Every required column is checked so one pass surfaces all problems of a row.
 */
export class RecordValidator {
  /**
   * Validate and clean a single row
   */
  validate(row: RawRow, schema: TableSchema, headerIndex: HeaderIndex): RecordValidationResult {
    const cleaner = new CellCleaner(schema);
    const required = new Set(schema.required);
    const errors: ValidationError[] = [];
    const warnings: ValidationWarning[] = [];
    const record: CleanedRecord = {};

    for (const column of schema.columns) {
      const cellIndex = headerIndex.positions.get(normalizeColumnName(column));
      const rawValue = cellIndex !== undefined && cellIndex < row.cells.length
        ? row.cells[cellIndex]
        : null;

      const cleaned = cleaner.clean(rawValue, column);

      if (cleaned === null) {
        if (required.has(column)) {
          errors.push({
            position: row.position,
            column,
            message: `Row ${row.position}: required column '${column}' is empty or invalid (raw value: '${rawValue ?? ''}')`,
            value: rawValue
          });
        }
        continue;
      }

      if (
        cleaner.typeOf(column) === ColumnType.DECIMAL &&
        typeof cleaned === 'number' &&
        isDecimalOutOfRange(cleaned)
      ) {
        warnings.push({
          position: row.position,
          column,
          message: `Row ${row.position}: '${column}' = ${cleaned} is outside the expected range ${DECIMAL_RANGE.min}..${DECIMAL_RANGE.max}`,
          value: cleaned
        });
      }

      record[column] = cleaned;
    }

    if (errors.length > 0) {
      return { is_valid: false, errors, warnings };
    }
    return { is_valid: true, record, warnings };
  }

  /**
   * Validate every data row of a sheet. Blank rows are counted, not validated.
   */
  validateRows(rows: readonly RawRow[], schema: TableSchema, headers: readonly string[]): RowValidationSummary {
    const headerIndex = buildHeaderIndex(headers);
    const records: SourcedRecord[] = [];
    const errors: ValidationError[] = [];
    const warnings: ValidationWarning[] = headerIndex.duplicates.map((header) => ({
      position: 1,
      column: header,
      message: `Header '${header}' appears more than once; only its first column is read`
    }));
    let emptyRows = 0;
    let invalidRows = 0;

    for (const row of rows) {
      if (isEmptyRow(row)) {
        emptyRows++;
        continue;
      }

      const result = this.validate(row, schema, headerIndex);
      warnings.push(...result.warnings);

      if (result.is_valid) {
        records.push({ position: row.position, values: result.record });
      } else {
        invalidRows++;
        errors.push(...result.errors);
      }
    }

    return { records, errors, warnings, emptyRows, invalidRows };
  }
}

export default RecordValidator;
