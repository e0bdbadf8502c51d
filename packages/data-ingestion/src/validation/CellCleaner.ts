import { ColumnType, CleanedValue, TableSchema } from '@sheetreplica/types';

/**
 * Cell cleaning for the sync pipeline.
 * Converts one raw spreadsheet cell into a typed value, or null when nothing
 * usable is left. The column's declared type drives the conversion; content is never guessed.
 */

export type RawCell = string | null | undefined;

// Advisory bounds for decimals; values outside are reported, never rejected
export const DECIMAL_RANGE = { min: 0, max: 1_000_000 } as const;

const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f-\u009f]/g;
const DECIMAL_LITERAL = /^-?(\d+\.?\d*|\.\d+)$/;
const INTEGER_LITERAL = /^-?\d+$/;

const DATE_PATTERNS: Array<{ pattern: RegExp; order: 'ymd' | 'dmy' }> = [
  { pattern: /^(\d{4})-(\d{2})-(\d{2})$/, order: 'ymd' },
  { pattern: /^(\d{2})\/(\d{2})\/(\d{4})$/, order: 'dmy' },
  { pattern: /^(\d{2})-(\d{2})-(\d{4})$/, order: 'dmy' },
  { pattern: /^(\d{4})\/(\d{2})\/(\d{2})$/, order: 'ymd' }
];

export function cleanText(value: RawCell): string | null {
  if (value === null || value === undefined) return null;

  const text = String(value)
    .replace(/\s+/g, ' ')
    .replace(CONTROL_CHARACTERS, '')
    .replace(/\s+/g, ' ')
    .trim();

  return text.length > 0 ? text : null;
}

export function cleanDecimal(value: RawCell): number | null {
  if (value === null || value === undefined) return null;

  let text = String(value).trim().replace(/[^\d,.\-]/g, '');
  if (!text) return null;

  text = text.replace(/,/g, '.');

  // Every dot but the last one is a thousands separator
  const parts = text.split('.');
  if (parts.length > 2) {
    const decimals = parts.pop();
    text = `${parts.join('')}.${decimals}`;
  }

  if (!DECIMAL_LITERAL.test(text)) return null;

  const result = Number(text);
  return Number.isFinite(result) ? result : null;
}

export function isDecimalOutOfRange(value: number): boolean {
  return value < DECIMAL_RANGE.min || value > DECIMAL_RANGE.max;
}

export function cleanInteger(value: RawCell): number | null {
  if (value === null || value === undefined) return null;

  const text = String(value).trim().replace(/[^\d\-]/g, '');
  if (!INTEGER_LITERAL.test(text)) return null;

  const result = Number(text);
  return Number.isSafeInteger(result) ? result : null;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

export function cleanDate(value: RawCell): string | null {
  if (value === null || value === undefined) return null;

  const text = String(value).trim();
  if (!text) return null;

  for (const { pattern, order } of DATE_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;

    const [year, month, day] = order === 'ymd'
      ? [match[1], match[2], match[3]]
      : [match[3], match[2], match[1]];

    if (!isCalendarDate(Number(year), Number(month), Number(day))) {
      return null;
    }
    return `${year}-${month}-${day}`;
  }

  return null;
}

/**
 * Clean a raw cell according to a column type tag
 */
export function cleanValue(value: RawCell, type: ColumnType): CleanedValue | null {
  switch (type) {
    case ColumnType.TEXT:
      return cleanText(value);
    case ColumnType.DECIMAL:
      return cleanDecimal(value);
    case ColumnType.INTEGER:
      return cleanInteger(value);
    case ColumnType.DATE:
      return cleanDate(value);
  }
}

// Canonical textual form of a cleaned value, accepted back by cleanValue unchanged
export function toCanonicalText(value: CleanedValue): string {
  if (typeof value === 'string') return value;

  const text = String(value);
  if (!/e/i.test(text)) return text;

  // Exponent notation would not survive the decimal cleaner
  return Number.isInteger(value) ? BigInt(value).toString() : value.toFixed(20);
}

/**
 * Column-aware cleaner bound to one table schema.
 * Columns without a declared type are treated as text.
 */
export class CellCleaner {
  constructor(private readonly schema: TableSchema) {}

  typeOf(columnName: string): ColumnType {
    return this.schema.types[columnName] ?? ColumnType.TEXT;
  }

  clean(value: RawCell, columnName: string): CleanedValue | null {
    return cleanValue(value, this.typeOf(columnName));
  }
}

export default CellCleaner;
