import { KeyLookup, SourcedRecord, TableSchema, ValidationError } from '@sheetreplica/types';

export interface ForeignKeyValidationResult {
  valid: SourcedRecord[];
  rejected: ValidationError[];
  rejectedRecords: SourcedRecord[];
}

/**
 * Keep only records whose foreign key values exist in the referenced tables.
 * A record that does not carry an FK column is not checked on that column;
 * FK columns are optional unless the schema also lists them as required.
 */
export async function validateForeignKeys(
  records: SourcedRecord[],
  schema: TableSchema,
  keyLookup: KeyLookup
): Promise<ForeignKeyValidationResult> {
  const foreignKeys = Object.entries(schema.foreignKeys ?? {});
  if (foreignKeys.length === 0) {
    return { valid: records, rejected: [], rejectedRecords: [] };
  }

  // One store query at a time
  const referencedKeys = new Map<string, Set<string>>();
  for (const [column, table] of foreignKeys) {
    referencedKeys.set(column, await keyLookup(table, column));
  }

  const valid: SourcedRecord[] = [];
  const rejected: ValidationError[] = [];
  const rejectedRecords: SourcedRecord[] = [];

  for (const record of records) {
    let recordValid = true;

    for (const [column, table] of foreignKeys) {
      const value = record.values[column];
      if (value === undefined) continue;

      const key = String(value).trim();
      if (!referencedKeys.get(column)?.has(key)) {
        recordValid = false;
        rejected.push({
          position: record.position,
          column,
          message: `Row ${record.position}: ${column}='${key}' does not exist in ${table}.${column}`,
          value: key
        });
      }
    }

    if (recordValid) {
      valid.push(record);
    } else {
      rejectedRecords.push(record);
    }
  }

  return { valid, rejected, rejectedRecords };
}
