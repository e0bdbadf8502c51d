// SQL generation for the target tables
// Produces the statements to run once in the Supabase SQL editor before the first sync

import type { ColumnType, TableSchema } from '@sheetreplica/types'

const SQL_TYPES: Record<ColumnType, string> = {
  text: 'TEXT',
  decimal: 'DECIMAL(10,2)',
  integer: 'INTEGER',
  date: 'DATE',
}

export const sqlTypeOf = (schema: TableSchema, column: string): string =>
  SQL_TYPES[schema.types[column] ?? 'text']

export const generateColumnSql = (schema: TableSchema, column: string): string => {
  let definition = `${column} ${sqlTypeOf(schema, column)}`

  if (schema.primaryKey === column) {
    definition += ' PRIMARY KEY'
  } else if (schema.required.includes(column)) {
    definition += ' NOT NULL'
  }

  const referenced = schema.foreignKeys?.[column]
  if (referenced) {
    definition += ` REFERENCES ${referenced}(${column})`
  }

  return definition
}

export const generateCreateTableSql = (schema: TableSchema): string => {
  const columns = schema.columns.map((column) => `    ${generateColumnSql(schema, column)}`)

  return [
    `-- Table: ${schema.name}`,
    `CREATE TABLE IF NOT EXISTS ${schema.name} (`,
    columns.join(',\n'),
    ');',
  ].join('\n')
}

/**
 * One index per foreign key column and per date column
 */
export const generateIndexSql = (schema: TableSchema): string[] => {
  const indexed = schema.columns.filter((column) =>
    column !== schema.primaryKey &&
    (schema.foreignKeys?.[column] !== undefined || schema.types[column] === 'date')
  )

  return indexed.map((column) =>
    `CREATE INDEX IF NOT EXISTS idx_${schema.name}_${column} ON ${schema.name}(${column});`
  )
}

// Tables must come in dependency order so every REFERENCES target already exists
export const generateSchemaSql = (schemas: readonly TableSchema[]): string => {
  const tables = schemas.map(generateCreateTableSql)
  const indexes = schemas.flatMap(generateIndexSql)

  const sections = [tables.join('\n\n')]
  if (indexes.length > 0) {
    sections.push(['-- Indexes', ...indexes].join('\n'))
  }

  return `${sections.join('\n\n')}\n`
}
