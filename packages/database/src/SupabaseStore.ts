// Store client backed by Supabase (PostgREST)
// Implements the StoreClient boundary used by the loader and the foreign key cache

import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js'
import type { CleanedRecord, StoreClient, TableSchema } from '@sheetreplica/types'
import { StoreError, StoreOperation } from './errors'

export const SELECT_PAGE_SIZE = 1000

// PostgREST refuses a DELETE without a filter; this one matches every row of any column type
export const clearFilter = (column: string): string => `${column}.is.null,${column}.not.is.null`

export interface SupabaseStoreOptions {
  schemas?: readonly TableSchema[]
  pageSize?: number
}

/**
 * Column used to filter a delete-all: the primary key, else the first required column, else the first column
 */
export const clearFilterColumn = (schema: TableSchema): string | undefined =>
  schema.primaryKey ?? schema.required[0] ?? schema.columns[0]

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null

const toStoreError = (table: string, operation: StoreOperation, error: PostgrestError): StoreError =>
  new StoreError(table, operation, error.message, {
    storeCode: error.code,
    details: error.details || error.hint || null,
    cause: error
  })

export class SupabaseStore implements StoreClient {
  private readonly filterColumns = new Map<string, string>()
  private readonly pageSize: number

  constructor(private readonly client: SupabaseClient, options: SupabaseStoreOptions = {}) {
    this.pageSize = options.pageSize ?? SELECT_PAGE_SIZE

    for (const schema of options.schemas ?? []) {
      const column = clearFilterColumn(schema)
      if (column) {
        this.filterColumns.set(schema.name, column)
      }
    }
  }

  async clearTable(table: string): Promise<void> {
    const column = this.filterColumns.get(table)
    if (!column) {
      throw new StoreError(table, 'clear', 'no schema registered for this table')
    }

    const { error } = await this.client
      .from(table)
      .delete()
      .or(clearFilter(column))

    if (error) {
      throw toStoreError(table, 'clear', error)
    }
  }

  async insertBatch(table: string, records: CleanedRecord[]): Promise<void> {
    if (records.length === 0) return

    const { error } = await this.client
      .from(table)
      .insert(records)

    if (error) {
      throw toStoreError(table, 'insert', error)
    }
  }

  /**
   * Every value of one column, read page by page until a short page comes back.
   * Pages are ordered by the column so consecutive ranges neither skip nor repeat rows.
   */
  async selectColumn(table: string, column: string): Promise<unknown[]> {
    const values: unknown[] = []

    for (let from = 0; ; from += this.pageSize) {
      const { data, error } = await this.client
        .from(table)
        .select(column)
        .order(column)
        .range(from, from + this.pageSize - 1)

      if (error) {
        throw toStoreError(table, 'select', error)
      }

      const page: unknown = data
      const rows = Array.isArray(page) ? page : []
      for (const row of rows) {
        if (isRecord(row)) {
          values.push(row[column])
        }
      }

      if (rows.length < this.pageSize) break
    }

    return values
  }

  async ping(table: string): Promise<void> {
    const { error } = await this.client
      .from(table)
      .select('*', { count: 'exact', head: true })
      .limit(1)

    if (error) {
      throw toStoreError(table, 'ping', error)
    }
  }
}

export default SupabaseStore
