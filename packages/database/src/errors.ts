// Store errors raised by the Supabase-backed store client

export type StoreOperation = 'clear' | 'insert' | 'select' | 'ping'

export interface StoreErrorOptions {
  storeCode?: string
  details?: string | null
  cause?: unknown
}

export class StoreError extends Error {
  readonly table: string
  readonly operation: StoreOperation
  readonly storeCode?: string
  readonly details: string | null

  constructor(table: string, operation: StoreOperation, message: string, options: StoreErrorOptions = {}) {
    super(`${operation} on '${table}' failed: ${message}`)
    this.name = 'StoreError'
    this.table = table
    this.operation = operation
    this.storeCode = options.storeCode
    this.details = options.details ?? null
    if (options.cause !== undefined) {
      this.cause = options.cause
    }
  }
}
