// Database package exports for the sheet replication engine
// Main entry point for store operations

// Export clients
export { createStoreClient, DEFAULT_CLIENT_INFO } from './client'
export type { SupabaseClient, StoreConnectionConfig } from './client'

// Export the store
export { SupabaseStore, SELECT_PAGE_SIZE, clearFilter, clearFilterColumn } from './SupabaseStore'
export type { SupabaseStoreOptions } from './SupabaseStore'

// Export errors
export { StoreError } from './errors'
export type { StoreOperation, StoreErrorOptions } from './errors'

// Export schema SQL generation
export {
  generateColumnSql,
  generateCreateTableSql,
  generateIndexSql,
  generateSchemaSql,
  sqlTypeOf
} from './ddl'
