// Main exports for the data-ingestion package

// Schema registry
export { SchemaRegistry, defaultRegistry } from './schema/SchemaRegistry';

// Validation pipeline
export * from './validation';

// Loading
export { BatchLoader, DEFAULT_BATCH_SIZE, chunk } from './loader/BatchLoader';
export type { LoaderOptions, LoadOptions } from './loader/BatchLoader';

// Orchestration
export {
  SyncOrchestrator,
  DEFAULT_ERROR_SAMPLE_SIZE,
  summarizeRun,
  toRawRows
} from './workers/SyncOrchestrator';
export type { SyncOrchestratorOptions } from './workers/SyncOrchestrator';

// Google Sheets source
export {
  SheetsSourceReader,
  SHEETS_SCOPES,
  quoteSheetName,
  splitGrid
} from './parsers/SheetsSourceReader';
export type { SheetsSourceOptions } from './parsers/SheetsSourceReader';

// Logging and errors
export { default as logger, createLogger, parseLogLevel } from './utils/logger';
export type { Logger, LogLevel, LogThreshold, LogMeta, LoggerOptions } from './utils/logger';
export { SyncError, SchemaError, SourceError, ConfigError } from './utils/errors';
export type { SyncErrorCode } from './utils/errors';
export { getErrorMessage, getErrorStack, isError, truncateMessage } from './utils/errorUtils';
