/**
 * Error taxonomy of the sync engine.
 * Everything below the run level is recovered locally and turned into statistics;
 * these classes carry enough context for the log line and the final report.
 */

export type SyncErrorCode =
  | 'SCHEMA_INVALID'
  | 'SOURCE_UNAVAILABLE'
  | 'CONFIG_INVALID';

export class SyncError extends Error {
  readonly code: SyncErrorCode;

  constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'SyncError';
    this.code = code;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class SchemaError extends SyncError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('SCHEMA_INVALID', issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'SchemaError';
    this.issues = issues;
  }
}

export class SourceError extends SyncError {
  readonly sheet?: string;

  constructor(message: string, sheet?: string, cause?: unknown) {
    super('SOURCE_UNAVAILABLE', message, { cause });
    this.name = 'SourceError';
    this.sheet = sheet;
  }
}

export class ConfigError extends SyncError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIG_INVALID', issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
