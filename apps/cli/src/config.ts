import { z } from 'zod';
import { ConfigError, DEFAULT_BATCH_SIZE, DEFAULT_ERROR_SAMPLE_SIZE } from '@sheetreplica/data-ingestion';
import type { LogThreshold } from '@sheetreplica/data-ingestion';
import type { StoreConnectionConfig } from '@sheetreplica/database';

export const DEFAULT_CREDENTIALS_FILE = 'credentials/credentials.json';
export const DEFAULT_SPREADSHEET_NAME = 'Dados do ecommerce';
export const DEFAULT_WARNING_THRESHOLD = 100;

const LOG_THRESHOLDS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogThreshold[];

const EnvSchema = z.object({
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),
  SUPABASE_KEY: z.string().optional(),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().default(DEFAULT_CREDENTIALS_FILE),
  SPREADSHEET_ID: z.string().optional(),
  SPREADSHEET_NAME: z.string().default(DEFAULT_SPREADSHEET_NAME),
  SYNC_BATCH_SIZE: z.coerce.number().int().positive().default(DEFAULT_BATCH_SIZE),
  SYNC_ERROR_SAMPLE_SIZE: z.coerce.number().int().nonnegative().default(DEFAULT_ERROR_SAMPLE_SIZE),
  SYNC_WARNING_THRESHOLD: z.coerce.number().int().positive().default(DEFAULT_WARNING_THRESHOLD),
  SCHEMA_FILE: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_THRESHOLDS).default('info')
});

export interface SyncConfig {
  supabaseUrl?: string;
  supabaseKey?: string;
  credentialsFile: string;
  spreadsheetId?: string;
  spreadsheetName: string;
  batchSize: number;
  errorSampleSize: number;
  warningThreshold: number;
  schemaFile?: string;
  logLevel: LogThreshold;
}

// Command-line flags, as commander hands them over
export interface ConfigOverrides {
  batchSize?: string;
  schemaFile?: string;
}

/**
 * Build the configuration from environment variables and command-line flags.
 * Blank variables count as unset; flags win over the environment.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {}
): SyncConfig {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      values[key] = value.trim();
    }
  }
  if (overrides.batchSize !== undefined) values.SYNC_BATCH_SIZE = overrides.batchSize;
  if (overrides.schemaFile !== undefined) values.SCHEMA_FILE = overrides.schemaFile;

  const parsed = EnvSchema.safeParse(values);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const { data } = parsed;
  return {
    supabaseUrl: data.SUPABASE_URL,
    supabaseKey: data.SUPABASE_SERVICE_ROLE_KEY ?? data.SUPABASE_KEY,
    credentialsFile: data.GOOGLE_APPLICATION_CREDENTIALS,
    spreadsheetId: data.SPREADSHEET_ID,
    spreadsheetName: data.SPREADSHEET_NAME,
    batchSize: data.SYNC_BATCH_SIZE,
    errorSampleSize: data.SYNC_ERROR_SAMPLE_SIZE,
    warningThreshold: data.SYNC_WARNING_THRESHOLD,
    schemaFile: data.SCHEMA_FILE,
    logLevel: data.LOG_LEVEL
  };
}

/**
 * Supabase connection settings; only the commands that touch the store need them
 */
export function requireStoreConnection(config: SyncConfig): StoreConnectionConfig {
  const issues: string[] = [];
  if (!config.supabaseUrl) issues.push('SUPABASE_URL is not set');
  if (!config.supabaseKey) issues.push('SUPABASE_SERVICE_ROLE_KEY or SUPABASE_KEY is not set');

  if (!config.supabaseUrl || !config.supabaseKey) {
    throw new ConfigError('Supabase connection is not configured', issues);
  }

  return { url: config.supabaseUrl, key: config.supabaseKey };
}
