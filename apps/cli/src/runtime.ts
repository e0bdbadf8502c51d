import {
  SchemaRegistry,
  SheetsSourceReader,
  createLogger,
  defaultRegistry
} from '@sheetreplica/data-ingestion';
import type { Logger } from '@sheetreplica/data-ingestion';
import { SupabaseStore, createStoreClient } from '@sheetreplica/database';
import { SyncConfig, requireStoreConnection } from './config';

// Options declared on the root program and shared by every command
export interface GlobalOptions {
  schema?: string;
}

export function createCliLogger(config: SyncConfig): Logger {
  return createLogger({ level: config.logLevel });
}

export async function loadRegistry(config: SyncConfig): Promise<SchemaRegistry> {
  return config.schemaFile ? SchemaRegistry.fromFile(config.schemaFile) : defaultRegistry();
}

export function createSource(config: SyncConfig, logger: Logger): SheetsSourceReader {
  return new SheetsSourceReader({
    spreadsheetId: config.spreadsheetId,
    spreadsheetName: config.spreadsheetName,
    keyFile: config.credentialsFile,
    logger: logger.child('sheets')
  });
}

export function createStore(config: SyncConfig, registry: SchemaRegistry): SupabaseStore {
  const client = createStoreClient(requireStoreConnection(config));
  return new SupabaseStore(client, { schemas: registry.list() });
}
