import { describe, it, expect } from '@jest/globals';
import { ConfigError } from '@sheetreplica/data-ingestion';
import { loadConfig, requireStoreConnection } from '../config';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({})).toEqual({
      supabaseUrl: undefined,
      supabaseKey: undefined,
      credentialsFile: 'credentials/credentials.json',
      spreadsheetId: undefined,
      spreadsheetName: 'Dados do ecommerce',
      batchSize: 50,
      errorSampleSize: 5,
      warningThreshold: 100,
      schemaFile: undefined,
      logLevel: 'info'
    });
  });

  it('should read the environment', () => {
    const config = loadConfig({
      SUPABASE_URL: 'https://example.supabase.co',
      SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
      SPREADSHEET_ID: 'sheet-123',
      SYNC_BATCH_SIZE: '500',
      LOG_LEVEL: 'debug'
    });

    expect(config.supabaseUrl).toBe('https://example.supabase.co');
    expect(config.supabaseKey).toBe('test-secret');
    expect(config.spreadsheetId).toBe('sheet-123');
    expect(config.batchSize).toBe(500);
    expect(config.logLevel).toBe('debug');
  });

  it('should prefer the service role key over the plain key', () => {
    expect(loadConfig({ SUPABASE_KEY: 'anon-secret', SUPABASE_SERVICE_ROLE_KEY: 'test-secret' }).supabaseKey)
      .toBe('test-secret');
    expect(loadConfig({ SUPABASE_KEY: 'anon-secret' }).supabaseKey).toBe('anon-secret');
  });

  it('should treat blank variables as unset', () => {
    const config = loadConfig({ SPREADSHEET_ID: '', SYNC_BATCH_SIZE: '  ' });

    expect(config.spreadsheetId).toBeUndefined();
    expect(config.batchSize).toBe(50);
  });

  it('should let flags override the environment', () => {
    const config = loadConfig({ SYNC_BATCH_SIZE: '20', SCHEMA_FILE: 'a.json' }, { batchSize: '5', schemaFile: 'b.json' });

    expect(config.batchSize).toBe(5);
    expect(config.schemaFile).toBe('b.json');
  });

  it('should list every invalid setting', () => {
    let caught: unknown;
    try {
      loadConfig({ SUPABASE_URL: 'not a url', SYNC_BATCH_SIZE: '0', LOG_LEVEL: 'loud' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ code: 'CONFIG_INVALID' });
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues.map((issue) => issue.split(':')[0])).toEqual([
      'SUPABASE_URL',
      'SYNC_BATCH_SIZE',
      'LOG_LEVEL'
    ]);
  });
});

describe('requireStoreConnection', () => {
  it('should return the connection settings', () => {
    const config = loadConfig({ SUPABASE_URL: 'https://example.supabase.co', SUPABASE_KEY: 'test-secret' });

    expect(requireStoreConnection(config)).toEqual({ url: 'https://example.supabase.co', key: 'test-secret' });
  });

  it('should name what is missing', () => {
    expect(() => requireStoreConnection(loadConfig({ SUPABASE_URL: 'https://example.supabase.co' }))).toThrow(
      'Supabase connection is not configured: SUPABASE_SERVICE_ROLE_KEY or SUPABASE_KEY is not set'
    );
  });
});
