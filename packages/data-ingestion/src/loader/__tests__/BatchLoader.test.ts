import { describe, it, expect } from '@jest/globals';
import { CleanedRecord } from '@sheetreplica/types';
import { BatchLoader, DEFAULT_BATCH_SIZE, chunk } from '../BatchLoader';
import { createLogger } from '../../utils/logger';
import { MemoryStore } from '../../__tests__/helpers/memoryStore';
import { createMockLogger } from '../../__tests__/helpers/mockLogger';

const logger = createLogger({ level: 'silent' });

const sales = (count: number): CleanedRecord[] =>
  Array.from({ length: count }, (_, index) => ({ id_venda: `v_${index + 1}`, quantidade: index + 1 }));

describe('BatchLoader', () => {
  it('should default to batches of 50', () => {
    expect(new BatchLoader(new MemoryStore()).getBatchSize()).toBe(DEFAULT_BATCH_SIZE);
    expect(DEFAULT_BATCH_SIZE).toBe(50);
  });

  it('should reject a batch size that is not a positive integer', () => {
    expect(() => new BatchLoader(new MemoryStore(), { batchSize: 0 })).toThrow();
    expect(() => new BatchLoader(new MemoryStore(), { batchSize: 2.5 })).toThrow();
  });

  it('should split records into fixed-size chunks', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 3)).toEqual([]);
  });

  it('should clear the table and insert every batch', async () => {
    const store = new MemoryStore();
    store.seed('vendas', [{ id_venda: 'old' }]);
    const loader = new BatchLoader(store, { batchSize: 4, logger });

    const stats = await loader.load('vendas', sales(10));

    expect(stats).toEqual({
      inserted: 10,
      insertErrors: 0,
      batches: 3,
      failedBatches: 0,
      cleared: true,
      failedRecords: []
    });
    expect(store.calls).toEqual(['clear:vendas', 'insert:vendas:4', 'insert:vendas:4', 'insert:vendas:2']);
    expect(store.rows('vendas')).toEqual(sales(10));
  });

  it('should fall back to single inserts when one record of a batch is rejected', async () => {
    const store = new MemoryStore({ failInsert: (_table, record) => record.id_venda === 'v_30' });
    const mockLogger = createMockLogger();
    const loader = new BatchLoader(store, { logger: mockLogger });

    const stats = await loader.load('vendas', sales(50));

    expect(stats.inserted).toBe(49);
    expect(stats.insertErrors).toBe(1);
    expect(stats.batches).toBe(1);
    expect(stats.failedBatches).toBe(1);
    expect(stats.failedRecords).toEqual([{ id_venda: 'v_30', quantidade: 30 }]);
    expect(store.rows('vendas')).toHaveLength(49);
    expect(mockLogger.error).toHaveBeenCalledTimes(1);
    expect(mockLogger.error).toHaveBeenCalledWith('Record insert failed', {
      table: 'vendas',
      record: 30,
      error: 'insert rejected for vendas',
      data: { id_venda: 'v_30', quantidade: 30 }
    });
  });

  it('should number records across batches when reporting a failure', async () => {
    const store = new MemoryStore({ failInsert: (_table, record) => record.id_venda === 'v_7' });
    const mockLogger = createMockLogger();
    const loader = new BatchLoader(store, { batchSize: 3, logger: mockLogger });

    await loader.load('vendas', sales(8));

    expect(mockLogger.error).toHaveBeenCalledWith('Record insert failed', expect.objectContaining({ record: 7 }));
  });

  it('should insert exactly the records the store accepts', async () => {
    const rejected = new Set(['v_2', 'v_9', 'v_10', 'v_17']);
    const store = new MemoryStore({ failInsert: (_table, record) => rejected.has(String(record.id_venda)) });
    const loader = new BatchLoader(store, { batchSize: 7, logger });
    const records = sales(20);

    const stats = await loader.load('vendas', records);

    expect(store.rows('vendas')).toEqual(records.filter((record) => !rejected.has(String(record.id_venda))));
    expect(stats.failedRecords).toEqual(records.filter((record) => rejected.has(String(record.id_venda))));
    expect(stats.inserted + stats.insertErrors).toBe(records.length);
  });

  it('should keep loading when the table cannot be cleared', async () => {
    const store = new MemoryStore({ failClear: ['vendas'] });
    const mockLogger = createMockLogger();
    const loader = new BatchLoader(store, { logger: mockLogger });

    const stats = await loader.load('vendas', sales(3));

    expect(stats.cleared).toBe(false);
    expect(stats.inserted).toBe(3);
    expect(mockLogger.warn).toHaveBeenCalledWith('Could not clear table, inserting anyway', {
      table: 'vendas',
      error: 'clear refused for vendas'
    });
  });

  it('should reject duplicate keys one by one, leaving the first copy in place', async () => {
    const store = new MemoryStore({ primaryKeys: { clientes: 'id_cliente' } });
    const loader = new BatchLoader(store, { logger });

    const stats = await loader.load('clientes', [
      { id_cliente: 'cli_001', estado: 'SP' },
      { id_cliente: 'cli_001', estado: 'RJ' }
    ]);

    expect(stats.inserted).toBe(1);
    expect(stats.insertErrors).toBe(1);
    expect(store.rows('clientes')).toEqual([{ id_cliente: 'cli_001', estado: 'SP' }]);
  });

  it('should leave the table alone when asked not to clear it', async () => {
    const store = new MemoryStore();
    store.seed('vendas', [{ id_venda: 'v_0' }]);
    const loader = new BatchLoader(store, { logger });

    const stats = await loader.load('vendas', sales(1), { clear: false });

    expect(stats.cleared).toBe(false);
    expect(store.calls).toEqual(['insert:vendas:1']);
    expect(store.rows('vendas')).toEqual([{ id_venda: 'v_0' }, { id_venda: 'v_1', quantidade: 1 }]);
  });

  it('should report whether a clear went through', async () => {
    const loader = new BatchLoader(new MemoryStore({ failClear: ['produtos'] }), { logger });

    await expect(loader.clear('vendas')).resolves.toBe(true);
    await expect(loader.clear('produtos')).resolves.toBe(false);
  });
});
