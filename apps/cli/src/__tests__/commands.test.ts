import { describe, it, expect } from '@jest/globals';
import { createLogger, defaultRegistry } from '@sheetreplica/data-ingestion';
import { CleanedRecord, SheetContents, SourceReader, StoreClient } from '@sheetreplica/types';
import { runSync } from '../commands/sync';
import { formatInspectResult, runInspect } from '../commands/inspect';
import { formatCheckResult, runCheck } from '../commands/check';
import { runSchema } from '../commands/schema';

const logger = createLogger({ level: 'silent' });
const registry = defaultRegistry();

class FakeSource implements SourceReader {
  constructor(private readonly sheets: Record<string, SheetContents>) {}

  async listRows(sheetName: string): Promise<SheetContents> {
    const contents = this.sheets[sheetName];
    if (!contents) throw new Error(`Unable to parse range: ${sheetName}`);
    return contents;
  }

  async listSheets(): Promise<string[]> {
    return Object.keys(this.sheets);
  }
}

class FakeStore implements StoreClient {
  readonly tables = new Map<string, CleanedRecord[]>();
  readonly unreachable = new Set<string>();

  async clearTable(table: string): Promise<void> {
    this.tables.set(table, []);
  }

  async insertBatch(table: string, records: CleanedRecord[]): Promise<void> {
    this.tables.set(table, [...(this.tables.get(table) ?? []), ...records]);
  }

  async selectColumn(table: string, column: string): Promise<unknown[]> {
    return (this.tables.get(table) ?? []).map((row) => row[column]);
  }

  async ping(table: string): Promise<void> {
    if (this.unreachable.has(table)) throw new Error(`relation "${table}" does not exist`);
  }
}

const clientes: SheetContents = {
  headers: ['ID Cliente', 'Nome_Cliente', 'estado', 'estado', 'observacao'],
  rows: [
    ['cli_001', 'Ana', 'SP', 'XX', 'vip'],
    ['cli_002', 'Bruno', 'MG', '', ''],
    ['', 'Sem id', '', '', '']
  ]
};

describe('sync command', () => {
  const options = { batchSize: 50, errorSampleSize: 5, warningThreshold: 100, dryRun: false };

  it('should sync the requested tables and report a warning for rejected rows', async () => {
    const store = new FakeStore();

    const result = await runSync(
      { source: new FakeSource({ clientes }), store, registry, logger },
      { ...options, tables: ['clientes'] }
    );

    expect(result.outcome).toBe('warning');
    expect(result.exitCode).toBe(0);
    expect(store.tables.get('clientes')).toEqual([
      { id_cliente: 'cli_001', nome_cliente: 'Ana', estado: 'SP' },
      { id_cliente: 'cli_002', nome_cliente: 'Bruno', estado: 'MG' }
    ]);
    expect(result.output.split('\n')[0]).toBe(
      'clientes [completed]: read 3, valid 2, invalid 1, duplicates 0, fk rejected 0, inserted 2, insert errors 0'
    );
  });

  it('should fail the process when errors reach the threshold', async () => {
    const result = await runSync(
      { source: new FakeSource({}), store: new FakeStore(), registry, logger },
      { ...options, warningThreshold: 4 }
    );

    expect(result.report.totals.failedTables).toBe(4);
    expect(result.outcome).toBe('failure');
    expect(result.exitCode).toBe(1);
  });
});

describe('inspect command', () => {
  it('should show which header feeds which column', async () => {
    const result = await runInspect(new FakeSource({ clientes }), registry, 'clientes', 1);

    expect(result.table).toBe('clientes');
    expect(result.headers.map((header) => header.column)).toEqual([
      'id_cliente', 'nome_cliente', 'estado', null, null
    ]);
    expect(result.missingColumns).toEqual(['pais', 'data_cadastro']);
    expect(formatInspectResult(result).split('\n')).toEqual([
      "Sheet 'clientes': 5 columns, 3 data rows",
      'Table: clientes',
      'Headers:',
      "  [0] 'ID Cliente' -> idcliente -> id_cliente",
      "  [1] 'Nome_Cliente' -> nomecliente -> nome_cliente",
      "  [2] 'estado' -> estado -> estado",
      "  [3] 'estado' -> estado -> (ignored)",
      "  [4] 'observacao' -> observacao -> (ignored)",
      'Missing columns: pais, data_cadastro',
      'First rows:',
      '  Row 2: ["cli_001","Ana","SP","XX","vip"]'
    ]);
  });

  it('should inspect tabs no table reads', async () => {
    const result = await runInspect(
      new FakeSource({ rascunho: { headers: ['a'], rows: [] } }),
      registry,
      'rascunho'
    );

    expect(result.table).toBeNull();
    expect(result.missingColumns).toEqual([]);
    expect(formatInspectResult(result).split('\n')[1]).toBe('Table: (no table reads this sheet)');
  });
});

describe('check command', () => {
  it('should report missing tabs and unreachable tables', async () => {
    const store = new FakeStore();
    store.unreachable.add('vendas');
    const source = new FakeSource({
      clientes,
      produtos: { headers: [], rows: [] },
      preco_competidores: { headers: [], rows: [] }
    });

    const result = await runCheck(source, store, registry);

    expect(result.ok).toBe(false);
    expect(formatCheckResult(result).split('\n')).toEqual([
      'Spreadsheet: 3 tabs (clientes, produtos, preco_competidores)',
      "  clientes: tab 'clientes', store ok",
      "  produtos: tab 'produtos', store ok",
      "  preco_competidores: tab 'preco_competidores', store ok",
      `  vendas: tab 'vendas' missing, store unreachable (relation "vendas" does not exist)`,
      'Some checks failed'
    ]);
  });

  it('should pass when both ends are reachable', async () => {
    const empty = { headers: [], rows: [] };
    const source = new FakeSource({ clientes: empty, produtos: empty, preco_competidores: empty, vendas: empty });

    const result = await runCheck(source, new FakeStore(), registry);

    expect(result.ok).toBe(true);
  });
});

describe('schema command', () => {
  it('should render the bundled tables in dependency order', () => {
    const sql = runSchema(registry);
    const tables = sql.split('\n').filter((line) => line.startsWith('CREATE TABLE'));

    expect(tables).toEqual([
      'CREATE TABLE IF NOT EXISTS clientes (',
      'CREATE TABLE IF NOT EXISTS produtos (',
      'CREATE TABLE IF NOT EXISTS preco_competidores (',
      'CREATE TABLE IF NOT EXISTS vendas ('
    ]);
    expect(sql).toContain('    id_cliente TEXT REFERENCES clientes(id_cliente),');
  });
});
