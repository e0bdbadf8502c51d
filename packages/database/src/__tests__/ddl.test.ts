import { describe, it, expect } from '@jest/globals'
import type { TableSchema } from '@sheetreplica/types'
import { generateColumnSql, generateCreateTableSql, generateIndexSql, generateSchemaSql } from '../ddl'

const produtos: TableSchema = {
  name: 'produtos',
  columns: ['id_produto', 'nome_produto', 'preco_atual', 'data_criacao'],
  required: ['id_produto', 'nome_produto'],
  types: { preco_atual: 'decimal', data_criacao: 'date' },
  primaryKey: 'id_produto'
}

const vendas: TableSchema = {
  name: 'vendas',
  columns: ['id_venda', 'id_produto', 'quantidade', 'data_venda'],
  required: ['id_venda'],
  types: { quantidade: 'integer', data_venda: 'date' },
  foreignKeys: { id_produto: 'produtos' },
  primaryKey: 'id_venda'
}

describe('schema SQL', () => {
  it('should map column types and constraints', () => {
    expect(generateColumnSql(produtos, 'id_produto')).toBe('id_produto TEXT PRIMARY KEY')
    expect(generateColumnSql(produtos, 'nome_produto')).toBe('nome_produto TEXT NOT NULL')
    expect(generateColumnSql(produtos, 'preco_atual')).toBe('preco_atual DECIMAL(10,2)')
    expect(generateColumnSql(vendas, 'quantidade')).toBe('quantidade INTEGER')
    expect(generateColumnSql(vendas, 'id_produto')).toBe('id_produto TEXT REFERENCES produtos(id_produto)')
  })

  it('should render a CREATE TABLE statement', () => {
    expect(generateCreateTableSql(vendas)).toBe([
      '-- Table: vendas',
      'CREATE TABLE IF NOT EXISTS vendas (',
      '    id_venda TEXT PRIMARY KEY,',
      '    id_produto TEXT REFERENCES produtos(id_produto),',
      '    quantidade INTEGER,',
      '    data_venda DATE',
      ');'
    ].join('\n'))
  })

  it('should index foreign key and date columns', () => {
    expect(generateIndexSql(vendas)).toEqual([
      'CREATE INDEX IF NOT EXISTS idx_vendas_id_produto ON vendas(id_produto);',
      'CREATE INDEX IF NOT EXISTS idx_vendas_data_venda ON vendas(data_venda);'
    ])
  })

  it('should render tables in the order given, then the indexes', () => {
    const sql = generateSchemaSql([produtos, vendas])

    expect(sql.indexOf('CREATE TABLE IF NOT EXISTS produtos')).toBeLessThan(
      sql.indexOf('CREATE TABLE IF NOT EXISTS vendas')
    )
    expect(sql.split('\n').filter((line) => line.startsWith('CREATE INDEX'))).toEqual([
      'CREATE INDEX IF NOT EXISTS idx_produtos_data_criacao ON produtos(data_criacao);',
      'CREATE INDEX IF NOT EXISTS idx_vendas_id_produto ON vendas(id_produto);',
      'CREATE INDEX IF NOT EXISTS idx_vendas_data_venda ON vendas(data_venda);'
    ])
    expect(sql.endsWith(');\n')).toBe(true)
  })
})
