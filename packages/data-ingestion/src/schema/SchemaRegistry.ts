import fs from 'fs/promises';
import { z } from 'zod';
import { COLUMN_TYPES, ColumnType, TableSchema } from '@sheetreplica/types';
import { SchemaError } from '../utils/errors';
import { getErrorMessage } from '../utils/errorUtils';
import defaultSchemaFile from '../../config/schemas.json';

// Table and column names end up in SQL, so they are kept to plain identifiers
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const ColumnTypeSchema = z.custom<ColumnType>(
  (value) => typeof value === 'string' && COLUMN_TYPES.some((type) => type === value),
  { message: `Column type must be one of ${COLUMN_TYPES.join(', ')}` }
);

const TableSchemaSchema = z
  .object({
    name: z.string().regex(IDENTIFIER, 'Table name must be a plain identifier'),
    sheet: z.string().min(1).optional(),
    columns: z.array(z.string().regex(IDENTIFIER, 'Column name must be a plain identifier')).min(1),
    required: z.array(z.string()).default([]),
    types: z.record(ColumnTypeSchema).default({}),
    foreignKeys: z.record(z.string().min(1)).optional(),
    primaryKey: z.string().min(1).optional()
  })
  .superRefine((schema, ctx) => {
    const declared = new Set(schema.columns);

    if (declared.size !== schema.columns.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Duplicate column names', path: ['columns'] });
    }

    const mustBeDeclared = (columns: string[], path: string) => {
      for (const column of columns) {
        if (!declared.has(column)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Column '${column}' is not one of the table columns`,
            path: [path]
          });
        }
      }
    };

    mustBeDeclared(schema.required, 'required');
    mustBeDeclared(Object.keys(schema.types), 'types');
    mustBeDeclared(Object.keys(schema.foreignKeys ?? {}), 'foreignKeys');
    if (schema.primaryKey) mustBeDeclared([schema.primaryKey], 'primaryKey');

    for (const [column, table] of Object.entries(schema.foreignKeys ?? {})) {
      if (table === schema.name) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Foreign key '${column}' references its own table`,
          path: ['foreignKeys', column]
        });
      }
    }
  });

const SchemaFileSchema = z.object({
  tables: z.array(TableSchemaSchema).min(1)
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}

/**
 * Process-wide static table declarations.
 * Validated once at construction; lookups never mutate the schemas.
 */
export class SchemaRegistry {
  private readonly schemas = new Map<string, TableSchema>();

  constructor(schemas: TableSchema[]) {
    const parsed = SchemaFileSchema.safeParse({ tables: schemas });
    if (!parsed.success) {
      throw new SchemaError('Invalid table schema', formatIssues(parsed.error));
    }

    for (const schema of parsed.data.tables) {
      if (this.schemas.has(schema.name)) {
        throw new SchemaError(`Table '${schema.name}' is declared more than once`);
      }
      this.schemas.set(schema.name, Object.freeze({ ...schema }));
    }

    const danglingReferences: string[] = [];
    for (const schema of this.schemas.values()) {
      for (const [column, table] of Object.entries(schema.foreignKeys ?? {})) {
        const referenced = this.schemas.get(table);
        if (!referenced) {
          danglingReferences.push(`${schema.name}.${column} references unknown table '${table}'`);
        } else if (!referenced.columns.includes(column)) {
          danglingReferences.push(`${schema.name}.${column} references missing column ${table}.${column}`);
        }
      }
    }
    if (danglingReferences.length > 0) {
      throw new SchemaError('Invalid foreign keys', danglingReferences);
    }

    // Fails fast on cycles
    this.dependencyOrder();
  }

  /**
   * Build a registry from parsed JSON of the shape { tables: TableSchema[] }
   */
  static fromJson(data: unknown): SchemaRegistry {
    const parsed = SchemaFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new SchemaError('Invalid schema file', formatIssues(parsed.error));
    }
    return new SchemaRegistry(parsed.data.tables);
  }

  static async fromFile(filePath: string): Promise<SchemaRegistry> {
    let contents: string;
    try {
      contents = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new SchemaError(`Cannot read schema file ${filePath}`, [
        getErrorMessage(error)
      ]);
    }

    let data: unknown;
    try {
      data = JSON.parse(contents);
    } catch (error) {
      throw new SchemaError(`Schema file ${filePath} is not valid JSON`, [
        getErrorMessage(error)
      ]);
    }

    return SchemaRegistry.fromJson(data);
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  get(name: string): TableSchema {
    const schema = this.schemas.get(name);
    if (!schema) {
      throw new SchemaError(`Unknown table '${name}'`, [`Known tables: ${this.names().join(', ')}`]);
    }
    return schema;
  }

  list(): TableSchema[] {
    return Array.from(this.schemas.values());
  }

  names(): string[] {
    return Array.from(this.schemas.keys());
  }

  sheetOf(name: string): string {
    const schema = this.get(name);
    return schema.sheet ?? schema.name;
  }

  /**
   * Tables ordered so that every referenced table precedes the tables referencing it.
   * Ties keep registration order. With `names`, only those tables are returned.
   */
  dependencyOrder(names?: string[]): string[] {
    const pending = this.names();
    const placed = new Set<string>();
    const ordered: string[] = [];

    while (pending.length > 0) {
      const index = pending.findIndex((name) => {
        const references = Object.values(this.schemas.get(name)?.foreignKeys ?? {});
        return references.every((table) => placed.has(table));
      });

      if (index === -1) {
        throw new SchemaError('Foreign keys form a cycle', pending);
      }

      const [next] = pending.splice(index, 1);
      placed.add(next);
      ordered.push(next);
    }

    if (!names) return ordered;

    for (const name of names) {
      this.get(name);
    }
    const wanted = new Set(names);
    return ordered.filter((name) => wanted.has(name));
  }
}

/**
 * Registry holding the bundled e-commerce tables (clientes, produtos, preco_competidores, vendas)
 */
export function defaultRegistry(): SchemaRegistry {
  return SchemaRegistry.fromJson(defaultSchemaFile);
}

export default SchemaRegistry;
