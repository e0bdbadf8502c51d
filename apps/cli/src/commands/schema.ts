import { Command } from 'commander';
import fs from 'fs/promises';
import type { SchemaRegistry } from '@sheetreplica/data-ingestion';
import { generateSchemaSql } from '@sheetreplica/database';
import { loadConfig } from '../config';
import { GlobalOptions, loadRegistry } from '../runtime';

export function runSchema(registry: SchemaRegistry): string {
  return generateSchemaSql(registry.dependencyOrder().map((table) => registry.get(table)));
}

interface SchemaFlags {
  out?: string;
}

export const schemaCommand = new Command('schema')
  .description('Print the CREATE TABLE statements for the registered tables')
  .option('--out <file>', 'Write the SQL to a file instead of stdout')
  .action(async (flags: SchemaFlags, command: Command) => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const config = loadConfig(process.env, { schemaFile: globals.schema });
    const sql = runSchema(await loadRegistry(config));

    if (flags.out) {
      await fs.writeFile(flags.out, sql, 'utf8');
      console.log(`Schema written to ${flags.out}`);
    } else {
      process.stdout.write(sql);
    }
  });
