#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { loadConfig } from '../config/catalog';
import { CatalogStore } from '../store/catalogStore';
import { QueryResult } from '../types';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { parseArgs, UsageError } from './args';

const USAGE = `Usage: wearable-query [--db <file>] [--json] "<select statement>"
       wearable-query [--db <file>] [--json] --tables

  --db      catalog database file (or CATALOG_DB_PATH, default ./catalog.db)
  --json    print rows as JSON instead of a table
  --tables  list every table with its kind, device and row count`;

/**
 * JSON text of query rows. SQLite integers too large for a number come back
 * as bigint and are written as strings.
 */
export function toJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, item: unknown) => (typeof item === 'bigint' ? item.toString() : item),
    2
  );
}

export interface QueryOutput {
  write(text: string): void;
  table(rows: unknown[]): void;
}

const consoleOutput: QueryOutput = {
  write: (text) => console.log(text),
  table: (rows) => console.table(rows),
};

function printResult(result: QueryResult, asJson: boolean, output: QueryOutput): void {
  if (asJson) {
    output.write(toJson(result.rows));
  } else if (result.rows.length === 0) {
    output.write(`(no rows) columns: ${result.columns.join(', ')}`);
  } else {
    output.table(result.rows);
  }
}

/**
 * Runs one read-only statement against the catalog and returns the exit code
 */
export function runQuery(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  output: QueryOutput = consoleOutput
): number {
  let store: CatalogStore | null = null;

  try {
    const { flags, positionals } = parseArgs(argv, ['json', 'tables', 'help']);
    if (flags.help) {
      output.write(USAGE);
      return 0;
    }

    const config = loadConfig(env);
    // stdout carries results; only problems are logged
    logger.setLevel('warn');

    const asJson = flags.json === 'true';
    const listTables = flags.tables === 'true';
    const sql = positionals.join(' ').trim();
    if (!listTables && sql === '') {
      throw new UsageError('A statement or --tables is required');
    }

    store = new CatalogStore(flags.db ?? config.dbPath, { readonly: true });

    if (listTables) {
      const tables = store.listTables();
      if (asJson) {
        output.write(toJson(tables));
      } else {
        output.table(tables);
      }
    } else {
      printResult(store.runReadOnlyQuery(sql), asJson, output);
    }
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
    } else {
      logger.error('query_failed', { error: errorMessage(error) });
    }
    return 1;
  } finally {
    store?.close();
  }
}

if (require.main === module) {
  dotenv.config();
  process.exitCode = runQuery(process.argv.slice(2));
}
