import { TABLES } from '../config/catalog';

/**
 * Quotes an identifier for SQLite. Source column names are arbitrary text
 * and are always written through this.
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export const CREATE_PARTICIPANTS_SQL = `
  CREATE TABLE IF NOT EXISTS ${TABLES.PARTICIPANTS} (
    participant_id TEXT PRIMARY KEY,
    folder TEXT,
    annotation TEXT,
    created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
  )
`;

export const CREATE_DATA_DICTIONARY_SQL = `
  CREATE TABLE IF NOT EXISTS ${TABLES.DATA_DICTIONARY} (
    table_name TEXT NOT NULL,
    column_name TEXT NOT NULL,
    device TEXT NOT NULL,
    description TEXT NOT NULL,
    units TEXT,
    sampling_rate TEXT,
    sensor_type TEXT,
    PRIMARY KEY (table_name, column_name)
  )
`;

/**
 * Device stream table. Source columns carry no declared type so SQLite keeps
 * each value exactly as bound.
 */
export function createDeviceTableSql(table: string, columns: string[]): string {
  const sourceColumns = columns.map((column) => `    ${quoteIdentifier(column)},`);
  return [
    `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(table)} (`,
    '    id INTEGER PRIMARY KEY AUTOINCREMENT,',
    ...sourceColumns,
    `    participant_id TEXT NOT NULL REFERENCES ${TABLES.PARTICIPANTS} (participant_id),`,
    '    session_id TEXT,',
    '    source_file TEXT NOT NULL,',
    '    row_index INTEGER NOT NULL,',
    '    row_key TEXT NOT NULL UNIQUE,',
    '    annotation TEXT,',
    '    created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP',
    ')',
  ].join('\n');
}

export function addColumnSql(table: string, column: string): string {
  return `ALTER TABLE ${quoteIdentifier(table)} ADD COLUMN ${quoteIdentifier(column)}`;
}
