import Database from 'better-sqlite3';
import { TABLES } from '../config/catalog';
import { missingColumns } from '../helpers/dedupeHelper';
import { TABLE_LEVEL_COLUMN } from '../helpers/dictionaryHelper';
import { computeRowKey } from '../helpers/idempotencyHelper';
import {
  AppendResult,
  CellValue,
  DataDictionaryEntry,
  DEVICE_TYPES,
  DeviceType,
  ParticipantOverview,
  ParticipantSensorStats,
  QueryResult,
  ReadOptions,
  RowContext,
  RowFilter,
  StoredRow,
  TableInfo,
  TableKind,
} from '../types';
import { QueryRejectedError } from '../utils/errors';
import {
  addColumnSql,
  CREATE_DATA_DICTIONARY_SQL,
  CREATE_PARTICIPANTS_SQL,
  createDeviceTableSql,
  quoteIdentifier,
} from './schema';

export interface CatalogStoreOptions {
  readonly?: boolean;
}

export interface EnsureTableResult {
  created: boolean;
  addedColumns: string[];
}

export interface ParticipantDetails {
  folder: string | null;
  annotation: string;
  fields?: Record<string, CellValue>;
}

export interface SensorListing {
  sensorName: string;
  device: DeviceType;
  description: string;
  units: string | null;
  samplingRate: string | null;
  sensorType: string | null;
  loaded: boolean;
}

export interface SensorSummary {
  sensorName: string;
  totalRecords: number;
  participantStats: {
    participantId: string;
    sessionId: string | null;
    recordCount: number;
  }[];
}

export interface SensorData {
  sensorName: string;
  columns: string[];
  data: StoredRow[];
  totalRecords: number;
}

export interface DatabaseStats {
  totalParticipants: number;
  totalSensorTypes: number;
  sensorStats: { sensorName: string; recordCount: number }[];
}

type TableDescription = Omit<TableInfo, 'rowCount'>;

interface DictionaryRow {
  table_name: string;
  device: string;
  description: string;
  units: string | null;
  sampling_rate: string | null;
  sensor_type: string | null;
}

function toDeviceType(value: string): DeviceType | null {
  return DEVICE_TYPES.find((device) => device === value) ?? null;
}

/**
 * The single-file SQLite catalog. One process owns the file for writing; the
 * writer runs in WAL mode so read-only openers see a consistent snapshot.
 */
export class CatalogStore {
  private readonly db: Database.Database;
  readonly isReadonly: boolean;

  constructor(
    readonly dbPath: string,
    options: CatalogStoreOptions = {}
  ) {
    this.isReadonly = options.readonly ?? false;
    this.db = new Database(dbPath, {
      readonly: this.isReadonly,
      fileMustExist: this.isReadonly,
    });
    this.db.pragma('foreign_keys = ON');
    if (!this.isReadonly) {
      this.db.pragma('journal_mode = WAL');
    }
  }

  /**
   * Creates participants and data_dictionary if absent and seeds the
   * dictionary. Safe to call on every run.
   */
  initializeSchema(entries: DataDictionaryEntry[]): void {
    this.db.exec(CREATE_PARTICIPANTS_SQL);
    this.db.exec(CREATE_DATA_DICTIONARY_SQL);
    this.writeDictionary(entries, 'REPLACE');
  }

  /**
   * Adds entries without touching existing ones
   */
  addDictionaryEntries(entries: DataDictionaryEntry[]): void {
    this.writeDictionary(entries, 'IGNORE');
  }

  private writeDictionary(entries: DataDictionaryEntry[], mode: 'REPLACE' | 'IGNORE'): void {
    const statement = this.db.prepare<CellValue[]>(
      `INSERT OR ${mode} INTO ${TABLES.DATA_DICTIONARY}
        (table_name, column_name, device, description, units, sampling_rate, sensor_type)
        VALUES (?, ?, ?, ?, ?, ?, ?)`
    );
    const write = this.db.transaction((items: DataDictionaryEntry[]) => {
      for (const entry of items) {
        statement.run(
          entry.tableName,
          entry.columnName,
          entry.device,
          entry.description,
          entry.units,
          entry.samplingRate,
          entry.sensorType
        );
      }
    });
    write(entries);
  }

  ensureParticipantColumns(columns: string[]): string[] {
    const added = missingColumns(this.getColumns(TABLES.PARTICIPANTS), columns);
    for (const column of added) {
      this.db.exec(addColumnSql(TABLES.PARTICIPANTS, column));
    }
    return added;
  }

  /**
   * Inserts the participant unless it exists. Existing rows are never
   * modified. Returns true when a row was created.
   */
  ensureParticipant(participantId: string, details: ParticipantDetails): boolean {
    const fields = details.fields ?? {};
    const names = ['participant_id', 'folder', 'annotation', ...Object.keys(fields)];
    const values: CellValue[] = [
      participantId,
      details.folder,
      details.annotation,
      ...Object.values(fields),
    ];

    const result = this.db
      .prepare<CellValue[]>(
        `INSERT OR IGNORE INTO ${TABLES.PARTICIPANTS} (${names
          .map(quoteIdentifier)
          .join(', ')}) VALUES (${names.map(() => '?').join(', ')})`
      )
      .run(...values);
    return result.changes === 1;
  }

  /**
   * Creates the stream table if absent, then adds any source column it lacks
   */
  ensureDeviceTable(table: string, columns: string[]): EnsureTableResult {
    if (!this.hasTable(table)) {
      this.db.exec(createDeviceTableSql(table, columns));
      return { created: true, addedColumns: [...columns] };
    }

    const added = missingColumns(this.getColumns(table), columns);
    for (const column of added) {
      this.db.exec(addColumnSql(table, column));
    }
    return { created: false, addedColumns: added };
  }

  /**
   * Appends rows in order. A row whose idempotency key is already stored is
   * counted as a duplicate and left alone.
   */
  appendRows(
    table: string,
    columns: string[],
    rows: CellValue[][],
    context: RowContext
  ): AppendResult {
    const names = [
      ...columns,
      'participant_id',
      'session_id',
      'source_file',
      'row_index',
      'row_key',
      'annotation',
    ];
    const statement = this.db.prepare<CellValue[]>(
      `INSERT OR IGNORE INTO ${quoteIdentifier(table)} (${names
        .map(quoteIdentifier)
        .join(', ')}) VALUES (${names.map(() => '?').join(', ')})`
    );

    let inserted = 0;
    let duplicates = 0;
    rows.forEach((row, rowIndex) => {
      const rowKey = computeRowKey({
        participantId: context.participantId,
        device: context.device,
        sourceFile: context.sourceFile,
        rowIndex,
      });
      const result = statement.run(
        ...row,
        context.participantId,
        context.sessionId,
        context.sourceFile,
        rowIndex,
        rowKey,
        context.annotation
      );
      if (result.changes === 1) {
        inserted++;
      } else {
        duplicates++;
      }
    });

    return { inserted, duplicates };
  }

  /**
   * Runs fn as one unit; an exception rolls everything in it back
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  hasTable(name: string): boolean {
    const row = this.db
      .prepare<[string], { name: string }>(
        `SELECT name FROM sqlite_master
          WHERE type = 'table' AND name = ? AND name NOT LIKE 'sqlite_%'`
      )
      .get(name);
    return row !== undefined;
  }

  getColumns(table: string): string[] {
    if (!this.hasTable(table)) {
      return [];
    }
    return this.db
      .prepare<[], { name: string }>(`PRAGMA table_info(${quoteIdentifier(table)})`)
      .all()
      .map((column) => column.name);
  }

  private describeTables(): TableDescription[] {
    const names = this.db
      .prepare<[], { name: string }>(
        `SELECT name FROM sqlite_master
          WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
          ORDER BY name`
      )
      .all()
      .map((row) => row.name);

    const described = new Map<string, DictionaryRow>();
    if (names.includes(TABLES.DATA_DICTIONARY)) {
      for (const row of this.tableLevelEntries()) {
        described.set(row.table_name, row);
      }
    }

    return names.map((name) => {
      let kind: TableKind = 'other';
      let device: DeviceType | null = null;
      const entry = described.get(name);

      if (name === TABLES.PARTICIPANTS) {
        kind = 'participants';
      } else if (name === TABLES.DATA_DICTIONARY) {
        kind = 'dictionary';
      } else if (entry) {
        device = toDeviceType(entry.device);
        kind = device ? 'device' : 'other';
      }

      return { name, kind, device, description: entry?.description ?? null };
    });
  }

  private tableLevelEntries(): DictionaryRow[] {
    return this.db
      .prepare<[string], DictionaryRow>(
        `SELECT table_name, device, description, units, sampling_rate, sensor_type
          FROM ${TABLES.DATA_DICTIONARY}
          WHERE column_name = ?
          ORDER BY table_name`
      )
      .all(TABLE_LEVEL_COLUMN);
  }

  listTables(): TableInfo[] {
    return this.describeTables().map((table) => ({
      ...table,
      rowCount: this.countRows(table.name),
    }));
  }

  isDeviceTable(name: string): boolean {
    return this.describeTables().some((t) => t.name === name && t.kind === 'device');
  }

  private buildWhere(table: string, filter: RowFilter): { clause: string; params: CellValue[] } {
    const columns = new Set(this.getColumns(table).map((c) => c.toLowerCase()));
    const conditions: string[] = [];
    const params: CellValue[] = [];

    if (filter.participantId !== undefined && columns.has('participant_id')) {
      conditions.push('participant_id = ?');
      params.push(filter.participantId);
    }
    if (filter.sessionId !== undefined && columns.has('session_id')) {
      conditions.push('session_id = ?');
      params.push(filter.sessionId);
    }

    return {
      clause: conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '',
      params,
    };
  }

  countRows(table: string, filter: RowFilter = {}): number {
    const { clause, params } = this.buildWhere(table, filter);
    const row = this.db
      .prepare<CellValue[], { count: number }>(
        `SELECT COUNT(*) AS count FROM ${quoteIdentifier(table)}${clause}`
      )
      .get(...params);
    return row?.count ?? 0;
  }

  /**
   * Rows in insertion order
   */
  readRows(table: string, options: ReadOptions): QueryResult {
    const { clause, params } = this.buildWhere(table, options);
    const statement = this.db.prepare<CellValue[], StoredRow>(
      `SELECT * FROM ${quoteIdentifier(table)}${clause} ORDER BY rowid LIMIT ? OFFSET ?`
    );
    const rows = statement.all(...params, options.limit, options.offset);
    return {
      columns: statement.columns().map((column) => column.name),
      rows,
    };
  }

  /**
   * Runs one ad-hoc statement. Anything that could write, or that returns no
   * rows, is rejected before it runs. With `maxRows` only that many rows are
   * read and `truncated` tells whether more were left.
   */
  runReadOnlyQuery(sql: string, params: CellValue[] = [], maxRows?: number): QueryResult {
    const statement = this.db.prepare<CellValue[], StoredRow>(sql);
    if (!statement.readonly || !statement.reader) {
      throw new QueryRejectedError('Only read-only statements that return rows are allowed');
    }
    const columns = statement.columns().map((column) => column.name);
    if (maxRows === undefined) {
      return { columns, rows: statement.all(...params) };
    }

    const rows: StoredRow[] = [];
    let truncated = false;
    for (const row of statement.iterate(...params)) {
      if (rows.length === maxRows) {
        truncated = true;
        break;
      }
      rows.push(row);
    }
    return { columns, rows, truncated };
  }

  getDatabaseStats(): DatabaseStats {
    const tables = this.listTables();
    const participants = tables.find((t) => t.kind === 'participants');
    const hasDictionary = tables.some((t) => t.kind === 'dictionary');

    return {
      totalParticipants: participants?.rowCount ?? 0,
      totalSensorTypes: hasDictionary ? this.tableLevelEntries().length : 0,
      sensorStats: tables
        .filter((t) => t.kind === 'device')
        .map((t) => ({ sensorName: t.name, recordCount: t.rowCount }))
        .sort((a, b) => b.recordCount - a.recordCount),
    };
  }

  getParticipants(): StoredRow[] {
    if (!this.hasTable(TABLES.PARTICIPANTS)) {
      return [];
    }
    return this.db
      .prepare<[], StoredRow>(`SELECT * FROM ${TABLES.PARTICIPANTS} ORDER BY participant_id`)
      .all();
  }

  /**
   * Every stream the dictionary documents, loaded or not
   */
  getSensors(): SensorListing[] {
    if (!this.hasTable(TABLES.DATA_DICTIONARY)) {
      return [];
    }

    const listings: SensorListing[] = [];
    for (const row of this.tableLevelEntries()) {
      const device = toDeviceType(row.device);
      if (!device) continue;
      listings.push({
        sensorName: row.table_name,
        device,
        description: row.description,
        units: row.units,
        samplingRate: row.sampling_rate,
        sensorType: row.sensor_type,
        loaded: this.hasTable(row.table_name),
      });
    }
    return listings;
  }

  getSensorSummary(sensorName: string): SensorSummary | null {
    if (!this.isDeviceTable(sensorName)) {
      return null;
    }

    const participantStats = this.db
      .prepare<[], { participant_id: string; session_id: string | null; record_count: number }>(
        `SELECT participant_id, session_id, COUNT(*) AS record_count
          FROM ${quoteIdentifier(sensorName)}
          GROUP BY participant_id, session_id
          ORDER BY participant_id, session_id`
      )
      .all()
      .map((row) => ({
        participantId: row.participant_id,
        sessionId: row.session_id,
        recordCount: row.record_count,
      }));

    return {
      sensorName,
      totalRecords: this.countRows(sensorName),
      participantStats,
    };
  }

  getSensorData(
    sensorName: string,
    filter: RowFilter,
    limit: number
  ): SensorData | null {
    if (!this.isDeviceTable(sensorName)) {
      return null;
    }

    const result = this.readRows(sensorName, { ...filter, limit, offset: 0 });
    return {
      sensorName,
      columns: result.columns,
      data: result.rows,
      totalRecords: result.rows.length,
    };
  }

  getParticipantOverview(participantId: string): ParticipantOverview | null {
    if (!this.hasTable(TABLES.PARTICIPANTS)) {
      return null;
    }

    const participantInfo = this.db
      .prepare<[string], StoredRow>(
        `SELECT * FROM ${TABLES.PARTICIPANTS} WHERE participant_id = ?`
      )
      .get(participantId);
    if (!participantInfo) {
      return null;
    }

    const sensorStats: ParticipantSensorStats[] = [];
    for (const table of this.describeTables()) {
      if (table.kind !== 'device') continue;

      const sessionStats = this.db
        .prepare<[string], { session_id: string | null; record_count: number }>(
          `SELECT session_id, COUNT(*) AS record_count
            FROM ${quoteIdentifier(table.name)}
            WHERE participant_id = ?
            GROUP BY session_id
            ORDER BY session_id`
        )
        .all(participantId)
        .map((row) => ({ sessionId: row.session_id, recordCount: row.record_count }));

      if (sessionStats.length > 0) {
        sensorStats.push({
          sensorName: table.name,
          description: table.description,
          sessionStats,
        });
      }
    }

    return { participantId, participantInfo, sensorStats };
  }

  close(): void {
    this.db.close();
  }
}
