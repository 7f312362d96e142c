export const DEVICE_TYPES = ['earable', 'headband', 'chest', 'wristband'] as const;

/**
 * One of the four wearable device families a stream can belong to
 */
export type DeviceType = (typeof DEVICE_TYPES)[number];

/**
 * A value as it is parsed from a source file and bound into SQLite
 */
export type CellValue = string | number | null;

/**
 * A value as SQLite hands it back
 */
export type StoredValue = string | number | bigint | Buffer | null;

export type StoredRow = Record<string, StoredValue>;

/**
 * Known layout and documentation of a single sensor stream
 */
export interface SensorDefinition {
  device: DeviceType;
  columns: string[];
  description: string;
  units: string;
  samplingRate: string;
  sensorType: string;
}

export interface DeviceDefinition {
  device: DeviceType;
  label: string;
  prefixes: string[]; // file stem prefixes claimed by the device
}

export interface SensorCatalog {
  devices: DeviceDefinition[];
  sensors: Record<string, SensorDefinition>;
  columnDescriptions: Record<string, string>;
}

/**
 * Row of the data_dictionary table. A table-level entry uses column name "*"
 */
export interface DataDictionaryEntry {
  tableName: string;
  columnName: string;
  device: DeviceType;
  description: string;
  units: string | null;
  samplingRate: string | null;
  sensorType: string | null;
}

export type TableKind = 'participants' | 'dictionary' | 'device' | 'other';

export interface TableInfo {
  name: string;
  kind: TableKind;
  device: DeviceType | null;
  description: string | null;
  rowCount: number;
}

export interface RowFilter {
  participantId?: string;
  sessionId?: string;
}

export interface ReadOptions extends RowFilter {
  limit: number;
  offset: number;
}

export interface QueryResult {
  columns: string[];
  rows: StoredRow[];
  truncated?: boolean; // set when a row cap stopped the read early
}
