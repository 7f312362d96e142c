import { DataDictionaryEntry, SensorCatalog } from '../types';
import { SensorMatch } from '../parsers/types';

export const TABLE_LEVEL_COLUMN = '*';

/**
 * Entries seeded for every known stream, whether or not its table exists yet
 */
export function buildDictionaryEntries(catalog: SensorCatalog): DataDictionaryEntry[] {
  const entries: DataDictionaryEntry[] = [];

  for (const [tableName, sensor] of Object.entries(catalog.sensors)) {
    entries.push({
      tableName,
      columnName: TABLE_LEVEL_COLUMN,
      device: sensor.device,
      description: sensor.description,
      units: sensor.units,
      samplingRate: sensor.samplingRate,
      sensorType: sensor.sensorType,
    });

    for (const column of sensor.columns) {
      entries.push({
        tableName,
        columnName: column,
        device: sensor.device,
        description: catalog.columnDescriptions[column] ?? column,
        units: null,
        samplingRate: null,
        sensorType: null,
      });
    }
  }

  return entries;
}

/**
 * Entries for a stream as it was actually loaded. Known streams only gain
 * rows for extra columns; unknown streams get a generic table-level entry.
 */
export function buildStreamEntries(
  match: SensorMatch,
  columns: string[],
  columnDescriptions: Record<string, string>
): DataDictionaryEntry[] {
  const entries: DataDictionaryEntry[] = [
    {
      tableName: match.table,
      columnName: TABLE_LEVEL_COLUMN,
      device: match.device,
      description: match.definition?.description ?? match.annotation,
      units: match.definition?.units ?? null,
      samplingRate: match.definition?.samplingRate ?? null,
      sensorType: match.definition?.sensorType ?? null,
    },
  ];

  for (const column of columns) {
    entries.push({
      tableName: match.table,
      columnName: column,
      device: match.device,
      description: columnDescriptions[column] ?? column,
      units: null,
      samplingRate: null,
      sensorType: null,
    });
  }

  return entries;
}
