import { DeviceType, RawTable, SensorDefinition, SourceFile } from '../types';

/**
 * Reads one file format into raw records
 */
export interface TabularReader {
  format: string;
  extensions: readonly string[]; // lower-case, with leading dot
  read(filePath: string): Promise<RawTable>;
}

/**
 * Where a recognised file goes and how it is documented
 */
export interface SensorMatch {
  device: DeviceType;
  table: string;
  definition: SensorDefinition | null; // null for streams outside the catalog
  annotation: string;
}

/**
 * Claims the files of one device type
 */
export interface DeviceParser {
  device: DeviceType;
  label: string;
  matches(file: SourceFile): SensorMatch | null;
}
