import { CellValue, DeviceType } from './catalog';

/**
 * A file found under a participant folder
 */
export interface SourceFile {
  absolutePath: string;
  relativePath: string; // posix separators, relative to the extraction root
  name: string;
  stem: string;
  extension: string; // lower-case, with leading dot
  participantId: string;
  sessionId: string | null;
}

/**
 * Records exactly as a reader produced them, header line included
 */
export interface RawTable {
  records: CellValue[][];
}

/**
 * Header resolved, every row as wide as the header
 */
export interface ParsedTable {
  columns: string[];
  rows: CellValue[][];
  hasHeader: boolean;
}

/**
 * Bookkeeping values written next to every reading
 */
export interface RowContext {
  participantId: string;
  sessionId: string | null;
  device: DeviceType;
  sourceFile: string;
  annotation: string;
}

export interface AppendResult {
  inserted: number;
  duplicates: number;
}
