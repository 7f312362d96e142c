import { SourceFile } from './reading';

export type IgnoreReason = 'unsupported_extension' | 'unmatched';

export type FileOutcome =
  | {
      status: 'processed';
      file: SourceFile;
      table: string;
      inserted: number;
      duplicates: number;
    }
  | { status: 'skipped'; file: SourceFile; reason: string }
  | { status: 'ignored'; file: SourceFile; reason: IgnoreReason };

export interface SkippedFile {
  path: string;
  reason: string;
}

/**
 * Result of one extraction run
 */
export interface ExtractionSummary {
  rootPath: string;
  participants: number;
  filesProcessed: number;
  filesSkipped: SkippedFile[];
  filesIgnored: number;
  filesUnmatched: number;
  rowsInserted: number;
  rowsDuplicate: number;
  tables: Record<string, number>; // rows inserted per table in this run
  durationMs: number;
}
