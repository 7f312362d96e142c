import { ExtractionSummary, FileOutcome } from '../types';

/**
 * Folds per-file outcomes into the summary of an extraction run
 */
export function computeSummary(
  rootPath: string,
  participants: number,
  outcomes: FileOutcome[],
  durationMs: number
): ExtractionSummary {
  const summary = defaultSummary(rootPath);
  summary.participants = participants;
  summary.durationMs = durationMs;

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'processed':
        summary.filesProcessed += 1;
        summary.rowsInserted += outcome.inserted;
        summary.rowsDuplicate += outcome.duplicates;
        summary.tables[outcome.table] =
          (summary.tables[outcome.table] ?? 0) + outcome.inserted;
        break;
      case 'skipped':
        summary.filesSkipped.push({
          path: outcome.file.relativePath,
          reason: outcome.reason,
        });
        break;
      case 'ignored':
        if (outcome.reason === 'unmatched') {
          summary.filesUnmatched += 1;
        } else {
          summary.filesIgnored += 1;
        }
        break;
    }
  }

  return summary;
}

/**
 * Summary of a run that has not touched any file yet
 */
export function defaultSummary(rootPath: string): ExtractionSummary {
  return {
    rootPath,
    participants: 0,
    filesProcessed: 0,
    filesSkipped: [],
    filesIgnored: 0,
    filesUnmatched: 0,
    rowsInserted: 0,
    rowsDuplicate: 0,
    tables: {},
    durationMs: 0,
  };
}
