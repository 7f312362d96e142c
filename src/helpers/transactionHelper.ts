import { SensorMatch } from '../parsers/types';
import { CatalogStore } from '../store/catalogStore';
import { AppendResult, ParsedTable, RowContext } from '../types';
import { errorCode } from '../utils/errors';
import { metrics } from '../utils/metrics';
import { buildStreamEntries } from './dictionaryHelper';

export interface FileAppendResult extends AppendResult {
  tableCreated: boolean;
  addedColumns: string[];
}

const MAX_TRANSACTION_RETRIES = 3;
const BASE_RETRY_DELAY_MS = 100;

// Raised by what a file contains (too many columns, oversized values,
// constraint failures) rather than by the database file itself
const FILE_CONTENT_ERROR_CODES = ['SQLITE_ERROR', 'SQLITE_TOOBIG', 'SQLITE_RANGE', 'SQLITE_MISMATCH'];

/**
 * Writes one parsed file as a single transaction: table creation or
 * widening, dictionary entries and rows. A failure rolls back this file
 * only. A locked database is retried with exponential backoff; any other
 * error is rethrown for the caller to classify with `isFileContentError`.
 */
export async function appendFileInTransaction(
  store: CatalogStore,
  match: SensorMatch,
  parsed: ParsedTable,
  context: RowContext,
  columnDescriptions: Record<string, string>
): Promise<FileAppendResult> {
  let lastError: unknown = null;

  for (let attempt = 0; attempt < MAX_TRANSACTION_RETRIES; attempt++) {
    try {
      return store.transaction(() => {
        const ensured = store.ensureDeviceTable(match.table, parsed.columns);
        store.addDictionaryEntries(
          buildStreamEntries(match, parsed.columns, columnDescriptions)
        );
        const appended = store.appendRows(match.table, parsed.columns, parsed.rows, context);
        return {
          ...appended,
          tableCreated: ensured.created,
          addedColumns: ensured.addedColumns,
        };
      });
    } catch (error) {
      lastError = error;
      if (attempt < MAX_TRANSACTION_RETRIES - 1 && isBusyError(error)) {
        metrics.recordTransactionRetry(context.sourceFile, attempt + 1);
        await new Promise((resolve) =>
          setTimeout(resolve, Math.pow(2, attempt) * BASE_RETRY_DELAY_MS)
        );
        continue;
      }
      throw error;
    }
  }

  throw lastError ?? new Error('Transaction failed after retries');
}

export function isBusyError(error: unknown): boolean {
  const code = errorCode(error);
  return code === 'SQLITE_BUSY' || code === 'SQLITE_LOCKED';
}

export function isFileContentError(error: unknown): boolean {
  const code = errorCode(error);
  if (code === undefined) return false;
  return FILE_CONTENT_ERROR_CODES.includes(code) || code.startsWith('SQLITE_CONSTRAINT');
}
