import { constants as fsConstants, Dirent, promises as fs, Stats } from 'fs';
import path from 'path';
import {
  DEFAULT_METADATA_FILE,
  PARTICIPANT_COLUMNS,
  RESERVED_COLUMNS,
} from '../config/catalog';
import { computeSummary } from '../helpers/aggregateHelper';
import { buildDictionaryEntries } from '../helpers/dictionaryHelper';
import {
  appendFileInTransaction,
  FileAppendResult,
  isFileContentError,
} from '../helpers/transactionHelper';
import { readDelimited } from '../parsers/delimited';
import { resolveHeader } from '../parsers/header';
import { ParserRegistry } from '../parsers/registry';
import { SensorMatch, TabularReader } from '../parsers/types';
import { CatalogStore } from '../store/catalogStore';
import {
  CellValue,
  ExtractionSummary,
  FileOutcome,
  ParsedTable,
  RowContext,
  SensorCatalog,
  SourceFile,
} from '../types';
import {
  errorCode,
  errorMessage,
  errorStack,
  ExtractionError,
  ExtractionErrorCode,
  FileParseError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { metrics } from '../utils/metrics';
import { splitFileName, toPosixPath } from '../utils/normalizer';
import { validateColumns, validateTableName } from '../utils/validator';

export interface ExtractOptions {
  rootPath: string;
  store: CatalogStore;
  registry: ParserRegistry;
  catalog: SensorCatalog;
  metadataFile?: string;
}

const FOLDER_ANNOTATION = 'Participant folder found during extraction';
const METADATA_ANNOTATION = 'Participant session schedule from metadata';
const PARTICIPANT_ID_HEADERS = ['participant_id', 'participant', 'id'];

/**
 * One extraction run over a root folder. Each immediate subfolder is a
 * participant; files inside it have no session, files one level deeper
 * belong to the session named by their folder.
 *
 * A file that cannot be read or does not fit a table is skipped with a
 * warning. A missing root, an unreadable folder or a store error aborts the
 * run.
 */
export async function extractFolder(options: ExtractOptions): Promise<ExtractionSummary> {
  const startTime = Date.now();
  const rootPath = path.resolve(options.rootPath);
  const { store, registry, catalog } = options;

  try {
    await assertReadableRoot(rootPath);
    const participantFolders = (await readDirectory(rootPath, 'ROOT_UNREADABLE'))
      .filter((entry) => entry.isDirectory() && !isHidden(entry.name))
      .map((entry) => entry.name);

    logger.info('extraction_started', {
      rootPath,
      dbPath: store.dbPath,
      participantFolders: participantFolders.length,
    });

    store.initializeSchema(buildDictionaryEntries(catalog));
    await loadParticipantMetadata(
      rootPath,
      options.metadataFile ?? DEFAULT_METADATA_FILE,
      participantFolders,
      store
    );

    const outcomes: FileOutcome[] = [];
    for (const folder of participantFolders) {
      store.ensureParticipant(folder, { folder, annotation: FOLDER_ANNOTATION });
      for (const file of await collectSourceFiles(rootPath, folder)) {
        outcomes.push(await processFile(file, store, registry, catalog));
      }
    }

    const summary = computeSummary(
      rootPath,
      participantFolders.length,
      outcomes,
      Date.now() - startTime
    );
    metrics.recordDuration(rootPath, summary.durationMs);

    for (const table of store.listTables()) {
      logger.info('catalog_table_stats', { table: table.name, rowCount: table.rowCount });
    }
    logger.info('extraction_completed', {
      rootPath,
      participants: summary.participants,
      filesProcessed: summary.filesProcessed,
      filesSkipped: summary.filesSkipped.length,
      filesIgnored: summary.filesIgnored,
      filesUnmatched: summary.filesUnmatched,
      rowsInserted: summary.rowsInserted,
      rowsDuplicate: summary.rowsDuplicate,
      durationMs: summary.durationMs,
    });

    return summary;
  } catch (error) {
    logger.error('extraction_failed', {
      rootPath,
      error: errorMessage(error),
      code: errorCode(error),
      stack: errorStack(error),
    });
    throw error;
  }
}

async function processFile(
  file: SourceFile,
  store: CatalogStore,
  registry: ParserRegistry,
  catalog: SensorCatalog
): Promise<FileOutcome> {
  const reader = registry.readerFor(file);
  if (!reader) {
    return { status: 'ignored', file, reason: 'unsupported_extension' };
  }

  const match = registry.resolve(file);
  if (!match) {
    logger.debug('extraction_file_unmatched', { sourceFile: file.relativePath });
    return { status: 'ignored', file, reason: 'unmatched' };
  }

  let parsed: ParsedTable;
  try {
    parsed = await readSourceFile(file, reader, match);
  } catch (error) {
    return skipFile(file, match, errorMessage(error));
  }

  const context: RowContext = {
    participantId: file.participantId,
    sessionId: file.sessionId,
    device: match.device,
    sourceFile: file.relativePath,
    annotation: match.annotation,
  };
  let result: FileAppendResult;
  try {
    result = await appendFileInTransaction(
      store,
      match,
      parsed,
      context,
      catalog.columnDescriptions
    );
  } catch (error) {
    // the file's transaction is rolled back; only store failures end the run
    if (!isFileContentError(error)) {
      throw error;
    }
    return skipFile(file, match, errorMessage(error));
  }

  if (result.duplicates > 0) {
    metrics.recordDuplicates(match.table, file.relativePath, result.duplicates);
  }
  metrics.recordFileProcessed(match.table, result.inserted);
  logger.info('extraction_file_processed', {
    sourceFile: file.relativePath,
    table: match.table,
    device: match.device,
    rowsInserted: result.inserted,
    rowsDuplicate: result.duplicates,
    tableCreated: result.tableCreated,
    addedColumns: result.addedColumns.join(','),
  });

  return {
    status: 'processed',
    file,
    table: match.table,
    inserted: result.inserted,
    duplicates: result.duplicates,
  };
}

function skipFile(file: SourceFile, match: SensorMatch, reason: string): FileOutcome {
  logger.warn('extraction_file_skipped', {
    sourceFile: file.relativePath,
    table: match.table,
    reason,
  });
  metrics.recordFileSkipped(file.relativePath, reason);
  return { status: 'skipped', file, reason };
}

async function readSourceFile(
  file: SourceFile,
  reader: TabularReader,
  match: SensorMatch
): Promise<ParsedTable> {
  const tableCheck = validateTableName(match.table);
  if (!tableCheck.isValid) {
    throw new FileParseError(tableCheck.errors.join('; '));
  }

  const parsed = resolveHeader(await reader.read(file.absolutePath), match.definition);

  const columnCheck = validateColumns(parsed.columns, RESERVED_COLUMNS);
  if (!columnCheck.isValid) {
    throw new FileParseError(columnCheck.errors.join('; '));
  }
  return parsed;
}

/**
 * Creates participant rows from metadata.csv before any folder is walked, so
 * that metadata lands with the row instead of updating it later. Returns the
 * number of participants created.
 */
async function loadParticipantMetadata(
  rootPath: string,
  metadataFile: string,
  participantFolders: string[],
  store: CatalogStore
): Promise<number> {
  const metadataPath = path.join(rootPath, metadataFile);
  if (!(await isFile(metadataPath))) {
    logger.info('metadata_not_found', { metadataPath });
    return 0;
  }

  let metadata: ParticipantMetadata;
  try {
    metadata = await readParticipantMetadata(metadataPath);
  } catch (error) {
    logger.warn('metadata_skipped', { metadataPath, reason: errorMessage(error) });
    return 0;
  }

  const { parsed, idIndex, fieldColumns } = metadata;
  let created = 0;
  let missingIds = 0;

  store.transaction(() => {
    store.ensureParticipantColumns(fieldColumns);

    for (const row of parsed.rows) {
      const idValue = row[idIndex];
      if (idValue === null) {
        missingIds++;
        continue;
      }

      // ids keep their written form: numbers only come back for text that prints the same
      const participantId = String(idValue);
      const fields: Record<string, CellValue> = {};
      parsed.columns.forEach((column, index) => {
        if (index !== idIndex) {
          fields[column] = row[index];
        }
      });

      const inserted = store.ensureParticipant(participantId, {
        folder: participantFolders.includes(participantId) ? participantId : null,
        annotation: METADATA_ANNOTATION,
        fields,
      });
      if (inserted) created++;
    }
  });

  if (missingIds > 0) {
    logger.warn('metadata_rows_without_id', { metadataPath, rows: missingIds });
  }
  logger.info('metadata_loaded', { metadataPath, rows: parsed.rows.length, created });
  return created;
}

interface ParticipantMetadata {
  parsed: ParsedTable;
  idIndex: number;
  fieldColumns: string[];
}

async function readParticipantMetadata(metadataPath: string): Promise<ParticipantMetadata> {
  const parsed = resolveHeader(await readDelimited(metadataPath), null);
  const idIndex = findParticipantIdColumn(parsed.columns);
  const fieldColumns = parsed.columns.filter((_, index) => index !== idIndex);

  if (fieldColumns.length > 0) {
    const check = validateColumns(fieldColumns, PARTICIPANT_COLUMNS);
    if (!check.isValid) {
      throw new FileParseError(check.errors.join('; '));
    }
  }
  return { parsed, idIndex, fieldColumns };
}

export function findParticipantIdColumn(columns: string[]): number {
  const index = columns.findIndex((column) =>
    PARTICIPANT_ID_HEADERS.includes(column.trim().toLowerCase())
  );
  return index === -1 ? 0 : index;
}

async function collectSourceFiles(rootPath: string, folder: string): Promise<SourceFile[]> {
  const folderPath = path.join(rootPath, folder);
  const files: SourceFile[] = [];

  for (const entry of await readDirectory(folderPath, 'FOLDER_UNREADABLE')) {
    if (isHidden(entry.name)) continue;

    const entryPath = path.join(folderPath, entry.name);
    if (entry.isFile()) {
      files.push(toSourceFile(rootPath, entryPath, folder, null));
    } else if (entry.isDirectory()) {
      for (const sessionEntry of await readDirectory(entryPath, 'FOLDER_UNREADABLE')) {
        if (sessionEntry.isFile() && !isHidden(sessionEntry.name)) {
          files.push(
            toSourceFile(rootPath, path.join(entryPath, sessionEntry.name), folder, entry.name)
          );
        }
      }
    }
  }

  return files;
}

function toSourceFile(
  rootPath: string,
  absolutePath: string,
  participantId: string,
  sessionId: string | null
): SourceFile {
  const name = path.basename(absolutePath);
  const { stem, extension } = splitFileName(name);
  return {
    absolutePath,
    relativePath: toPosixPath(path.relative(rootPath, absolutePath)),
    name,
    stem,
    extension,
    participantId,
    sessionId,
  };
}

async function assertReadableRoot(rootPath: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await fs.stat(rootPath);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new ExtractionError('ROOT_NOT_FOUND', `Root folder does not exist: ${rootPath}`);
    }
    throw new ExtractionError(
      'ROOT_UNREADABLE',
      `Root folder cannot be read: ${rootPath} (${errorMessage(error)})`
    );
  }

  if (!stats.isDirectory()) {
    throw new ExtractionError('ROOT_NOT_DIRECTORY', `Root path is not a folder: ${rootPath}`);
  }

  try {
    await fs.access(rootPath, fsConstants.R_OK | fsConstants.X_OK);
  } catch (error) {
    throw new ExtractionError(
      'ROOT_UNREADABLE',
      `Root folder cannot be read: ${rootPath} (${errorMessage(error)})`
    );
  }
}

/**
 * Entries sorted by name so runs visit files in a stable order
 */
async function readDirectory(
  directory: string,
  code: ExtractionErrorCode
): Promise<Dirent[]> {
  try {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    throw new ExtractionError(
      code,
      `Folder cannot be read: ${directory} (${errorMessage(error)})`
    );
  }
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

function isHidden(name: string): boolean {
  return name.startsWith('.');
}
