import { z } from 'zod';
import { LogLevel } from '../utils/logger';

// Table names
export const TABLES = {
  PARTICIPANTS: 'participants',
  DATA_DICTIONARY: 'data_dictionary',
} as const;

/**
 * Columns the catalog adds to every device table. A source column may not
 * reuse one of these names.
 */
export const RESERVED_COLUMNS = [
  'id',
  'participant_id',
  'session_id',
  'source_file',
  'row_index',
  'row_key',
  'annotation',
  'created_at',
  'rowid',
  'oid',
  '_rowid_',
] as const;

/**
 * Columns of the participants table the tool writes itself; metadata.csv
 * columns may not reuse them
 */
export const PARTICIPANT_COLUMNS = [
  'participant_id',
  'folder',
  'annotation',
  'created_at',
  'rowid',
  'oid',
  '_rowid_',
] as const;

export const DEFAULT_VIEWER_PORT = 5000;
export const DEFAULT_METADATA_FILE = 'metadata.csv';

const envSchema = z.object({
  CATALOG_DB_PATH: z.string().min(1).default('./catalog.db'),
  DATA_ROOT: z.string().min(1).optional(),
  VIEWER_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_VIEWER_PORT),
  VIEWER_HOST: z.string().min(1).default('127.0.0.1'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface CatalogConfig {
  dbPath: string;
  dataRoot: string | null;
  viewerPort: number;
  viewerHost: string;
  logLevel: LogLevel;
}

/**
 * Builds the configuration handed to the extractor, viewer and query tool.
 * Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CatalogConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      present[key] = value;
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  return {
    dbPath: parsed.data.CATALOG_DB_PATH,
    dataRoot: parsed.data.DATA_ROOT ?? null,
    viewerPort: parsed.data.VIEWER_PORT,
    viewerHost: parsed.data.VIEWER_HOST,
    logLevel: parsed.data.LOG_LEVEL,
  };
}
