#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { DEFAULT_METADATA_FILE, loadConfig } from '../config/catalog';
import { DEFAULT_SENSOR_CATALOG_PATH, loadSensorCatalog } from '../config/sensors';
import { extractFolder } from '../functions/extractFolder';
import { createDefaultRegistry } from '../parsers/registry';
import { CatalogStore } from '../store/catalogStore';
import { ExtractionSummary } from '../types';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { parseArgs, UsageError } from './args';

const USAGE = `Usage: wearable-extract --root <folder> [--db <file>] [--metadata <name>] [--sensors <file>]

  --root      folder with one subfolder per participant (or DATA_ROOT)
  --db        catalog database file (or CATALOG_DB_PATH, default ./catalog.db)
  --metadata  participant metadata file inside the root (default ${DEFAULT_METADATA_FILE})
  --sensors   sensor catalog JSON (default data/sensors.json)`;

export function formatSummary(summary: ExtractionSummary): string {
  const lines = [
    `Extraction finished for ${summary.rootPath}`,
    `  participants:     ${summary.participants}`,
    `  files processed:  ${summary.filesProcessed}`,
    `  files skipped:    ${summary.filesSkipped.length}`,
    `  files unmatched:  ${summary.filesUnmatched}`,
    `  files ignored:    ${summary.filesIgnored}`,
    `  rows inserted:    ${summary.rowsInserted}`,
    `  duplicate rows:   ${summary.rowsDuplicate}`,
    `  duration:         ${summary.durationMs} ms`,
  ];

  const tables = Object.entries(summary.tables).sort(([a], [b]) => a.localeCompare(b));
  if (tables.length > 0) {
    lines.push('', 'Rows inserted per table:');
    for (const [table, rows] of tables) {
      lines.push(`  ${table}: ${rows}`);
    }
  }

  if (summary.filesSkipped.length > 0) {
    lines.push('', 'Skipped files:');
    for (const skipped of summary.filesSkipped) {
      lines.push(`  ${skipped.path}: ${skipped.reason}`);
    }
  }

  return lines.join('\n');
}

/**
 * Runs one extraction and returns the process exit code
 */
export async function runExtract(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let store: CatalogStore | null = null;

  try {
    const { flags } = parseArgs(argv, ['help']);
    if (flags.help) {
      console.log(USAGE);
      return 0;
    }

    const config = loadConfig(env);
    logger.setLevel(config.logLevel);

    const rootPath = flags.root ?? config.dataRoot;
    if (!rootPath) {
      throw new UsageError('--root is required (or set DATA_ROOT)');
    }

    const catalog = loadSensorCatalog(flags.sensors ?? DEFAULT_SENSOR_CATALOG_PATH);
    store = new CatalogStore(flags.db ?? config.dbPath);

    const summary = await extractFolder({
      rootPath,
      store,
      registry: createDefaultRegistry(catalog),
      catalog,
      metadataFile: flags.metadata,
    });

    console.log(formatSummary(summary));
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
    } else {
      console.error(`Extraction failed: ${errorMessage(error)}`);
    }
    return 1;
  } finally {
    store?.close();
  }
}

if (require.main === module) {
  dotenv.config();
  runExtract(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(errorMessage(error));
      process.exitCode = 1;
    });
}
