#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { Server } from 'http';
import { loadConfig } from '../config/catalog';
import { createViewerApp } from '../functions/viewer';
import { CatalogStore } from '../store/catalogStore';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { parseArgs, parsePort, UsageError } from './args';

const USAGE = `Usage: wearable-serve [--db <file>] [--port <number>] [--host <address>]

  --db    catalog database file (or CATALOG_DB_PATH, default ./catalog.db)
  --port  listening port (or VIEWER_PORT, default 5000)
  --host  listening address (or VIEWER_HOST, default 127.0.0.1)`;

export interface RunningViewer {
  server: Server;
  store: CatalogStore;
  close(): Promise<void>;
}

/**
 * Opens the catalog read-only and starts the viewer
 */
export async function startViewer(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): Promise<RunningViewer> {
  const { flags } = parseArgs(argv);
  const config = loadConfig(env);
  logger.setLevel(config.logLevel);

  const port = parsePort(flags.port) ?? config.viewerPort;
  const host = flags.host ?? config.viewerHost;
  const dbPath = flags.db ?? config.dbPath;

  const store = new CatalogStore(dbPath, { readonly: true });
  const app = createViewerApp({ store });

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, host, () => resolve(listening));
    listening.once('error', reject);
  }).catch((error: unknown) => {
    store.close();
    throw error;
  });

  logger.info('viewer_started', { dbPath, host, port });

  return {
    server,
    store,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => {
          store.close();
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      }),
  };
}

async function main(): Promise<void> {
  dotenv.config();
  const argv = process.argv.slice(2);
  if (argv.includes('--help')) {
    console.log(USAGE);
    return;
  }

  let viewer: RunningViewer;
  try {
    viewer = await startViewer(argv);
  } catch (error) {
    console.error(error instanceof UsageError ? `${error.message}\n\n${USAGE}` : `Viewer failed to start: ${errorMessage(error)}`);
    process.exitCode = 1;
    return;
  }

  const address = viewer.server.address();
  if (address && typeof address !== 'string') {
    console.log(`Catalog viewer listening on http://${address.address}:${address.port}`);
  }

  const shutdown = (): void => {
    logger.info('viewer_stopping', {});
    viewer.close().catch((error: unknown) => {
      logger.error('viewer_stop_failed', { error: errorMessage(error) });
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
  });
}
